import { describe, expect, it } from 'vitest'
import { makeRecord } from '../../__tests__/fakes.js'
import { filterByRegion, matchesRegion, regionVariants } from '../region-filter.js'

describe('regionVariants', () => {
  it('expands a broad region to its subregions', () => {
    expect(regionVariants('新界')).toEqual(['新界', '新界東', '新界东', '新界西'])
  })

  it('maps a simplified spelling to its narrowest group', () => {
    expect(regionVariants('新界东')).toEqual(['新界東', '新界东'])
    expect(regionVariants('香港岛')).toEqual(['港島', '香港島', '香港岛', '港岛'])
  })

  it('keeps an unknown region as given', () => {
    expect(regionVariants(' 火星 ')).toEqual(['火星'])
  })
})

describe('matchesRegion', () => {
  it('matches on region equality', () => {
    expect(matchesRegion(makeRecord({ region: '九龙' }), ['九龍', '九龙'])).toBe(true)
  })

  it('matches on a districtLevel2 substring', () => {
    expect(matchesRegion(makeRecord({ districtLevel2: '九龍城' }), ['九龍', '九龙'])).toBe(true)
    expect(matchesRegion(makeRecord({ districtLevel2: '沙田' }), ['九龍', '九龙'])).toBe(false)
  })
})

describe('filterByRegion', () => {
  it('keeps records in any spelling of the region', () => {
    const records = [
      makeRecord({ propertyId: 'a', region: '新界東' }),
      makeRecord({ propertyId: 'b', region: '新界西' }),
      makeRecord({ propertyId: 'c', region: '港島' }),
      makeRecord({ propertyId: 'd' }),
    ]

    expect(filterByRegion(records, '新界').map(record => record.propertyId)).toEqual(['a', 'b'])
    expect(filterByRegion(records, '新界东').map(record => record.propertyId)).toEqual(['a'])
  })
})
