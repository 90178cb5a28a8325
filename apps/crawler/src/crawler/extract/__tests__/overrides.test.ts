import { describe, expect, it } from 'vitest'
import type { OverrideRule } from '../../data/index.js'
import { applyOverrides } from '../overrides.js'

describe('applyOverrides', () => {
  it('corrects the hierarchy of a known estate', () => {
    const result = applyOverrides({ estateName: '映日灣', districtLevel2: '荃灣', title: '映日灣 1座' })

    expect(result.fields).toEqual({
      estateName: '映日灣',
      districtLevel2: '荃灣 | 麗城',
      subDistrict: '荃灣西',
      title: '映日灣 1座',
    })
    expect(result.applied).toEqual(['映日灣 is listed under 荃灣 | 麗城 / 荃灣西 on Centaline'])
  })

  it('matches on any of the listed fields', () => {
    const result = applyOverrides({ districtLevel2: '港島東', subDistrict: '北角', district: '灣仔' })

    expect(result.fields.district).toBe('東區')
  })

  it('returns the same fields when nothing matches', () => {
    const fields = { estateName: '逸瓏灣', districtLevel2: '大埔' }
    const result = applyOverrides(fields)

    expect(result.fields).toBe(fields)
    expect(result.applied).toEqual([])
  })

  it('applies custom rules in order', () => {
    const rules: OverrideRule[] = [
      { description: 'first', match: { fields: ['estateName'], equals: '甲' }, set: { estateName: '乙' } },
      { description: 'second', match: { fields: ['estateName'], equals: '乙' }, set: { subDistrict: '丙區' } },
    ]

    const result = applyOverrides({ estateName: '甲' }, rules)

    expect(result.fields).toEqual({ estateName: '乙', subDistrict: '丙區' })
    expect(result.applied).toEqual(['first', 'second'])
  })
})
