import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../errors.js'
import { centanetProfile } from '../centanet/profile.js'
import { hse28Profile } from '../hse28/profile.js'
import { BUILT_IN_PROFILES, getSiteProfile, getSiteRegistry, SiteProfileRegistry } from '../registry.js'

describe('SiteProfileRegistry', () => {
  it('rejects a second profile with the same id', () => {
    const registry = new SiteProfileRegistry()
    registry.register(centanetProfile)

    expect(() => registry.register({ ...centanetProfile, baseUrl: 'https://example.test' })).toThrow(
      "Site profile 'centanet' is already registered"
    )
  })

  it('rejects a second profile on the same registrable domain', () => {
    const registry = new SiteProfileRegistry()
    registry.register(centanetProfile)

    expect(() => registry.register({ ...centanetProfile, id: 'centanet-mobile', baseUrl: 'https://m.centanet.com' })).toThrow(
      ConfigurationError
    )
  })

  it('looks profiles up by id and by domain', () => {
    const registry = new SiteProfileRegistry()
    registry.register(centanetProfile)
    registry.register(hse28Profile)

    expect(registry.get('CENTANET')).toBe(centanetProfile)
    expect(registry.getByDomain('https://www.28hse.com/buy/apartment')).toBe(hse28Profile)
    expect(registry.getByDomain('28HSE.com')).toBe(hse28Profile)
    expect(registry.getByDomain('example.test')).toBeUndefined()
  })
})

describe('built-in profiles', () => {
  it('registers every built-in site once', () => {
    expect(getSiteRegistry().ids()).toEqual(['centanet', '28hse', 'ricacorp'])
    expect(getSiteProfile('ricacorp')?.pagination).toEqual({ mode: 'query_param', paramName: 'page' })
  })

  it('never treats a list URL as a detail page', () => {
    for (const profile of BUILT_IN_PROFILES) {
      for (const listUrl of Object.values(profile.listUrls)) {
        expect(profile.detailPathPattern.test(new URL(listUrl).pathname)).toBe(false)
      }
    }
  })

  it('is immutable', () => {
    expect(Object.isFrozen(centanetProfile)).toBe(true)
  })
})
