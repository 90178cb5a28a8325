import { describe, expect, it } from 'vitest'
import {
  canonicalizeUrl,
  getRegistrableDomain,
  hashUrl,
  parseUrlSlug,
  withQueryParam,
} from '../url.js'

describe('canonicalizeUrl', () => {
  it('resolves relative links against the base URL', () => {
    expect(canonicalizeUrl('/findproperty/detail/abc_CWJ731', 'https://hk.centanet.com')).toBe(
      'https://hk.centanet.com/findproperty/detail/abc_CWJ731'
    )
  })

  it('treats encoded and decoded paths as the same URL', () => {
    const encoded = canonicalizeUrl(
      'https://hk.centanet.com/findproperty/detail/%E7%93%8F%E9%96%80_CWJ731'
    )
    const decoded = canonicalizeUrl('https://hk.centanet.com/findproperty/detail/瓏門_CWJ731')
    expect(encoded).toBe('https://hk.centanet.com/findproperty/detail/瓏門_CWJ731')
    expect(decoded).toBe(encoded)
  })

  it('drops fragments, tracking params and trailing slashes, and sorts the query', () => {
    expect(
      canonicalizeUrl('HTTP://WWW.28HSE.COM/buy/apartment/property-123/?utm_source=x&b=2&a=1#photos')
    ).toBe('https://www.28hse.com/buy/apartment/property-123?a=1&b=2')
  })

  it('keeps identifying query parameters and encoded reserved characters', () => {
    const first = canonicalizeUrl('https://example.test/detail?id=1')
    const second = canonicalizeUrl('https://example.test/detail?id=2')
    expect(first).not.toBe(second)
    expect(canonicalizeUrl('https://example.test/a%2Fb')).toBe('https://example.test/a%2Fb')
  })

  it('keeps ASCII escapes encoded and maps a canonical URL to itself', () => {
    const escaped = canonicalizeUrl('https://hk.centanet.com/findproperty/detail/x%2541_1')
    expect(escaped).toBe('https://hk.centanet.com/findproperty/detail/x%2541_1')
    expect(canonicalizeUrl('https://hk.centanet.com/findproperty/detail/xA_1')).not.toBe(escaped)

    const canonical = canonicalizeUrl(
      'https://hk.centanet.com/findproperty/detail/%E5%BE%A1%E5%87%B1_XYZ?q=%E5%BE%A1&p=%2541'
    )
    expect(canonical).toBe('https://hk.centanet.com/findproperty/detail/御凱_XYZ?p=%2541&q=御')
    expect(canonical && canonicalizeUrl(canonical)).toBe(canonical)
  })

  it('rejects non-http links', () => {
    expect(canonicalizeUrl('javascript:void(0)', 'https://example.test')).toBeNull()
    expect(canonicalizeUrl('mailto:agent@example.test')).toBeNull()
  })
})

describe('url helpers', () => {
  it('finds the registrable domain', () => {
    expect(getRegistrableDomain('https://hk.centanet.com/findproperty/list/buy')).toBe('centanet.com')
  })

  it('hashes to 16 hex characters', () => {
    const hash = hashUrl('https://hk.centanet.com/findproperty/detail/瓏門_CWJ731')
    expect(hash).toMatch(/^[0-9a-f]{16}$/)
    expect(hashUrl('https://hk.centanet.com/findproperty/detail/瓏門_CWJ731')).toBe(hash)
  })

  it('sets a query parameter', () => {
    expect(withQueryParam('https://www.28hse.com/buy/apartment', 'page', '3')).toBe(
      'https://www.28hse.com/buy/apartment?page=3'
    )
  })

  it('parses slug tokens and the listing id', () => {
    expect(parseUrlSlug('https://hk.centanet.com/findproperty/detail/%E8%8D%83%E7%81%A3%E8%A5%BF-%E5%BE%A1%E5%87%B1-2%E5%BA%A7_XYZ')).toEqual({
      text: '荃灣西-御凱-2座',
      tokens: ['荃灣西', '御凱', '2座'],
      listingId: 'XYZ',
    })
    expect(parseUrlSlug('https://www.28hse.com/')).toBeNull()
  })
})
