import { readFileSync } from 'node:fs'
import { describe, expect, it } from 'vitest'
import { ParseFailureError, ValidationRejectionError } from '../../errors.js'
import { buildListingRecord } from '../../process/listing.js'
import { centanetProfile } from '../../sites/centanet/profile.js'
import { hashUrl } from '../../utils/url.js'
import { extractFields } from '../pipeline.js'

function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8')
}

const crawledAt = new Date('2024-03-05T02:00:00.000Z')

describe('extractFields', () => {
  it('resolves the breadcrumb first and seeds the hierarchy from it', () => {
    const result = extractFields(
      fixture('centanet-detail.html'),
      'https://hk.centanet.com/findproperty/detail/逸瓏灣-2期-8座_ABC123',
      centanetProfile
    )
    if (!result.ok) throw new Error(result.reason)

    expect(result.fields.breadcrumbPath).toEqual(['買樓', '新界東', '大埔', '白石角', '逸瓏灣'])
    const winners = Object.fromEntries(result.extractions.map(e => [e.fieldName, e.strategyId]))
    expect(winners).toMatchObject({
      breadcrumbPath: 'navMarkup',
      category: 'breadcrumbPath:navMarkup',
      estateName: 'breadcrumbPath:navMarkup',
      district: 'pathVocabulary',
      title: 'heading',
      price: 'element',
      monthlyMortgagePayment: 'pageText',
    })
  })

  it('anchors embedded navigation data at the list category', () => {
    const html = `<html><body><h1>映日灣 1座</h1>
      <script>window.__STATE__={paths:[{path:"新界西_4-NW"},{path:"荃灣 | 麗城_23-WS050"},{path:"荃灣西_19-WS"},{path:"映日灣_E01"}]}</script>
      </body></html>`

    const result = extractFields(html, 'https://hk.centanet.com/findproperty/detail/映日灣-1座_AB12', centanetProfile, {
      categoryLabel: '買樓',
    })
    if (!result.ok) throw new Error(result.reason)

    expect(result.fields).toMatchObject({
      breadcrumbPath: ['買樓', '新界西', '荃灣 | 麗城', '荃灣西', '映日灣'],
      category: '買樓',
      region: '新界西',
      districtLevel2: '荃灣 | 麗城',
      subDistrict: '荃灣西',
      estateName: '映日灣',
      district: '荃灣',
      address: '新界西 荃灣 映日灣',
    })
  })

  it('ignores embedded navigation data that never reaches a category', () => {
    const html = `<html><body><h1>映日灣 1座</h1>
      <script>window.__STATE__={paths:[{path:"新界西_4-NW"},{path:"荃灣西_19-WS"}]}</script>
      </body></html>`

    const result = extractFields(html, 'https://hk.centanet.com/findproperty/detail/映日灣-1座_AB12', centanetProfile)
    if (!result.ok) throw new Error(result.reason)

    expect(result.fields.breadcrumbPath).toBeUndefined()
    expect(result.fields.category).toBeUndefined()
    expect(result.fields.estateName).toBe('映日灣')
  })

  it('reads a JSON-LD BreadcrumbList in position order', () => {
    const html = `<html><head><script type="application/ld+json">
      {"@context":"https://schema.org","@type":"BreadcrumbList","itemListElement":[
        {"@type":"ListItem","position":3,"name":"港島"},
        {"@type":"ListItem","position":1,"name":"主頁"},
        {"@type":"ListItem","position":2,"item":{"name":"買樓"}},
        {"@type":"ListItem","position":4,"name":"灣仔"}]}
      </script></head><body><h1>星街小區</h1></body></html>`

    const result = extractFields(html, 'https://hk.centanet.com/findproperty/detail/x_1', centanetProfile)
    if (!result.ok) throw new Error(result.reason)

    expect(result.fields).toMatchObject({
      breadcrumbPath: ['買樓', '港島', '灣仔'],
      region: '港島',
      districtLevel2: '灣仔',
      district: '灣仔',
    })
    expect(result.fields.estateName).toBeUndefined()
  })

  it('falls back to a breadcrumb written as text', () => {
    const html = '<html><body><p>主頁 > 租樓 > 九龍 > 旺角</p><h1>旺角中心</h1></body></html>'

    const result = extractFields(html, 'https://hk.centanet.com/findproperty/detail/x_2', centanetProfile)
    if (!result.ok) throw new Error(result.reason)

    expect(result.fields.breadcrumbPath).toEqual(['租樓', '九龍', '旺角'])
    expect(result.extractions[0]).toMatchObject({ fieldName: 'breadcrumbPath', strategyId: 'textPattern', strategyRank: 3 })
  })

  it('recognises a plain link list that starts at the region', () => {
    const html = `<html><body>
      <div class="crumbs"><a href="/">首頁</a> <a href="/r">新界西</a> <a href="/d">荃灣</a> <a href="/e">御凱</a></div>
      <h1>御凱 2座</h1></body></html>`

    const result = extractFields(html, 'https://hk.centanet.com/findproperty/detail/x_3', centanetProfile, {
      categoryLabel: '租樓',
    })
    if (!result.ok) throw new Error(result.reason)

    expect(result.fields.breadcrumbPath).toEqual(['租樓', '新界西', '荃灣', '御凱'])
    expect(result.fields.estateName).toBe('御凱')
    expect(result.extractions[0].strategyId).toBe('navLinks')
  })

  it('reports an empty page', () => {
    expect(extractFields('   ', 'https://hk.centanet.com/findproperty/detail/x_4', centanetProfile)).toEqual({
      ok: false,
      reason: 'EMPTY_PAGE',
      details: 'Page body is empty',
    })
  })
})

describe('buildListingRecord', () => {
  it('builds the Scenario A record', () => {
    const url = 'https://hk.centanet.com/findproperty/detail/逸瓏灣-2期-8座_ABC123'

    const record = buildListingRecord(fixture('centanet-detail.html'), url, centanetProfile, { crawledAt })

    expect(record).toEqual({
      propertyId: hashUrl(url),
      source: 'centanet',
      url,
      title: '逸瓏灣 2期 8座 中層',
      price: 24_800_000,
      priceDisplay: '$2,480萬',
      monthlyMortgagePayment: 85_000,
      area: 620,
      areaDisplay: '實用面積: 620呎',
      district: '大埔',
      street: '大埔科進路8號',
      address: '大埔科進路8號',
      category: '買樓',
      region: '新界東',
      districtLevel2: '大埔',
      subDistrict: '白石角',
      estateName: '逸瓏灣',
      breadcrumb: '主頁 > 買樓 > 新界東 > 大埔 > 白石角 > 逸瓏灣',
      propertyType: '住宅',
      bedrooms: 2,
      bathrooms: 1,
      floor: '中層',
      buildingAge: 8,
      orientation: '東南',
      description: '海景開揚，鄰近港鐵站。',
      images: ['https://hk.centanet.com/photos/1.jpg', 'https://hk.centanet.com/photos/2.jpg'],
      facilities: ['會所', '泳池'],
      updateDate: '2024-03-05',
      crawledAt: '2024-03-05T02:00:00.000Z',
    })
  })

  it('gives the same record for the same page', () => {
    const url = 'https://hk.centanet.com/findproperty/detail/逸瓏灣-2期-8座_ABC123'
    const html = fixture('centanet-detail.html')

    expect(buildListingRecord(html, url, centanetProfile, { crawledAt })).toEqual(
      buildListingRecord(html, url, centanetProfile, { crawledAt })
    )
  })

  it('infers the estate and title from the URL slug (Scenario C)', () => {
    const url = 'https://hk.centanet.com/findproperty/detail/荃灣西-御凱-2座_XYZ'

    const record = buildListingRecord(fixture('slug-only-detail.html'), url, centanetProfile, { crawledAt })

    expect(record).toMatchObject({
      title: '荃灣西 御凱 2座',
      estateName: '御凱',
      price: 6_800_000,
      area: 450,
      areaDisplay: '實用面積 450 呎',
      breadcrumb: null,
      category: null,
      region: null,
      address: null,
      images: [],
    })
  })

  it('applies estate overrides before canonicalizing', () => {
    const html = `<html><body><h1>映日灣 1座</h1>
      <script>window.__STATE__={paths:[{path:"新界西_4-NW"},{path:"荃灣_23"},{path:"映日灣_E01"}]}</script>
      </body></html>`

    const record = buildListingRecord(html, 'https://hk.centanet.com/findproperty/detail/映日灣-1座_AB12', centanetProfile, {
      crawledAt,
      categoryLabel: '買樓',
    })

    expect(record.breadcrumb).toBe('主頁 > 買樓 > 新界西 > 荃灣 | 麗城 > 荃灣西 > 映日灣')
    expect(record).toMatchObject({
      districtLevel2: '荃灣 | 麗城',
      subDistrict: '荃灣西',
      estateName: '映日灣',
      district: '荃灣',
    })
  })

  it('rejects a page whose title cannot be resolved', () => {
    const build = () =>
      buildListingRecord('<html><body><p>價錢待定</p></body></html>', 'https://hk.centanet.com/findproperty/detail/登入', centanetProfile, {
        crawledAt,
      })

    expect(build).toThrow(ValidationRejectionError)
  })

  it('raises a parse failure for an empty page', () => {
    expect(() =>
      buildListingRecord('', 'https://hk.centanet.com/findproperty/detail/x_1', centanetProfile, { crawledAt })
    ).toThrow(ParseFailureError)
  })
})
