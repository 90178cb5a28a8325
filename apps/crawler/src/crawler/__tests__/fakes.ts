/**
 * In-process stand-ins for the page fetcher and rate limiter, plus HTML and
 * record builders shared by the crawler tests.
 */

import { vi } from 'vitest'
import type {
  ListingRecord,
  PageFetcher,
  PageFetchFailureCode,
  PageFetchOptions,
  PageFetchResult,
  RateLimiter,
} from '../types.js'

/** HTML body, or a failure to report */
export type FakePage = string | { errorCode: PageFetchFailureCode; errorMessage?: string }

function toResult(page: FakePage): PageFetchResult {
  if (typeof page === 'string') {
    return { success: true, html: page, statusCode: 200, durationMs: 1 }
  }
  return {
    success: false,
    errorCode: page.errorCode,
    errorMessage: page.errorMessage ?? page.errorCode,
    durationMs: 1,
  }
}

export function createFakeFetcher(respond: (url: string, options: PageFetchOptions) => FakePage | Promise<FakePage>) {
  const fetcher = {
    fetch: vi.fn<PageFetcher['fetch']>(async (url, options) => toResult(await respond(url, options))),
    closeSession: vi.fn<PageFetcher['closeSession']>(async () => undefined),
  }
  return fetcher satisfies PageFetcher
}

/** Serves fixed pages by URL; anything else is a 404 */
export function pagesFetcher(pages: Readonly<Record<string, FakePage>>) {
  return createFakeFetcher(url => pages[url] ?? { errorCode: 'HTTP_ERROR', errorMessage: 'HTTP 404: Not Found' })
}

export const immediateRateLimiter: RateLimiter = {
  acquire: async () => undefined,
}

export function listPage(hrefs: readonly string[]): string {
  const items = hrefs.map(href => `<li><a href="${href}">listing</a></li>`).join('')
  return `<html><body><ul class="results">${items}</ul></body></html>`
}

export function detailPage(title: string): string {
  return `<html><body><h1>${title}</h1><p>售價 $500萬</p></body></html>`
}

export function makeRecord(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    propertyId: '0123456789abcdef',
    source: '28hse',
    url: 'https://www.28hse.com/buy/apartment/property-1',
    title: '御凱 2座',
    price: 5_000_000,
    priceDisplay: '$500萬',
    monthlyMortgagePayment: null,
    area: null,
    areaDisplay: null,
    district: null,
    street: null,
    address: null,
    category: null,
    region: null,
    districtLevel2: null,
    subDistrict: null,
    estateName: null,
    breadcrumb: null,
    propertyType: null,
    bedrooms: null,
    bathrooms: null,
    floor: null,
    buildingAge: null,
    orientation: null,
    description: null,
    images: [],
    facilities: [],
    updateDate: null,
    crawledAt: '2024-03-05T02:00:00.000Z',
    ...overrides,
  }
}
