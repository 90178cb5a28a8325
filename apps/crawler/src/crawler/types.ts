/**
 * Crawler Core Types
 *
 * Site profiles, the page-fetcher contract, extraction values and the
 * records a crawl run produces.
 */

import type { CheerioAPI } from 'cheerio'

// ═══════════════════════════════════════════════════════════════════════════════
// Site Profile
// ═══════════════════════════════════════════════════════════════════════════════

export type ListingCategory = 'buy' | 'rent'

/**
 * How a site advances from one list page to the next.
 *
 * query_param pages are independent URLs. script_driven pages only exist as
 * rendered state: page N is reached by running a script on page N-1 in the
 * same fetcher session.
 */
export type PaginationConfig =
  | { mode: 'query_param'; paramName: string }
  | {
      mode: 'script_driven'
      /** Page-side script that advances the loaded list to `page` */
      pageScript: (page: number) => string
      /** Delay after the script before the HTML is re-read */
      settleDelaySeconds: number
    }

export type PaginationMode = PaginationConfig['mode']

/** CSS selectors tried in order by the `element`-style strategies */
export interface SiteSelectors {
  breadcrumb: readonly string[]
  title: readonly string[]
  price: readonly string[]
  area: readonly string[]
  address: readonly string[]
  description: readonly string[]
  images: readonly string[]
  facilities: readonly string[]
}

export interface SiteProfile {
  /** Stable source id written to every record (e.g. 'centanet') */
  readonly id: string
  readonly name: string
  readonly baseUrl: string
  readonly listUrls: Readonly<Record<ListingCategory, string>>
  readonly pagination: PaginationConfig
  /** Minimum delay between requests to the site's domain */
  readonly rateLimitMs: number
  readonly maxConcurrency: number
  /** Detail page timeout */
  readonly timeoutMs: number
  readonly listTimeoutMs: number
  /** List page timeout when a page script runs */
  readonly scriptTimeoutMs: number
  readonly retryCount: number
  /** Matched against the decoded path of candidate links */
  readonly detailPathPattern: RegExp
  /** Lowercased fragments that disqualify a link anywhere in its href */
  readonly excludedPathFragments: readonly string[]
  readonly selectors: SiteSelectors
  readonly fieldStrategies: FieldStrategyTable
  /** Brand strings stripped from page titles */
  readonly siteNames: readonly string[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Page Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

export type WaitCondition = 'load' | 'domcontentloaded' | 'networkidle'

export interface PageFetchOptions {
  /** Reuse browser/cookie state across calls with the same id */
  sessionId?: string
  /** Script to run on the page already loaded in the session */
  scriptToRun?: string
  waitCondition: WaitCondition
  extraDelaySeconds: number
  timeoutMs: number
}

export type PageFetchFailureCode =
  | 'HTTP_ERROR'
  | 'TIMEOUT'
  | 'BLOCKED'
  | 'TOO_LARGE'
  | 'NETWORK_ERROR'
  | 'SCRIPT_UNSUPPORTED'
  | 'SCRIPT_FAILED'

export type PageFetchResult =
  | { success: true; html: string; statusCode?: number; durationMs: number }
  | {
      success: false
      errorCode: PageFetchFailureCode
      errorMessage: string
      statusCode?: number
      durationMs: number
    }

/**
 * Rendering engine boundary. The crawler only sees HTML or a failure.
 */
export interface PageFetcher {
  fetch(url: string, options: PageFetchOptions): Promise<PageFetchResult>
  closeSession(sessionId: string): Promise<void>
}

/**
 * Per-domain request pacing. `acquire` resolves when a request may be sent.
 */
export interface RateLimiter {
  acquire(urlOrDomain: string): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction
// ═══════════════════════════════════════════════════════════════════════════════

/** A numeric value plus the text it was read from */
export interface Measured {
  value: number
  display: string
}

export interface FieldValueMap {
  /** Breadcrumb parts with the home sentinel removed */
  breadcrumbPath: string[]
  category: string
  region: string
  district: string
  districtLevel2: string
  subDistrict: string
  estateName: string
  street: string
  address: string
  title: string
  price: Measured
  area: Measured
  monthlyMortgagePayment: Measured
  propertyType: string
  bedrooms: number
  bathrooms: number
  floor: string
  buildingAge: number
  orientation: string
  /** YYYY-MM-DD */
  updateDate: string
  description: string
  images: string[]
  facilities: string[]
}

export type FieldName = keyof FieldValueMap

export type ResolvedFields = Partial<FieldValueMap>

export type HierarchyField = 'category' | 'region' | 'districtLevel2' | 'subDistrict' | 'estateName'

export type Hierarchy = Record<HierarchyField, string | null>

/** One field's winning candidate and the strategy that produced it */
export interface RawExtraction<K extends FieldName = FieldName> {
  fieldName: K
  value: FieldValueMap[K]
  strategyId: string
  /** Position of the strategy in the site's chain for this field */
  strategyRank: number
}

/**
 * A parsed detail page. Built once per page; strategies only read from it.
 */
export interface PageDocument {
  readonly $: CheerioAPI
  /** Visible text, one entry per block, whitespace collapsed */
  readonly lines: readonly string[]
  readonly text: string
  /** Inline script bodies */
  readonly scripts: readonly string[]
  /** Parsed JSON-LD nodes, @graph entries flattened */
  readonly jsonLd: readonly Record<string, unknown>[]
}

export interface StrategyInput {
  readonly doc: PageDocument
  readonly url: string
  readonly profile: SiteProfile
  readonly resolved: Readonly<ResolvedFields>
  /** Category of the list the page came from (買樓 / 租樓), if known */
  readonly categoryLabel: string | null
}

export type FieldStrategy<K extends FieldName> = (input: StrategyInput) => FieldValueMap[K] | null

/**
 * Strategy ids available per field. Fields mapped to `never` are only
 * filled from the breadcrumb path.
 */
export interface StrategyIds {
  breadcrumbPath: 'navMarkup' | 'embeddedNavData' | 'jsonLdBreadcrumb' | 'textPattern' | 'navLinks'
  category: never
  region: never
  district: 'pathVocabulary' | 'districtLevel2Prefix' | 'labelledText'
  districtLevel2: never
  subDistrict: never
  estateName: 'labelledText' | 'urlSlug'
  street: 'labelledText' | 'addressPattern'
  address: 'element' | 'structuredData' | 'composed'
  title: 'heading' | 'metaTitle' | 'urlSlug' | 'estateName'
  price: 'element' | 'pageText' | 'structuredData'
  area: 'element' | 'pageText'
  monthlyMortgagePayment: 'pageText'
  propertyType: 'labelledText' | 'vocabulary'
  bedrooms: 'pageText'
  bathrooms: 'pageText'
  floor: 'pageText'
  buildingAge: 'pageText'
  orientation: 'pageText'
  updateDate: 'pageText'
  description: 'element' | 'metaDescription'
  images: 'gallery' | 'ogImage' | 'structuredData'
  facilities: 'listItems'
}

/** Declarative per-site table: field -> ordered strategy ids */
export type FieldStrategyTable = {
  readonly [K in FieldName]?: readonly StrategyIds[K][]
}

export type ExtractFailureReason = 'EMPTY_PAGE' | 'PARSE_FAILED'

export type ExtractResult =
  | { ok: true; fields: ResolvedFields; extractions: RawExtraction[] }
  | { ok: false; reason: ExtractFailureReason; details?: string }

// ═══════════════════════════════════════════════════════════════════════════════
// Run Records
// ═══════════════════════════════════════════════════════════════════════════════

export interface FrontierUrl {
  url: string
  /** List page the link was found on */
  page: number
  siteId: string
}

export interface ListingRecord {
  propertyId: string
  source: string
  url: string
  title: string
  price: number | null
  priceDisplay: string | null
  monthlyMortgagePayment: number | null
  area: number | null
  areaDisplay: string | null
  district: string | null
  street: string | null
  address: string | null
  category: string | null
  region: string | null
  districtLevel2: string | null
  subDistrict: string | null
  estateName: string | null
  breadcrumb: string | null
  propertyType: string | null
  bedrooms: number | null
  bathrooms: number | null
  floor: string | null
  buildingAge: number | null
  orientation: string | null
  description: string | null
  images: string[]
  facilities: string[]
  updateDate: string | null
  /** ISO 8601 */
  crawledAt: string
}

export type RejectReason = 'TITLE_UNRESOLVED' | 'INVALID_URL'

export type AssembleResult =
  | { status: 'ok'; record: ListingRecord }
  | { status: 'reject'; reason: RejectReason; details: string }

export type FailureReason =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'VALIDATION_REJECTED'
  | 'UNEXPECTED_ERROR'

export interface FailedUrl {
  url: string
  siteId: string
  reason: FailureReason
  message: string
}

export type DetailOutcome =
  | { url: string; record: ListingRecord; failure: null }
  | { url: string; record: null; failure: FailedUrl }

export type SiteCrawlStatus = 'completed' | 'aborted'

export interface SiteCrawlSummary {
  siteId: string
  status: SiteCrawlStatus
  urlsFound: number
  urlsScheduled: number
  succeeded: number
  failed: number
  /** Set when the walk aborted */
  error?: string
}
