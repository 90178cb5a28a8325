/**
 * Crawl Orchestrator
 *
 * Walks each selected site in sequence, schedules its detail pages and
 * collects outcomes into one CrawlRun. A site whose walk aborts is reported
 * and skipped; the run continues with the next site.
 */

import { loggers } from '../config/logger.js'
import { classifyError } from './errors.js'
import { DEFAULT_RETRY_POLICY, HttpFetcher } from './fetch/http-fetcher.js'
import { PacingRateLimiter } from './fetch/rate-limiter.js'
import { filterByRegion } from './process/region-filter.js'
import { CrawlRun } from './process/run-state.js'
import { DetailFetchScheduler } from './process/scheduler.js'
import type {
  FailedUrl,
  FrontierUrl,
  ListingCategory,
  ListingRecord,
  PageFetcher,
  SiteCrawlSummary,
  SiteProfile,
} from './types.js'
import { ListPageWalker } from './walk/list-walker.js'

const log = loggers.crawl

export interface CrawlOptions {
  profiles: readonly SiteProfile[]
  category: ListingCategory
  maxPages: number
  /** Cap on detail pages scheduled across all sites */
  maxProperties?: number
  /** Keep only records in this region (any spelling variant) */
  region?: string
  /** Fetcher per site; defaults to an HttpFetcher honoring the profile's retry count */
  createFetcher?: (profile: SiteProfile) => PageFetcher
  rateLimiter?: PacingRateLimiter
  userAgent?: string
  maxResponseBytes?: number
  clock?: () => Date
}

export interface CrawlReport {
  startedAt: Date
  finishedAt: Date
  category: ListingCategory
  region: string | null
  sites: SiteCrawlSummary[]
  /** Records after the region filter */
  records: ListingRecord[]
  failures: FailedUrl[]
  /** Records dropped by the region filter */
  filteredOut: number
}

function defaultFetcherFactory(options: CrawlOptions): (profile: SiteProfile) => PageFetcher {
  return profile =>
    new HttpFetcher({
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: profile.retryCount },
      userAgent: options.userAgent,
      maxSizeBytes: options.maxResponseBytes,
    })
}

export async function runCrawl(options: CrawlOptions): Promise<CrawlReport> {
  const run = new CrawlRun({ category: options.category, clock: options.clock })
  const rateLimiter = options.rateLimiter ?? new PacingRateLimiter()
  const createFetcher = options.createFetcher ?? defaultFetcherFactory(options)
  const sites: SiteCrawlSummary[] = []
  let scheduledTotal = 0

  log.info('Crawl started', {
    sites: options.profiles.map(profile => profile.id),
    category: options.category,
    maxPages: options.maxPages,
    maxProperties: options.maxProperties ?? null,
    region: options.region ?? null,
  })

  for (const profile of options.profiles) {
    const remaining =
      options.maxProperties === undefined ? Number.POSITIVE_INFINITY : options.maxProperties - scheduledTotal
    if (remaining <= 0) {
      log.info('Property budget used up, skipping site', { siteId: profile.id })
      sites.push({ siteId: profile.id, status: 'completed', urlsFound: 0, urlsScheduled: 0, succeeded: 0, failed: 0 })
      continue
    }

    rateLimiter.setMinDelay(profile.baseUrl, profile.rateLimitMs)
    const fetcher = createFetcher(profile)
    const summary = await crawlSite(profile, {
      run,
      fetcher,
      rateLimiter,
      listUrl: profile.listUrls[options.category],
      maxPages: options.maxPages,
      budget: remaining,
    })
    scheduledTotal += summary.urlsScheduled
    sites.push(summary)
  }

  const records = options.region ? filterByRegion(run.records, options.region) : [...run.records]
  const report: CrawlReport = {
    startedAt: run.startedAt,
    finishedAt: run.now(),
    category: options.category,
    region: options.region ?? null,
    sites,
    records,
    failures: [...run.failures],
    filteredOut: run.records.length - records.length,
  }

  log.info('Crawl finished', {
    records: report.records.length,
    failures: report.failures.length,
    filteredOut: report.filteredOut,
    aborted: sites.filter(site => site.status === 'aborted').map(site => site.siteId),
  })
  return report
}

interface SiteCrawlContext {
  run: CrawlRun
  fetcher: PageFetcher
  rateLimiter: PacingRateLimiter
  listUrl: string
  maxPages: number
  budget: number
}

async function crawlSite(profile: SiteProfile, context: SiteCrawlContext): Promise<SiteCrawlSummary> {
  const { run, fetcher, rateLimiter } = context
  const walker = new ListPageWalker({ fetcher, rateLimiter })
  const frontier: FrontierUrl[] = []
  let urlsFound = 0

  try {
    for await (const item of walker.walk(profile, context.listUrl, context.maxPages)) {
      urlsFound++
      if (!run.frontier.add(item.url)) continue
      frontier.push(item)
      // Stop walking once the budget is covered
      if (frontier.length >= context.budget) break
    }
  } catch (error) {
    const classified = classifyError(error)
    log.error('Site aborted', { siteId: profile.id, code: classified.code }, error)
    return {
      siteId: profile.id,
      status: 'aborted',
      urlsFound,
      urlsScheduled: 0,
      succeeded: 0,
      failed: 0,
      error: classified.message,
    }
  }

  log.info('Frontier ready', { siteId: profile.id, urlsFound, scheduled: frontier.length })

  const scheduler = new DetailFetchScheduler({ fetcher, rateLimiter })
  let succeeded = 0
  let failed = 0
  for await (const outcome of scheduler.run(profile, frontier, run)) {
    if (outcome.record) succeeded++
    else failed++
  }

  return {
    siteId: profile.id,
    status: 'completed',
    urlsFound,
    urlsScheduled: frontier.length,
    succeeded,
    failed,
  }
}
