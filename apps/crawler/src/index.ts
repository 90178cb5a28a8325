/**
 * Listing crawler public API.
 */

export { runCrawl, type CrawlOptions, type CrawlReport } from './crawler/crawl.js'
export {
  classifyError,
  ConfigurationError,
  CrawlError,
  FetchFailureError,
  ListWalkAbortedError,
  ParseFailureError,
  ValidationRejectionError,
} from './crawler/errors.js'
export {
  assembleBreadcrumbPath,
  canonicalizeHierarchy,
  deriveHierarchy,
  joinBreadcrumb,
} from './crawler/extract/breadcrumb.js'
export { applyOverrides } from './crawler/extract/overrides.js'
export { extractFields } from './crawler/extract/pipeline.js'
export { writeRunOutputs } from './crawler/export/result-sink.js'
export { HttpFetcher } from './crawler/fetch/http-fetcher.js'
export { PacingRateLimiter } from './crawler/fetch/rate-limiter.js'
export { FrontierDeduplicator } from './crawler/process/frontier.js'
export { filterByRegion } from './crawler/process/region-filter.js'
export { CrawlRun } from './crawler/process/run-state.js'
export { DetailFetchScheduler } from './crawler/process/scheduler.js'
export { assembleRecord } from './crawler/process/validator.js'
export { getSiteProfile, listSiteProfiles, SiteProfileRegistry } from './crawler/sites/registry.js'
export type * from './crawler/types.js'
export { ListPageWalker } from './crawler/walk/list-walker.js'
