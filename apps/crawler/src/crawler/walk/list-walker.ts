/**
 * List Page Walker
 *
 * Walks a site's paginated list and lazily yields detail URLs, deduplicated
 * within the walk.
 *
 * States:
 * - Page 1: fetch the list URL in a fetcher session
 * - query_param pages: fetch `listUrl?<param>=N`, each page independent
 * - script_driven pages: run `pageScript(N)` on the loaded session page and
 *   re-read the HTML. A failure is retried once with a longer settle delay;
 *   after that page 1 is re-fetched in the session and the walk continues
 *   (the repeat normally yields nothing new, which ends the walk)
 *
 * Termination: a page after the first that yields no new URL ends the walk.
 * A page 1 failure aborts the site; later failures only contribute nothing.
 */

import { loggers } from '../../config/logger.js'
import { FetchFailureError, ListWalkAbortedError } from '../errors.js'
import { loadHtml } from '../extract/kit/html.js'
import { FrontierDeduplicator } from '../process/frontier.js'
import type { FrontierUrl, PageFetcher, PageFetchOptions, PageFetchResult, RateLimiter, SiteProfile } from '../types.js'
import { canonicalizeUrl, decodedPathname, getRegistrableDomain, withQueryParam } from '../utils/url.js'

const log = loggers.walker

const UNFOLLOWABLE_SCHEMES = ['javascript:', 'mailto:', 'tel:', '#']

/** Settle delay multiplier for the single script retry */
const SCRIPT_RETRY_SETTLE_FACTOR = 2

export interface ListWalkerDeps {
  fetcher: PageFetcher
  rateLimiter: RateLimiter
}

/**
 * Detail links on a list page, canonicalized, in document order, without
 * repeats.
 */
export function extractDetailLinks(html: string, profile: SiteProfile): string[] {
  const $ = loadHtml(html)
  const siteDomain = getRegistrableDomain(profile.baseUrl)
  const links = new Set<string>()

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim()
    if (!href) return

    const lowered = href.toLowerCase()
    if (UNFOLLOWABLE_SCHEMES.some(scheme => lowered.startsWith(scheme))) return

    const canonical = canonicalizeUrl(href, profile.baseUrl)
    if (canonical === null || getRegistrableDomain(canonical) !== siteDomain) return

    const path = decodedPathname(canonical)
    if (path === null || !profile.detailPathPattern.test(path)) return

    const decodedLower = path.toLowerCase()
    if (profile.excludedPathFragments.some(fragment => lowered.includes(fragment) || decodedLower.includes(fragment))) {
      return
    }
    links.add(canonical)
  })

  return [...links]
}

export class ListPageWalker {
  constructor(private readonly deps: ListWalkerDeps) {}

  async *walk(
    profile: SiteProfile,
    listUrl: string,
    maxPages: number
  ): AsyncGenerator<FrontierUrl, void, undefined> {
    const seen = new FrontierDeduplicator(profile.baseUrl)
    const sessionId = `${profile.id}:list`

    try {
      for (let page = 1; page <= maxPages; page++) {
        const result = await this.fetchPage(profile, listUrl, page, sessionId)

        if (!result.success) {
          const failure = new FetchFailureError(listUrl, result.errorCode, result.errorMessage, result.statusCode)
          if (page === 1) {
            throw new ListWalkAbortedError(profile.id, failure)
          }
          log.warn('List page failed, continuing', {
            siteId: profile.id,
            page,
            errorCode: result.errorCode,
            message: result.errorMessage,
          })
          continue
        }

        const links = extractDetailLinks(result.html, profile)
        let fresh = 0
        for (const url of links) {
          if (!seen.add(url)) continue
          fresh++
          yield { url, page, siteId: profile.id }
        }

        log.info('List page walked', { siteId: profile.id, page, links: links.length, fresh })

        if (page > 1 && fresh === 0) {
          log.info('No new listings, stopping', { siteId: profile.id, page })
          break
        }
      }
    } finally {
      await this.deps.fetcher.closeSession(sessionId)
    }
  }

  private async request(url: string, options: PageFetchOptions): Promise<PageFetchResult> {
    await this.deps.rateLimiter.acquire(url)
    return this.deps.fetcher.fetch(url, options)
  }

  private async fetchPage(
    profile: SiteProfile,
    listUrl: string,
    page: number,
    sessionId: string
  ): Promise<PageFetchResult> {
    const plain: PageFetchOptions = {
      sessionId,
      waitCondition: 'domcontentloaded',
      extraDelaySeconds: 0,
      timeoutMs: profile.listTimeoutMs,
    }

    if (page === 1) {
      return this.request(listUrl, plain)
    }

    const { pagination } = profile
    if (pagination.mode === 'query_param') {
      return this.request(withQueryParam(listUrl, pagination.paramName, String(page)), plain)
    }

    const scripted: PageFetchOptions = {
      sessionId,
      scriptToRun: pagination.pageScript(page),
      waitCondition: 'networkidle',
      extraDelaySeconds: pagination.settleDelaySeconds,
      timeoutMs: profile.scriptTimeoutMs,
    }

    const first = await this.request(listUrl, scripted)
    if (first.success) return first

    log.warn('Page script failed, retrying with longer settle', {
      siteId: profile.id,
      page,
      errorCode: first.errorCode,
    })
    const retry = await this.request(listUrl, {
      ...scripted,
      extraDelaySeconds: pagination.settleDelaySeconds * SCRIPT_RETRY_SETTLE_FACTOR,
    })
    if (retry.success) return retry

    log.warn('Page script failed twice, re-reading page 1', {
      siteId: profile.id,
      page,
      errorCode: retry.errorCode,
    })
    return this.request(listUrl, plain)
  }
}
