/**
 * Detail Fetch Scheduler
 *
 * Drains a site's frontier with at most `profile.maxConcurrency` fetch+parse
 * tasks in flight and yields outcomes in completion order. Every task error
 * is classified at the task boundary: a failed page frees its slot and never
 * cancels its siblings.
 */

import pLimit from 'p-limit'
import { loggers } from '../../config/logger.js'
import { classifyError, FetchFailureError, toFailureReason } from '../errors.js'
import type { DetailOutcome, FrontierUrl, PageFetcher, RateLimiter, SiteProfile } from '../types.js'
import { buildListingRecord } from './listing.js'
import type { CrawlRun } from './run-state.js'

const log = loggers.scheduler

/** Progress is logged every this many completions, and at 100% */
const PROGRESS_INTERVAL = 10

export interface DetailSchedulerDeps {
  fetcher: PageFetcher
  rateLimiter: RateLimiter
}

export class DetailFetchScheduler {
  constructor(private readonly deps: DetailSchedulerDeps) {}

  /**
   * Fetch and parse every URL. Accepted records and failures are appended to
   * `run` as they complete.
   */
  async *run(
    profile: SiteProfile,
    urls: readonly FrontierUrl[],
    run: CrawlRun
  ): AsyncGenerator<DetailOutcome, void, undefined> {
    const total = urls.length
    if (total === 0) return

    const limit = pLimit(profile.maxConcurrency)
    const settled: DetailOutcome[] = []
    let wake: (() => void) | null = null

    const tasks = urls.map(item =>
      limit(() => this.processOne(profile, item, run)).then(outcome => {
        settled.push(outcome)
        wake?.()
        wake = null
      })
    )

    let completed = 0
    try {
      while (completed < total) {
        if (settled.length === 0) {
          await new Promise<void>(resolve => {
            wake = resolve
          })
        }
        const outcome = settled.shift()
        if (!outcome) continue

        completed++
        if (outcome.record) run.addRecord(outcome.record)
        else run.addFailure(outcome.failure)

        if (completed % PROGRESS_INTERVAL === 0 || completed === total) {
          log.info('Detail progress', {
            siteId: profile.id,
            completed,
            total,
            percent: Math.round((completed / total) * 100),
          })
        }
        yield outcome
      }
      await Promise.all(tasks)
    } finally {
      // Consumer stopped early: drop tasks that have not started
      limit.clearQueue()
    }
  }

  private async processOne(profile: SiteProfile, item: FrontierUrl, run: CrawlRun): Promise<DetailOutcome> {
    const { fetcher, rateLimiter } = this.deps
    try {
      await rateLimiter.acquire(item.url)
      const result = await fetcher.fetch(item.url, {
        waitCondition: 'domcontentloaded',
        extraDelaySeconds: 0,
        timeoutMs: profile.timeoutMs,
      })
      if (!result.success) {
        throw new FetchFailureError(item.url, result.errorCode, result.errorMessage, result.statusCode)
      }

      const record = buildListingRecord(result.html, item.url, profile, {
        crawledAt: run.now(),
        categoryLabel: run.categoryLabel,
      })
      return { url: item.url, record, failure: null }
    } catch (error) {
      const classified = classifyError(error)
      log.warn('Detail page failed', {
        siteId: profile.id,
        url: item.url,
        category: classified.category,
        code: classified.code,
        message: classified.message,
      })
      return {
        url: item.url,
        record: null,
        failure: {
          url: item.url,
          siteId: profile.id,
          reason: toFailureReason(classified),
          message: classified.message,
        },
      }
    }
  }
}
