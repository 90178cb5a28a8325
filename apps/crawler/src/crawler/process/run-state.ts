/**
 * Crawl Run State
 *
 * One owner for everything a run accumulates: the frontier seen-set, accepted
 * records and failed URLs. Passed by reference to the walker, scheduler and
 * sink; append-only.
 */

import type { FailedUrl, ListingCategory, ListingRecord } from '../types.js'
import { FrontierDeduplicator } from './frontier.js'

/** Breadcrumb category each list category's pages sit under */
export const CATEGORY_LABELS: Readonly<Record<ListingCategory, string>> = {
  buy: '買樓',
  rent: '租樓',
}

export interface CrawlRunOptions {
  category: ListingCategory
  clock?: () => Date
}

export class CrawlRun {
  readonly frontier = new FrontierDeduplicator()
  readonly category: ListingCategory
  readonly startedAt: Date
  private readonly clock: () => Date
  private readonly acceptedRecords: ListingRecord[] = []
  private readonly failedUrls: FailedUrl[] = []

  constructor(options: CrawlRunOptions) {
    this.category = options.category
    this.clock = options.clock ?? (() => new Date())
    this.startedAt = this.clock()
  }

  get categoryLabel(): string {
    return CATEGORY_LABELS[this.category]
  }

  get records(): readonly ListingRecord[] {
    return this.acceptedRecords
  }

  get failures(): readonly FailedUrl[] {
    return this.failedUrls
  }

  now(): Date {
    return this.clock()
  }

  addRecord(record: ListingRecord): void {
    this.acceptedRecords.push(record)
  }

  addFailure(failure: FailedUrl): void {
    this.failedUrls.push(failure)
  }

  recordsFor(siteId: string): ListingRecord[] {
    return this.acceptedRecords.filter(record => record.source === siteId)
  }
}
