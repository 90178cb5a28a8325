/**
 * Frontier Deduplicator
 *
 * Seen-set of canonical detail URLs for one run. Two links that differ only
 * in scheme, host case, fragment, tracking parameters, parameter order or a
 * trailing slash are the same listing.
 */

import { canonicalizeUrl } from '../utils/url.js'

export class FrontierDeduplicator {
  private readonly seen = new Set<string>()

  constructor(private readonly baseUrl?: string) {}

  /** Canonical form used as the dedup key, or null for unusable URLs */
  normalize(url: string): string | null {
    return canonicalizeUrl(url, this.baseUrl)
  }

  /**
   * Insert `url`. Returns true when it was not seen before; unusable URLs
   * are never inserted.
   */
  add(url: string): boolean {
    const key = this.normalize(url)
    if (key === null || this.seen.has(key)) return false
    this.seen.add(key)
    return true
  }

  has(url: string): boolean {
    const key = this.normalize(url)
    return key !== null && this.seen.has(key)
  }

  get size(): number {
    return this.seen.size
  }
}
