/**
 * In-process Rate Limiter
 *
 * Paces requests per registrable domain (eTLD+1): hk.centanet.com and
 * www.centanet.com share one budget. Each acquire reserves the next free slot
 * synchronously, so concurrent callers are spaced out in call order.
 */

import type { RateLimiter } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'

export interface PacingRateLimiterOptions {
  /** Delay for domains without an explicit setting (default: 1000) */
  defaultMinDelayMs?: number
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export class PacingRateLimiter implements RateLimiter {
  private readonly delays = new Map<string, number>()
  private readonly nextSlot = new Map<string, number>()
  private readonly defaultMinDelayMs: number
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: PacingRateLimiterOptions = {}) {
    this.defaultMinDelayMs = options.defaultMinDelayMs ?? 1000
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  async acquire(urlOrDomain: string): Promise<void> {
    const domain = this.resolveDomain(urlOrDomain)
    const now = this.now()
    const slot = Math.max(now, this.nextSlot.get(domain) ?? now)
    this.nextSlot.set(domain, slot + this.getMinDelayMs(domain))

    const waitMs = slot - now
    if (waitMs > 0) {
      await this.sleep(waitMs)
    }
  }

  getMinDelayMs(domain: string): number {
    return this.delays.get(domain) ?? this.defaultMinDelayMs
  }

  setMinDelay(urlOrDomain: string, minDelayMs: number): void {
    this.delays.set(this.resolveDomain(urlOrDomain), minDelayMs)
  }

  private resolveDomain(urlOrDomain: string): string {
    return urlOrDomain.includes('://') ? getRegistrableDomain(urlOrDomain) : urlOrDomain.toLowerCase()
  }
}
