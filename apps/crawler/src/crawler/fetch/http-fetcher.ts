/**
 * HTTP Page Fetcher
 *
 * Plain HTTP implementation of PageFetcher using the global fetch API.
 * Supports timeout, size limits, retries, a blocked-page heuristic and
 * per-session cookie reuse.
 *
 * It does not render pages: a request with `scriptToRun` fails with
 * SCRIPT_UNSUPPORTED, and `waitCondition` has nothing to wait for once the
 * body is read. Script-driven pagination needs a rendering fetcher behind
 * the same interface.
 */

import { loggers } from '../../config/logger.js'
import type { PageFetcher, PageFetchOptions, PageFetchResult } from '../types.js'

const log = loggers.fetch

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'zh-HK,zh;q=0.9,en;q=0.8',
} as const

export const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024

export interface HttpFetcherOptions {
  retryPolicy?: RetryPolicy
  userAgent?: string
  maxSizeBytes?: number
  /** Extra headers merged over the defaults */
  headers?: Record<string, string>
  sleep?: (ms: number) => Promise<void>
}

interface Session {
  cookies: Map<string, string>
}

type Attempt = { kind: 'result'; result: PageFetchResult } | { kind: 'network_error'; message: string }

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

export class HttpFetcher implements PageFetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly userAgent: string
  private readonly maxSizeBytes: number
  private readonly headers: Record<string, string>
  private readonly sleep: (ms: number) => Promise<void>
  private readonly sessions = new Map<string, Session>()

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.userAgent = options.userAgent ?? 'Mozilla/5.0 (compatible; HomescanCrawler/0.1)'
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
    this.headers = options.headers ?? {}
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  async fetch(url: string, options: PageFetchOptions): Promise<PageFetchResult> {
    const startTime = Date.now()

    if (options.scriptToRun !== undefined) {
      return {
        success: false,
        errorCode: 'SCRIPT_UNSUPPORTED',
        errorMessage: 'HttpFetcher cannot run page scripts',
        durationMs: Date.now() - startTime,
      }
    }

    const session = options.sessionId ? this.openSession(options.sessionId) : undefined
    let lastError = 'Unknown error after retries'

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      const outcome = await this.fetchOnce(url, options.timeoutMs, session, startTime)
      const canRetry = attempt < this.retryPolicy.maxAttempts

      if (outcome.kind === 'network_error') {
        lastError = outcome.message
        if (canRetry) {
          await this.retryAfter(url, attempt, outcome.message)
          continue
        }
        break
      }

      const { result } = outcome
      if (
        !result.success &&
        result.errorCode === 'HTTP_ERROR' &&
        result.statusCode !== undefined &&
        this.retryPolicy.retryableStatusCodes.includes(result.statusCode) &&
        canRetry
      ) {
        await this.retryAfter(url, attempt, result.errorMessage)
        continue
      }

      if (result.success && options.extraDelaySeconds > 0) {
        await this.sleep(options.extraDelaySeconds * 1000)
      }
      return result
    }

    return {
      success: false,
      errorCode: 'NETWORK_ERROR',
      errorMessage: lastError,
      durationMs: Date.now() - startTime,
    }
  }

  async closeSession(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId)
  }

  private openSession(sessionId: string): Session {
    let session = this.sessions.get(sessionId)
    if (!session) {
      session = { cookies: new Map() }
      this.sessions.set(sessionId, session)
    }
    return session
  }

  private buildHeaders(session: Session | undefined): Record<string, string> {
    const headers: Record<string, string> = {
      ...DEFAULT_FETCH_HEADERS,
      'User-Agent': this.userAgent,
      ...this.headers,
    }
    if (session && session.cookies.size > 0) {
      headers.Cookie = [...session.cookies].map(([name, value]) => `${name}=${value}`).join('; ')
    }
    return headers
  }

  private async retryAfter(url: string, attempt: number, reason: string): Promise<void> {
    const delayMs = this.backoffDelay(attempt)
    log.debug('Retrying fetch', { url, attempt, delayMs, reason })
    await this.sleep(delayMs)
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  /**
   * Single attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    timeoutMs: number,
    session: Session | undefined,
    startTime: number
  ): Promise<Attempt> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.buildHeaders(session),
        signal: controller.signal,
        redirect: 'follow',
      })

      if (session) {
        this.storeCookies(session, response.headers.getSetCookie())
      }

      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (this.looksLikeBlockedPage(text)) {
          return {
            kind: 'result',
            result: {
              success: false,
              errorCode: 'BLOCKED',
              statusCode: response.status,
              errorMessage: 'Request blocked (captcha or access denied)',
              durationMs: Date.now() - startTime,
            },
          }
        }
      }

      if (!response.ok) {
        return {
          kind: 'result',
          result: {
            success: false,
            errorCode: 'HTTP_ERROR',
            statusCode: response.status,
            errorMessage: `HTTP ${response.status}: ${response.statusText}`,
            durationMs: Date.now() - startTime,
          },
        }
      }

      const contentLength = Number.parseInt(response.headers.get('content-length') ?? '', 10)
      const html =
        Number.isFinite(contentLength) && contentLength > this.maxSizeBytes
          ? null
          : await this.readBodyWithLimit(response, this.maxSizeBytes)

      if (html === null) {
        return {
          kind: 'result',
          result: {
            success: false,
            errorCode: 'TOO_LARGE',
            statusCode: response.status,
            errorMessage: `Response exceeded ${this.maxSizeBytes} bytes`,
            durationMs: Date.now() - startTime,
          },
        }
      }

      return {
        kind: 'result',
        result: {
          success: true,
          html,
          statusCode: response.status,
          durationMs: Date.now() - startTime,
        },
      }
    } catch (error) {
      if (isAbortError(error)) {
        return {
          kind: 'result',
          result: {
            success: false,
            errorCode: 'TIMEOUT',
            errorMessage: `Request timed out after ${timeoutMs}ms`,
            durationMs: Date.now() - startTime,
          },
        }
      }
      return { kind: 'network_error', message: error instanceof Error ? error.message : String(error) }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private storeCookies(session: Session, setCookieHeaders: string[]): void {
    for (const header of setCookieHeaders) {
      const pair = header.split(';')[0] ?? ''
      const separator = pair.indexOf('=')
      if (separator <= 0) continue
      session.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim())
    }
  }

  /**
   * Read response body with size limit. Returns null past the limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  /**
   * Heuristic check for captcha / access-denied pages.
   */
  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    const blockIndicators = [
      'captcha',
      'recaptcha',
      'hcaptcha',
      'challenge-form',
      'cf-browser-verification',
      'please verify you are a human',
      'access denied',
      'bot detection',
    ]

    return blockIndicators.some(indicator => lowerHtml.includes(indicator))
  }
}
