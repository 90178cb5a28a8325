/**
 * Crawl Error Classification
 *
 * Every error caught at a task or site boundary is classified before it is
 * logged or recorded, so failed-URL reasons and log fields stay consistent.
 */

import { ZodError } from 'zod'
import type { FailureReason, PageFetchFailureCode } from './types.js'

export type ErrorCategory =
  | 'fetch' // network, timeout, blocked or render failure
  | 'parse' // HTML could not be parsed
  | 'validation' // record rejected by the final gate
  | 'config' // invalid settings or site profile
  | 'internal' // bug

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isRetryable: boolean
  details?: Record<string, unknown>
}

export const ERROR_CODES = {
  FETCH_FAILED: 'FETCH_FAILED',
  LIST_WALK_ABORTED: 'LIST_WALK_ABORTED',
  PARSE_FAILED: 'PARSE_FAILED',
  VALIDATION_REJECTED: 'VALIDATION_REJECTED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class CrawlError extends Error {
  constructor(
    message: string,
    readonly category: ErrorCategory,
    readonly code: ErrorCode,
    readonly details?: Record<string, unknown>
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class FetchFailureError extends CrawlError {
  constructor(
    readonly url: string,
    readonly fetchCode: PageFetchFailureCode,
    message: string,
    readonly statusCode?: number
  ) {
    super(message, 'fetch', ERROR_CODES.FETCH_FAILED, {
      url,
      fetchCode,
      ...(statusCode !== undefined ? { statusCode } : {}),
    })
  }
}

/** Page 1 of a site's list could not be fetched; only that site stops. */
export class ListWalkAbortedError extends CrawlError {
  constructor(
    readonly siteId: string,
    readonly cause: FetchFailureError
  ) {
    super(`List walk aborted for ${siteId}: ${cause.message}`, 'fetch', ERROR_CODES.LIST_WALK_ABORTED, {
      siteId,
      url: cause.url,
    })
  }
}

export class ParseFailureError extends CrawlError {
  constructor(
    readonly url: string,
    message: string
  ) {
    super(message, 'parse', ERROR_CODES.PARSE_FAILED, { url })
  }
}

export class ValidationRejectionError extends CrawlError {
  constructor(
    readonly url: string,
    readonly reason: string,
    message: string
  ) {
    super(message, 'validation', ERROR_CODES.VALIDATION_REJECTED, { url, reason })
  }
}

export class ConfigurationError extends CrawlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'config', ERROR_CODES.CONFIGURATION_ERROR, details)
  }
}

const RETRYABLE_FETCH_CODES: ReadonlySet<PageFetchFailureCode> = new Set(['TIMEOUT', 'NETWORK_ERROR'])

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof FetchFailureError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: RETRYABLE_FETCH_CODES.has(error.fetchCode),
      details: error.details,
    }
  }

  if (error instanceof CrawlError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: false,
      details: error.details,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'config',
      code: ERROR_CODES.CONFIGURATION_ERROR,
      message: 'Configuration validation failed',
      isRetryable: false,
      details: {
        issues: error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    }
  }

  if (error instanceof Error) {
    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isRetryable: false,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}

/**
 * Map a classified error onto the failed-URL reason written to the export.
 */
export function toFailureReason(classified: ClassifiedError): FailureReason {
  switch (classified.category) {
    case 'fetch':
      return 'FETCH_FAILED'
    case 'parse':
      return 'PARSE_FAILED'
    case 'validation':
      return 'VALIDATION_REJECTED'
    case 'config':
    case 'internal':
      return 'UNEXPECTED_ERROR'
  }
}
