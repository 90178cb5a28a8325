import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import {
  classifyError,
  ConfigurationError,
  FetchFailureError,
  ListWalkAbortedError,
  ParseFailureError,
  toFailureReason,
  ValidationRejectionError,
} from '../errors.js'

describe('classifyError', () => {
  it('marks timeouts as retryable fetch failures', () => {
    const classified = classifyError(new FetchFailureError('https://www.28hse.com/x', 'TIMEOUT', 'Timed out after 30000ms'))

    expect(classified).toMatchObject({
      category: 'fetch',
      code: 'FETCH_FAILED',
      message: 'Timed out after 30000ms',
      isRetryable: true,
      details: { url: 'https://www.28hse.com/x', fetchCode: 'TIMEOUT' },
    })
  })

  it('keeps HTTP errors non-retryable', () => {
    expect(classifyError(new FetchFailureError('https://www.28hse.com/x', 'HTTP_ERROR', 'HTTP 404', 404)).isRetryable).toBe(
      false
    )
  })

  it('names the site in an aborted walk', () => {
    const cause = new FetchFailureError('https://hk.centanet.com/findproperty/list/buy', 'BLOCKED', 'HTTP 403: Forbidden', 403)
    const classified = classifyError(new ListWalkAbortedError('centanet', cause))

    expect(classified.code).toBe('LIST_WALK_ABORTED')
    expect(classified.message).toBe('List walk aborted for centanet: HTTP 403: Forbidden')
  })

  it('treats schema errors as configuration errors', () => {
    const parsed = z.object({ maxPages: z.number() }).safeParse({ maxPages: 'ten' })
    if (parsed.success) throw new Error('expected a schema error')

    expect(classifyError(parsed.error)).toMatchObject({ category: 'config', code: 'CONFIGURATION_ERROR' })
  })

  it('wraps anything else as unexpected', () => {
    expect(classifyError(new Error('boom'))).toMatchObject({ category: 'internal', message: 'boom' })
    expect(classifyError('plain string')).toMatchObject({ category: 'internal', message: 'plain string' })
  })
})

describe('toFailureReason', () => {
  it('maps categories onto failed-URL reasons', () => {
    expect(toFailureReason(classifyError(new ParseFailureError('u', 'EMPTY_PAGE')))).toBe('PARSE_FAILED')
    expect(toFailureReason(classifyError(new ValidationRejectionError('u', 'TITLE_UNRESOLVED', 'no title')))).toBe(
      'VALIDATION_REJECTED'
    )
    expect(toFailureReason(classifyError(new ConfigurationError('bad')))).toBe('UNEXPECTED_ERROR')
  })
})
