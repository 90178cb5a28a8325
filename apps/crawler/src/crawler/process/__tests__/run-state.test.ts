import { describe, expect, it } from 'vitest'
import { makeRecord } from '../../__tests__/fakes.js'
import { CrawlRun } from '../run-state.js'

describe('CrawlRun', () => {
  it('labels the run with its breadcrumb category', () => {
    expect(new CrawlRun({ category: 'buy' }).categoryLabel).toBe('買樓')
    expect(new CrawlRun({ category: 'rent' }).categoryLabel).toBe('租樓')
  })

  it('reads time from the injected clock', () => {
    const times = [new Date('2024-03-05T02:00:00.000Z'), new Date('2024-03-05T02:05:00.000Z')]
    let calls = 0
    const run = new CrawlRun({ category: 'buy', clock: () => times[Math.min(calls++, 1)] })

    expect(run.startedAt.toISOString()).toBe('2024-03-05T02:00:00.000Z')
    expect(run.now().toISOString()).toBe('2024-03-05T02:05:00.000Z')
  })

  it('accumulates records and failures', () => {
    const run = new CrawlRun({ category: 'buy' })
    run.addRecord(makeRecord({ source: 'centanet' }))
    run.addRecord(makeRecord({ source: '28hse' }))
    run.addFailure({ url: 'https://www.28hse.com/x', siteId: '28hse', reason: 'FETCH_FAILED', message: 'HTTP 500' })

    expect(run.records).toHaveLength(2)
    expect(run.recordsFor('centanet')).toHaveLength(1)
    expect(run.failures).toHaveLength(1)
  })
})
