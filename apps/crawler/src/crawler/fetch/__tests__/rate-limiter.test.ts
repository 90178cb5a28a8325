import { describe, expect, it } from 'vitest'
import { PacingRateLimiter } from '../rate-limiter.js'

function createClock(start: number) {
  const state = { now: start, sleeps: [] as number[] }
  return {
    state,
    now: () => state.now,
    sleep: async (ms: number) => {
      state.sleeps.push(ms)
    },
  }
}

describe('PacingRateLimiter', () => {
  it('spaces concurrent acquires for one domain by the minimum delay', async () => {
    const clock = createClock(1000)
    const limiter = new PacingRateLimiter({ now: clock.now, sleep: clock.sleep })
    limiter.setMinDelay('https://hk.centanet.com', 500)

    await Promise.all([
      limiter.acquire('https://hk.centanet.com/findproperty/list/buy'),
      limiter.acquire('https://hk.centanet.com/findproperty/detail/a_1'),
      limiter.acquire('https://www.centanet.com/other'),
    ])

    expect(clock.state.sleeps).toEqual([500, 1000])
  })

  it('does not wait once the delay has elapsed', async () => {
    const clock = createClock(1000)
    const limiter = new PacingRateLimiter({ defaultMinDelayMs: 200, now: clock.now, sleep: clock.sleep })

    await limiter.acquire('28hse.com')
    clock.state.now = 1300
    await limiter.acquire('28hse.com')

    expect(clock.state.sleeps).toEqual([])
  })

  it('keeps separate budgets per registrable domain', async () => {
    const clock = createClock(0)
    const limiter = new PacingRateLimiter({ defaultMinDelayMs: 1000, now: clock.now, sleep: clock.sleep })

    await limiter.acquire('https://www.28hse.com/buy')
    await limiter.acquire('https://www.ricacorp.com/zh-hk')

    expect(clock.state.sleeps).toEqual([])
    expect(limiter.getMinDelayMs('ricacorp.com')).toBe(1000)
  })
})
