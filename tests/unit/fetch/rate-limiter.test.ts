import { describe, it, expect } from 'vitest'
import { RateLimiter, parseRetryAfter } from '../../../src/fetch/rate-limiter'
import { SourceAbortedError } from '../../../src/utils/errors'
import { ManualClock } from '../../helpers/manual-clock'
import { createMockLogger } from '../../helpers/logger'

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('5', 0)).toBe(5000)
    expect(parseRetryAfter(' 1.5 ', 0)).toBe(1500)
  })

  it('reads HTTP dates relative to now', () => {
    const now = 1_700_000_000_000
    expect(parseRetryAfter(new Date(now + 10_000).toUTCString(), now)).toBe(10_000)
  })

  it('never returns a negative delay', () => {
    const now = 1_700_000_000_000
    expect(parseRetryAfter(new Date(now - 10_000).toUTCString(), now)).toBe(0)
  })

  it('returns null for unreadable values', () => {
    expect(parseRetryAfter('soon', 0)).toBeNull()
  })
})

describe('RateLimiter', () => {
  it('admits requests up to the budget without waiting', async () => {
    const clock = new ManualClock()
    const limiter = new RateLimiter({ requests_per_minute: 2 }, { clock })

    await limiter.acquire()
    await limiter.acquire()

    expect(clock.sleeps).toEqual([])
    expect(limiter.requestsInWindow).toBe(2)
  })

  it('waits for the window to roll over once the budget is spent', async () => {
    const clock = new ManualClock()
    const limiter = new RateLimiter({ requests_per_minute: 2 }, { clock })

    await limiter.acquire()
    await limiter.acquire()
    await limiter.acquire()

    expect(clock.sleeps).toEqual([60_000])
    expect(limiter.requestsInWindow).toBe(1)
  })

  it('waits only for the oldest request to leave the window', async () => {
    const clock = new ManualClock()
    const limiter = new RateLimiter({ requests_per_minute: 2 }, { clock })

    await limiter.acquire()
    clock.advance(20_000)
    await limiter.acquire()
    await limiter.acquire()

    expect(clock.sleeps).toEqual([40_000])
  })

  it('serializes concurrent callers', async () => {
    const clock = new ManualClock()
    const limiter = new RateLimiter({ requests_per_minute: 1 }, { clock })

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()])

    expect(clock.sleeps).toEqual([60_000, 60_000])
  })

  it('cools down when the retry-after header is present', async () => {
    const clock = new ManualClock()
    const limiter = new RateLimiter(
      { requests_per_minute: 100, retry_after_header: 'Retry-After' },
      { clock }
    )

    expect(limiter.noteResponse({ 'retry-after': '5' })).toBe(5000)
    expect(limiter.coolingDown).toBe(true)

    await limiter.acquire()
    expect(clock.sleeps).toEqual([5000])
    expect(limiter.coolingDown).toBe(false)
  })

  it('ignores responses without the header', () => {
    const limiter = new RateLimiter(
      { requests_per_minute: 100, retry_after_header: 'Retry-After' },
      { clock: new ManualClock() }
    )
    expect(limiter.noteResponse({ 'content-type': 'application/json' })).toBeNull()
  })

  it('ignores the header when none is configured', () => {
    const limiter = new RateLimiter({ requests_per_minute: 100 }, { clock: new ManualClock() })
    expect(limiter.noteResponse({ 'retry-after': '5' })).toBeNull()
  })

  it('warns about unreadable header values', () => {
    const logger = createMockLogger()
    const limiter = new RateLimiter(
      { requests_per_minute: 100, retry_after_header: 'X-Wait' },
      { clock: new ManualClock(), logger }
    )

    expect(limiter.noteResponse({ 'x-wait': 'later' })).toBeNull()
    expect(logger.warn).toHaveBeenCalledWith('Ignoring unreadable x-wait header', { value: 'later' })
  })

  it('admits everything when unconfigured', async () => {
    const clock = new ManualClock()
    const limiter = new RateLimiter(undefined, { clock })

    for (let i = 0; i < 10; i++) {
      await limiter.acquire()
    }
    expect(clock.sleeps).toEqual([])
  })

  it('stops waiting when the signal aborts', async () => {
    const clock = new ManualClock()
    const limiter = new RateLimiter({ requests_per_minute: 1 }, { clock })
    const controller = new AbortController()
    controller.abort()

    await expect(limiter.acquire(controller.signal)).rejects.toThrow(SourceAbortedError)
  })
})
