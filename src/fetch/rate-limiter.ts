import type { RateLimitConfig } from '../types/source'
import { SourceAbortedError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import type { Clock } from './clock'
import { systemClock } from './clock'

/** Length of the rolling request window */
export const RATE_LIMIT_WINDOW_MS = 60_000

export interface RateLimiterOptions {
  clock?: Clock
  logger?: Logger
}

/**
 * Parses a retry-after value: delta-seconds or an HTTP date.
 *
 * @returns Milliseconds to wait, or `null` when the value is unreadable
 */
export function parseRetryAfter(value: string, now: number): number | null {
  const trimmed = value.trim()
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000)
  }
  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) {
    return null
  }
  return Math.max(0, date - now)
}

/**
 * Per-source request budget over a rolling 60-second window, with a
 * cooldown started by the configured retry-after header.
 * Without configuration every request is admitted immediately.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ requests_per_minute: 30, retry_after_header: 'Retry-After' })
 * await limiter.acquire(signal)
 * const response = await http.request(request)
 * limiter.noteResponse(response.headers)
 * ```
 */
export class RateLimiter {
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly timestamps: number[] = []
  private cooldownUntil = 0
  private tail: Promise<void> = Promise.resolve()

  constructor(
    private readonly config: RateLimitConfig | undefined,
    options: RateLimiterOptions = {}
  ) {
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Waits until a request may be sent, then records it. Concurrent callers
   * are admitted one at a time in call order.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot(signal))
    this.tail = turn.then(
      () => undefined,
      () => undefined
    )
    return turn
  }

  /**
   * Starts a cooldown when the response carries the retry-after header.
   *
   * @returns The cooldown applied in milliseconds, or `null` when none
   */
  noteResponse(headers: Readonly<Record<string, string>>): number | null {
    const headerName = this.config?.retry_after_header?.toLowerCase()
    if (!headerName) {
      return null
    }
    const value = headers[headerName]
    if (value === undefined) {
      return null
    }

    const now = this.clock.now()
    const delayMs = parseRetryAfter(value, now)
    if (delayMs === null) {
      this.logger.warn(`Ignoring unreadable ${headerName} header`, { value })
      return null
    }

    this.cooldownUntil = Math.max(this.cooldownUntil, now + delayMs)
    this.logger.info(`Cooling down for ${delayMs}ms`, { header: headerName, value })
    return delayMs
  }

  /** Whether a cooldown is active at the current time */
  get coolingDown(): boolean {
    return this.clock.now() < this.cooldownUntil
  }

  /** Requests recorded inside the current window */
  get requestsInWindow(): number {
    this.prune(this.clock.now())
    return this.timestamps.length
  }

  private async waitForSlot(signal: AbortSignal | undefined): Promise<void> {
    for (;;) {
      if (signal?.aborted) {
        throw new SourceAbortedError('Rate limiter wait aborted')
      }

      const now = this.clock.now()
      if (now < this.cooldownUntil) {
        await this.clock.sleep(this.cooldownUntil - now, signal)
        continue
      }

      if (!this.config) {
        return
      }

      this.prune(now)
      if (this.timestamps.length < this.config.requests_per_minute) {
        this.timestamps.push(now)
        return
      }

      const waitMs = this.timestamps[0] + RATE_LIMIT_WINDOW_MS - now
      this.logger.debug(`Request budget spent, waiting ${waitMs}ms`)
      await this.clock.sleep(waitMs, signal)
    }
  }

  private prune(now: number): void {
    const windowStart = now - RATE_LIMIT_WINDOW_MS
    while (this.timestamps.length > 0 && this.timestamps[0] <= windowStart) {
      this.timestamps.shift()
    }
  }
}
