/**
 * Retry utility for wrapping async operations with retry logic
 * @module fetch/retry
 */

import { FetchError, SourceAbortedError } from '../utils/errors'
import { sleep as defaultSleep } from './clock'

export interface RetryConfig {
  /** Maximum attempts, the first included */
  maxAttempts: number
  /** Delay before the second attempt */
  initialDelayMs: number
  backoffMultiplier: number
  maxDelayMs: number
}

/**
 * Retry configuration with hooks
 */
export interface ExtendedRetryConfig extends RetryConfig {
  /** Decides whether an error is retried; defaults to `isRetryableError` */
  shouldRetry?: (error: Error, attempt: number) => boolean

  /** Called before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void

  /** Abort signal for cancellation */
  signal?: AbortSignal

  /** Replaces the timer-based sleep (tests use a manual clock) */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 250,
  backoffMultiplier: 2,
  maxDelayMs: 10_000,
}

/**
 * Calculate delay with exponential backoff and jitter
 *
 * @param attempt - Current attempt number (1-based)
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig): number {
  let delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1)
  delay = Math.min(delay, config.maxDelayMs)

  // ±20% jitter
  const jitter = delay * 0.2 * (Math.random() * 2 - 1)
  return Math.max(0, Math.round(delay + jitter))
}

/**
 * Network failures, 408, 429 and 5xx responses are retryable
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof FetchError && error.retryable
}

/**
 * Wraps an async function with retry logic
 *
 * @returns The result of the function
 * @throws The last error if all retries fail
 *
 * @example
 * ```typescript
 * const response = await withRetry(() => http.request(request), {
 *   ...DEFAULT_RETRY_CONFIG,
 *   signal,
 * })
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: ExtendedRetryConfig
): Promise<T> {
  const sleep = config.sleep ?? defaultSleep
  const shouldRetry = config.shouldRetry ?? isRetryableError

  for (let attempt = 1; ; attempt++) {
    if (config.signal?.aborted) {
      throw new SourceAbortedError('Retry operation aborted', { attempt })
    }

    try {
      return await fn()
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught))

      if (attempt >= config.maxAttempts || !shouldRetry(error, attempt)) {
        throw error
      }

      const delay = calculateRetryDelay(attempt, config)
      config.onRetry?.(error, attempt, delay)
      await sleep(delay, config.signal)
    }
  }
}
