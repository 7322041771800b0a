import { SourceAbortedError } from '../utils/errors'

/**
 * Time source for rate limiting and backoff. Tests inject a manual clock.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number
  /** Resolves after `ms`; rejects with `SourceAbortedError` when `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

/**
 * Sleep utility with abort signal support
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SourceAbortedError('Sleep aborted'))
      return
    }

    const abortHandler = () => {
      clearTimeout(timeoutId)
      reject(new SourceAbortedError('Sleep aborted'))
    }
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', abortHandler)
      resolve()
    }, ms)

    signal?.addEventListener('abort', abortHandler, { once: true })
  })
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
}
