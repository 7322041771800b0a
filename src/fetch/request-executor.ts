import { FetchError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import type { Clock } from './clock'
import { systemClock } from './clock'
import type { HttpClient, HttpRequest, HttpResponse } from './http-client'
import type { RateLimiter } from './rate-limiter'
import type { RetryConfig } from './retry'
import { DEFAULT_RETRY_CONFIG, withRetry } from './retry'

export const DEFAULT_MAX_COOLDOWN_RETRIES = 5

export interface RequestExecutorOptions {
  http: HttpClient
  limiter: RateLimiter
  retry?: RetryConfig
  /** Responses that start a cooldown are re-sent at most this many times */
  maxCooldownRetries?: number
  clock?: Clock
  logger?: Logger
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500
}

/**
 * Sends one logical request through a source's rate limiter, re-sending it
 * after retry-after cooldowns and retrying transient failures with backoff.
 */
export class RequestExecutor {
  private readonly http: HttpClient
  private readonly limiter: RateLimiter
  private readonly retry: RetryConfig
  private readonly maxCooldownRetries: number
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(options: RequestExecutorOptions) {
    this.http = options.http
    this.limiter = options.limiter
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG
    this.maxCooldownRetries = options.maxCooldownRetries ?? DEFAULT_MAX_COOLDOWN_RETRIES
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * @throws {FetchError} Non-2xx status after retries, or a non-retryable status
   */
  send(request: HttpRequest): Promise<HttpResponse> {
    return withRetry(() => this.sendThroughLimiter(request), {
      ...this.retry,
      signal: request.signal,
      sleep: (ms, signal) => this.clock.sleep(ms, signal),
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(`Retrying ${request.method} ${request.url} in ${delayMs}ms`, {
          attempt,
          error: error.message,
        })
      },
    })
  }

  private async sendThroughLimiter(request: HttpRequest): Promise<HttpResponse> {
    for (let cooldowns = 0; ; cooldowns++) {
      await this.limiter.acquire(request.signal)
      const response = await this.http.request(request)
      const cooldownMs = this.limiter.noteResponse(response.headers)

      if (isSuccessStatus(response.status)) {
        return response
      }

      if (cooldownMs !== null && cooldowns < this.maxCooldownRetries) {
        this.logger.info(`${request.method} ${request.url} returned ${response.status}, re-sending after cooldown`, {
          cooldownMs,
          cooldowns: cooldowns + 1,
        })
        continue
      }

      throw new FetchError(`${request.method} ${request.url} returned status ${response.status}`, {
        url: request.url,
        status: response.status,
        retryable: isRetryableStatus(response.status),
      })
    }
  }
}
