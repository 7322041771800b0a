export { FetchEngine } from './fetch-engine'
export type { FetchEngineOptions, SourceSession } from './fetch-engine'
export { AuthResolver, extractToken, DEFAULT_MAX_AUTH_DEPTH } from './auth-resolver'
export type { AuthResolverOptions } from './auth-resolver'
export { RateLimiter, parseRetryAfter, RATE_LIMIT_WINDOW_MS } from './rate-limiter'
export type { RateLimiterOptions } from './rate-limiter'
export { PaginationDriver, extractPageRecords } from './pagination-driver'
export type {
  PaginationPhase,
  PaginationState,
  PaginationDriverOptions,
  QueryParams,
  PageDecoder,
} from './pagination-driver'
export {
  RequestExecutor,
  DEFAULT_MAX_COOLDOWN_RETRIES,
  isSuccessStatus,
  isRetryableStatus,
} from './request-executor'
export type { RequestExecutorOptions } from './request-executor'
export { FetchHttpClient, buildUrl, isJsonContentType } from './http-client'
export type { HttpClient, HttpRequest, HttpResponse } from './http-client'
export { withRetry, calculateRetryDelay, isRetryableError, DEFAULT_RETRY_CONFIG } from './retry'
export type { RetryConfig, ExtendedRetryConfig } from './retry'
export { substituteEnv } from './env'
export type { Environment } from './env'
export { systemClock, sleep } from './clock'
export type { Clock } from './clock'
