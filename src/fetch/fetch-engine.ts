import type { SourceDescriptor } from '../types/source'
import { ConfigError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import { AuthResolver } from './auth-resolver'
import type { Clock } from './clock'
import { systemClock } from './clock'
import type { Environment } from './env'
import type { HttpClient, HttpRequest } from './http-client'
import { FetchHttpClient } from './http-client'
import type { PageDecoder } from './pagination-driver'
import { PaginationDriver } from './pagination-driver'
import { RateLimiter } from './rate-limiter'
import { RequestExecutor } from './request-executor'
import type { RetryConfig } from './retry'
import { DEFAULT_RETRY_CONFIG } from './retry'

export interface FetchEngineOptions {
  http?: HttpClient
  /** Variables for `env[NAME]` placeholders (default: `process.env`) */
  env?: Environment
  retry?: Partial<RetryConfig>
  maxAuthDepth?: number
  maxCooldownRetries?: number
  clock?: Clock
  logger?: Logger
}

/**
 * Everything one source run needs to send requests: its own limiter,
 * executor and auth resolver.
 */
export interface SourceSession {
  limiter: RateLimiter
  executor: RequestExecutor
  resolver: AuthResolver
}

/**
 * Fetches raw records for HTTP-backed sources.
 *
 * Every call builds a fresh session, so rate limits and cached auth tokens
 * are scoped to one source run.
 */
export class FetchEngine {
  private readonly http: HttpClient
  private readonly env: Environment
  private readonly retry: RetryConfig
  private readonly maxAuthDepth?: number
  private readonly maxCooldownRetries?: number
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(options: FetchEngineOptions = {}) {
    this.http = options.http ?? new FetchHttpClient()
    this.env = options.env ?? process.env
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...options.retry }
    this.maxAuthDepth = options.maxAuthDepth
    this.maxCooldownRetries = options.maxCooldownRetries
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? createSilentLogger()
  }

  createSession(descriptor: SourceDescriptor, signal?: AbortSignal, logger: Logger = this.logger): SourceSession {
    const limiter = new RateLimiter(descriptor.rate_limit, { clock: this.clock, logger })
    const executor = new RequestExecutor({
      http: this.http,
      limiter,
      retry: this.retry,
      maxCooldownRetries: this.maxCooldownRetries,
      clock: this.clock,
      logger,
    })
    const resolver = new AuthResolver({
      executor,
      env: this.env,
      maxAuthDepth: this.maxAuthDepth,
      signal,
      logger,
    })
    return { limiter, executor, resolver }
  }

  /**
   * Yields the source's raw records across all pages. `decodePage`, when
   * given, reads each page body in place of `records_path`.
   *
   * @throws {ConfigError} No endpoint, or a malformed response shape
   * @throws {AuthCycleError} The auth chain does not terminate
   * @throws {FetchError} A request failed after retries
   */
  async *fetchRecords(
    descriptor: SourceDescriptor,
    signal?: AbortSignal,
    logger: Logger = this.logger,
    decodePage?: PageDecoder
  ): AsyncGenerator<unknown, void, undefined> {
    const session = this.createSession(descriptor, signal, logger)
    const request = await this.resolveRequest(descriptor, session, signal)

    const driver = new PaginationDriver({
      url: request.url,
      pagination: descriptor.pagination,
      recordsPath: descriptor.records_path,
      decodePage,
      logger,
      fetchPage: async (url) => {
        const response = await session.executor.send({ ...request, url })
        return response.body
      },
    })

    yield* driver.records()
    logger.info(`Fetched ${driver.state.cumulativeRecords} records`, {
      pages: driver.state.pagesFetched,
    })
  }

  /**
   * Downloads an import source's file in a single request.
   */
  async download(
    descriptor: SourceDescriptor,
    signal?: AbortSignal,
    logger: Logger = this.logger
  ): Promise<Uint8Array | string> {
    const session = this.createSession(descriptor, signal, logger)
    const request = await this.resolveRequest(descriptor, session, signal)
    const response = await session.executor.send({ ...request, responseType: 'bytes' })

    if (response.body instanceof Uint8Array || typeof response.body === 'string') {
      return response.body
    }
    return JSON.stringify(response.body)
  }

  private async resolveRequest(
    descriptor: SourceDescriptor,
    session: SourceSession,
    signal: AbortSignal | undefined
  ): Promise<HttpRequest> {
    if (descriptor.endpoint === undefined) {
      throw new ConfigError(`Source '${descriptor.name}' has no endpoint`, {
        source: descriptor.name,
      })
    }

    const url = await session.resolver.resolve(descriptor.endpoint)
    const headers = await session.resolver.resolveHeaders(descriptor.headers)
    const body =
      descriptor.body === undefined ? undefined : await session.resolver.resolve(descriptor.body)

    return {
      method: descriptor.method ?? 'GET',
      url,
      headers,
      body,
      signal,
    }
  }
}
