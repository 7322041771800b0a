import type { AuthChain, AuthRequestDescriptor } from '../types/source'
import { AuthCycleError, ConfigError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import { lookupPath } from '../extraction/dot-path'
import type { Environment } from './env'
import { substituteEnv } from './env'
import type { RequestExecutor } from './request-executor'

export const DEFAULT_MAX_AUTH_DEPTH = 8

export interface AuthResolverOptions {
  /** Executor of the owning source, so sub-requests share its rate limit */
  executor: RequestExecutor
  env: Environment
  maxAuthDepth?: number
  signal?: AbortSignal
  logger?: Logger
}

/**
 * Resolves auth chains to strings. Each nested request is sent once per
 * resolver; later references reuse its token.
 *
 * @example
 * ```typescript
 * const resolver = new AuthResolver({ executor, env: process.env })
 * const authorization = await resolver.resolve([
 *   'Bearer ',
 *   { endpoint: 'https://auth.example.com/token', token_key: 'credentials.token' },
 * ])
 * ```
 */
export class AuthResolver {
  private readonly executor: RequestExecutor
  private readonly env: Environment
  private readonly maxAuthDepth: number
  private readonly signal?: AbortSignal
  private readonly logger: Logger
  private readonly tokens = new Map<AuthRequestDescriptor, string>()

  constructor(options: AuthResolverOptions) {
    this.executor = options.executor
    this.env = options.env
    this.maxAuthDepth = options.maxAuthDepth ?? DEFAULT_MAX_AUTH_DEPTH
    this.signal = options.signal
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * @throws {ConfigError} Missing environment variable or unresolvable `token_key`
   * @throws {AuthCycleError} A request re-enters its own resolution path or nests too deep
   * @throws {FetchError} A sub-request failed
   */
  resolve(value: AuthChain): Promise<string> {
    return this.resolveChain(value, new Set(), 0)
  }

  /**
   * Resolves every header value of a header map
   */
  resolveHeaders(headers: Readonly<Record<string, AuthChain>> | undefined): Promise<Record<string, string>> {
    return this.resolveHeaderMap(headers, new Set(), 0)
  }

  private async resolveChain(
    value: AuthChain,
    path: ReadonlySet<AuthRequestDescriptor>,
    depth: number
  ): Promise<string> {
    if (typeof value === 'string') {
      return substituteEnv(value, this.env)
    }

    let result = ''
    for (const part of value) {
      result +=
        typeof part === 'string'
          ? substituteEnv(part, this.env)
          : await this.resolveRequest(part, path, depth + 1)
    }
    return result
  }

  private async resolveHeaderMap(
    headers: Readonly<Record<string, AuthChain>> | undefined,
    path: ReadonlySet<AuthRequestDescriptor>,
    depth: number
  ): Promise<Record<string, string>> {
    const resolved: Record<string, string> = {}
    for (const [name, value] of Object.entries(headers ?? {})) {
      resolved[name] = await this.resolveChain(value, path, depth)
    }
    return resolved
  }

  private async resolveRequest(
    request: AuthRequestDescriptor,
    path: ReadonlySet<AuthRequestDescriptor>,
    depth: number
  ): Promise<string> {
    if (path.has(request)) {
      throw new AuthCycleError('Auth request re-enters its own resolution path', depth)
    }
    if (depth > this.maxAuthDepth) {
      throw new AuthCycleError(
        `Auth chain nests deeper than ${this.maxAuthDepth} requests`,
        depth,
        { maxAuthDepth: this.maxAuthDepth }
      )
    }

    const cached = this.tokens.get(request)
    if (cached !== undefined) {
      return cached
    }

    const nestedPath = new Set(path).add(request)
    const url = await this.resolveChain(request.endpoint, nestedPath, depth)
    const headers = await this.resolveHeaderMap(request.headers, nestedPath, depth)
    const body =
      request.body === undefined
        ? undefined
        : await this.resolveChain(request.body, nestedPath, depth)
    const method = request.method ?? 'GET'

    this.logger.debug(`Requesting auth token from ${url}`, { method, depth })
    const response = await this.executor.send({
      method,
      url,
      headers,
      body,
      signal: this.signal,
    })

    const token = extractToken(response.body, request.token_key, url)
    this.tokens.set(request, token)
    return token
  }
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value)
}

/**
 * Token of an auth response: the value at `tokenKey`, or the whole body.
 */
export function extractToken(body: unknown, tokenKey: string | undefined, url: string): string {
  if (tokenKey === undefined) {
    return stringify(body)
  }

  const document = typeof body === 'string' ? parseJson(body) : body
  const lookup = lookupPath(document, tokenKey)
  if (!lookup.found || lookup.value === null) {
    throw new ConfigError(`Auth response from ${url} has no value at '${tokenKey}'`, {
      url,
      tokenKey,
    })
  }
  return stringify(lookup.value)
}

function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch {
    return undefined
  }
}
