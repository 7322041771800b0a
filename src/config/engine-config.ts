/**
 * Engine-wide settings: storage location, retry and auth bounds, deadlines.
 * @module config/engine-config
 */

import { ConfigError } from '../utils/errors'
import type { Environment } from '../fetch/env'
import { isValidIdentifier } from '../adapters/base-storage-adapter'

export interface EngineConfig {
  /** PostgreSQL connection string; in-memory storage when absent */
  databaseUrl?: string
  /** Database schema holding the tables */
  schema: string
  /** Attempts per request, the first included */
  maxAttempts: number
  /** Deepest nesting of auth requests */
  maxAuthDepth: number
  /** Re-sends after retry-after cooldowns per attempt */
  maxCooldownRetries: number
  /** Per-source deadline; no deadline when absent */
  sourceDeadlineMs?: number
  /** Sources ingested at the same time */
  sourceConcurrency: number
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  schema: 'public',
  maxAttempts: 3,
  maxAuthDepth: 8,
  maxCooldownRetries: 5,
  sourceConcurrency: 4,
}

/** Environment variables read by `loadEngineConfigFromEnv` */
export const ENGINE_ENV_VARS = {
  databaseUrl: 'TRIBUTARY_DATABASE_URL',
  schema: 'TRIBUTARY_SCHEMA',
  maxAttempts: 'TRIBUTARY_MAX_ATTEMPTS',
  maxAuthDepth: 'TRIBUTARY_MAX_AUTH_DEPTH',
  maxCooldownRetries: 'TRIBUTARY_MAX_COOLDOWN_RETRIES',
  sourceDeadlineMs: 'TRIBUTARY_SOURCE_DEADLINE_MS',
  sourceConcurrency: 'TRIBUTARY_SOURCE_CONCURRENCY',
} as const

function requireInteger(field: string, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new ConfigError(`${field} must be an integer of at least ${minimum}`, { field, value })
  }
}

/**
 * Fills in defaults and validates every setting.
 *
 * @throws {ConfigError} A setting is out of range
 */
export function resolveEngineConfig(partial: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG }
  for (const [field, value] of Object.entries(partial)) {
    if (value === undefined) {
      continue
    }
    switch (field) {
      case 'databaseUrl':
      case 'schema':
        if (typeof value !== 'string') {
          throw new ConfigError(`${field} must be a string`, { field, value })
        }
        config[field] = value
        break
      case 'maxAttempts':
      case 'maxAuthDepth':
      case 'maxCooldownRetries':
      case 'sourceDeadlineMs':
      case 'sourceConcurrency':
        if (typeof value !== 'number') {
          throw new ConfigError(`${field} must be a number`, { field, value })
        }
        config[field] = value
        break
      default:
        throw new ConfigError(`Unknown engine setting '${field}'`, { field })
    }
  }

  if (!isValidIdentifier(config.schema)) {
    throw new ConfigError('schema must be a valid identifier', { schema: config.schema })
  }
  if (config.databaseUrl !== undefined && config.databaseUrl.trim() === '') {
    throw new ConfigError('databaseUrl cannot be empty')
  }
  requireInteger('maxAttempts', config.maxAttempts, 1)
  requireInteger('maxAuthDepth', config.maxAuthDepth, 1)
  requireInteger('maxCooldownRetries', config.maxCooldownRetries, 0)
  requireInteger('sourceConcurrency', config.sourceConcurrency, 1)
  if (config.sourceDeadlineMs !== undefined) {
    requireInteger('sourceDeadlineMs', config.sourceDeadlineMs, 1)
  }
  return config
}

function readNumber(env: Environment, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return undefined
  }
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number`, { variable: name, value: raw })
  }
  return value
}

function readString(env: Environment, name: string): string | undefined {
  const raw = env[name]
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim()
}

/**
 * Reads engine settings from `TRIBUTARY_*` environment variables.
 *
 * @example
 * ```typescript
 * const config = loadEngineConfigFromEnv({
 *   TRIBUTARY_DATABASE_URL: 'postgres://localhost:5432/tributary',
 *   TRIBUTARY_MAX_ATTEMPTS: '5',
 * })
 * config.maxAttempts // 5
 * ```
 */
export function loadEngineConfigFromEnv(
  env: Environment = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  return resolveEngineConfig({
    databaseUrl: readString(env, ENGINE_ENV_VARS.databaseUrl),
    schema: readString(env, ENGINE_ENV_VARS.schema),
    maxAttempts: readNumber(env, ENGINE_ENV_VARS.maxAttempts),
    maxAuthDepth: readNumber(env, ENGINE_ENV_VARS.maxAuthDepth),
    maxCooldownRetries: readNumber(env, ENGINE_ENV_VARS.maxCooldownRetries),
    sourceDeadlineMs: readNumber(env, ENGINE_ENV_VARS.sourceDeadlineMs),
    sourceConcurrency: readNumber(env, ENGINE_ENV_VARS.sourceConcurrency),
    ...overrides,
  })
}
