import { describe, it, expect } from 'vitest'
import {
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfigFromEnv,
  resolveEngineConfig,
} from '../../../src/config/engine-config'
import { ConfigError } from '../../../src/utils/errors'

describe('resolveEngineConfig', () => {
  it('fills in defaults', () => {
    expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG)
  })

  it('keeps explicit settings', () => {
    expect(resolveEngineConfig({ maxAttempts: 5, sourceDeadlineMs: 30_000 })).toMatchObject({
      maxAttempts: 5,
      sourceDeadlineMs: 30_000,
      maxAuthDepth: 8,
    })
  })

  it('rejects out-of-range values', () => {
    expect(() => resolveEngineConfig({ maxAttempts: 0 })).toThrow(
      'maxAttempts must be an integer of at least 1'
    )
    expect(() => resolveEngineConfig({ sourceConcurrency: 1.5 })).toThrow(ConfigError)
    expect(() => resolveEngineConfig({ schema: 'my-schema' })).toThrow(
      'schema must be a valid identifier'
    )
    expect(() => resolveEngineConfig({ databaseUrl: ' ' })).toThrow('databaseUrl cannot be empty')
  })

  it('allows zero cooldown retries', () => {
    expect(resolveEngineConfig({ maxCooldownRetries: 0 }).maxCooldownRetries).toBe(0)
  })
})

describe('loadEngineConfigFromEnv', () => {
  it('reads TRIBUTARY_ variables', () => {
    const config = loadEngineConfigFromEnv({
      TRIBUTARY_DATABASE_URL: 'postgres://localhost:5432/ingest',
      TRIBUTARY_SCHEMA: 'ingest',
      TRIBUTARY_MAX_ATTEMPTS: '5',
      TRIBUTARY_SOURCE_CONCURRENCY: '2',
      TRIBUTARY_SOURCE_DEADLINE_MS: '',
    })

    expect(config).toEqual({
      databaseUrl: 'postgres://localhost:5432/ingest',
      schema: 'ingest',
      maxAttempts: 5,
      maxAuthDepth: 8,
      maxCooldownRetries: 5,
      sourceConcurrency: 2,
    })
  })

  it('lets overrides win', () => {
    const config = loadEngineConfigFromEnv({ TRIBUTARY_MAX_AUTH_DEPTH: '3' }, { maxAuthDepth: 4 })
    expect(config.maxAuthDepth).toBe(4)
  })

  it('rejects non-numeric values', () => {
    expect(() => loadEngineConfigFromEnv({ TRIBUTARY_MAX_ATTEMPTS: 'many' })).toThrow(
      'TRIBUTARY_MAX_ATTEMPTS must be a number'
    )
  })
})
