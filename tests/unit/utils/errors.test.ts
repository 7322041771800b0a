import { describe, it, expect } from 'vitest'
import {
  AuthCycleError,
  ConfigError,
  ExtractionError,
  FetchError,
  TransformError,
  TributaryError,
  errorMessage,
} from '../../../src/utils/errors'

describe('errors', () => {
  it('carries code and context', () => {
    const error = new ConfigError('Bad source', { source: 'licenses' })

    expect(error).toBeInstanceOf(TributaryError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('ConfigError')
    expect(error.code).toBe('CONFIG_ERROR')
    expect(error.context).toEqual({ source: 'licenses' })
  })

  it('records auth depth', () => {
    const error = new AuthCycleError('Too deep', 9, { maxAuthDepth: 8 })
    expect(error.code).toBe('AUTH_CYCLE')
    expect(error.context).toEqual({ depth: 9, maxAuthDepth: 8 })
  })

  it('describes the failing transform', () => {
    const error = new TransformError('multiply', 'abc', 'not a number')
    expect(error.message).toBe(`Transform 'multiply' failed for value "abc": not a number`)
    expect(error.transformType).toBe('multiply')
  })

  it('names the column and key a record is missing', () => {
    const error = new ExtractionError('name', 'business.name')
    expect(error.message).toBe("Column 'name': key 'business.name' not found in record")
    expect(error.code).toBe('EXTRACTION_ERROR')
    expect(error.context).toEqual({ column: 'name', reference: 'business.name' })
  })

  it('keeps the cause of fetch failures', () => {
    const cause = new Error('socket hang up')
    const error = new FetchError('Request failed', { url: 'https://x.test', retryable: true, cause })
    expect(error.cause).toBe(cause)
    expect(error.context).toEqual({ url: 'https://x.test', status: undefined, retryable: true })
  })

  it('formats unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
  })
})
