/**
 * Error classes shared by the ingestion pipeline.
 * @module utils/errors
 */

/**
 * Base class for every error raised by tributary
 */
export class TributaryError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'TributaryError'
    this.code = code
    this.context = context

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * A source descriptor or engine option is malformed or inconsistent.
 * Raised before any record of the affected source is fetched.
 */
export class ConfigError extends TributaryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/**
 * An auth chain refers back to itself or nests deeper than allowed.
 */
export class AuthCycleError extends TributaryError {
  public readonly depth: number

  constructor(message: string, depth: number, context?: Record<string, unknown>) {
    super(message, 'AUTH_CYCLE', { depth, ...context })
    this.name = 'AuthCycleError'
    this.depth = depth
  }
}

/**
 * A value could not be transformed. Rejects the record, not the source.
 */
export class TransformError extends TributaryError {
  public readonly transformType: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    transformType: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Transform '${transformType}' failed for value ${JSON.stringify(value)}: ${reason}`,
      'TRANSFORM_ERROR',
      { transformType, value, reason, ...context }
    )
    this.name = 'TransformError'
    this.transformType = transformType
    this.value = value
    this.reason = reason
  }

  /** Copy of this error with extra context attached */
  withContext(context: Record<string, unknown>): TransformError {
    return new TransformError(this.transformType, this.value, this.reason, {
      ...this.context,
      ...context,
    })
  }
}

export interface FetchErrorDetails {
  url: string
  status?: number
  retryable: boolean
  cause?: unknown
}

/**
 * A record lacks a key its column map reads, under `strict_keys`. Rejects
 * the record, not the source.
 */
export class ExtractionError extends TributaryError {
  public readonly column: string
  public readonly reference: string | number

  constructor(column: string, reference: string | number, context?: Record<string, unknown>) {
    super(`Column '${column}': key '${reference}' not found in record`, 'EXTRACTION_ERROR', {
      column,
      reference,
      ...context,
    })
    this.name = 'ExtractionError'
    this.column = column
    this.reference = reference
  }
}

/**
 * An HTTP request failed: network failure or non-success status.
 */
export class FetchError extends TributaryError {
  public readonly url: string
  public readonly status?: number
  public readonly retryable: boolean

  constructor(message: string, details: FetchErrorDetails) {
    super(message, 'FETCH_ERROR', {
      url: details.url,
      status: details.status,
      retryable: details.retryable,
    })
    this.name = 'FetchError'
    this.url = details.url
    this.status = details.status
    this.retryable = details.retryable
    if (details.cause !== undefined) {
      this.cause = details.cause
    }
  }
}

/**
 * Identity lookup matched more than one stored row.
 */
export class ReconciliationError extends TributaryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RECONCILIATION_ERROR', context)
    this.name = 'ReconciliationError'
  }
}

/**
 * A source ran past its deadline or the run was aborted.
 */
export class SourceAbortedError extends TributaryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SOURCE_ABORTED', context)
    this.name = 'SourceAbortedError'
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
