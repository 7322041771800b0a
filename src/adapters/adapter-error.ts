import { TributaryError } from '../utils/errors'

/**
 * Base class for storage adapter errors.
 */
export class AdapterError extends TributaryError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'AdapterError'
  }
}

/**
 * Error thrown when query execution fails.
 *
 * @example
 * ```typescript
 * throw new QueryError('Unknown data column', { column: 'licence_no', table: 'data' })
 * ```
 */
export class QueryError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'QUERY_ERROR', context)
    this.name = 'QueryError'
  }
}

/**
 * Error thrown when a transaction fails and is rolled back.
 */
export class TransactionError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSACTION_ERROR', context)
    this.name = 'TransactionError'
  }
}

/**
 * Error thrown when adapter configuration or a column name is invalid.
 */
export class ValidationError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context)
    this.name = 'ValidationError'
  }
}

/**
 * Error thrown when a row is not found.
 *
 * @example
 * ```typescript
 * throw new NotFoundError('Data row not found', { id: 42, table: 'data' })
 * ```
 */
export class NotFoundError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND_ERROR', context)
    this.name = 'NotFoundError'
  }
}
