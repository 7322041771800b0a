export type {
  StorageAdapter,
  StorageConfig,
  SourceInput,
  RowCriteria,
  FindOptions,
  TransactionOptions,
} from './types'
export {
  AdapterError,
  QueryError,
  TransactionError,
  ValidationError,
  NotFoundError,
} from './adapter-error'
export {
  BaseStorageAdapter,
  RESERVED_COLUMNS,
  MAX_IDENTIFIER_LENGTH,
  isValidIdentifier,
  assertDataColumnName,
} from './base-storage-adapter'
export { MemoryStorageAdapter } from './memory'
export type { MemoryStorageOptions } from './memory'
