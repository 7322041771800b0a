// Main entry point
export { IngestionRunner } from './ingestion'
export type {
  IngestionRunnerOptions,
  IngestionReport,
  SourceReport,
  SourceStatus,
} from './ingestion'

// Types - Sources
export type {
  SourceType,
  HttpMethod,
  ResponseType,
  AuthRequestDescriptor,
  AuthChainPart,
  AuthChain,
  TransformSpec,
  ColumnReference,
  ExtractionSpecObject,
  ExtractionSpec,
  ColumnMap,
  PaginationConfig,
  RateLimitConfig,
  SourceDescriptor,
} from './types'
export { SOURCE_TYPES, HTTP_METHODS, RESPONSE_TYPES } from './types'

// Types - Records
export type {
  Scalar,
  CanonicalRow,
  StoredValue,
  StoredFields,
  SourceRow,
  DataRow,
  Citation,
} from './types'

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  ENGINE_ENV_VARS,
  resolveEngineConfig,
  loadEngineConfigFromEnv,
  validateSourceDescriptor,
  loadSourceDescriptor,
} from './config'
export type { EngineConfig, DescriptorValidationOptions, LoadedSource } from './config'

// Transforms
export {
  TransformRegistry,
  createDefaultTransformRegistry,
  defaultTransformRegistry,
  registerTransform,
  dateFormatTransform,
  multiplyTransform,
  phoneTransform,
} from './transforms'
export type { TransformFunction, TransformFactory, CompiledTransform } from './transforms'

// Extraction
export {
  FieldExtractor,
  compileColumnMap,
  destinationColumns,
  toScalar,
  lookupPath,
  getPath,
} from './extraction'
export type { CompiledColumn, CompiledColumnMap, FieldExtractorOptions, PathLookup } from './extraction'

// Fetching
export {
  FetchEngine,
  AuthResolver,
  RateLimiter,
  PaginationDriver,
  RequestExecutor,
  FetchHttpClient,
  buildUrl,
  substituteEnv,
  withRetry,
  calculateRetryDelay,
  DEFAULT_RETRY_CONFIG,
  systemClock,
} from './fetch'
export type {
  FetchEngineOptions,
  AuthResolverOptions,
  RateLimiterOptions,
  PaginationPhase,
  PaginationState,
  PageDecoder,
  RequestExecutorOptions,
  HttpClient,
  HttpRequest,
  HttpResponse,
  RetryConfig,
  Environment,
  Clock,
} from './fetch'

// Schema and reconciliation
export { SchemaManager, validateColumnName, collectColumns } from './schema'
export {
  ReconciliationEngine,
  mergeFields,
  toStoredFields,
  UniqueKeysStrategy,
  AllNonNullStrategy,
  resolveIdentityStrategy,
  identityLockKeys,
} from './reconciliation'
export type { IdentityStrategy, UpsertResult, FieldMerge } from './reconciliation'

// Storage
export {
  MemoryStorageAdapter,
  BaseStorageAdapter,
  AdapterError,
  QueryError,
  TransactionError,
  ValidationError,
  NotFoundError,
} from './adapters'
export type {
  StorageAdapter,
  StorageConfig,
  SourceInput,
  RowCriteria,
  FindOptions,
  TransactionOptions,
  MemoryStorageOptions,
} from './adapters'

// Record sources
export { NodeFileReader, openRecordStream } from './sources'
export type { TabularDecoder, FileReader, DecodedRow, DecodeOptions } from './sources'

// Errors and logging
export {
  TributaryError,
  ConfigError,
  AuthCycleError,
  TransformError,
  ExtractionError,
  FetchError,
  ReconciliationError,
  SourceAbortedError,
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
} from './utils'
export type { Logger } from './utils'
