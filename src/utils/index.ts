export {
  TributaryError,
  ConfigError,
  AuthCycleError,
  TransformError,
  ExtractionError,
  FetchError,
  ReconciliationError,
  SourceAbortedError,
  errorMessage,
} from './errors'
export type { FetchErrorDetails } from './errors'
export type { Logger } from './logger'
export { defaultLogger, createSilentLogger, createPrefixedLogger } from './logger'
export { KeyedMutex } from './keyed-mutex'
export { AsyncSemaphore } from './semaphore'
