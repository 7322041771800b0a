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
} from './source'
export { SOURCE_TYPES, HTTP_METHODS, RESPONSE_TYPES } from './source'

export type {
  Scalar,
  CanonicalRow,
  StoredValue,
  StoredFields,
  SourceRow,
  DataRow,
  Citation,
} from './records'
