/**
 * Source descriptor types.
 *
 * Descriptors are produced by the configuration layer (one per source file)
 * and are read-only for the duration of a run.
 *
 * @module types/source
 */

/**
 * Category of a source. All three are treated uniformly once reduced to
 * fetch or file parameters plus a column map.
 */
export type SourceType = 'api' | 'dataset' | 'import'

export const SOURCE_TYPES: readonly SourceType[] = ['api', 'dataset', 'import']

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
]

/**
 * A nested request whose response supplies part of a string value,
 * typically an access token.
 *
 * @example
 * ```typescript
 * const tokenRequest: AuthRequestDescriptor = {
 *   endpoint: 'https://auth.example.com/token',
 *   method: 'POST',
 *   body: '{"client_id": "env[CLIENT_ID]"}',
 *   token_key: 'credentials.token',
 * }
 * ```
 */
export interface AuthRequestDescriptor {
  endpoint: AuthChain
  headers?: Record<string, AuthChain>
  body?: AuthChain
  method?: HttpMethod
  /** Dot-path of the token inside the response; the whole body when absent */
  token_key?: string
}

export type AuthChainPart = string | AuthRequestDescriptor

/**
 * A literal string, or an ordered list of literals and nested requests whose
 * resolved values are concatenated in place.
 *
 * @example
 * ```typescript
 * const authorization: AuthChain = [
 *   'Bearer ',
 *   { endpoint: 'https://auth.example.com/token', token_key: 'access_token' },
 * ]
 * ```
 */
export type AuthChain = string | AuthChainPart[]

/**
 * Named transform with its parameters, e.g. `{ type: 'multiply', factor: 100 }`.
 */
export interface TransformSpec {
  type: string
  [param: string]: unknown
}

/** Dot-path key for structured records, or positional index for rows */
export type ColumnReference = string | number

export interface ExtractionSpecObject {
  key?: ColumnReference
  column?: ColumnReference
  transform?: TransformSpec
}

export type ExtractionSpec = ColumnReference | ExtractionSpecObject

/**
 * Destination column to extraction spec. The array form lists destination
 * columns by position for header-less tabular sources.
 */
export type ColumnMap = Record<string, ExtractionSpec> | string[]

/**
 * Pagination signals. At most one continuation signal (`next_page_url`,
 * `skip_records_param` or `page_num_param`) may be configured;
 * `total_records_key` may accompany any of them.
 */
export interface PaginationConfig {
  /** Dot-path of the total record count in each response */
  total_records_key?: string
  /** Dot-path of the next page URL in each response */
  next_page_url?: string
  /** Query parameter carrying the number of records already fetched */
  skip_records_param?: string
  /** Expected page size; a shorter page ends offset pagination */
  batch_size?: number
  /** Query parameter carrying `batch_size`, when the server needs it */
  batch_size_param?: string
  /** Query parameter carrying the page number */
  page_num_param?: string
  /** First page number (default: 1) */
  start_page?: number
  /** Hard stop after this many pages */
  max_pages?: number
}

export interface RateLimitConfig {
  requests_per_minute: number
  /** Response header whose presence starts a cooldown (delta-seconds or HTTP date) */
  retry_after_header?: string
}

export type ResponseType = 'json' | 'html'

export const RESPONSE_TYPES: readonly ResponseType[] = ['json', 'html']

/**
 * Declarative description of one source.
 */
export interface SourceDescriptor {
  name: string
  source_type: SourceType
  config_path?: string

  endpoint?: AuthChain
  method?: HttpMethod
  headers?: Record<string, AuthChain>
  body?: AuthChain
  /** Dot-path of the records array inside a JSON response */
  records_path?: string
  /** API sources: `html` pages are handed to the tabular decoder (default: `json`) */
  response_type?: ResponseType

  column_map: ColumnMap
  pagination?: PaginationConfig
  rate_limit?: RateLimitConfig
  unique_keys?: string[]

  /** Tabular sources: whether the first row is a header row */
  has_header?: boolean
  /** Dataset sources: folder holding the files */
  folder_path?: string
  /** Dataset sources: files to read (default: every file in the folder) */
  file_names?: string[]
  /** Raw values read as null (e.g. `"N/A"`, `"-"`) */
  null_values?: string[]
  /** Options handed to the tabular decoder untouched (separator, sheet, ...) */
  decoder?: Record<string, unknown>
  /** A mapped key path missing from a record rejects the record instead of reading null */
  strict_keys?: boolean
}
