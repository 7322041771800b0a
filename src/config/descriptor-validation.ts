/**
 * Turns untrusted source configuration into typed, compiled descriptors.
 * @module config/descriptor-validation
 */

import type {
  AuthChain,
  AuthChainPart,
  AuthRequestDescriptor,
  ColumnMap,
  ColumnReference,
  ExtractionSpec,
  ExtractionSpecObject,
  HttpMethod,
  PaginationConfig,
  RateLimitConfig,
  ResponseType,
  SourceDescriptor,
  SourceType,
  TransformSpec,
} from '../types/source'
import { HTTP_METHODS, RESPONSE_TYPES, SOURCE_TYPES } from '../types/source'
import { AuthCycleError, ConfigError } from '../utils/errors'
import { isRecord } from '../extraction/dot-path'
import type { CompiledColumnMap } from '../extraction/field-extractor'
import { compileColumnMap, destinationColumns } from '../extraction/field-extractor'
import type { TransformRegistry } from '../transforms/registry'
import { defaultTransformRegistry } from '../transforms/registry'
import type { IdentityStrategy } from '../reconciliation/identity-strategy'
import { resolveIdentityStrategy } from '../reconciliation/identity-strategy'
import { validateColumnName } from '../schema/schema-manager'
import { DEFAULT_MAX_AUTH_DEPTH } from '../fetch/auth-resolver'

export interface DescriptorValidationOptions {
  registry?: TransformRegistry
  maxAuthDepth?: number
}

/**
 * A validated descriptor with its column map compiled and identity policy
 * resolved.
 */
export interface LoadedSource {
  descriptor: SourceDescriptor
  columns: CompiledColumnMap
  destinations: string[]
  identity: IdentityStrategy
}

class FieldReader {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly source: string
  ) {}

  fail(field: string, message: string): never {
    throw new ConfigError(`Source '${this.source}': ${field} ${message}`, {
      source: this.source,
      field,
    })
  }

  string(field: string): string | undefined {
    const value = this.raw[field]
    if (value === undefined || value === null) {
      return undefined
    }
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail(field, 'must be a non-empty string')
    }
    return value
  }

  boolean(field: string): boolean | undefined {
    const value = this.raw[field]
    if (value === undefined || value === null) {
      return undefined
    }
    if (typeof value !== 'boolean') {
      this.fail(field, 'must be a boolean')
    }
    return value
  }

  stringList(field: string, allowEmptyStrings = false): string[] | undefined {
    const value = this.raw[field]
    if (value === undefined || value === null) {
      return undefined
    }
    if (!Array.isArray(value)) {
      this.fail(field, 'must be a list of strings')
    }
    return value.map((item: unknown, index) => {
      if (typeof item !== 'string' || (item === '' && !allowEmptyStrings)) {
        this.fail(`${field}[${index}]`, 'must be a non-empty string')
      }
      return item
    })
  }

  record(field: string): Record<string, unknown> | undefined {
    const value = this.raw[field]
    if (value === undefined || value === null) {
      return undefined
    }
    if (!isRecord(value)) {
      this.fail(field, 'must be an object')
    }
    return value
  }

  get(field: string): unknown {
    return this.raw[field]
  }
}

function positiveInteger(reader: FieldReader, section: Record<string, unknown>, field: string, minimum = 1): number | undefined {
  const value = section[field]
  if (value === undefined || value === null) {
    return undefined
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < minimum) {
    reader.fail(field, `must be an integer of at least ${minimum}`)
  }
  return value
}

function optionalString(reader: FieldReader, section: Record<string, unknown>, field: string): string | undefined {
  const value = section[field]
  if (value === undefined || value === null) {
    return undefined
  }
  if (typeof value !== 'string' || value === '') {
    reader.fail(field, 'must be a non-empty string')
  }
  return value
}

function parseMethod(reader: FieldReader, value: unknown, field: string): HttpMethod | undefined {
  if (value === undefined || value === null) {
    return undefined
  }
  const method = HTTP_METHODS.find(
    (candidate) => typeof value === 'string' && candidate === value.toUpperCase()
  )
  if (!method) {
    reader.fail(field, `must be one of ${HTTP_METHODS.join(', ')}`)
  }
  return method
}

function parseResponseType(reader: FieldReader): ResponseType | undefined {
  const value = reader.get('response_type')
  if (value === undefined || value === null) {
    return undefined
  }
  const responseType = RESPONSE_TYPES.find((candidate) => candidate === value)
  if (!responseType) {
    reader.fail('response_type', `must be one of ${RESPONSE_TYPES.join(', ')}`)
  }
  return responseType
}

class AuthChainParser {
  constructor(
    private readonly reader: FieldReader,
    private readonly maxAuthDepth: number
  ) {}

  chain(value: unknown, field: string, ancestors: ReadonlySet<object>, depth: number): AuthChain {
    if (typeof value === 'string') {
      return value
    }
    if (isRecord(value)) {
      return [this.request(value, field, ancestors, depth + 1)]
    }
    if (!Array.isArray(value)) {
      this.reader.fail(field, 'must be a string or a list of strings and requests')
    }
    return value.map((part, index): AuthChainPart => {
      if (typeof part === 'string') {
        return part
      }
      if (!isRecord(part)) {
        this.reader.fail(`${field}[${index}]`, 'must be a string or a request object')
      }
      return this.request(part, `${field}[${index}]`, ancestors, depth + 1)
    })
  }

  headers(value: unknown, field: string, ancestors: ReadonlySet<object>, depth: number): Record<string, AuthChain> | undefined {
    if (value === undefined || value === null) {
      return undefined
    }
    if (!isRecord(value)) {
      this.reader.fail(field, 'must be an object')
    }
    const headers: Record<string, AuthChain> = {}
    for (const [name, chain] of Object.entries(value)) {
      headers[name] = this.chain(chain, `${field}.${name}`, ancestors, depth)
    }
    return headers
  }

  body(value: unknown, field: string, ancestors: ReadonlySet<object>, depth: number): AuthChain | undefined {
    if (value === undefined || value === null) {
      return undefined
    }
    // A plain object body that is not a request is sent as JSON text
    if (isRecord(value) && !('endpoint' in value)) {
      return JSON.stringify(value)
    }
    return this.chain(value, field, ancestors, depth)
  }

  private request(
    raw: Record<string, unknown>,
    field: string,
    ancestors: ReadonlySet<object>,
    depth: number
  ): AuthRequestDescriptor {
    if (ancestors.has(raw)) {
      throw new AuthCycleError(`Auth request at ${field} refers back to itself`, depth, { field })
    }
    if (depth > this.maxAuthDepth) {
      throw new AuthCycleError(`Auth chain at ${field} nests deeper than ${this.maxAuthDepth} requests`, depth, {
        field,
        maxAuthDepth: this.maxAuthDepth,
      })
    }
    if (raw.endpoint === undefined) {
      this.reader.fail(`${field}.endpoint`, 'is required')
    }

    const nested = new Set(ancestors).add(raw)
    const request: AuthRequestDescriptor = {
      endpoint: this.chain(raw.endpoint, `${field}.endpoint`, nested, depth),
    }
    const headers = this.headers(raw.headers, `${field}.headers`, nested, depth)
    if (headers) {
      request.headers = headers
    }
    const body = this.body(raw.body, `${field}.body`, nested, depth)
    if (body !== undefined) {
      request.body = body
    }
    const method = parseMethod(this.reader, raw.method, `${field}.method`)
    if (method) {
      request.method = method
    }
    const tokenKey = optionalString(this.reader, raw, 'token_key')
    if (tokenKey !== undefined) {
      request.token_key = tokenKey
    }
    return request
  }
}

function parseReference(reader: FieldReader, value: unknown, field: string): ColumnReference {
  if (typeof value === 'string' && value !== '') {
    return value
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return value
  }
  return reader.fail(field, 'must be a non-empty string or a non-negative integer')
}

function parseTransform(reader: FieldReader, value: unknown, field: string): TransformSpec {
  const type = isRecord(value) ? value.type : undefined
  if (!isRecord(value) || typeof type !== 'string' || type === '') {
    return reader.fail(field, "must be an object with a string 'type'")
  }
  return { ...value, type }
}

function parseExtractionSpec(reader: FieldReader, value: unknown, field: string): ExtractionSpec {
  if (!isRecord(value)) {
    return parseReference(reader, value, field)
  }
  const spec: ExtractionSpecObject = {}
  if (value.key !== undefined) {
    spec.key = parseReference(reader, value.key, `${field}.key`)
  }
  if (value.column !== undefined) {
    spec.column = parseReference(reader, value.column, `${field}.column`)
  }
  if (value.transform !== undefined) {
    spec.transform = parseTransform(reader, value.transform, `${field}.transform`)
  }
  return spec
}

function parseColumnMap(reader: FieldReader): ColumnMap {
  const value = reader.get('column_map')
  if (Array.isArray(value)) {
    if (value.length === 0) {
      reader.fail('column_map', 'cannot be empty')
    }
    return value.map((destination, index) => {
      if (typeof destination !== 'string') {
        reader.fail(`column_map[${index}]`, 'must be a column name')
      }
      return destination
    })
  }
  if (!isRecord(value)) {
    return reader.fail('column_map', 'must be an object or a list of column names')
  }
  const entries = Object.entries(value)
  if (entries.length === 0) {
    reader.fail('column_map', 'cannot be empty')
  }
  const columnMap: Record<string, ExtractionSpec> = {}
  for (const [destination, spec] of entries) {
    columnMap[destination] = parseExtractionSpec(reader, spec, `column_map.${destination}`)
  }
  return columnMap
}

/**
 * Checks the pagination section, including which signals may be combined.
 */
function parsePagination(reader: FieldReader): PaginationConfig | undefined {
  const section = reader.record('pagination')
  if (!section) {
    return undefined
  }

  const pagination: PaginationConfig = {}
  const assign = <K extends keyof PaginationConfig>(key: K, value: PaginationConfig[K] | undefined) => {
    if (value !== undefined) {
      pagination[key] = value
    }
  }
  assign('total_records_key', optionalString(reader, section, 'total_records_key'))
  assign('next_page_url', optionalString(reader, section, 'next_page_url'))
  assign('skip_records_param', optionalString(reader, section, 'skip_records_param'))
  assign('batch_size', positiveInteger(reader, section, 'batch_size'))
  assign('batch_size_param', optionalString(reader, section, 'batch_size_param'))
  assign('page_num_param', optionalString(reader, section, 'page_num_param'))
  assign('start_page', positiveInteger(reader, section, 'start_page', 0))
  assign('max_pages', positiveInteger(reader, section, 'max_pages'))

  const signals = (['next_page_url', 'skip_records_param', 'page_num_param'] as const).filter(
    (signal) => pagination[signal] !== undefined
  )
  if (signals.length > 1) {
    reader.fail('pagination', `may use only one of next_page_url, skip_records_param and page_num_param (got ${signals.join(', ')})`)
  }
  if (pagination.batch_size_param !== undefined && pagination.batch_size === undefined) {
    reader.fail('pagination.batch_size_param', 'needs batch_size')
  }
  if (pagination.start_page !== undefined && pagination.page_num_param === undefined) {
    reader.fail('pagination.start_page', 'needs page_num_param')
  }
  return pagination
}

function parseRateLimit(reader: FieldReader): RateLimitConfig | undefined {
  const section = reader.record('rate_limit')
  if (!section) {
    return undefined
  }
  const requestsPerMinute = positiveInteger(reader, section, 'requests_per_minute')
  if (requestsPerMinute === undefined) {
    return reader.fail('rate_limit.requests_per_minute', 'is required')
  }
  const rateLimit: RateLimitConfig = { requests_per_minute: requestsPerMinute }
  const header = optionalString(reader, section, 'retry_after_header')
  if (header !== undefined) {
    rateLimit.retry_after_header = header
  }
  return rateLimit
}

function parseSourceType(reader: FieldReader): SourceType {
  const value = reader.get('source_type')
  const sourceType = SOURCE_TYPES.find((candidate) => candidate === value)
  if (!sourceType) {
    return reader.fail('source_type', `must be one of ${SOURCE_TYPES.join(', ')}`)
  }
  return sourceType
}

/**
 * Validates raw configuration (typically parsed JSON or YAML) as a source
 * descriptor.
 *
 * @throws {ConfigError} A field is missing, malformed or inconsistent
 * @throws {AuthCycleError} An auth chain refers back to itself or nests too deep
 */
export function validateSourceDescriptor(
  input: unknown,
  options: DescriptorValidationOptions = {}
): SourceDescriptor {
  if (!isRecord(input)) {
    throw new ConfigError('Source descriptor must be an object')
  }
  const name = input.name
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ConfigError('Source descriptor needs a non-empty name', { field: 'name' })
  }

  const reader = new FieldReader(input, name)
  const auth = new AuthChainParser(reader, options.maxAuthDepth ?? DEFAULT_MAX_AUTH_DEPTH)
  const roots = new Set<object>()

  const descriptor: SourceDescriptor = {
    name,
    source_type: parseSourceType(reader),
    column_map: parseColumnMap(reader),
  }

  const configPath = reader.string('config_path')
  if (configPath !== undefined) descriptor.config_path = configPath

  const endpoint = reader.get('endpoint')
  if (endpoint !== undefined && endpoint !== null) {
    descriptor.endpoint = auth.chain(endpoint, 'endpoint', roots, 0)
  }
  const method = parseMethod(reader, reader.get('method'), 'method')
  if (method) descriptor.method = method
  const headers = auth.headers(reader.get('headers'), 'headers', roots, 0)
  if (headers) descriptor.headers = headers
  const body = auth.body(reader.get('body'), 'body', roots, 0)
  if (body !== undefined) descriptor.body = body

  const recordsPath = reader.string('records_path')
  if (recordsPath !== undefined) descriptor.records_path = recordsPath
  const responseType = parseResponseType(reader)
  if (responseType) descriptor.response_type = responseType
  const pagination = parsePagination(reader)
  if (pagination) descriptor.pagination = pagination
  const rateLimit = parseRateLimit(reader)
  if (rateLimit) descriptor.rate_limit = rateLimit
  const uniqueKeys = reader.stringList('unique_keys')
  if (uniqueKeys) descriptor.unique_keys = uniqueKeys

  const hasHeader = reader.boolean('has_header')
  if (hasHeader !== undefined) descriptor.has_header = hasHeader
  const folderPath = reader.string('folder_path')
  if (folderPath !== undefined) descriptor.folder_path = folderPath
  const fileNames = reader.stringList('file_names')
  if (fileNames) descriptor.file_names = fileNames
  const nullValues = reader.stringList('null_values', true)
  if (nullValues) descriptor.null_values = nullValues
  const decoder = reader.record('decoder')
  if (decoder) descriptor.decoder = decoder
  const strictKeys = reader.boolean('strict_keys')
  if (strictKeys !== undefined) descriptor.strict_keys = strictKeys

  if ((descriptor.source_type === 'api' || descriptor.source_type === 'import') && !descriptor.endpoint) {
    reader.fail('endpoint', `is required for ${descriptor.source_type} sources`)
  }
  if (descriptor.source_type === 'dataset' && !descriptor.folder_path) {
    reader.fail('folder_path', 'is required for dataset sources')
  }
  if (descriptor.source_type !== 'api' && descriptor.pagination) {
    reader.fail('pagination', 'only applies to api sources')
  }
  if (descriptor.response_type === 'html') {
    if (descriptor.source_type !== 'api') {
      reader.fail('response_type', 'only applies to api sources')
    }
    if (descriptor.records_path !== undefined) {
      reader.fail('records_path', 'does not apply to html responses')
    }
    if (descriptor.pagination?.next_page_url || descriptor.pagination?.total_records_key) {
      reader.fail('pagination', 'html responses only page by skip_records_param or page_num_param')
    }
  }
  return descriptor
}

/**
 * Validates a descriptor, compiles its column map and resolves its identity
 * policy.
 *
 * @example
 * ```typescript
 * const loaded = loadSourceDescriptor(JSON.parse(await readFile('licenses.json', 'utf8')))
 * loaded.destinations // ['license_number', 'name', 'issued_on']
 * loaded.identity.kind // 'unique-keys'
 * ```
 */
export function loadSourceDescriptor(
  input: unknown,
  options: DescriptorValidationOptions = {}
): LoadedSource {
  const descriptor = validateSourceDescriptor(input, options)
  const columns = compileColumnMap(
    descriptor.column_map,
    options.registry ?? defaultTransformRegistry
  )
  const destinations = destinationColumns(columns)

  const seen = new Set<string>()
  for (const destination of destinations) {
    validateColumnName(destination)
    if (seen.has(destination)) {
      throw new ConfigError(`Source '${descriptor.name}': column '${destination}' is mapped twice`, {
        source: descriptor.name,
        column: destination,
      })
    }
    seen.add(destination)
  }

  for (const key of descriptor.unique_keys ?? []) {
    if (!seen.has(key)) {
      throw new ConfigError(`Source '${descriptor.name}': unique key '${key}' is not a mapped column`, {
        source: descriptor.name,
        key,
      })
    }
  }

  return {
    descriptor,
    columns,
    destinations,
    identity: resolveIdentityStrategy(descriptor.unique_keys),
  }
}
