import type { SourceType } from '../types/source'
import { SOURCE_TYPES } from '../types/source'
import type { Citation, DataRow, SourceRow, StoredFields } from '../types/records'
import type {
  FindOptions,
  RowCriteria,
  SourceInput,
  StorageAdapter,
  StorageConfig,
  TransactionOptions,
} from './types'
import { ValidationError } from './adapter-error'

/** Columns every data row carries besides its dynamic fields */
export const RESERVED_COLUMNS: readonly string[] = ['id', 'created_at', 'updated_at']

/** PostgreSQL truncates identifiers longer than this */
export const MAX_IDENTIFIER_LENGTH = 63

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && name.length <= MAX_IDENTIFIER_LENGTH
}

/**
 * @throws {ValidationError} The name is not a usable data column
 */
export function assertDataColumnName(name: string): void {
  if (!isValidIdentifier(name)) {
    throw new ValidationError(`Invalid column name '${name}'`, { column: name })
  }
  if (RESERVED_COLUMNS.includes(name.toLowerCase())) {
    throw new ValidationError(`Column name '${name}' is reserved`, { column: name })
  }
}

export function parseSourceType(value: unknown): SourceType {
  const sourceType = SOURCE_TYPES.find((candidate) => candidate === value)
  if (!sourceType) {
    throw new ValidationError(`Unknown source type '${String(value)}'`, { value })
  }
  return sourceType
}

/**
 * Common configuration handling for storage adapters. Concrete adapters
 * (in-memory, Drizzle) implement the storage operations.
 */
export abstract class BaseStorageAdapter implements StorageAdapter {
  protected readonly config: Required<StorageConfig>

  /**
   * @throws {ValidationError} A schema or table name is not a valid identifier
   */
  constructor(config: StorageConfig = {}) {
    this.validateConfig(config)

    this.config = {
      schema: config.schema ?? 'public',
      sourcesTable: config.sourcesTable ?? 'sources',
      dataTable: config.dataTable ?? 'data',
      citationsTable: config.citationsTable ?? 'citations',
    }
  }

  protected validateConfig(config: StorageConfig): void {
    for (const [field, value] of Object.entries(config)) {
      if (value === undefined) {
        continue
      }
      if (typeof value !== 'string' || !isValidIdentifier(value)) {
        throw new ValidationError(`${field} must be a valid identifier`, { field, value })
      }
    }
  }

  abstract initialize(): Promise<void>
  abstract getColumns(): Promise<string[]>
  abstract addColumns(names: readonly string[]): Promise<string[]>
  abstract upsertSource(input: SourceInput): Promise<SourceRow>
  abstract findSourceByName(name: string): Promise<SourceRow | null>
  abstract findDataRows(criteria: RowCriteria, options?: FindOptions): Promise<DataRow[]>
  abstract getDataRow(id: number): Promise<DataRow | null>
  abstract insertDataRow(fields: StoredFields): Promise<DataRow>
  abstract updateDataRow(id: number, fields: StoredFields): Promise<DataRow>
  abstract insertCitation(dataId: number, sourceId: number): Promise<boolean>
  abstract listCitations(dataId: number): Promise<Citation[]>
  abstract countDataRows(): Promise<number>
  abstract transaction<R>(
    callback: (tx: StorageAdapter) => Promise<R>,
    options?: TransactionOptions
  ): Promise<R>
}
