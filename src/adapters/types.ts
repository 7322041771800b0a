import type { SourceType } from '../types/source'
import type { Citation, DataRow, SourceRow, StoredFields } from '../types/records'

/**
 * Values for registering or refreshing a source.
 */
export interface SourceInput {
  name: string
  sourceType: SourceType
  configPath: string | null
  uniqueKeys: string[]
}

/**
 * Column to stored value; a row matches when every column equals its value.
 */
export type RowCriteria = ReadonlyMap<string, string>

export interface FindOptions {
  /** Maximum rows returned, lowest ids first */
  limit?: number
}

export interface TransactionOptions {
  /**
   * Serializes transactions that share any of these keys for their whole
   * duration. Keys are taken in sorted order; PostgreSQL maps each onto a
   * transaction-scoped advisory lock.
   */
  lockKeys?: readonly string[]
}

/**
 * Storage for sources, reconciled data rows and citations.
 *
 * Data columns hold text (or null) and are only ever added. Column names
 * passed in must already be valid identifiers; unknown columns raise
 * `QueryError`.
 *
 * @example
 * ```typescript
 * const dataId = await storage.transaction(
 *   async (tx) => {
 *     const [existing] = await tx.findDataRows(new Map([['license_number', 'L1']]), { limit: 1 })
 *     const row = existing
 *       ? await tx.updateDataRow(existing.id, { name: 'Acme' })
 *       : await tx.insertDataRow({ license_number: 'L1', name: 'Acme' })
 *     await tx.insertCitation(row.id, sourceId)
 *     return row.id
 *   },
 *   { lockKeys: ['license_number=L1'] }
 * )
 * ```
 */
export interface StorageAdapter {
  /** Creates the tables when they do not exist */
  initialize(): Promise<void>

  /** Data columns, excluding id and timestamps */
  getColumns(): Promise<string[]>

  /**
   * Adds missing data columns as nullable text.
   *
   * @returns The columns this call added
   */
  addColumns(names: readonly string[]): Promise<string[]>

  /** Inserts the source, or refreshes the one with the same name */
  upsertSource(input: SourceInput): Promise<SourceRow>

  findSourceByName(name: string): Promise<SourceRow | null>

  findDataRows(criteria: RowCriteria, options?: FindOptions): Promise<DataRow[]>

  getDataRow(id: number): Promise<DataRow | null>

  insertDataRow(fields: StoredFields): Promise<DataRow>

  /**
   * Writes the given fields and refreshes `updatedAt`.
   *
   * @throws {NotFoundError} No row has the id
   */
  updateDataRow(id: number, fields: StoredFields): Promise<DataRow>

  /**
   * @returns Whether the citation was created (false when it already existed)
   */
  insertCitation(dataId: number, sourceId: number): Promise<boolean>

  listCitations(dataId: number): Promise<Citation[]>

  countDataRows(): Promise<number>

  /**
   * Runs the callback in a transaction; every write through `tx` is undone
   * when the callback throws. Transactions started on `tx` join the outer one.
   */
  transaction<R>(
    callback: (tx: StorageAdapter) => Promise<R>,
    options?: TransactionOptions
  ): Promise<R>
}

/**
 * Names of the schema and tables an adapter uses.
 */
export interface StorageConfig {
  /** Database schema (default: `public`) */
  schema?: string
  sourcesTable?: string
  dataTable?: string
  citationsTable?: string
}
