import type { Citation, DataRow, SourceRow, StoredFields } from '../../types/records'
import { KeyedMutex } from '../../utils/keyed-mutex'
import type {
  FindOptions,
  RowCriteria,
  SourceInput,
  StorageAdapter,
  StorageConfig,
  TransactionOptions,
} from '../types'
import { BaseStorageAdapter, assertDataColumnName } from '../base-storage-adapter'
import { NotFoundError, QueryError } from '../adapter-error'

export interface MemoryStorageOptions extends StorageConfig {
  /** Timestamp source (default: `new Date()`) */
  now?: () => Date
}

function copyRow(row: DataRow): DataRow {
  return {
    id: row.id,
    createdAt: new Date(row.createdAt.getTime()),
    updatedAt: new Date(row.updatedAt.getTime()),
    fields: { ...row.fields },
  }
}

function copySource(source: SourceRow): SourceRow {
  return {
    ...source,
    uniqueKeys: [...source.uniqueKeys],
    createdAt: new Date(source.createdAt.getTime()),
    updatedAt: new Date(source.updatedAt.getTime()),
  }
}

function citationKey(dataId: number, sourceId: number): string {
  return `${dataId}:${sourceId}`
}

/**
 * In-process storage. Transactions journal their writes and undo them when
 * the callback throws; `lockKeys` serialize transactions through a keyed
 * mutex.
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorageAdapter()
 * await storage.initialize()
 * await storage.addColumns(['license_number', 'name'])
 * const row = await storage.insertDataRow({ license_number: 'L1', name: 'Acme' })
 * ```
 */
export class MemoryStorageAdapter extends BaseStorageAdapter {
  private readonly columns: string[] = []
  private readonly sources = new Map<string, SourceRow>()
  private readonly rows = new Map<number, DataRow>()
  private readonly citations = new Map<string, Citation>()
  private readonly locks = new KeyedMutex()
  private readonly now: () => Date
  private nextSourceId = 1
  private nextDataId = 1

  constructor(options: MemoryStorageOptions = {}) {
    const { now, ...config } = options
    super(config)
    this.now = now ?? (() => new Date())
  }

  async initialize(): Promise<void> {}

  async getColumns(): Promise<string[]> {
    return [...this.columns]
  }

  async addColumns(names: readonly string[]): Promise<string[]> {
    names.forEach(assertDataColumnName)
    const added: string[] = []
    for (const name of names) {
      if (!this.columns.includes(name)) {
        this.columns.push(name)
        added.push(name)
      }
    }
    return added
  }

  async upsertSource(input: SourceInput): Promise<SourceRow> {
    const timestamp = this.now()
    const existing = this.sources.get(input.name)
    const source: SourceRow = existing
      ? {
          ...existing,
          sourceType: input.sourceType,
          configPath: input.configPath,
          uniqueKeys: [...input.uniqueKeys],
          updatedAt: timestamp,
        }
      : {
          id: this.nextSourceId++,
          name: input.name,
          sourceType: input.sourceType,
          configPath: input.configPath,
          uniqueKeys: [...input.uniqueKeys],
          createdAt: timestamp,
          updatedAt: timestamp,
        }
    this.sources.set(source.name, source)
    return copySource(source)
  }

  async findSourceByName(name: string): Promise<SourceRow | null> {
    const source = this.sources.get(name)
    return source ? copySource(source) : null
  }

  async findDataRows(criteria: RowCriteria, options: FindOptions = {}): Promise<DataRow[]> {
    for (const column of criteria.keys()) {
      this.assertKnownColumn(column)
    }

    const matches: DataRow[] = []
    for (const row of this.rows.values()) {
      if (options.limit !== undefined && matches.length >= options.limit) {
        break
      }
      const matched = Array.from(criteria).every(
        ([column, value]) => (row.fields[column] ?? null) === value
      )
      if (matched) {
        matches.push(this.withAllColumns(row))
      }
    }
    return matches
  }

  async getDataRow(id: number): Promise<DataRow | null> {
    const row = this.rows.get(id)
    return row ? this.withAllColumns(row) : null
  }

  async insertDataRow(fields: StoredFields): Promise<DataRow> {
    this.assertKnownColumns(fields)
    const timestamp = this.now()
    const row: DataRow = {
      id: this.nextDataId++,
      createdAt: timestamp,
      updatedAt: timestamp,
      fields: { ...fields },
    }
    this.rows.set(row.id, row)
    return this.withAllColumns(row)
  }

  async updateDataRow(id: number, fields: StoredFields): Promise<DataRow> {
    this.assertKnownColumns(fields)
    const row = this.rows.get(id)
    if (!row) {
      throw new NotFoundError('Data row not found', { id, table: this.config.dataTable })
    }
    const updated: DataRow = {
      ...row,
      updatedAt: this.now(),
      fields: { ...row.fields, ...fields },
    }
    this.rows.set(id, updated)
    return this.withAllColumns(updated)
  }

  async insertCitation(dataId: number, sourceId: number): Promise<boolean> {
    if (!this.rows.has(dataId)) {
      throw new QueryError('Citation references a missing data row', {
        dataId,
        table: this.config.citationsTable,
      })
    }
    const key = citationKey(dataId, sourceId)
    if (this.citations.has(key)) {
      return false
    }
    this.citations.set(key, { dataId, sourceId, createdAt: this.now() })
    return true
  }

  async listCitations(dataId: number): Promise<Citation[]> {
    return Array.from(this.citations.values())
      .filter((citation) => citation.dataId === dataId)
      .sort((a, b) => a.sourceId - b.sourceId)
      .map((citation) => ({ ...citation, createdAt: new Date(citation.createdAt.getTime()) }))
  }

  async countDataRows(): Promise<number> {
    return this.rows.size
  }

  async transaction<R>(
    callback: (tx: StorageAdapter) => Promise<R>,
    options: TransactionOptions = {}
  ): Promise<R> {
    const run = async (): Promise<R> => {
      const tx = new JournaledMemoryTransaction(this)
      try {
        return await callback(tx)
      } catch (error) {
        tx.rollback()
        throw error
      }
    }
    return options.lockKeys && options.lockKeys.length > 0
      ? this.locks.runAll(options.lockKeys, run)
      : run()
  }

  /** @internal Undo support for transactions */
  restoreSource(source: SourceRow): void {
    this.sources.set(source.name, copySource(source))
  }

  /** @internal */
  removeSource(name: string): void {
    this.sources.delete(name)
  }

  /** @internal */
  restoreDataRow(row: DataRow): void {
    this.rows.set(row.id, copyRow(row))
  }

  /** @internal */
  removeDataRow(id: number): void {
    this.rows.delete(id)
  }

  /** @internal */
  removeCitation(dataId: number, sourceId: number): void {
    this.citations.delete(citationKey(dataId, sourceId))
  }

  private withAllColumns(row: DataRow): DataRow {
    const copy = copyRow(row)
    for (const column of this.columns) {
      copy.fields[column] = row.fields[column] ?? null
    }
    return copy
  }

  private assertKnownColumn(column: string): void {
    if (!this.columns.includes(column)) {
      throw new QueryError(`Unknown data column '${column}'`, {
        column,
        table: this.config.dataTable,
      })
    }
  }

  private assertKnownColumns(fields: StoredFields): void {
    Object.keys(fields).forEach((column) => this.assertKnownColumn(column))
  }
}

/**
 * Transaction view over a memory adapter. Reads and writes go through the
 * adapter itself; each write records how to undo it.
 */
class JournaledMemoryTransaction implements StorageAdapter {
  private readonly undo: Array<() => void> = []

  constructor(private readonly store: MemoryStorageAdapter) {}

  initialize(): Promise<void> {
    return this.store.initialize()
  }

  getColumns(): Promise<string[]> {
    return this.store.getColumns()
  }

  // Column additions survive a rollback
  addColumns(names: readonly string[]): Promise<string[]> {
    return this.store.addColumns(names)
  }

  async upsertSource(input: SourceInput): Promise<SourceRow> {
    const previous = await this.store.findSourceByName(input.name)
    const source = await this.store.upsertSource(input)
    this.undo.push(() =>
      previous ? this.store.restoreSource(previous) : this.store.removeSource(input.name)
    )
    return source
  }

  findSourceByName(name: string): Promise<SourceRow | null> {
    return this.store.findSourceByName(name)
  }

  findDataRows(criteria: RowCriteria, options?: FindOptions): Promise<DataRow[]> {
    return this.store.findDataRows(criteria, options)
  }

  getDataRow(id: number): Promise<DataRow | null> {
    return this.store.getDataRow(id)
  }

  async insertDataRow(fields: StoredFields): Promise<DataRow> {
    const row = await this.store.insertDataRow(fields)
    this.undo.push(() => this.store.removeDataRow(row.id))
    return row
  }

  async updateDataRow(id: number, fields: StoredFields): Promise<DataRow> {
    const previous = await this.store.getDataRow(id)
    const row = await this.store.updateDataRow(id, fields)
    if (previous) {
      this.undo.push(() => this.store.restoreDataRow(previous))
    }
    return row
  }

  async insertCitation(dataId: number, sourceId: number): Promise<boolean> {
    const created = await this.store.insertCitation(dataId, sourceId)
    if (created) {
      this.undo.push(() => this.store.removeCitation(dataId, sourceId))
    }
    return created
  }

  listCitations(dataId: number): Promise<Citation[]> {
    return this.store.listCitations(dataId)
  }

  countDataRows(): Promise<number> {
    return this.store.countDataRows()
  }

  transaction<R>(callback: (tx: StorageAdapter) => Promise<R>): Promise<R> {
    return callback(this)
  }

  rollback(): void {
    for (const undo of this.undo.reverse()) {
      undo()
    }
    this.undo.length = 0
  }
}
