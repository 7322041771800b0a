import { sql } from 'drizzle-orm'
import type { SQL } from 'drizzle-orm'
import type { Citation, DataRow, SourceRow, StoredFields, StoredValue } from '../../types/records'
import { TributaryError, errorMessage } from '../../utils/errors'
import type {
  FindOptions,
  RowCriteria,
  SourceInput,
  StorageAdapter,
  StorageConfig,
  TransactionOptions,
} from '../types'
import {
  BaseStorageAdapter,
  RESERVED_COLUMNS,
  assertDataColumnName,
  parseSourceType,
} from '../base-storage-adapter'
import { NotFoundError, QueryError, TransactionError, ValidationError } from '../adapter-error'

/**
 * The part of a Drizzle database the adapter needs: raw SQL execution and
 * transactions. A `NodePgDatabase` satisfies it.
 */
export interface DrizzleSqlDatabase {
  execute(query: SQL): PromiseLike<{ rows: Record<string, unknown>[] }>
  transaction<R>(callback: (tx: DrizzleSqlDatabase) => Promise<R>): Promise<R>
}

type QueryRow = Record<string, unknown>

function toNumber(value: unknown, field: string): number {
  const parsed = typeof value === 'number' ? value : Number(value)
  if (!Number.isFinite(parsed)) {
    throw new QueryError(`Column '${field}' is not numeric`, { field, value })
  }
  return parsed
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value))
}

function toStoredValue(value: unknown): StoredValue {
  if (value === null || value === undefined) {
    return null
  }
  return typeof value === 'string' ? value : String(value)
}

function parseUniqueKeys(value: unknown): string[] {
  if (typeof value !== 'string') {
    return []
  }
  const parsed: unknown = JSON.parse(value)
  return Array.isArray(parsed)
    ? parsed.filter((key): key is string => typeof key === 'string')
    : []
}

/**
 * PostgreSQL storage through Drizzle's `sql` builder.
 *
 * Data columns are created on demand as nullable TEXT. Schema changes and
 * keyed transactions take transaction-scoped advisory locks, so concurrent
 * processes agree on both.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres'
 * import pg from 'pg'
 *
 * const pool = new pg.Pool({ connectionString: process.env.TRIBUTARY_DATABASE_URL })
 * const storage = new DrizzleStorageAdapter(drizzle(pool), { schema: 'tributary' })
 * await storage.initialize()
 * ```
 */
export class DrizzleStorageAdapter extends BaseStorageAdapter {
  private readonly db: DrizzleSqlDatabase
  private readonly inTransaction: boolean

  constructor(db: DrizzleSqlDatabase, config: StorageConfig = {}, inTransaction = false) {
    super(config)
    this.db = db
    this.inTransaction = inTransaction
  }

  private table(name: string): SQL {
    return sql`${sql.identifier(this.config.schema)}.${sql.identifier(name)}`
  }

  private get sourcesTable(): SQL {
    return this.table(this.config.sourcesTable)
  }

  private get dataTable(): SQL {
    return this.table(this.config.dataTable)
  }

  private get citationsTable(): SQL {
    return this.table(this.config.citationsTable)
  }

  private async run(query: SQL, operation: string): Promise<QueryRow[]> {
    try {
      const result = await this.db.execute(query)
      return result.rows
    } catch (error) {
      throw new QueryError(`Failed to ${operation}: ${errorMessage(error)}`, {
        operation,
        schema: this.config.schema,
      })
    }
  }

  private lock(key: string): SQL {
    return sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`
  }

  private schemaLockKey(): string {
    return `tributary:schema:${this.config.schema}`
  }

  async initialize(): Promise<void> {
    await this.withTransaction(async (tx) => {
      await tx.run(tx.lock(tx.schemaLockKey()), 'lock schema')
      await tx.run(sql`CREATE SCHEMA IF NOT EXISTS ${sql.identifier(this.config.schema)}`, 'create schema')
      await tx.run(
        sql`CREATE TABLE IF NOT EXISTS ${tx.sourcesTable} (
          id SERIAL PRIMARY KEY,
          name TEXT NOT NULL UNIQUE,
          source_type TEXT NOT NULL,
          config_path TEXT,
          unique_keys TEXT NOT NULL DEFAULT '[]',
          created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
          updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )`,
        'create sources table'
      )
      await tx.run(
        sql`CREATE TABLE IF NOT EXISTS ${tx.dataTable} (
          id SERIAL PRIMARY KEY,
          created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
          updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )`,
        'create data table'
      )
      await tx.run(
        sql`CREATE TABLE IF NOT EXISTS ${tx.citationsTable} (
          data_id INTEGER NOT NULL REFERENCES ${tx.dataTable} (id) ON DELETE CASCADE,
          source_id INTEGER NOT NULL REFERENCES ${tx.sourcesTable} (id) ON DELETE CASCADE,
          created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
          PRIMARY KEY (data_id, source_id)
        )`,
        'create citations table'
      )
    })
  }

  async getColumns(): Promise<string[]> {
    const rows = await this.run(
      sql`SELECT column_name FROM information_schema.columns
        WHERE table_schema = ${this.config.schema} AND table_name = ${this.config.dataTable}
        ORDER BY ordinal_position`,
      'list data columns'
    )
    return rows
      .map((row) => String(row.column_name))
      .filter((name) => !RESERVED_COLUMNS.includes(name))
  }

  async addColumns(names: readonly string[]): Promise<string[]> {
    names.forEach(assertDataColumnName)
    if (names.length === 0) {
      return []
    }

    return this.withTransaction(async (tx) => {
      await tx.run(tx.lock(tx.schemaLockKey()), 'lock schema')
      const existing = new Set(await tx.getColumns())
      const added: string[] = []
      for (const name of names) {
        if (existing.has(name) || added.includes(name)) {
          continue
        }
        await tx.run(
          sql`ALTER TABLE ${tx.dataTable} ADD COLUMN IF NOT EXISTS ${sql.identifier(name)} TEXT`,
          `add column ${name}`
        )
        added.push(name)
      }
      return added
    })
  }

  async upsertSource(input: SourceInput): Promise<SourceRow> {
    const rows = await this.run(
      sql`INSERT INTO ${this.sourcesTable} (name, source_type, config_path, unique_keys)
        VALUES (${input.name}, ${input.sourceType}, ${input.configPath}, ${JSON.stringify(input.uniqueKeys)})
        ON CONFLICT (name) DO UPDATE SET
          source_type = EXCLUDED.source_type,
          config_path = EXCLUDED.config_path,
          unique_keys = EXCLUDED.unique_keys,
          updated_at = now()
        RETURNING *`,
      'upsert source'
    )
    return this.toSourceRow(this.single(rows, 'upsert source'))
  }

  async findSourceByName(name: string): Promise<SourceRow | null> {
    const rows = await this.run(
      sql`SELECT * FROM ${this.sourcesTable} WHERE name = ${name}`,
      'find source'
    )
    return rows.length > 0 ? this.toSourceRow(rows[0]) : null
  }

  async findDataRows(criteria: RowCriteria, options: FindOptions = {}): Promise<DataRow[]> {
    const conditions = Array.from(criteria).map(([column, value]) => {
      assertDataColumnName(column)
      return sql`${sql.identifier(column)} = ${value}`
    })
    const where = conditions.length > 0 ? sql` WHERE ${sql.join(conditions, sql` AND `)}` : sql``
    const limit = options.limit !== undefined ? sql` LIMIT ${options.limit}` : sql``

    const rows = await this.run(
      sql`SELECT * FROM ${this.dataTable}${where} ORDER BY id${limit}`,
      'find data rows'
    )
    return rows.map((row) => this.toDataRow(row))
  }

  async getDataRow(id: number): Promise<DataRow | null> {
    const rows = await this.run(sql`SELECT * FROM ${this.dataTable} WHERE id = ${id}`, 'get data row')
    return rows.length > 0 ? this.toDataRow(rows[0]) : null
  }

  async insertDataRow(fields: StoredFields): Promise<DataRow> {
    const entries = Object.entries(fields)
    entries.forEach(([column]) => assertDataColumnName(column))

    const query =
      entries.length === 0
        ? sql`INSERT INTO ${this.dataTable} DEFAULT VALUES RETURNING *`
        : sql`INSERT INTO ${this.dataTable} (${sql.join(
            entries.map(([column]) => sql.identifier(column)),
            sql`, `
          )}) VALUES (${sql.join(
            entries.map(([, value]) => sql`${value}`),
            sql`, `
          )}) RETURNING *`

    const rows = await this.run(query, 'insert data row')
    return this.toDataRow(this.single(rows, 'insert data row'))
  }

  async updateDataRow(id: number, fields: StoredFields): Promise<DataRow> {
    const assignments = Object.entries(fields).map(([column, value]) => {
      assertDataColumnName(column)
      return sql`${sql.identifier(column)} = ${value}`
    })
    assignments.push(sql`updated_at = now()`)

    const rows = await this.run(
      sql`UPDATE ${this.dataTable} SET ${sql.join(assignments, sql`, `)} WHERE id = ${id} RETURNING *`,
      'update data row'
    )
    if (rows.length === 0) {
      throw new NotFoundError('Data row not found', { id, table: this.config.dataTable })
    }
    return this.toDataRow(rows[0])
  }

  async insertCitation(dataId: number, sourceId: number): Promise<boolean> {
    const rows = await this.run(
      sql`INSERT INTO ${this.citationsTable} (data_id, source_id)
        VALUES (${dataId}, ${sourceId})
        ON CONFLICT (data_id, source_id) DO NOTHING
        RETURNING data_id`,
      'insert citation'
    )
    return rows.length > 0
  }

  async listCitations(dataId: number): Promise<Citation[]> {
    const rows = await this.run(
      sql`SELECT data_id, source_id, created_at FROM ${this.citationsTable}
        WHERE data_id = ${dataId} ORDER BY source_id`,
      'list citations'
    )
    return rows.map((row) => ({
      dataId: toNumber(row.data_id, 'data_id'),
      sourceId: toNumber(row.source_id, 'source_id'),
      createdAt: toDate(row.created_at),
    }))
  }

  async countDataRows(): Promise<number> {
    const rows = await this.run(
      sql`SELECT count(*)::int AS count FROM ${this.dataTable}`,
      'count data rows'
    )
    return toNumber(this.single(rows, 'count data rows').count, 'count')
  }

  async transaction<R>(
    callback: (tx: StorageAdapter) => Promise<R>,
    options: TransactionOptions = {}
  ): Promise<R> {
    return this.withTransaction(async (tx) => {
      for (const key of Array.from(new Set(options.lockKeys ?? [])).sort()) {
        await tx.run(tx.lock(key), 'acquire transaction lock')
      }
      return callback(tx)
    })
  }

  private async withTransaction<R>(
    callback: (tx: DrizzleStorageAdapter) => Promise<R>
  ): Promise<R> {
    if (this.inTransaction) {
      return callback(this)
    }
    try {
      return await this.db.transaction((db) =>
        callback(new DrizzleStorageAdapter(db, this.config, true))
      )
    } catch (error) {
      if (error instanceof TributaryError) {
        throw error
      }
      throw new TransactionError(`Transaction rolled back: ${errorMessage(error)}`, {
        schema: this.config.schema,
      })
    }
  }

  private single(rows: QueryRow[], operation: string): QueryRow {
    if (rows.length !== 1) {
      throw new QueryError(`Expected one row from ${operation}, got ${rows.length}`, { operation })
    }
    return rows[0]
  }

  private toSourceRow(row: QueryRow): SourceRow {
    try {
      return {
        id: toNumber(row.id, 'id'),
        name: String(row.name),
        sourceType: parseSourceType(row.source_type),
        configPath: typeof row.config_path === 'string' ? row.config_path : null,
        uniqueKeys: parseUniqueKeys(row.unique_keys),
        createdAt: toDate(row.created_at),
        updatedAt: toDate(row.updated_at),
      }
    } catch (error) {
      if (error instanceof ValidationError || error instanceof QueryError) {
        throw error
      }
      throw new QueryError(`Malformed source row: ${errorMessage(error)}`, { row })
    }
  }

  private toDataRow(row: QueryRow): DataRow {
    const fields: StoredFields = {}
    for (const [column, value] of Object.entries(row)) {
      if (!RESERVED_COLUMNS.includes(column)) {
        fields[column] = toStoredValue(value)
      }
    }
    return {
      id: toNumber(row.id, 'id'),
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
      fields,
    }
  }
}
