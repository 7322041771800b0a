import type { SourceType } from '../types/source'
import type { CanonicalRow, StoredFields } from '../types/records'
import type { StorageAdapter } from '../adapters/types'
import type { SchemaManager } from '../schema/schema-manager'
import { ReconciliationError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import type { IdentityStrategy } from './identity-strategy'
import { identityLockKeys, resolveIdentityStrategy } from './identity-strategy'

export interface ReconciliationEngineOptions {
  /** When set, each row's columns are ensured before it is written */
  schemaManager?: SchemaManager
  logger?: Logger
}

/**
 * Outcome of one upsert
 */
export interface UpsertResult {
  dataId: number
  /** A new data row was inserted */
  created: boolean
  /** The (row, source) citation did not exist before */
  citationCreated: boolean
  /** Columns whose stored value changed */
  fieldsChanged: string[]
}

export interface FieldMerge {
  /** Stored row after the merge */
  fields: StoredFields
  /** Incoming non-null values; what gets written */
  updates: StoredFields
  changed: string[]
}

/**
 * Converts a canonical row to stored text values. Numbers are written as
 * their decimal string.
 */
export function toStoredFields(row: CanonicalRow): StoredFields {
  const fields: StoredFields = {}
  for (const [column, value] of Object.entries(row)) {
    fields[column] = value === null ? null : String(value)
  }
  return fields
}

/**
 * Overlays incoming values on a stored row. Null incoming values never
 * overwrite.
 *
 * @example
 * ```typescript
 * mergeFields({ name: 'Acme', address: null }, { name: null, address: '123 Main' })
 * // fields: { name: 'Acme', address: '123 Main' }, changed: ['address']
 * ```
 */
export function mergeFields(stored: StoredFields, incoming: StoredFields): FieldMerge {
  const fields: StoredFields = { ...stored }
  const updates: StoredFields = {}
  const changed: string[] = []

  for (const [column, value] of Object.entries(incoming)) {
    if (value === null) {
      continue
    }
    updates[column] = value
    if ((stored[column] ?? null) !== value) {
      changed.push(column)
    }
    fields[column] = value
  }

  return { fields, updates, changed }
}

/**
 * Merges canonical rows from many sources into one dataset and records
 * which sources contributed to each row.
 *
 * @example
 * ```typescript
 * const engine = new ReconciliationEngine(storage, { schemaManager })
 * const sourceId = await engine.registerSource('state-licenses', 'api', null, ['license_number'])
 * const dataId = await engine.upsert({ license_number: 'L1', name: 'Acme' }, sourceId)
 * ```
 */
export class ReconciliationEngine {
  private readonly sourceIds = new Map<string, number>()
  private readonly strategies = new Map<number, IdentityStrategy>()
  private readonly schemaManager?: SchemaManager
  private readonly logger: Logger

  constructor(
    private readonly storage: StorageAdapter,
    options: ReconciliationEngineOptions = {}
  ) {
    this.schemaManager = options.schemaManager
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Looks up or creates the source named `name`. `identity` is the source's
   * strategy, or its unique keys to build one from. Repeated calls with the
   * same name return the cached id.
   */
  async registerSource(
    name: string,
    sourceType: SourceType,
    configPath: string | null,
    identity: IdentityStrategy | readonly string[] = []
  ): Promise<number> {
    const cached = this.sourceIds.get(name)
    if (cached !== undefined) {
      return cached
    }

    const strategy = 'identify' in identity ? identity : resolveIdentityStrategy(identity)
    const source = await this.storage.upsertSource({
      name,
      sourceType,
      configPath,
      uniqueKeys: [...strategy.keys],
    })
    this.sourceIds.set(name, source.id)
    this.strategies.set(source.id, strategy)
    this.logger.debug(`Registered source '${name}'`, { sourceId: source.id })
    return source.id
  }

  /**
   * @throws {ReconciliationError} The source was not registered with this engine
   */
  identityStrategyFor(sourceId: number): IdentityStrategy {
    const strategy = this.strategies.get(sourceId)
    if (!strategy) {
      throw new ReconciliationError(`Source ${sourceId} is not registered`, { sourceId })
    }
    return strategy
  }

  /**
   * Inserts or merges a row and cites the source.
   *
   * @returns The data row id
   * @throws {ReconciliationError} The identity matched more than one stored row
   */
  async upsert(row: CanonicalRow, sourceId: number): Promise<number> {
    const result = await this.upsertDetailed(row, sourceId)
    return result.dataId
  }

  async upsertDetailed(row: CanonicalRow, sourceId: number): Promise<UpsertResult> {
    const strategy = this.identityStrategyFor(sourceId)
    if (this.schemaManager) {
      await this.schemaManager.ensureColumns(Object.keys(row))
    }

    const fields = toStoredFields(row)
    const criteria = strategy.identify(fields)
    const lockKeys = identityLockKeys(criteria, fields)

    if (!criteria) {
      return this.storage.transaction((tx) => this.insertNew(tx, fields, sourceId), { lockKeys })
    }

    return this.storage.transaction(
      async (tx) => {
        const matches = await tx.findDataRows(criteria, { limit: 2 })
        if (matches.length > 1) {
          throw new ReconciliationError('Identity matches more than one stored row', {
            sourceId,
            identity: Object.fromEntries(criteria),
            dataIds: matches.map((match) => match.id),
          })
        }
        if (matches.length === 0) {
          return this.insertNew(tx, fields, sourceId)
        }

        const existing = matches[0]
        const merge = mergeFields(existing.fields, fields)
        await tx.updateDataRow(existing.id, merge.updates)
        const citationCreated = await tx.insertCitation(existing.id, sourceId)
        return {
          dataId: existing.id,
          created: false,
          citationCreated,
          fieldsChanged: merge.changed,
        }
      },
      { lockKeys }
    )
  }

  private async insertNew(
    tx: StorageAdapter,
    fields: StoredFields,
    sourceId: number
  ): Promise<UpsertResult> {
    const inserted = await tx.insertDataRow(fields)
    const citationCreated = await tx.insertCitation(inserted.id, sourceId)
    return {
      dataId: inserted.id,
      created: true,
      citationCreated,
      fieldsChanged: Object.keys(fields).filter((column) => fields[column] !== null),
    }
  }
}
