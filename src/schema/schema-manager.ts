import type { ColumnMap, SourceDescriptor } from '../types/source'
import type { StorageAdapter } from '../adapters/types'
import { RESERVED_COLUMNS, isValidIdentifier } from '../adapters/base-storage-adapter'
import { ConfigError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import { KeyedMutex } from '../utils/keyed-mutex'

/**
 * @throws {ConfigError} The name is not a valid identifier or is reserved
 */
export function validateColumnName(name: string): void {
  if (!isValidIdentifier(name)) {
    throw new ConfigError(
      `Column name '${name}' must start with a letter or underscore, contain only letters, digits and underscores, and be at most 63 characters`,
      { column: name }
    )
  }
  if (RESERVED_COLUMNS.includes(name.toLowerCase())) {
    throw new ConfigError(`Column name '${name}' is reserved`, {
      column: name,
      reserved: RESERVED_COLUMNS,
    })
  }
}

function unionColumns(columnSets: Iterable<readonly string[]>): string[] {
  const columns = new Set<string>()
  for (const set of columnSets) {
    set.forEach((column) => columns.add(column))
  }
  return Array.from(columns)
}

/**
 * Destination columns of one column map
 */
export function columnMapDestinations(columnMap: ColumnMap): string[] {
  return Array.isArray(columnMap) ? [...columnMap] : Object.keys(columnMap)
}

/**
 * Union of destination columns across sources, in first-seen order
 */
export function collectColumns(descriptors: Iterable<Pick<SourceDescriptor, 'column_map'>>): string[] {
  const sets: string[][] = []
  for (const descriptor of descriptors) {
    sets.push(columnMapDestinations(descriptor.column_map))
  }
  return unionColumns(sets)
}

const SCHEMA_LOCK = 'schema'

/**
 * Keeps the data table's column set a superset of every column in use.
 * Columns are only ever added.
 */
export class SchemaManager {
  private readonly known = new Set<string>()
  private readonly mutex = new KeyedMutex()
  private loaded = false
  private readonly logger: Logger

  constructor(
    private readonly storage: StorageAdapter,
    logger: Logger = createSilentLogger()
  ) {
    this.logger = logger
  }

  /**
   * Makes sure every named column exists.
   *
   * @returns The columns this call added
   * @throws {ConfigError} A name is invalid or reserved
   */
  async ensureColumns(names: readonly string[]): Promise<string[]> {
    names.forEach(validateColumnName)
    if (this.loaded && names.every((name) => this.known.has(name))) {
      return []
    }

    return this.mutex.run(SCHEMA_LOCK, async () => {
      await this.load()
      const missing = unionColumns([names]).filter((name) => !this.known.has(name))
      if (missing.length === 0) {
        return []
      }

      const added = await this.storage.addColumns(missing)
      missing.forEach((name) => this.known.add(name))
      if (added.length > 0) {
        this.logger.info(`Added columns: ${added.join(', ')}`)
      }
      return added
    })
  }

  /** Columns known to exist, in the order they were seen */
  knownColumns(): string[] {
    return Array.from(this.known)
  }

  /** Re-reads the column set from storage */
  async refresh(): Promise<string[]> {
    return this.mutex.run(SCHEMA_LOCK, async () => {
      this.loaded = false
      this.known.clear()
      await this.load()
      return this.knownColumns()
    })
  }

  private async load(): Promise<void> {
    if (this.loaded) {
      return
    }
    for (const column of await this.storage.getColumns()) {
      this.known.add(column)
    }
    this.loaded = true
  }
}
