import type { ColumnMap, ColumnReference, ExtractionSpec } from '../types/source'
import type { CanonicalRow, Scalar } from '../types/records'
import type { CompiledTransform } from '../transforms/types'
import type { TransformRegistry } from '../transforms/registry'
import { defaultTransformRegistry } from '../transforms/registry'
import { ConfigError, ExtractionError, TransformError } from '../utils/errors'
import { isRecord, lookupPath } from './dot-path'

/**
 * One destination column with its resolved reference and transform.
 */
export interface CompiledColumn {
  destination: string
  reference: ColumnReference
  transform?: CompiledTransform
}

export type CompiledColumnMap = readonly CompiledColumn[]

function isExtractionObject(
  spec: ExtractionSpec
): spec is Exclude<ExtractionSpec, ColumnReference> {
  return typeof spec === 'object' && spec !== null
}

/**
 * Resolves every destination column of a column map to one reference and an
 * optional compiled transform.
 *
 * @throws {ConfigError} A spec has no reference or names an unknown transform
 */
export function compileColumnMap(
  columnMap: ColumnMap,
  registry: TransformRegistry = defaultTransformRegistry
): CompiledColumnMap {
  if (Array.isArray(columnMap)) {
    return columnMap.map((destination, index) => ({ destination, reference: index }))
  }

  return Object.entries(columnMap).map(([destination, spec]) => {
    if (!isExtractionObject(spec)) {
      return { destination, reference: spec }
    }

    const reference = spec.key ?? spec.column
    if (reference === undefined) {
      throw new ConfigError(`Column '${destination}' needs a 'key' or 'column' reference`, {
        destination,
      })
    }
    if (spec.key !== undefined && spec.column !== undefined) {
      throw new ConfigError(`Column '${destination}' sets both 'key' and 'column'`, {
        destination,
      })
    }

    const column: CompiledColumn = { destination, reference }
    if (spec.transform) {
      try {
        column.transform = registry.compile(spec.transform)
      } catch (error) {
        if (error instanceof ConfigError) {
          throw new ConfigError(`Column '${destination}': ${error.message}`, {
            destination,
            ...error.context,
          })
        }
        throw error
      }
    }
    return column
  })
}

export function destinationColumns(columns: CompiledColumnMap): string[] {
  return columns.map((column) => column.destination)
}

/**
 * Coerces a raw value to a canonical scalar.
 */
export function toScalar(value: unknown): Scalar {
  if (value === undefined || value === null) {
    return null
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  if (typeof value === 'bigint') {
    return value.toString()
  }
  return JSON.stringify(value)
}

/**
 * @throws {ConfigError} A named reference was applied to a positional row
 */
function positionOf(reference: ColumnReference): number {
  if (typeof reference === 'number') {
    return reference
  }
  if (/^\d+$/.test(reference)) {
    return Number(reference)
  }
  throw new ConfigError(`Named reference '${reference}' cannot be applied to a positional row`, {
    reference,
  })
}

export interface FieldExtractorOptions {
  /** Raw string values read as null */
  nullValues?: readonly string[]
  /** A reference that does not resolve rejects the record */
  strictKeys?: boolean
}

/**
 * Applies compiled column maps to raw records.
 */
export class FieldExtractor {
  private readonly nullValues: ReadonlySet<string>
  private readonly strictKeys: boolean

  constructor(
    private readonly columns: CompiledColumnMap,
    options: FieldExtractorOptions = {}
  ) {
    this.nullValues = new Set(options.nullValues ?? [])
    this.strictKeys = options.strictKeys ?? false
  }

  get destinations(): string[] {
    return destinationColumns(this.columns)
  }

  /**
   * Produces the canonical row for one raw record. A reference that does not
   * resolve yields `null` for that column, or rejects the record under
   * `strictKeys`.
   *
   * @throws {TransformError} A transform rejected a value
   * @throws {ExtractionError} A reference did not resolve under `strictKeys`
   * @throws {ConfigError} A named reference was applied to a positional row
   */
  extract(record: unknown): CanonicalRow {
    const row: CanonicalRow = {}
    for (const column of this.columns) {
      const scalar = toScalar(this.resolve(record, column))
      const raw = typeof scalar === 'string' && this.nullValues.has(scalar) ? null : scalar
      row[column.destination] = column.transform
        ? this.applyTransform(column, raw)
        : raw
    }
    return row
  }

  private resolve(record: unknown, column: CompiledColumn): unknown {
    const { reference } = column
    if (Array.isArray(record)) {
      const index = positionOf(reference)
      if (index >= record.length) {
        return this.missing(column)
      }
      return record[index]
    }
    if (isRecord(record)) {
      const lookup = lookupPath(record, String(reference))
      return lookup.found ? lookup.value : this.missing(column)
    }
    return this.missing(column)
  }

  private missing(column: CompiledColumn): null {
    if (this.strictKeys) {
      throw new ExtractionError(column.destination, column.reference)
    }
    return null
  }

  private applyTransform(column: CompiledColumn, value: Scalar): Scalar {
    if (!column.transform) {
      return value
    }
    try {
      return column.transform.apply(value)
    } catch (error) {
      if (error instanceof TransformError) {
        throw error.withContext({ column: column.destination })
      }
      throw error
    }
  }
}
