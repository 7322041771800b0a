import type { SourceType } from './source'

/** Canonical column value */
export type Scalar = string | number | null

/**
 * A record in the shared destination column space, produced by applying one
 * source's column map to one raw record.
 */
export type CanonicalRow = Record<string, Scalar>

/** Data columns are stored as text */
export type StoredValue = string | null

export type StoredFields = Record<string, StoredValue>

/** A registered source */
export interface SourceRow {
  id: number
  name: string
  sourceType: SourceType
  configPath: string | null
  uniqueKeys: string[]
  createdAt: Date
  updatedAt: Date
}

/** A reconciled row with the dynamic column set held as a name/value map */
export interface DataRow {
  id: number
  createdAt: Date
  updatedAt: Date
  fields: StoredFields
}

/** Provenance edge: the source contributed to the data row */
export interface Citation {
  dataId: number
  sourceId: number
  createdAt: Date
}
