import type { StoredFields } from '../types/records'
import type { RowCriteria } from '../adapters/types'

/**
 * Decides which columns identify a row across sources.
 */
export interface IdentityStrategy {
  readonly kind: 'unique-keys' | 'all-non-null'
  /** Columns persisted as the source's `unique_keys`; empty for all-non-null */
  readonly keys: readonly string[]
  /**
   * Identity criteria of a row, or `null` when the row cannot be matched
   * and must be inserted as new.
   */
  identify(fields: StoredFields): RowCriteria | null
}

/**
 * Identity is the source's configured `unique_keys`. A row with any key
 * missing cannot be matched.
 */
export class UniqueKeysStrategy implements IdentityStrategy {
  readonly kind = 'unique-keys'

  constructor(readonly keys: readonly string[]) {}

  identify(fields: StoredFields): RowCriteria | null {
    const criteria = new Map<string, string>()
    for (const key of this.keys) {
      const value = fields[key] ?? null
      if (value === null) {
        return null
      }
      criteria.set(key, value)
    }
    return criteria.size > 0 ? criteria : null
  }
}

/**
 * Identity is every non-null column of the incoming row.
 */
export class AllNonNullStrategy implements IdentityStrategy {
  readonly kind = 'all-non-null'
  readonly keys: readonly string[] = []

  identify(fields: StoredFields): RowCriteria | null {
    const criteria = new Map<string, string>()
    for (const [column, value] of Object.entries(fields)) {
      if (value !== null) {
        criteria.set(column, value)
      }
    }
    return criteria.size > 0 ? criteria : null
  }
}

export function resolveIdentityStrategy(uniqueKeys: readonly string[] | undefined): IdentityStrategy {
  return uniqueKeys && uniqueKeys.length > 0
    ? new UniqueKeysStrategy([...uniqueKeys])
    : new AllNonNullStrategy()
}

/**
 * Lock keys for an upsert: one per (column, value) pair of the identity
 * criteria and of the incoming row's non-null fields, sorted and distinct.
 *
 * Any criteria that can match a row are a subset of that row's fields, so
 * two upserts that could resolve to the same row always share a key,
 * whatever identity policy each source uses.
 */
export function identityLockKeys(criteria: RowCriteria | null, fields: StoredFields): string[] {
  const keys = new Set<string>()
  for (const [column, value] of criteria ?? []) {
    keys.add(`identity:${JSON.stringify([column, value])}`)
  }
  for (const [column, value] of Object.entries(fields)) {
    if (value !== null) {
      keys.add(`identity:${JSON.stringify([column, value])}`)
    }
  }
  return Array.from(keys).sort()
}
