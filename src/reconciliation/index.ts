export {
  ReconciliationEngine,
  mergeFields,
  toStoredFields,
} from './reconciliation-engine'
export type {
  ReconciliationEngineOptions,
  UpsertResult,
  FieldMerge,
} from './reconciliation-engine'
export {
  UniqueKeysStrategy,
  AllNonNullStrategy,
  resolveIdentityStrategy,
  identityLockKeys,
} from './identity-strategy'
export type { IdentityStrategy } from './identity-strategy'
