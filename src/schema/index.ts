export {
  SchemaManager,
  validateColumnName,
  collectColumns,
  columnMapDestinations,
} from './schema-manager'
