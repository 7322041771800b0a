export { lookupPath, getPath, isRecord } from './dot-path'
export type { PathLookup } from './dot-path'
export {
  FieldExtractor,
  compileColumnMap,
  destinationColumns,
  toScalar,
} from './field-extractor'
export type { CompiledColumn, CompiledColumnMap, FieldExtractorOptions } from './field-extractor'
