export type { DecodedRow, DecodeOptions, TabularDecoder, FileReader } from './types'
export { NodeFileReader } from './node-file-reader'
export { openRecordStream, DATASET_METADATA_FILES } from './record-source'
export type { RecordSourceDependencies } from './record-source'
