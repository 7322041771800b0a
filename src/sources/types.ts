/**
 * A decoded tabular row: keyed by header when the file has one, positional
 * otherwise.
 */
export type DecodedRow = Record<string, unknown> | unknown[]

export interface DecodeOptions {
  hasHeader: boolean
  /** File the content came from, for format detection and messages */
  fileName: string
  /** The descriptor's `decoder` section, untouched */
  options: Readonly<Record<string, unknown>>
}

/**
 * Decodes tabular file content (CSV, TSV, spreadsheets) into rows.
 * Implementations live outside the engine.
 */
export interface TabularDecoder {
  decode(
    content: Uint8Array | string,
    options: DecodeOptions
  ): Iterable<DecodedRow> | AsyncIterable<DecodedRow>
}

/**
 * File access for dataset sources.
 */
export interface FileReader {
  /** Names of the regular files in a folder */
  list(folder: string): Promise<string[]>
  read(path: string): Promise<Uint8Array>
}
