import { join } from 'node:path'
import type { SourceDescriptor } from '../types/source'
import type { FetchEngine } from '../fetch/fetch-engine'
import { ConfigError, SourceAbortedError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import type { DecodeOptions, DecodedRow, FileReader, TabularDecoder } from './types'

/** Files in a dataset folder that never hold records */
export const DATASET_METADATA_FILES: readonly string[] = ['structure.json']

export interface RecordSourceDependencies {
  fetchEngine: FetchEngine
  decoder?: TabularDecoder
  fileReader?: FileReader
  logger?: Logger
}

function requireDecoder(descriptor: SourceDescriptor, decoder: TabularDecoder | undefined): TabularDecoder {
  if (!decoder) {
    throw new ConfigError(`Source '${descriptor.name}' needs a tabular decoder`, {
      source: descriptor.name,
      sourceType: descriptor.source_type,
    })
  }
  return decoder
}

function fileNameOf(url: string): string {
  const pathname = new URL(url, 'http://localhost').pathname
  const name = pathname.split('/').pop()
  return name && name !== '' ? name : 'download'
}

async function collectRows(rows: Iterable<DecodedRow> | AsyncIterable<DecodedRow>): Promise<DecodedRow[]> {
  const collected: DecodedRow[] = []
  for await (const row of rows) {
    collected.push(row)
  }
  return collected
}

async function* apiRecords(
  descriptor: SourceDescriptor,
  deps: RecordSourceDependencies,
  signal: AbortSignal | undefined,
  logger: Logger
): AsyncGenerator<unknown, void, undefined> {
  if (descriptor.response_type !== 'html') {
    yield* deps.fetchEngine.fetchRecords(descriptor, signal, logger)
    return
  }

  const decoder = requireDecoder(descriptor, deps.decoder)
  const endpoint = typeof descriptor.endpoint === 'string' ? descriptor.endpoint : ''
  const name = fileNameOf(endpoint)
  const options: DecodeOptions = {
    hasHeader: descriptor.has_header ?? false,
    fileName: name.toLowerCase().endsWith('.html') ? name : `${name}.html`,
    options: descriptor.decoder ?? {},
  }
  yield* deps.fetchEngine.fetchRecords(descriptor, signal, logger, async (body) => {
    const content = typeof body === 'string' || body instanceof Uint8Array ? body : JSON.stringify(body)
    return collectRows(decoder.decode(content, options))
  })
}

async function* importRecords(
  descriptor: SourceDescriptor,
  deps: RecordSourceDependencies,
  signal: AbortSignal | undefined,
  logger: Logger
): AsyncGenerator<DecodedRow, void, undefined> {
  const decoder = requireDecoder(descriptor, deps.decoder)
  const content = await deps.fetchEngine.download(descriptor, signal, logger)
  const endpoint = typeof descriptor.endpoint === 'string' ? descriptor.endpoint : ''
  logger.info('Downloaded import file', { bytes: content.length })

  yield* decoder.decode(content, {
    hasHeader: descriptor.has_header ?? false,
    fileName: fileNameOf(endpoint),
    options: descriptor.decoder ?? {},
  })
}

async function* datasetRecords(
  descriptor: SourceDescriptor,
  deps: RecordSourceDependencies,
  signal: AbortSignal | undefined,
  logger: Logger
): AsyncGenerator<DecodedRow, void, undefined> {
  const decoder = requireDecoder(descriptor, deps.decoder)
  const { fileReader } = deps
  const folder = descriptor.folder_path
  if (!fileReader || folder === undefined) {
    throw new ConfigError(`Source '${descriptor.name}' needs a folder and a file reader`, {
      source: descriptor.name,
    })
  }

  const fileNames =
    descriptor.file_names ??
    (await fileReader.list(folder)).filter((name) => !DATASET_METADATA_FILES.includes(name))

  for (const fileName of fileNames) {
    if (signal?.aborted) {
      throw new SourceAbortedError(`Source '${descriptor.name}' aborted`, { file: fileName })
    }
    logger.debug(`Reading ${fileName}`)
    const content = await fileReader.read(join(folder, fileName))
    yield* decoder.decode(content, {
      hasHeader: descriptor.has_header ?? false,
      fileName,
      options: descriptor.decoder ?? {},
    })
  }
}

/**
 * Raw records of one source, whatever its type.
 *
 * @throws {ConfigError} A dataset, import or html api source has no decoder
 */
export function openRecordStream(
  descriptor: SourceDescriptor,
  deps: RecordSourceDependencies,
  signal?: AbortSignal
): AsyncIterable<unknown> {
  const logger = deps.logger ?? createSilentLogger()
  switch (descriptor.source_type) {
    case 'api':
      return apiRecords(descriptor, deps, signal, logger)
    case 'import':
      return importRecords(descriptor, deps, signal, logger)
    case 'dataset':
      return datasetRecords(descriptor, deps, signal, logger)
  }
}
