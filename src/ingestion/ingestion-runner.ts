import { v4 as uuidv4 } from 'uuid'
import type { StorageAdapter } from '../adapters/types'
import type { EngineConfig } from '../config/engine-config'
import { resolveEngineConfig } from '../config/engine-config'
import type { LoadedSource } from '../config/descriptor-validation'
import { loadSourceDescriptor } from '../config/descriptor-validation'
import { FieldExtractor } from '../extraction/field-extractor'
import { FetchEngine } from '../fetch/fetch-engine'
import { ReconciliationEngine } from '../reconciliation/reconciliation-engine'
import { SchemaManager, collectColumns } from '../schema/schema-manager'
import { openRecordStream } from '../sources/record-source'
import type { FileReader, TabularDecoder } from '../sources/types'
import type { TransformRegistry } from '../transforms/registry'
import {
  ConfigError,
  ExtractionError,
  ReconciliationError,
  SourceAbortedError,
  TransformError,
  TributaryError,
  errorMessage,
} from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createPrefixedLogger, defaultLogger } from '../utils/logger'
import { AsyncSemaphore } from '../utils/semaphore'

export interface IngestionRunnerOptions {
  storage: StorageAdapter
  /** Built from `config` when absent */
  fetchEngine?: FetchEngine
  decoder?: TabularDecoder
  fileReader?: FileReader
  registry?: TransformRegistry
  config?: Partial<EngineConfig>
  logger?: Logger
  /** Run id generator (default: uuid v4) */
  generateRunId?: () => string
}

/**
 * - `completed`: every record was read; some may have been rejected
 * - `failed`: the source stopped early
 * - `invalid`: the descriptor was rejected before anything was fetched
 */
export type SourceStatus = 'completed' | 'failed' | 'invalid'

export interface SourceReport {
  name: string
  status: SourceStatus
  sourceId?: number
  recordsSeen: number
  recordsUpserted: number
  recordsRejected: number
  rowsCreated: number
  error?: { code: string; message: string }
}

export interface IngestionReport {
  runId: string
  startedAt: Date
  finishedAt: Date
  sources: SourceReport[]
}

interface RegisteredSource extends LoadedSource {
  sourceId: number
}

function emptyReport(name: string, status: SourceStatus): SourceReport {
  return {
    name,
    status,
    recordsSeen: 0,
    recordsUpserted: 0,
    recordsRejected: 0,
    rowsCreated: 0,
  }
}

function describeError(error: unknown): { code: string; message: string } {
  return {
    code: error instanceof TributaryError ? error.code : 'UNEXPECTED_ERROR',
    message: errorMessage(error),
  }
}

function nameOf(input: unknown, index: number): string {
  if (typeof input === 'object' && input !== null && 'name' in input && typeof input.name === 'string') {
    return input.name
  }
  return `#${index}`
}

/**
 * Errors that reject one record and let the source continue
 */
function isRecordError(error: unknown): boolean {
  return (
    error instanceof TransformError ||
    error instanceof ExtractionError ||
    error instanceof ReconciliationError
  )
}

/**
 * Ingests a set of sources into one reconciled dataset.
 *
 * Descriptors are validated up front; an invalid one is reported and
 * skipped. The remaining sources run concurrently, each with its own rate
 * limit and auth tokens. A failing source never stops the others.
 *
 * @example
 * ```typescript
 * const runner = new IngestionRunner({ storage, config: { sourceDeadlineMs: 600_000 } })
 * const report = await runner.run(descriptors)
 * for (const source of report.sources) {
 *   console.log(source.name, source.status, source.recordsUpserted)
 * }
 * ```
 */
export class IngestionRunner {
  private readonly storage: StorageAdapter
  private readonly config: EngineConfig
  private readonly fetchEngine: FetchEngine
  private readonly decoder?: TabularDecoder
  private readonly fileReader?: FileReader
  private readonly registry?: TransformRegistry
  private readonly logger: Logger
  private readonly generateRunId: () => string
  private readonly schemaManager: SchemaManager
  private readonly reconciliation: ReconciliationEngine

  constructor(options: IngestionRunnerOptions) {
    this.storage = options.storage
    this.config = resolveEngineConfig(options.config)
    this.logger = options.logger ?? defaultLogger
    this.fetchEngine =
      options.fetchEngine ??
      new FetchEngine({
        retry: { maxAttempts: this.config.maxAttempts },
        maxAuthDepth: this.config.maxAuthDepth,
        maxCooldownRetries: this.config.maxCooldownRetries,
        logger: this.logger,
      })
    this.decoder = options.decoder
    this.fileReader = options.fileReader
    this.registry = options.registry
    this.generateRunId = options.generateRunId ?? uuidv4
    this.schemaManager = new SchemaManager(this.storage, createPrefixedLogger('schema', this.logger))
    this.reconciliation = new ReconciliationEngine(this.storage, {
      schemaManager: this.schemaManager,
      logger: this.logger,
    })
  }

  get engine(): ReconciliationEngine {
    return this.reconciliation
  }

  async run(descriptors: readonly unknown[]): Promise<IngestionReport> {
    const runId = this.generateRunId()
    const startedAt = new Date()
    this.logger.info(`Starting ingestion run ${runId}`, { sources: descriptors.length })

    await this.storage.initialize()

    const reports = new Map<number, SourceReport>()
    const loaded: Array<{ index: number; source: LoadedSource }> = []
    const names = new Set<string>()

    descriptors.forEach((input, index) => {
      const name = nameOf(input, index)
      try {
        const source = loadSourceDescriptor(input, {
          registry: this.registry,
          maxAuthDepth: this.config.maxAuthDepth,
        })
        if (names.has(source.descriptor.name)) {
          throw new ConfigError(`Source name '${name}' is used more than once`, { source: name })
        }
        names.add(source.descriptor.name)
        loaded.push({ index, source })
      } catch (error) {
        if (!(error instanceof TributaryError)) {
          throw error
        }
        this.logger.error(`Source '${name}' is invalid: ${error.message}`, error.context)
        reports.set(index, { ...emptyReport(name, 'invalid'), error: describeError(error) })
      }
    })

    await this.schemaManager.ensureColumns(
      collectColumns(loaded.map(({ source }) => source.descriptor))
    )

    const registered: Array<{ index: number; source: RegisteredSource }> = []
    for (const { index, source } of loaded) {
      const { descriptor } = source
      const sourceId = await this.reconciliation.registerSource(
        descriptor.name,
        descriptor.source_type,
        descriptor.config_path ?? null,
        source.identity
      )
      registered.push({ index, source: { ...source, sourceId } })
    }

    const semaphore = new AsyncSemaphore(this.config.sourceConcurrency)
    const settled = await Promise.allSettled(
      registered.map(({ source }) => semaphore.run(() => this.ingestSource(source)))
    )
    settled.forEach((result, position) => {
      const { index, source } = registered[position]
      reports.set(
        index,
        result.status === 'fulfilled'
          ? result.value
          : {
              ...emptyReport(source.descriptor.name, 'failed'),
              sourceId: source.sourceId,
              error: describeError(result.reason),
            }
      )
    })

    const sources = Array.from(reports.entries())
      .sort(([a], [b]) => a - b)
      .map(([, report]) => report)
    const finishedAt = new Date()
    this.logger.info(`Finished ingestion run ${runId}`, {
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      completed: sources.filter((source) => source.status === 'completed').length,
      failed: sources.filter((source) => source.status !== 'completed').length,
    })
    return { runId, startedAt, finishedAt, sources }
  }

  private async ingestSource(source: RegisteredSource): Promise<SourceReport> {
    const { descriptor, sourceId } = source
    const logger = createPrefixedLogger(`source:${descriptor.name}`, this.logger)
    const report: SourceReport = { ...emptyReport(descriptor.name, 'completed'), sourceId }
    const extractor = new FieldExtractor(source.columns, {
      nullValues: descriptor.null_values,
      strictKeys: descriptor.strict_keys,
    })

    const controller = new AbortController()
    const deadline = this.config.sourceDeadlineMs
    const timer =
      deadline === undefined
        ? undefined
        : setTimeout(() => {
            logger.warn(`Deadline of ${deadline}ms reached, aborting`)
            controller.abort()
          }, deadline)

    try {
      const records = openRecordStream(
        descriptor,
        {
          fetchEngine: this.fetchEngine,
          decoder: this.decoder,
          fileReader: this.fileReader,
          logger,
        },
        controller.signal
      )

      for await (const record of records) {
        if (controller.signal.aborted) {
          throw new SourceAbortedError(`Source '${descriptor.name}' passed its deadline`, {
            deadlineMs: deadline,
          })
        }
        report.recordsSeen += 1
        await this.ingestRecord(record, extractor, source, report, logger)
      }

      logger.info('Source completed', {
        recordsSeen: report.recordsSeen,
        recordsUpserted: report.recordsUpserted,
        recordsRejected: report.recordsRejected,
      })
    } catch (error) {
      report.status = 'failed'
      report.error = describeError(error)
      logger.error(`Source failed: ${errorMessage(error)}`, {
        code: report.error.code,
        recordsSeen: report.recordsSeen,
      })
    } finally {
      clearTimeout(timer)
    }
    return report
  }

  private async ingestRecord(
    record: unknown,
    extractor: FieldExtractor,
    source: RegisteredSource,
    report: SourceReport,
    logger: Logger
  ): Promise<void> {
    try {
      const row = extractor.extract(record)
      const result = await this.reconciliation.upsertDetailed(row, source.sourceId)
      report.recordsUpserted += 1
      if (result.created) {
        report.rowsCreated += 1
      }
    } catch (error) {
      if (!isRecordError(error)) {
        throw error
      }
      report.recordsRejected += 1
      logger.warn(`Rejected record ${report.recordsSeen}: ${errorMessage(error)}`, {
        code: error instanceof TributaryError ? error.code : undefined,
      })
    }
  }
}
