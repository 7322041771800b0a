import type { PaginationConfig } from '../types/source'
import { ConfigError, FetchError, TributaryError, errorMessage } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import { lookupPath } from '../extraction/dot-path'
import { buildUrl } from './http-client'

export type PaginationPhase = 'START' | 'FETCHING' | 'ADVANCING' | 'DONE'

export type QueryParams = Record<string, string | number>

/** Turns one page body into its records */
export type PageDecoder = (body: unknown) => Promise<unknown[]>

/**
 * Snapshot of a pagination run
 */
export interface PaginationState {
  phase: PaginationPhase
  /** URL of the next (or last) request, without query parameters */
  url: string
  params: QueryParams
  /** Records seen so far; never decreases */
  cumulativeRecords: number
  pagesFetched: number
}

export interface PaginationDriverOptions {
  url: string
  pagination?: PaginationConfig
  /** Dot-path of the records array inside each response */
  recordsPath?: string
  /** Sends one page request and returns the response body */
  fetchPage: (url: string) => Promise<unknown>
  /** Replaces the `recordsPath` lookup */
  decodePage?: PageDecoder
  logger?: Logger
}

/**
 * Pulls records from the response body of one page.
 *
 * @throws {ConfigError} The body (or the value at `recordsPath`) is not an array
 */
export function extractPageRecords(body: unknown, recordsPath: string | undefined): unknown[] {
  const document = typeof body === 'string' ? parseJsonBody(body) : body

  if (recordsPath === undefined) {
    if (!Array.isArray(document)) {
      throw new ConfigError('Response is not an array and no records_path is configured')
    }
    return document
  }

  const lookup = lookupPath(document, recordsPath)
  if (!lookup.found || lookup.value === null) {
    return []
  }
  if (!Array.isArray(lookup.value)) {
    throw new ConfigError(`Value at records_path '${recordsPath}' is not an array`, {
      recordsPath,
    })
  }
  return lookup.value
}

function parseJsonBody(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch {
    throw new ConfigError('Response body is not JSON')
  }
}

/**
 * @throws {FetchError} The response's next page link is not a URL
 */
function resolveNextPageUrl(link: string, requestUrl: string): string {
  try {
    return new URL(link, requestUrl).toString()
  } catch (error) {
    throw new FetchError(`Next page link '${link}' from ${requestUrl} is not a valid URL: ${errorMessage(error)}`, {
      url: link,
      retryable: false,
      cause: error,
    })
  }
}

function readCount(body: unknown, path: string): number | null {
  const lookup = lookupPath(body, path)
  if (!lookup.found) {
    return null
  }
  const value = lookup.value
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value)
  }
  return null
}

/**
 * Drives one source's pagination: START → FETCHING → ADVANCING → DONE.
 * Pages are requested strictly one after another and records are yielded
 * once their page has been parsed.
 *
 * @example
 * ```typescript
 * const driver = new PaginationDriver({
 *   url: 'https://api.example.com/licenses',
 *   pagination: { skip_records_param: 'offset', batch_size: 100 },
 *   recordsPath: 'data',
 *   fetchPage: async (url) => (await executor.send({ method: 'GET', url, headers })).body,
 * })
 * for await (const record of driver.records()) {
 *   // ...
 * }
 * ```
 */
export class PaginationDriver {
  private readonly pagination: PaginationConfig
  private readonly recordsPath?: string
  private readonly fetchPage: (url: string) => Promise<unknown>
  private readonly decodePage?: PageDecoder
  private readonly logger: Logger

  private phase: PaginationPhase = 'START'
  private url: string
  private params: QueryParams = {}
  private cumulativeRecords = 0
  private pagesFetched = 0
  private offset = 0
  private pageNumber = 1

  constructor(options: PaginationDriverOptions) {
    this.url = options.url
    this.pagination = options.pagination ?? {}
    this.recordsPath = options.recordsPath
    this.fetchPage = options.fetchPage
    this.decodePage = options.decodePage
    this.logger = options.logger ?? createSilentLogger()
  }

  get state(): PaginationState {
    return {
      phase: this.phase,
      url: this.url,
      params: { ...this.params },
      cumulativeRecords: this.cumulativeRecords,
      pagesFetched: this.pagesFetched,
    }
  }

  /**
   * Yields every record of every page. A driver runs once.
   */
  async *records(): AsyncGenerator<unknown, void, undefined> {
    if (this.phase !== 'START') {
      throw new TributaryError('Pagination has already started', 'PAGINATION_RESTARTED', {
        phase: this.phase,
      })
    }
    this.initialParams()

    while (this.phase !== 'DONE') {
      this.phase = 'FETCHING'
      const requestUrl = buildUrl(this.url, this.params)
      const body = await this.fetchPage(requestUrl)
      const records = this.decodePage
        ? await this.decodePage(body)
        : extractPageRecords(body, this.recordsPath)

      this.pagesFetched += 1
      this.cumulativeRecords += records.length
      this.logger.debug(`Fetched page ${this.pagesFetched}`, {
        url: requestUrl,
        records: records.length,
        cumulativeRecords: this.cumulativeRecords,
      })

      this.phase = 'ADVANCING'
      this.advance(body, records.length, requestUrl)

      yield* records
    }
  }

  private initialParams(): void {
    const { skip_records_param, batch_size, batch_size_param, page_num_param, start_page } =
      this.pagination

    if (skip_records_param) {
      this.params[skip_records_param] = this.offset
      if (batch_size_param && batch_size !== undefined) {
        this.params[batch_size_param] = batch_size
      }
    } else if (page_num_param) {
      this.pageNumber = start_page ?? 1
      this.params[page_num_param] = this.pageNumber
      if (batch_size_param && batch_size !== undefined) {
        this.params[batch_size_param] = batch_size
      }
    }
  }

  private advance(body: unknown, pageRecords: number, requestUrl: string): void {
    const {
      total_records_key,
      next_page_url,
      skip_records_param,
      batch_size,
      page_num_param,
      max_pages,
    } = this.pagination

    if (total_records_key) {
      const document = typeof body === 'string' ? parseJsonBody(body) : body
      const total = readCount(document, total_records_key)
      if (total !== null && this.cumulativeRecords >= total) {
        this.phase = 'DONE'
        return
      }
    }

    if (pageRecords === 0) {
      this.phase = 'DONE'
      return
    }

    if (max_pages !== undefined && this.pagesFetched >= max_pages) {
      this.phase = 'DONE'
      return
    }

    if (next_page_url) {
      const document = typeof body === 'string' ? parseJsonBody(body) : body
      const lookup = lookupPath(document, next_page_url)
      if (!lookup.found || typeof lookup.value !== 'string' || lookup.value === '') {
        this.phase = 'DONE'
        return
      }
      this.url = resolveNextPageUrl(lookup.value, requestUrl)
      this.params = {}
      this.phase = 'FETCHING'
      return
    }

    if (skip_records_param) {
      if (batch_size !== undefined && pageRecords < batch_size) {
        this.phase = 'DONE'
        return
      }
      this.offset += pageRecords
      this.params[skip_records_param] = this.offset
      this.phase = 'FETCHING'
      return
    }

    if (page_num_param) {
      this.pageNumber += 1
      this.params[page_num_param] = this.pageNumber
      this.phase = 'FETCHING'
      return
    }

    this.phase = 'DONE'
  }
}
