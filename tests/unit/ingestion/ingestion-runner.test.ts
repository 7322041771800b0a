import { describe, it, expect } from 'vitest'
import { MemoryStorageAdapter } from '../../../src/adapters/memory'
import { FetchEngine } from '../../../src/fetch/fetch-engine'
import type { HttpRequest, HttpResponse } from '../../../src/fetch/http-client'
import { IngestionRunner } from '../../../src/ingestion/ingestion-runner'
import { FakeHttpClient, jsonResponse } from '../../helpers/fake-http-client'
import { createMockLogger } from '../../helpers/logger'
import { ManualClock } from '../../helpers/manual-clock'

const REGISTRY_URL = 'https://registry.example.com/licenses'
const DIRECTORY_URL = 'https://directory.example.com/listings'

const registry = {
  name: 'registry',
  source_type: 'api',
  endpoint: REGISTRY_URL,
  records_path: 'data',
  column_map: { license_number: 'id', name: 'name' },
  unique_keys: ['license_number'],
}

const directory = {
  name: 'directory',
  source_type: 'api',
  endpoint: DIRECTORY_URL,
  column_map: {
    license_number: 'license',
    address: 'location.street',
    fee: { key: 'fee', transform: { type: 'multiply', factor: 100 } },
  },
  unique_keys: ['license_number'],
}

function createRunner(
  handler: (request: HttpRequest) => HttpResponse | Promise<HttpResponse>,
  config: { sourceDeadlineMs?: number } = {}
) {
  const storage = new MemoryStorageAdapter()
  const http = new FakeHttpClient(handler)
  const runner = new IngestionRunner({
    storage,
    fetchEngine: new FetchEngine({ http, env: {}, retry: { maxAttempts: 1 }, clock: new ManualClock() }),
    config,
    logger: createMockLogger(),
    generateRunId: () => 'run-1',
  })
  return { runner, storage, http }
}

function routes(responses: Record<string, unknown>) {
  return (request: HttpRequest): HttpResponse => {
    const body = responses[request.url]
    return body === undefined ? jsonResponse({ error: 'not found' }, 404) : jsonResponse(body)
  }
}

describe('IngestionRunner', () => {
  it('reconciles records from every source', async () => {
    const { runner, storage } = createRunner(
      routes({
        [REGISTRY_URL]: {
          data: [
            { id: 'L1', name: 'Acme' },
            { id: 'L2', name: 'Zenith' },
          ],
        },
        [DIRECTORY_URL]: [{ license: 'L1', location: { street: '123 Main' }, fee: '1.5' }],
      })
    )

    const report = await runner.run([registry, directory])

    expect(report.runId).toBe('run-1')
    expect(report.sources).toEqual([
      expect.objectContaining({
        name: 'registry',
        status: 'completed',
        sourceId: 1,
        recordsSeen: 2,
        recordsUpserted: 2,
        recordsRejected: 0,
      }),
      expect.objectContaining({
        name: 'directory',
        status: 'completed',
        sourceId: 2,
        recordsSeen: 1,
        recordsUpserted: 1,
        recordsRejected: 0,
      }),
    ])
    expect(report.sources[0].rowsCreated + report.sources[1].rowsCreated).toBe(2)

    await expect(storage.countDataRows()).resolves.toBe(2)
    const [row] = await storage.findDataRows(new Map([['license_number', 'L1']]))
    expect(row.fields).toEqual({
      license_number: 'L1',
      name: 'Acme',
      address: '123 Main',
      fee: '150',
    })
    const citations = await storage.listCitations(row.id)
    expect(citations.map((citation) => citation.sourceId)).toEqual([1, 2])
  })

  it('creates every mapped column before ingesting', async () => {
    const { runner, storage } = createRunner(routes({ [REGISTRY_URL]: { data: [] } }))

    await runner.run([registry, { ...directory, endpoint: 'https://directory.example.com/none' }])

    await expect(storage.getColumns()).resolves.toEqual(['license_number', 'name', 'address', 'fee'])
  })

  it('reports invalid descriptors and runs the rest', async () => {
    const { runner } = createRunner(routes({ [REGISTRY_URL]: { data: [{ id: 'L1', name: 'Acme' }] } }))

    const report = await runner.run([
      { name: 'broken', source_type: 'api', column_map: {} },
      registry,
      42,
      registry,
    ])

    expect(report.sources.map((source) => [source.name, source.status])).toEqual([
      ['broken', 'invalid'],
      ['registry', 'completed'],
      ['#2', 'invalid'],
      ['registry', 'invalid'],
    ])
    expect(report.sources[0].error).toEqual({
      code: 'CONFIG_ERROR',
      message: "Source 'broken': column_map cannot be empty",
    })
    expect(report.sources[2].error?.message).toBe('Source descriptor must be an object')
    expect(report.sources[3].error?.message).toBe("Source name 'registry' is used more than once")
  })

  it('rejects records that fail to transform and keeps going', async () => {
    const { runner } = createRunner(
      routes({
        [DIRECTORY_URL]: [
          { license: 'L1', fee: 'abc' },
          { license: 'L2', fee: '2' },
        ],
      })
    )

    const [report] = (await runner.run([directory])).sources

    expect(report).toMatchObject({
      status: 'completed',
      recordsSeen: 2,
      recordsUpserted: 1,
      recordsRejected: 1,
      rowsCreated: 1,
    })
  })

  it('rejects records missing a mapped key under strict_keys', async () => {
    const { runner, storage } = createRunner(
      routes({ [REGISTRY_URL]: { data: [{ id: 'L1', name: 'Acme' }, { id: 'L2' }] } })
    )

    const [report] = (await runner.run([{ ...registry, strict_keys: true }])).sources

    expect(report).toMatchObject({
      status: 'completed',
      recordsSeen: 2,
      recordsUpserted: 1,
      recordsRejected: 1,
    })
    await expect(storage.countDataRows()).resolves.toBe(1)
  })

  it('isolates a failing source', async () => {
    const { runner } = createRunner(routes({ [DIRECTORY_URL]: [{ license: 'L1' }] }))

    const report = await runner.run([registry, directory])

    expect(report.sources[0]).toMatchObject({
      name: 'registry',
      status: 'failed',
      recordsSeen: 0,
      error: {
        code: 'FETCH_ERROR',
        message: `GET ${REGISTRY_URL} returned status 404`,
      },
    })
    expect(report.sources[1]).toMatchObject({ name: 'directory', status: 'completed', recordsUpserted: 1 })
  })

  it('aborts a source that passes its deadline', async () => {
    const { runner } = createRunner(
      async () => {
        await new Promise((resolve) => setTimeout(resolve, 50))
        return jsonResponse({ data: [{ id: 'L1', name: 'Acme' }] })
      },
      { sourceDeadlineMs: 1 }
    )

    const [report] = (await runner.run([registry])).sources

    expect(report.status).toBe('failed')
    expect(report.error?.code).toBe('SOURCE_ABORTED')
    expect(report.recordsUpserted).toBe(0)
  })
})
