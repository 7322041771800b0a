import { describe, it, expect } from 'vitest'
import { FetchEngine } from '../../../src/fetch/fetch-engine'
import { openRecordStream } from '../../../src/sources/record-source'
import type { SourceDescriptor } from '../../../src/types/source'
import { ConfigError, SourceAbortedError } from '../../../src/utils/errors'
import { collect } from '../../helpers/collect'
import { FakeHttpClient, jsonResponse, textResponse } from '../../helpers/fake-http-client'
import { ManualClock } from '../../helpers/manual-clock'
import { LineDecoder, MemoryFileReader } from '../../helpers/tabular'

function engineFor(http: FakeHttpClient): FetchEngine {
  return new FetchEngine({ http, env: {}, clock: new ManualClock() })
}

const importSource: SourceDescriptor = {
  name: 'registry-export',
  source_type: 'import',
  endpoint: 'https://files.example.com/exports/licenses.csv?version=2',
  column_map: ['license_number', 'name'],
  decoder: { separator: ',' },
}

const datasetSource: SourceDescriptor = {
  name: 'county-files',
  source_type: 'dataset',
  folder_path: '/data/county',
  column_map: ['license_number', 'name'],
}

const files = new MemoryFileReader({
  '/data/county': {
    'b.csv': 'L2,Zenith\n',
    'a.csv': 'L1,Acme\n',
    'structure.json': '{"columns": 2}',
  },
})

describe('openRecordStream', () => {
  it('pages through api sources', async () => {
    const http = new FakeHttpClient().enqueue(jsonResponse([{ id: 1 }]))
    const records = openRecordStream(
      { name: 'api', source_type: 'api', endpoint: 'https://api.example.com/items', column_map: { id: 'id' } },
      { fetchEngine: engineFor(http) }
    )

    await expect(collect(records)).resolves.toEqual([{ id: 1 }])
  })

  it('decodes html api pages with the tabular decoder', async () => {
    const html = { 'content-type': 'text/html' }
    const http = new FakeHttpClient().enqueue(
      textResponse('L1,Acme\n', 200, html),
      textResponse('L2,Zenith\n', 200, html),
      textResponse('', 200, html)
    )
    const decoder = new LineDecoder()

    const records = await collect(
      openRecordStream(
        {
          name: 'registry-table',
          source_type: 'api',
          endpoint: 'https://registry.example.com/licenses',
          response_type: 'html',
          pagination: { page_num_param: 'page' },
          column_map: ['license_number', 'name'],
          decoder: { table: 0 },
        },
        { fetchEngine: engineFor(http), decoder }
      )
    )

    expect(records).toEqual([
      ['L1', 'Acme'],
      ['L2', 'Zenith'],
    ])
    expect(http.urls).toEqual([
      'https://registry.example.com/licenses?page=1',
      'https://registry.example.com/licenses?page=2',
      'https://registry.example.com/licenses?page=3',
    ])
    expect(decoder.calls[0]).toEqual({
      hasHeader: false,
      fileName: 'licenses.html',
      options: { table: 0 },
    })
  })

  it('needs a decoder for html api sources', async () => {
    const http = new FakeHttpClient()
    const source: SourceDescriptor = {
      name: 'registry-table',
      source_type: 'api',
      endpoint: 'https://registry.example.com/licenses',
      response_type: 'html',
      column_map: ['license_number'],
    }

    await expect(collect(openRecordStream(source, { fetchEngine: engineFor(http) }))).rejects.toThrow(
      "Source 'registry-table' needs a tabular decoder"
    )
    expect(http.requests).toHaveLength(0)
  })

  it('downloads and decodes import files', async () => {
    const http = new FakeHttpClient().enqueue(textResponse('license_number,name\nL1,Acme\n'))
    const decoder = new LineDecoder()

    const records = await collect(
      openRecordStream({ ...importSource, has_header: true }, { fetchEngine: engineFor(http), decoder })
    )

    expect(records).toEqual([{ license_number: 'L1', name: 'Acme' }])
    expect(decoder.calls).toEqual([
      { hasHeader: true, fileName: 'licenses.csv', options: { separator: ',' } },
    ])
  })

  it('reads files without a header row by default', async () => {
    const http = new FakeHttpClient().enqueue(textResponse('L1,Acme\n'))

    const records = await collect(
      openRecordStream(importSource, { fetchEngine: engineFor(http), decoder: new LineDecoder() })
    )

    expect(records).toEqual([['L1', 'Acme']])
  })

  it('needs a decoder for tabular sources', async () => {
    const http = new FakeHttpClient()

    await expect(
      collect(openRecordStream(importSource, { fetchEngine: engineFor(http) }))
    ).rejects.toThrow(ConfigError)
    expect(http.requests).toHaveLength(0)
  })

  it('reads every data file of a dataset folder in name order', async () => {
    const records = await collect(
      openRecordStream(datasetSource, {
        fetchEngine: engineFor(new FakeHttpClient()),
        decoder: new LineDecoder(),
        fileReader: files,
      })
    )

    expect(records).toEqual([
      ['L1', 'Acme'],
      ['L2', 'Zenith'],
    ])
  })

  it('reads only the listed files when file_names is set', async () => {
    const records = await collect(
      openRecordStream(
        { ...datasetSource, file_names: ['b.csv'] },
        { fetchEngine: engineFor(new FakeHttpClient()), decoder: new LineDecoder(), fileReader: files }
      )
    )

    expect(records).toEqual([['L2', 'Zenith']])
  })

  it('stops reading files once aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(
      collect(
        openRecordStream(
          datasetSource,
          { fetchEngine: engineFor(new FakeHttpClient()), decoder: new LineDecoder(), fileReader: files },
          controller.signal
        )
      )
    ).rejects.toThrow(SourceAbortedError)
  })
})
