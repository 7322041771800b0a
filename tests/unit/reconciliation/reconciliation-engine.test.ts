import { describe, it, expect } from 'vitest'
import { MemoryStorageAdapter } from '../../../src/adapters/memory'
import type { FindOptions, RowCriteria } from '../../../src/adapters/types'
import type { DataRow } from '../../../src/types/records'
import {
  ReconciliationEngine,
  mergeFields,
  toStoredFields,
} from '../../../src/reconciliation/reconciliation-engine'
import { SchemaManager } from '../../../src/schema/schema-manager'
import { UniqueKeysStrategy } from '../../../src/reconciliation/identity-strategy'
import { ReconciliationError } from '../../../src/utils/errors'

function createEngine(storage = new MemoryStorageAdapter()) {
  const engine = new ReconciliationEngine(storage, { schemaManager: new SchemaManager(storage) })
  return { engine, storage }
}

class SlowLookupStorage extends MemoryStorageAdapter {
  async findDataRows(criteria: RowCriteria, options?: FindOptions): Promise<DataRow[]> {
    const rows = await super.findDataRows(criteria, options)
    await new Promise((resolve) => setTimeout(resolve, 5))
    return rows
  }
}

describe('toStoredFields', () => {
  it('stores numbers as decimal text', () => {
    expect(toStoredFields({ fee: 12.5, count: 3, name: 'Acme', note: null })).toEqual({
      fee: '12.5',
      count: '3',
      name: 'Acme',
      note: null,
    })
  })
})

describe('mergeFields', () => {
  it('never overwrites with null', () => {
    expect(
      mergeFields({ name: 'Acme', address: null }, { name: null, address: '123 Main' })
    ).toEqual({
      fields: { name: 'Acme', address: '123 Main' },
      updates: { address: '123 Main' },
      changed: ['address'],
    })
  })

  it('writes unchanged values without reporting them', () => {
    expect(mergeFields({ name: 'Acme' }, { name: 'Acme' }).changed).toEqual([])
  })
})

describe('ReconciliationEngine', () => {
  it('merges rows from two sources and cites both', async () => {
    const { engine, storage } = createEngine()
    const registry = await engine.registerSource('state-registry', 'api', null, ['license_number'])
    const directory = await engine.registerSource('directory', 'dataset', 'sources/directory.json', [
      'license_number',
    ])

    const first = await engine.upsertDetailed(
      { license_number: 'L1', name: 'Acme', address: null },
      registry
    )
    const second = await engine.upsertDetailed(
      { license_number: 'L1', name: null, address: '123 Main' },
      directory
    )

    expect(first).toEqual({
      dataId: 1,
      created: true,
      citationCreated: true,
      fieldsChanged: ['license_number', 'name'],
    })
    expect(second).toEqual({
      dataId: 1,
      created: false,
      citationCreated: true,
      fieldsChanged: ['address'],
    })
    await expect(storage.countDataRows()).resolves.toBe(1)
    const row = await storage.getDataRow(1)
    expect(row?.fields).toEqual({ license_number: 'L1', name: 'Acme', address: '123 Main' })
    const citations = await storage.listCitations(1)
    expect(citations.map((citation) => citation.sourceId)).toEqual([registry, directory])
  })

  it('is idempotent for a repeated row', async () => {
    const { engine, storage } = createEngine()
    const source = await engine.registerSource('registry', 'api', null, ['license_number'])

    await engine.upsert({ license_number: 'L1', name: 'Acme' }, source)
    const repeat = await engine.upsertDetailed({ license_number: 'L1', name: 'Acme' }, source)

    expect(repeat).toEqual({ dataId: 1, created: false, citationCreated: false, fieldsChanged: [] })
    await expect(storage.listCitations(1)).resolves.toHaveLength(1)
  })

  it('inserts rows whose identity has a missing key', async () => {
    const { engine, storage } = createEngine()
    const source = await engine.registerSource('registry', 'api', null, ['license_number'])

    await engine.upsert({ license_number: null, name: 'Acme' }, source)
    await engine.upsert({ license_number: null, name: 'Acme' }, source)

    await expect(storage.countDataRows()).resolves.toBe(2)
  })

  it('matches on every non-null column without unique keys', async () => {
    const { engine, storage } = createEngine()
    const source = await engine.registerSource('scrape', 'import', null)

    const a = await engine.upsert({ name: 'Acme', city: 'Boston' }, source)
    const b = await engine.upsert({ name: 'Acme', city: 'Boston', phone: null }, source)
    const c = await engine.upsert({ name: 'Acme', city: 'Salem' }, source)

    expect(a).toBe(b)
    expect(c).not.toBe(a)
    await expect(storage.countDataRows()).resolves.toBe(2)
  })

  it('refuses to merge an ambiguous identity', async () => {
    const { engine, storage } = createEngine()
    const source = await engine.registerSource('scrape', 'import', null)
    await engine.upsert({ name: 'Acme', city: 'Boston' }, source)
    await engine.upsert({ name: 'Acme', city: 'Salem' }, source)

    await expect(engine.upsert({ name: 'Acme' }, source)).rejects.toThrow(ReconciliationError)
    await expect(storage.countDataRows()).resolves.toBe(2)
  })

  it('creates one row for concurrent upserts of the same identity', async () => {
    const { engine, storage } = createEngine(new SlowLookupStorage())
    const a = await engine.registerSource('a', 'api', null, ['license_number'])
    const b = await engine.registerSource('b', 'api', null, ['license_number'])

    const ids = await Promise.all([
      engine.upsert({ license_number: 'L9', name: 'Acme' }, a),
      engine.upsert({ license_number: 'L9', phone: '+16175550100' }, b),
    ])

    expect(ids).toEqual([1, 1])
    await expect(storage.countDataRows()).resolves.toBe(1)
    await expect(storage.listCitations(1)).resolves.toHaveLength(2)
  })

  it('creates one row for concurrent upserts from sources with different identity policies', async () => {
    const { engine, storage } = createEngine(new SlowLookupStorage())
    const byLicense = await engine.registerSource('a', 'api', null, ['license_number'])
    const byEveryColumn = await engine.registerSource('b', 'api', null, [])

    const ids = await Promise.all([
      engine.upsert({ license_number: 'L1', name: 'Acme' }, byLicense),
      engine.upsert({ license_number: 'L1', name: 'Acme' }, byEveryColumn),
    ])

    expect(ids).toEqual([1, 1])
    await expect(storage.countDataRows()).resolves.toBe(1)
    await expect(engine.upsert({ license_number: 'L1', name: 'Acme Corp' }, byLicense)).resolves.toBe(1)
  })

  it('registers a source with a prepared identity strategy', async () => {
    const { engine, storage } = createEngine()
    const strategy = new UniqueKeysStrategy(['license_number'])

    const sourceId = await engine.registerSource('registry', 'api', null, strategy)

    expect(engine.identityStrategyFor(sourceId)).toBe(strategy)
    await expect(storage.findSourceByName('registry')).resolves.toMatchObject({
      uniqueKeys: ['license_number'],
    })
  })

  it('caches source registration by name', async () => {
    const { engine } = createEngine()
    const first = await engine.registerSource('registry', 'api', null, ['license_number'])
    const second = await engine.registerSource('registry', 'api', null)

    expect(second).toBe(first)
    expect(engine.identityStrategyFor(first).kind).toBe('unique-keys')
  })

  it('rejects rows for unknown sources', async () => {
    const { engine } = createEngine()
    await expect(engine.upsert({ name: 'Acme' }, 42)).rejects.toThrow('Source 42 is not registered')
  })
})
