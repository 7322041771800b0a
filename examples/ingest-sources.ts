/**
 * Ingestion Example
 *
 * Loads source descriptors from JSON files and ingests them into PostgreSQL
 * when TRIBUTARY_DATABASE_URL is set, or into memory otherwise.
 *
 * Usage:
 *   REGISTRY_CLIENT_SECRET=... tsx examples/ingest-sources.ts examples/sources
 */

import { readFile, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import {
  IngestionRunner,
  MemoryStorageAdapter,
  defaultLogger,
  loadEngineConfigFromEnv,
} from '../src/index'
import type { StorageAdapter } from '../src/index'
import { createPostgresStorage } from '../src/adapters/drizzle'

async function loadDescriptors(folder: string): Promise<unknown[]> {
  const names = (await readdir(folder)).filter((name) => name.endsWith('.json')).sort()
  return Promise.all(
    names.map(async (name) => {
      const parsed: unknown = JSON.parse(await readFile(join(folder, name), 'utf8'))
      return parsed
    })
  )
}

async function main(): Promise<void> {
  const folder = process.argv[2] ?? join('examples', 'sources')
  const config = loadEngineConfigFromEnv()
  const descriptors = await loadDescriptors(folder)

  let storage: StorageAdapter
  let close = async (): Promise<void> => {}
  if (config.databaseUrl) {
    const postgres = createPostgresStorage({
      connectionString: config.databaseUrl,
      schema: config.schema,
    })
    storage = postgres.storage
    close = postgres.close
  } else {
    defaultLogger.warn('TRIBUTARY_DATABASE_URL is not set, using in-memory storage')
    storage = new MemoryStorageAdapter()
  }

  try {
    const runner = new IngestionRunner({ storage, config })
    const report = await runner.run(descriptors)

    console.log(`\nRun ${report.runId}`)
    for (const source of report.sources) {
      const outcome = source.error ? ` (${source.error.code}: ${source.error.message})` : ''
      console.log(
        `  ${source.name}: ${source.status}, ${source.recordsUpserted}/${source.recordsSeen} upserted, ` +
          `${source.recordsRejected} rejected, ${source.rowsCreated} new rows${outcome}`
      )
    }
    console.log(`  ${await storage.countDataRows()} rows in the dataset`)

    if (report.sources.some((source) => source.status !== 'completed')) {
      process.exitCode = 1
    }
  } finally {
    await close()
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
