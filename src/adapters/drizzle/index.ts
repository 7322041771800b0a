import { drizzle } from 'drizzle-orm/node-postgres'
import pg from 'pg'
import type { StorageConfig } from '../types'
import { DrizzleStorageAdapter } from './drizzle-storage-adapter'

export interface PostgresStorageOptions extends StorageConfig {
  connectionString: string
  /** Pool size (default: pg's own default) */
  maxConnections?: number
}

export interface PostgresStorage {
  storage: DrizzleStorageAdapter
  /** Ends the connection pool */
  close(): Promise<void>
}

/**
 * Creates PostgreSQL storage on a node-postgres pool.
 *
 * @example
 * ```typescript
 * const { storage, close } = createPostgresStorage({
 *   connectionString: 'postgres://localhost:5432/tributary',
 *   schema: 'tributary',
 * })
 * try {
 *   await storage.initialize()
 * } finally {
 *   await close()
 * }
 * ```
 */
export function createPostgresStorage(options: PostgresStorageOptions): PostgresStorage {
  const { connectionString, maxConnections, ...config } = options
  const pool = new pg.Pool({ connectionString, max: maxConnections })
  const storage = new DrizzleStorageAdapter(drizzle(pool), config)
  return {
    storage,
    close: () => pool.end(),
  }
}

export { DrizzleStorageAdapter }
export type { DrizzleSqlDatabase } from './drizzle-storage-adapter'
