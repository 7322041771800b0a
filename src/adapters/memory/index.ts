export { MemoryStorageAdapter } from './memory-storage-adapter'
export type { MemoryStorageOptions } from './memory-storage-adapter'
