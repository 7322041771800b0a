import { vi } from 'vitest'
import type { Logger } from '../../src/utils/logger'

export function createMockLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  }
}
