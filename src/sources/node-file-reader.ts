import { readFile, readdir } from 'node:fs/promises'
import type { FileReader } from './types'

/**
 * `FileReader` over the local file system
 */
export class NodeFileReader implements FileReader {
  async list(folder: string): Promise<string[]> {
    const entries = await readdir(folder, { withFileTypes: true })
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort()
  }

  async read(path: string): Promise<Uint8Array> {
    return readFile(path)
  }
}
