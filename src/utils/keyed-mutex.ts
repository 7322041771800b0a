/**
 * Serializes async tasks that share a key. Tasks with different keys run
 * concurrently; tasks with the same key run in submission order.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const current = previous.then(task)
    const tail = current.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)

    try {
      return await current
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /**
   * Runs `task` holding every key. Keys are taken in sorted order, so tasks
   * with overlapping key sets cannot wait on each other in a cycle.
   */
  async runAll<T>(keys: readonly string[], task: () => Promise<T>): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort()
    const locked = ordered.reduceRight<() => Promise<T>>(
      (inner, key) => () => this.run(key, inner),
      task
    )
    return locked()
  }

  /** Number of keys with a queued or running task */
  get size(): number {
    return this.tails.size
  }
}
