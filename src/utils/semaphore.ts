/**
 * Limits how many async tasks run at once. Waiting tasks start in
 * submission order.
 */
export class AsyncSemaphore {
  private active = 0
  private readonly queue: Array<() => void> = []
  private readonly max: number

  constructor(max: number) {
    this.max = Number.isFinite(max) && max > 0 ? Math.floor(max) : 1
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.max) {
      // A releasing task hands its slot over without decrementing
      await new Promise<void>((resolve) => this.queue.push(resolve))
    } else {
      this.active += 1
    }

    try {
      return await task()
    } finally {
      const next = this.queue.shift()
      if (next) {
        next()
      } else {
        this.active -= 1
      }
    }
  }

  get running(): number {
    return this.active
  }
}
