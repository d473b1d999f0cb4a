interface Waiter<T> {
  resolve: (item: T | null) => void
  timer: NodeJS.Timeout
}

/**
 * FIFO handoff between audio producers and the single processing loop.
 * Producers never block; the consumer waits at most `timeoutMs` per dequeue.
 */
export class ChunkQueue<T> {
  private items: T[] = []
  private waiters: Waiter<T>[] = []

  enqueue(item: T): void {
    const waiter = this.waiters.shift()
    if (waiter) {
      clearTimeout(waiter.timer)
      waiter.resolve(item)
      return
    }
    this.items.push(item)
  }

  /**
   * Resolves with the oldest item, or with null once `timeoutMs` passes
   * without one arriving.
   */
  dequeue(timeoutMs: number): Promise<T | null> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift() ?? null)
    }

    return new Promise<T | null>(resolve => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter)
          resolve(null)
        }, timeoutMs)
      }
      this.waiters.push(waiter)
    })
  }

  /** Resolves every pending dequeue with null. */
  interrupt(): void {
    const waiters = this.waiters
    this.waiters = []
    for (const waiter of waiters) {
      clearTimeout(waiter.timer)
      waiter.resolve(null)
    }
  }

  /** Removes and returns everything still queued. */
  drain(): T[] {
    const drained = this.items
    this.items = []
    return drained
  }

  get size(): number {
    return this.items.length
  }
}
