/**
 * FIFO mutual-exclusion lock for async critical sections.
 *
 * acquire() resolves with a release function; waiters are granted the lock
 * in the order they asked for it. The release function is idempotent.
 */
export class AsyncMutex {
  private locked = false
  private waiting: (() => void)[] = []

  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve) => this.waiting.push(resolve))
    }
    this.locked = true

    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiting.shift()
      if (next) {
        // Ownership passes straight to the next waiter; `locked` stays true.
        next()
      } else {
        this.locked = false
      }
    }
  }

  /**
   * Runs `fn` while holding the lock and releases it however `fn` settles.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  isLocked(): boolean {
    return this.locked
  }

  /** Number of callers currently queued behind the holder. */
  pending(): number {
    return this.waiting.length
  }
}
