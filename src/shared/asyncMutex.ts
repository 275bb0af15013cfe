/**
 * Shared - Async Mutex
 *
 * Promise-chain-based mutual exclusion lock. Used wherever a sequence of
 * async steps must not interleave with another one: scoped store swaps and
 * suite file persistence.
 */
export class AsyncMutex {
  #queue: Promise<void> = Promise.resolve()
  #holders = 0

  /** True while a function is running or waiting for the lock. */
  get isLocked(): boolean {
    return this.#holders > 0
  }

  /**
   * Execute `fn` while holding the lock.
   *
   * Calls run strictly in submission (FIFO) order. A rejection from `fn`
   * is returned to its caller and releases the lock for the next one.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release!: () => void
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const previous = this.#queue
    this.#queue = gate
    this.#holders += 1

    await previous
    try {
      return await fn()
    } finally {
      this.#holders -= 1
      release()
    }
  }
}
