/**
 * Application Layer - Store Configuration
 *
 * The one mutable piece of shared state: which store settings read from and
 * which prefix their keys carry. Consumers hold a reference to this cell and
 * re-read it on every operation, so swapping the store (for a test double,
 * say) takes effect at the next read or `observe()`.
 *
 * Until a store is configured, reads resolve to the injected fallback.
 */

import type { SettingsStore } from '../core/ports/settingsStore.js'
import { AsyncMutex } from '../shared/asyncMutex.js'

export type StoreSelection = {
  store: SettingsStore
  prefix: string
}

export class StoreConfiguration {
  readonly #fallback: () => SettingsStore
  readonly #mutex = new AsyncMutex()
  #store: SettingsStore | null
  #prefix: string

  constructor(opts: { fallback: () => SettingsStore; store?: SettingsStore; prefix?: string }) {
    this.#fallback = opts.fallback
    this.#store = opts.store ?? null
    this.#prefix = opts.prefix ?? ''
  }

  get store(): SettingsStore {
    return this.#store ?? this.#fallback()
  }

  get prefix(): string {
    return this.#prefix
  }

  get isConfigured(): boolean {
    return this.#store !== null
  }

  /** Store and prefix read together. */
  current(): StoreSelection {
    return { store: this.store, prefix: this.#prefix }
  }

  /**
   * Replace the store and/or prefix. Passing `store: null` returns to the
   * fallback store.
   */
  configure(opts: { store?: SettingsStore | null; prefix?: string }): void {
    if (opts.store !== undefined) this.#store = opts.store
    if (opts.prefix !== undefined) this.#prefix = opts.prefix
  }

  /**
   * Use `store` for the duration of `fn`, then restore the previous store.
   * Overlapping calls queue up instead of interleaving their swaps.
   */
  async withStore<T>(store: SettingsStore, fn: () => Promise<T>): Promise<T> {
    return this.#mutex.runExclusive(async () => {
      const previous = this.#store
      this.#store = store
      try {
        return await fn()
      } finally {
        this.#store = previous
      }
    })
  }
}
