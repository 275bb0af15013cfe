/**
 * Infrastructure Layer - Key Observer
 *
 * Adapts a store's native per-key notifications into an (old, new) callback
 * with an explicit, idempotent cancellation handle.
 *
 * - Registration happens in the constructor, followed by one initial
 *   delivery carrying the current value as both old and new.
 * - The store reference is cleared on cancel; a cancelled observer ignores
 *   any notification that still reaches it.
 * - Notifications for a foreign key are logged and dropped, or thrown with
 *   `keyMismatch: 'throw'`.
 */

import { nanoid } from 'nanoid'
import { SettingsError } from '../../core/errors.js'
import type {
  Cancellable,
  ChangeCallback,
  KeyMismatchPolicy,
  KeyValueChange,
  KeyValueObserver,
  ObserveOptions,
  SettingsStore
} from '../../core/ports/settingsStore.js'
import { AsyncStream } from '../../shared/asyncStream.js'

export class KeyObserver implements KeyValueObserver, Cancellable {
  readonly id = `obs_${nanoid(8)}`
  readonly key: string
  readonly #callback: ChangeCallback
  readonly #keyMismatch: KeyMismatchPolicy
  readonly #warn: (message: string) => void
  #store: SettingsStore | null

  constructor(store: SettingsStore, key: string, callback: ChangeCallback, options: ObserveOptions = {}) {
    if (key.length === 0) {
      throw new SettingsError('INVALID_KEY', 'cannot observe an empty key')
    }
    this.key = key
    this.#callback = callback
    this.#keyMismatch = options.keyMismatch ?? 'log'
    this.#warn = options.onWarn ?? ((message: string) => console.warn(message))
    this.#store = store

    store.addObserver(key, this)
    const current = store.read(key)
    try {
      callback(current, current)
    } catch (error) {
      this.cancel()
      throw error
    }
  }

  get isActive(): boolean {
    return this.#store !== null
  }

  observeValue(keyPath: string, change: KeyValueChange): void {
    if (this.#store === null) return

    if (keyPath !== this.key) {
      const message = `[KeyObserver] ${this.id} received a notification for "${keyPath}", expected "${this.key}"`
      if (this.#keyMismatch === 'throw') {
        throw new SettingsError('KEY_MISMATCH', message)
      }
      this.#warn(`${message}; ignoring it`)
      return
    }

    this.#callback(change.old, change.new)
  }

  cancel(): void {
    const store = this.#store
    if (store === null) return
    this.#store = null
    store.removeObserver(this.key, this)
  }
}

/**
 * Observe `key` as a pull sequence of changes. The first element is the
 * current state; ending the iteration cancels the underlying observer.
 */
export function observeChanges(
  store: SettingsStore,
  key: string,
  options?: ObserveOptions
): AsyncStream<KeyValueChange> {
  return AsyncStream.create<KeyValueChange>((continuation) => {
    const observer = store.observe(
      key,
      (oldValue, newValue) => continuation.yield({ old: oldValue, new: newValue }),
      options
    )
    return () => observer.cancel()
  })
}
