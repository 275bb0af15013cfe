/**
 * Infrastructure Layer - Base Settings Store
 *
 * Native notification facility shared by all store implementations: a
 * per-key observer registry plus `notify()`, which subclasses call after
 * every mutation. Only effective changes (by deep equality) are dispatched.
 */

import { isDeepStrictEqual } from 'node:util'
import type {
  Cancellable,
  ChangeCallback,
  KeyValueObserver,
  ObserveOptions,
  PropertyRecord,
  PropertyValue,
  SettingsStore
} from '../../core/ports/settingsStore.js'
import { KeyObserver } from '../observation/keyObserver.js'

export abstract class BaseSettingsStore implements SettingsStore {
  readonly #observers = new Map<string, Set<KeyValueObserver>>()

  abstract read(key: string): PropertyValue | undefined
  abstract write(key: string, value: PropertyValue | undefined): void
  abstract remove(key: string): void
  abstract registerDefaults(defaults: PropertyRecord): void
  abstract snapshot(): PropertyRecord

  // ======================== Observation ========================

  addObserver(key: string, observer: KeyValueObserver): void {
    let observers = this.#observers.get(key)
    if (!observers) {
      observers = new Set()
      this.#observers.set(key, observers)
    }
    observers.add(observer)
  }

  removeObserver(key: string, observer: KeyValueObserver): void {
    const observers = this.#observers.get(key)
    if (!observers) return
    observers.delete(observer)
    if (observers.size === 0) this.#observers.delete(key)
  }

  observe(key: string, onChange: ChangeCallback, options?: ObserveOptions): Cancellable {
    return new KeyObserver(this, key, onChange, options)
  }

  /** Number of registered observers, for one key or across all keys. */
  observerCount(key?: string): number {
    if (key !== undefined) return this.#observers.get(key)?.size ?? 0
    let total = 0
    for (const observers of this.#observers.values()) total += observers.size
    return total
  }

  protected notify(key: string, oldValue: PropertyValue | undefined, newValue: PropertyValue | undefined): void {
    if (isDeepStrictEqual(oldValue, newValue)) return
    const observers = this.#observers.get(key)
    if (!observers) return

    // Snapshot: observers may cancel themselves (or others) while we dispatch.
    for (const observer of [...observers]) {
      try {
        observer.observeValue(key, { old: cloneValue(oldValue), new: cloneValue(newValue) })
      } catch (err) {
        console.error(`[SettingsStore] observer error for key "${key}":`, err)
      }
    }
  }
}

export function cloneValue(value: PropertyValue | undefined): PropertyValue | undefined {
  return value === undefined ? undefined : structuredClone(value)
}
