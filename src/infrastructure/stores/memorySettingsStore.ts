/**
 * Infrastructure Layer - Memory Settings Store
 *
 * Two layers per key: the user value and a registered default. Reads see the
 * user value when present, else the default. Values are validated as
 * property values and deep-copied on the way in and out.
 */

import { SettingsError } from '../../core/errors.js'
import {
  PropertyValueSchema,
  type PropertyRecord,
  type PropertyValue
} from '../../core/ports/settingsStore.js'
import { BaseSettingsStore, cloneValue } from './baseSettingsStore.js'

function toStoredValue(key: string, value: unknown): PropertyValue {
  const result = PropertyValueSchema.safeParse(value)
  if (!result.success) {
    throw new SettingsError('UNSUPPORTED_VALUE', `value for "${key}" is not a property value`)
  }
  return structuredClone(result.data)
}

export class MemorySettingsStore extends BaseSettingsStore {
  static #standard: MemorySettingsStore | undefined

  /** Process-wide store used when nothing else has been configured. */
  static get standard(): MemorySettingsStore {
    MemorySettingsStore.#standard ??= new MemorySettingsStore()
    return MemorySettingsStore.#standard
  }

  readonly #values = new Map<string, PropertyValue>()
  readonly #defaults = new Map<string, PropertyValue>()

  constructor(opts: { values?: PropertyRecord } = {}) {
    super()
    for (const [key, value] of Object.entries(opts.values ?? {})) {
      this.#values.set(key, toStoredValue(key, value))
    }
  }

  read(key: string): PropertyValue | undefined {
    return cloneValue(this.#effective(key))
  }

  write(key: string, value: PropertyValue | undefined): void {
    if (value === undefined) {
      this.remove(key)
      return
    }
    const stored = toStoredValue(key, value)
    const oldValue = this.#effective(key)
    this.#values.set(key, stored)
    this.valuesChanged()
    this.notify(key, oldValue, stored)
  }

  remove(key: string): void {
    if (!this.#values.has(key)) return
    const oldValue = this.#effective(key)
    this.#values.delete(key)
    this.valuesChanged()
    this.notify(key, oldValue, this.#effective(key))
  }

  registerDefaults(defaults: PropertyRecord): void {
    for (const [key, value] of Object.entries(defaults)) {
      const stored = toStoredValue(key, value)
      const oldValue = this.#effective(key)
      this.#defaults.set(key, stored)
      this.notify(key, oldValue, this.#effective(key))
    }
  }

  snapshot(): PropertyRecord {
    const merged: PropertyRecord = {}
    for (const [key, value] of this.#defaults) merged[key] = structuredClone(value)
    for (const [key, value] of this.#values) merged[key] = structuredClone(value)
    return merged
  }

  /** Remove every user value; defaults stay registered. */
  reset(): void {
    this.#mutate(() => this.#values.clear())
    this.valuesChanged()
  }

  /** Remove user values and defaults. */
  clear(): void {
    this.#mutate(() => {
      this.#values.clear()
      this.#defaults.clear()
    })
    this.valuesChanged()
  }

  unregisterDefaults(): void {
    this.#mutate(() => this.#defaults.clear())
  }

  /** User values only, without defaults. */
  protected userValues(): PropertyRecord {
    return Object.fromEntries([...this.#values].map(([key, value]) => [key, structuredClone(value)]))
  }

  /** Called after the user-value layer changes. */
  protected valuesChanged(): void {}

  #effective(key: string): PropertyValue | undefined {
    if (this.#values.has(key)) return this.#values.get(key)
    return this.#defaults.get(key)
  }

  #mutate(change: () => void): void {
    const keys = new Set([...this.#values.keys(), ...this.#defaults.keys()])
    const before = new Map([...keys].map((key) => [key, this.#effective(key)]))
    change()
    for (const key of keys) {
      this.notify(key, before.get(key), this.#effective(key))
    }
  }
}
