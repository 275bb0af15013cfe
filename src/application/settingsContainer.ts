/**
 * Application Layer - Settings Container
 *
 * Typed access to declared settings over whichever store the configuration
 * currently selects. Keys are `prefix + setting.name`.
 *
 * Besides read/write, every setting can be observed as:
 * - an AsyncStream of decoded values (`stream`, `streamFor`)
 * - a push publisher (`publisher`, `publisherFor`)
 * - a UI-facing AttributeObserver (`observer`)
 */

import { isDeepStrictEqual } from 'node:util'
import type { KeyMismatchPolicy, PropertyValue, SettingsStore } from '../core/ports/settingsStore.js'
import type { SettingDefinition } from '../core/setting.js'
import { AsyncSequencePublisher, type Deliver } from '../shared/asyncSequencePublisher.js'
import { AsyncStream } from '../shared/asyncStream.js'
import { AttributeObserver, type AttributeObserverOptions } from './bindings/attributeObserver.js'
import { DefaultRegistrar } from './defaultRegistrar.js'
import type { StoreConfiguration } from './storeConfiguration.js'

/** Pin an operation to a specific store instead of the configured one. */
export type StoreOverride = { store?: SettingsStore }

export class SettingsContainer {
  readonly configuration: StoreConfiguration
  readonly #registrar = new DefaultRegistrar()
  readonly #keyMismatch: KeyMismatchPolicy
  readonly #onWarn: ((message: string) => void) | undefined

  constructor(opts: {
    configuration: StoreConfiguration
    keyMismatch?: KeyMismatchPolicy
    onWarn?: (message: string) => void
  }) {
    this.configuration = opts.configuration
    this.#keyMismatch = opts.keyMismatch ?? 'log'
    this.#onWarn = opts.onWarn
  }

  get store(): SettingsStore {
    return this.configuration.store
  }

  key<V>(setting: SettingDefinition<V>): string {
    return `${this.configuration.prefix}${setting.name}`
  }

  // ======================== Read / Write ========================

  read<V>(setting: SettingDefinition<V>, opts: StoreOverride = {}): V {
    const store = opts.store ?? this.configuration.store
    const key = this.key(setting)
    this.#registrar.registerIfNeeded(store, key, setting)
    return decodeStored(setting, store.read(key))
  }

  write<V>(setting: SettingDefinition<V>, value: V, opts: StoreOverride = {}): void {
    const store = opts.store ?? this.configuration.store
    store.write(this.key(setting), setting.encode(value))
  }

  /** Drop the stored value; reads fall back to the default. */
  reset<V>(setting: SettingDefinition<V>, opts: StoreOverride = {}): void {
    const store = opts.store ?? this.configuration.store
    store.remove(this.key(setting))
  }

  registerDefault<V>(setting: SettingDefinition<V>, opts: StoreOverride = {}): void {
    const store = opts.store ?? this.configuration.store
    this.#registrar.registerIfNeeded(store, this.key(setting), setting)
  }

  // ======================== Observation ========================

  /**
   * Current value first, then every change. A stored value that fails to
   * decode ends the stream with that error. The store observation starts
   * when iteration starts, and ending the iteration releases it.
   */
  stream<V>(setting: SettingDefinition<V>, opts: StoreOverride = {}): AsyncStream<V> {
    const store = opts.store ?? this.configuration.store
    const key = this.key(setting)

    return AsyncStream.create<V>((continuation) => {
      // Before observing, so registering does not emit a change of its own.
      this.#registrar.registerIfNeeded(store, key, setting)
      const observer = store.observe(
        key,
        (_oldValue, newValue) => {
          let value: V
          try {
            value = decodeStored(setting, newValue)
          } catch (error) {
            continuation.finish(error)
            return
          }
          continuation.yield(value)
        },
        { keyMismatch: this.#keyMismatch, onWarn: this.#onWarn }
      )
      return () => observer.cancel()
    })
  }

  /**
   * Stream a projection of the value, skipping consecutive duplicates.
   */
  streamFor<V, S>(setting: SettingDefinition<V>, select: (value: V) => S, opts: StoreOverride = {}): AsyncStream<S> {
    const source = this.stream(setting, opts)

    return AsyncStream.create<S>((continuation) => {
      const iterator = source[Symbol.asyncIterator]()
      let last: { value: S } | null = null

      const pump = async (): Promise<void> => {
        for (;;) {
          const result = await iterator.next()
          if (result.done) break
          const projected = select(result.value)
          if (last && isDeepStrictEqual(last.value, projected)) continue
          last = { value: projected }
          continuation.yield(projected)
        }
        continuation.finish()
      }
      pump().catch((error: unknown) => continuation.finish(error))

      return () => {
        iterator.return?.().catch((err: unknown) => {
          console.error(`[SettingsContainer] failed to close stream for "${setting.name}":`, err)
        })
      }
    })
  }

  /**
   * Push-based view of `stream()`. The store observation starts when the
   * publisher gets its (single) subscriber.
   */
  publisher<V>(setting: SettingDefinition<V>, opts: StoreOverride & { deliver?: Deliver } = {}): AsyncSequencePublisher<V> {
    return new AsyncSequencePublisher<V>(
      { [Symbol.asyncIterator]: () => this.stream(setting, opts)[Symbol.asyncIterator]() },
      { deliver: opts.deliver }
    )
  }

  publisherFor<V, S>(
    setting: SettingDefinition<V>,
    select: (value: V) => S,
    opts: StoreOverride & { deliver?: Deliver } = {}
  ): AsyncSequencePublisher<S> {
    return new AsyncSequencePublisher<S>(
      { [Symbol.asyncIterator]: () => this.streamFor(setting, select, opts)[Symbol.asyncIterator]() },
      { deliver: opts.deliver }
    )
  }

  observer<V>(setting: SettingDefinition<V>, opts: AttributeObserverOptions = {}): AttributeObserver<V> {
    return new AttributeObserver(this, setting, opts)
  }
}

/** Absent and `null` stored values read as the setting's default. */
function decodeStored<V>(setting: SettingDefinition<V>, raw: PropertyValue | undefined): V {
  if (raw === undefined || raw === null) return setting.defaultValue
  return setting.decode(raw)
}
