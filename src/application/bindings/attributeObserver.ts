/**
 * Application Layer - Attribute Observer
 *
 * Keeps one UI-bound value slot in sync with a single setting. Owns at most
 * one live subscription and remembers the store and key it was built against.
 *
 * `observe()` is meant to be called on every UI refresh: it does nothing
 * while the configured store and prefix are unchanged, and otherwise tears the old
 * subscription down before subscribing against the current store. A failed
 * stream falls back to reading the value directly; the error never reaches
 * the slot.
 */

import { catchError, observeOn, of, type Observable, type SchedulerLike, type Subscription } from 'rxjs'
import { describeError } from '../../core/errors.js'
import type { SettingsStore } from '../../core/ports/settingsStore.js'
import type { SettingDefinition } from '../../core/setting.js'
import { toObservable } from '../../shared/asyncSequencePublisher.js'
import type { SettingsContainer } from '../settingsContainer.js'

export interface MutableBindingSlot<V> {
  set(value: V): void
}

export type AttributeObserverOptions = {
  /** Deliver slot updates on this scheduler instead of inline. */
  scheduler?: SchedulerLike
  onWarn?: (message: string) => void
}

export class AttributeObserver<V> {
  readonly #container: SettingsContainer
  readonly #setting: SettingDefinition<V>
  readonly #scheduler: SchedulerLike | undefined
  readonly #warn: (message: string) => void
  #subscription: Subscription | null = null
  #subscribedStore: SettingsStore | null = null
  #subscribedKey: string | null = null

  constructor(container: SettingsContainer, setting: SettingDefinition<V>, opts: AttributeObserverOptions = {}) {
    this.#container = container
    this.#setting = setting
    this.#scheduler = opts.scheduler
    this.#warn = opts.onWarn ?? ((message: string) => console.warn(message))
  }

  /** True while a subscription is live. A failed or finished one is not. */
  get isSubscribed(): boolean {
    return this.#subscription !== null && !this.#subscription.closed
  }

  /** The store the live subscription was built for, if any. */
  get subscribedStore(): SettingsStore | null {
    return this.#subscribedStore
  }

  /** The full key (prefix included) the live subscription observes, if any. */
  get subscribedKey(): string | null {
    return this.#subscribedKey
  }

  observe(slot: MutableBindingSlot<V>): void {
    const store = this.#container.store
    const key = this.#container.key(this.#setting)
    if (this.isSubscribed && this.#subscribedStore === store && this.#subscribedKey === key) return

    this.cancel()

    let values$: Observable<V> = toObservable(this.#container.publisher(this.#setting, { store })).pipe(
      catchError((error: unknown) => {
        this.#warn(
          `[AttributeObserver] stream for "${this.#setting.name}" failed (${describeError(error)}); re-reading from the store`
        )
        return of(this.#fallbackRead(store))
      })
    )
    if (this.#scheduler) values$ = values$.pipe(observeOn(this.#scheduler))

    this.#subscribedStore = store
    this.#subscribedKey = key
    this.#subscription = values$.subscribe((value) => slot.set(value))
  }

  cancel(): void {
    const subscription = this.#subscription
    this.#subscription = null
    this.#subscribedStore = null
    this.#subscribedKey = null
    subscription?.unsubscribe()
  }

  #fallbackRead(store: SettingsStore): V {
    try {
      return this.#container.read(this.#setting, { store })
    } catch (error) {
      this.#warn(
        `[AttributeObserver] "${this.#setting.name}" cannot be read (${describeError(error)}); using its default`
      )
      return this.#setting.defaultValue
    }
  }
}
