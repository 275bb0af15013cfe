/**
 * Core - Ports
 *
 * The key-value store capability consumed by settings containers and change
 * streams. Infrastructure provides implementations (in-memory, JSON file).
 */

import { z } from 'zod'

// ============================================================================
// Property Values
// ============================================================================

/**
 * A value a store can hold. Mirrors what survives a JSON round-trip.
 */
export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | { [key: string]: PropertyValue }

export const PropertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(PropertyValueSchema),
    z.record(PropertyValueSchema)
  ])
)

export type PropertyRecord = Record<string, PropertyValue>

// ============================================================================
// Change Notification
// ============================================================================

export type KeyValueChange = {
  old: PropertyValue | undefined
  new: PropertyValue | undefined
}

/**
 * Receiver of the store's native per-key notifications.
 *
 * `keyPath` is whatever key the store reports; it is expected to equal the
 * key the observer was registered for.
 */
export interface KeyValueObserver {
  observeValue(keyPath: string, change: KeyValueChange): void
}

export type ChangeCallback = (oldValue: PropertyValue | undefined, newValue: PropertyValue | undefined) => void

/**
 * What to do when a store reports a change for a key other than the one an
 * observer registered for.
 */
export type KeyMismatchPolicy = 'log' | 'throw'

export type ObserveOptions = {
  keyMismatch?: KeyMismatchPolicy
  onWarn?: (message: string) => void
}

/**
 * Handle for one active registration. `cancel()` is idempotent.
 */
export interface Cancellable {
  cancel(): void
}

// ============================================================================
// Store
// ============================================================================

export interface SettingsStore {
  /** Effective value: user value, else registered default. */
  read(key: string): PropertyValue | undefined

  /** Set the user value. `undefined` removes it. */
  write(key: string, value: PropertyValue | undefined): void

  remove(key: string): void

  /** Register defaults. Existing user values are left untouched. */
  registerDefaults(defaults: PropertyRecord): void

  /** User values merged over defaults. */
  snapshot(): PropertyRecord

  addObserver(key: string, observer: KeyValueObserver): void

  removeObserver(key: string, observer: KeyValueObserver): void

  /**
   * Observe one key. The callback receives the current value once as both
   * old and new, then every effective change until the handle is cancelled.
   */
  observe(key: string, onChange: ChangeCallback, options?: ObserveOptions): Cancellable
}
