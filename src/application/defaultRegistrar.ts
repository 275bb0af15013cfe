import type { SettingsStore } from '../core/ports/settingsStore.js'
import type { SettingDefinition } from '../core/setting.js'

/**
 * Registers each setting's default at most once per store, right before the
 * first read or observation. A store swapped in later gets its own
 * registration.
 */
export class DefaultRegistrar {
  readonly #registered = new WeakMap<SettingsStore, Set<string>>()

  registerIfNeeded<V>(store: SettingsStore, key: string, setting: SettingDefinition<V>): void {
    if (setting.optional) return

    let keys = this.#registered.get(store)
    if (!keys) {
      keys = new Set()
      this.#registered.set(store, keys)
    }
    if (keys.has(key)) return

    // Encode first: a failure leaves the key unregistered.
    const encoded = setting.encode(setting.defaultValue)
    if (encoded !== undefined) store.registerDefaults({ [key]: encoded })
    keys.add(key)
  }
}
