/**
 * Application Layer - Setting Binding
 *
 * Binds one setting to a zustand store for UI code. The zustand state holds
 * the value and a setter that writes through to the settings store; an
 * AttributeObserver keeps the value in sync with changes made elsewhere.
 */

import { createStore, type StoreApi } from 'zustand/vanilla'
import type { SettingDefinition } from '../../core/setting.js'
import type { SettingsContainer } from '../settingsContainer.js'
import type { AttributeObserver, AttributeObserverOptions, MutableBindingSlot } from './attributeObserver.js'

export interface SettingState<V> {
  value: V
  set: (value: V) => void
}

export type SettingBinding<V> = {
  state: StoreApi<SettingState<V>>
  observer: AttributeObserver<V>
  /** Call on every render/refresh cycle; resubscribes only when the store changed. */
  refresh: () => void
  dispose: () => void
}

export function createSettingBinding<V>(
  container: SettingsContainer,
  setting: SettingDefinition<V>,
  opts: AttributeObserverOptions = {}
): SettingBinding<V> {
  const state = createStore<SettingState<V>>()((set) => ({
    value: container.read(setting),
    set: (value) => {
      // Store first: a value that fails to encode never reaches the state.
      container.write(setting, value)
      set({ value })
    }
  }))

  const observer = container.observer(setting, opts)
  const slot: MutableBindingSlot<V> = {
    set: (value) => state.setState({ value })
  }

  return {
    state,
    observer,
    refresh: () => observer.observe(slot),
    dispose: () => observer.cancel()
  }
}
