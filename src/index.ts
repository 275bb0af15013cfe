/**
 * keyed-settings public API.
 */

// Core
export * from './core/errors.js'
export * from './core/setting.js'
export * from './core/ports/settingsStore.js'
export * from './core/ports/sink.js'

// Shared primitives
export { AsyncMutex } from './shared/asyncMutex.js'
export { AsyncStream, StreamContinuation, type StreamTermination } from './shared/asyncStream.js'
export {
  AsyncSequencePublisher,
  AsyncSequenceSubscription,
  toObservable,
  type Deliver,
  type SubscriptionState
} from './shared/asyncSequencePublisher.js'

// Application
export { StoreConfiguration, type StoreSelection } from './application/storeConfiguration.js'
export { DefaultRegistrar } from './application/defaultRegistrar.js'
export { SettingsContainer, type StoreOverride } from './application/settingsContainer.js'
export {
  AttributeObserver,
  type AttributeObserverOptions,
  type MutableBindingSlot
} from './application/bindings/attributeObserver.js'
export {
  createSettingBinding,
  type SettingBinding,
  type SettingState
} from './application/bindings/settingBinding.js'

// Infrastructure
export { KeyObserver, observeChanges } from './infrastructure/observation/keyObserver.js'
export { BaseSettingsStore } from './infrastructure/stores/baseSettingsStore.js'
export { MemorySettingsStore } from './infrastructure/stores/memorySettingsStore.js'
export { JsonFileSettingsStore } from './infrastructure/stores/jsonFileSettingsStore.js'

// Configuration / composition
export { parseSettingsConfig, type SettingsConfig } from './config/settingsConfig.js'
export { createSettings, type SettingsApp } from './app/createSettings.js'
