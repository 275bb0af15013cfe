import { readFileSync } from 'node:fs'
import { isAbsolute, resolve } from 'node:path'
import { parse as parseDotenv } from 'dotenv'
import { SettingsContainer } from '../application/settingsContainer.js'
import { StoreConfiguration } from '../application/storeConfiguration.js'
import { parseSettingsConfig, type SettingsConfig } from '../config/settingsConfig.js'
import type { SettingsStore } from '../core/ports/settingsStore.js'
import { JsonFileSettingsStore } from '../infrastructure/stores/jsonFileSettingsStore.js'
import { MemorySettingsStore } from '../infrastructure/stores/memorySettingsStore.js'

export type SettingsApp = {
  config: SettingsConfig
  configuration: StoreConfiguration
  container: SettingsContainer
}

function readEnvFile(path: string): Record<string, string> {
  try {
    return parseDotenv(readFileSync(path, 'utf8'))
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return {}
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`settings env file is unreadable: ${path} (${reason})`)
  }
}

/**
 * Wire configuration, store and container together.
 *
 * Variables come from `env` (default `process.env`), layered over `envFile`
 * when one is given. An explicit `store` wins over `SETTINGS_SUITE_PATH`;
 * with neither, the container runs against `MemorySettingsStore.standard`.
 */
export async function createSettings(opts: {
  env?: Record<string, string | undefined>
  envFile?: string
  baseDir?: string
  store?: SettingsStore
  onWarn?: (message: string) => void
} = {}): Promise<SettingsApp> {
  const baseDir = opts.baseDir ?? process.cwd()
  const fileEnv = opts.envFile
    ? readEnvFile(isAbsolute(opts.envFile) ? opts.envFile : resolve(baseDir, opts.envFile))
    : {}
  const config = parseSettingsConfig({ env: { ...fileEnv, ...(opts.env ?? process.env) }, baseDir })

  let store = opts.store
  if (!store && config.suitePath) {
    store = await JsonFileSettingsStore.open(config.suitePath)
  }

  const configuration = new StoreConfiguration({
    fallback: () => MemorySettingsStore.standard,
    store,
    prefix: config.prefix
  })
  const container = new SettingsContainer({
    configuration,
    keyMismatch: config.keyMismatch,
    onWarn: opts.onWarn
  })

  return { config, configuration, container }
}
