import { isAbsolute, resolve } from 'node:path'
import { z } from 'zod'
import type { KeyMismatchPolicy } from '../core/ports/settingsStore.js'

export type SettingsConfig = {
  prefix: string
  /** Absolute path of the JSON suite file, or null for the in-memory store. */
  suitePath: string | null
  keyMismatch: KeyMismatchPolicy
}

const SettingsEnvSchema = z.object({
  SETTINGS_PREFIX: z.string().default(''),
  SETTINGS_SUITE_PATH: z.string().optional(),
  SETTINGS_KEY_MISMATCH: z.enum(['log', 'throw']).default('log')
})

/**
 * Parse settings configuration from environment variables.
 *
 * - `SETTINGS_PREFIX`: prepended to every setting key (default empty)
 * - `SETTINGS_SUITE_PATH`: JSON suite file, relative to `baseDir`; unset or
 *   blank selects the process-wide in-memory store
 * - `SETTINGS_KEY_MISMATCH`: `log` (default) or `throw`
 */
export function parseSettingsConfig(opts: {
  env: Record<string, string | undefined>
  baseDir?: string
}): SettingsConfig {
  const sourceName = 'settings environment'
  const parsed = SettingsEnvSchema.safeParse({
    SETTINGS_PREFIX: opts.env.SETTINGS_PREFIX,
    SETTINGS_SUITE_PATH: opts.env.SETTINGS_SUITE_PATH,
    SETTINGS_KEY_MISMATCH: opts.env.SETTINGS_KEY_MISMATCH?.trim().toLowerCase() || undefined
  })
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new Error(`${sourceName} validation failed: ${message}`)
  }

  const rawPath = parsed.data.SETTINGS_SUITE_PATH?.trim()
  let suitePath: string | null = null
  if (rawPath) {
    const baseDir = opts.baseDir ?? process.cwd()
    suitePath = isAbsolute(rawPath) ? rawPath : resolve(baseDir, rawPath)
  }

  return {
    prefix: parsed.data.SETTINGS_PREFIX,
    suitePath,
    keyMismatch: parsed.data.SETTINGS_KEY_MISMATCH
  }
}
