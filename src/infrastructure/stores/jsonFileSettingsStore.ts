/**
 * Infrastructure Layer - JSON File Settings Store
 *
 * A named suite persisted as one JSON object. Reads and writes go through
 * the in-memory layers; every change of the user values schedules a rewrite
 * of the file.
 *
 * - Rewrites are serialized with AsyncMutex and land via temp file + rename.
 * - Defaults are never persisted; they are registered at run time.
 * - `flush()` resolves once every scheduled rewrite has finished.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { describeError } from '../../core/errors.js'
import { PropertyValueSchema, type PropertyRecord } from '../../core/ports/settingsStore.js'
import { AsyncMutex } from '../../shared/asyncMutex.js'
import { MemorySettingsStore } from './memorySettingsStore.js'

const SuiteFileSchema = z.record(PropertyValueSchema)

async function readSuiteFile(path: string): Promise<PropertyRecord> {
  let raw = ''
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return {}
    throw new Error(`settings suite path is unreadable: ${path} (${describeError(error)})`)
  }
  if (!raw.trim()) return {}

  let input: unknown
  try {
    input = JSON.parse(raw) as unknown
  } catch (error) {
    throw new Error(`settings suite file (${path}) is not valid JSON: ${describeError(error)}`)
  }

  const parsed = SuiteFileSchema.safeParse(input)
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new Error(`settings suite file (${path}) validation failed: ${message}`)
  }
  return parsed.data
}

export class JsonFileSettingsStore extends MemorySettingsStore {
  readonly path: string
  readonly #mutex = new AsyncMutex()
  #lastWrite: Promise<void> = Promise.resolve()

  private constructor(path: string, values: PropertyRecord) {
    super({ values })
    this.path = path
  }

  static async open(path: string): Promise<JsonFileSettingsStore> {
    const values = await readSuiteFile(path)
    return new JsonFileSettingsStore(path, values)
  }

  /** Wait until every scheduled rewrite has reached the disk (or failed). */
  async flush(): Promise<void> {
    await this.#lastWrite
  }

  protected override valuesChanged(): void {
    const content = `${JSON.stringify(this.userValues(), null, 2)}\n`
    this.#lastWrite = this.#mutex
      .runExclusive(() => this.#persist(content))
      .catch((err: unknown) => {
        console.error(`[JsonFileSettingsStore] failed to persist ${this.path}:`, err)
      })
  }

  async #persist(content: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    const tmpPath = `${this.path}.${process.pid}.${Date.now()}.tmp`
    try {
      await writeFile(tmpPath, content)
      await rename(tmpPath, this.path)
    } catch (err) {
      await rm(tmpPath, { force: true })
      throw err
    }
  }
}
