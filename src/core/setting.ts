/**
 * Core - Setting Declarations
 *
 * A setting is a (name, type, default) triple declared up front. The zod
 * schema is the type: it validates every value decoded from a store.
 *
 * Two storage encodings exist:
 * - `plain`: the value is stored as-is and must be a PropertyValue.
 * - `json`:  the value is stored as a JSON string, for structured types that
 *            should travel as one opaque blob.
 */

import { z } from 'zod'
import { SettingsError, describeError } from './errors.js'
import { PropertyValueSchema, type PropertyValue } from './ports/settingsStore.js'

export const SettingEncodingSchema = z.enum(['plain', 'json'])

export type SettingEncoding = z.infer<typeof SettingEncodingSchema>

const SettingHeaderSchema = z.object({
  name: z.string().min(1),
  encoding: SettingEncodingSchema.default('plain')
})

export interface SettingDefinition<V> {
  readonly name: string
  readonly encoding: SettingEncoding
  readonly optional: boolean
  readonly defaultValue: V
  /** Store representation; `undefined` means "remove the user value". */
  encode(value: V): PropertyValue | undefined
  decode(raw: PropertyValue): V
}

export type SettingValue<D> = D extends SettingDefinition<infer V> ? V : never

function parseHeader(input: { name: string; encoding?: SettingEncoding }): z.infer<typeof SettingHeaderSchema> {
  const result = SettingHeaderSchema.safeParse(input)
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new SettingsError('INVALID_KEY', `invalid setting declaration: ${message}`)
  }
  return result.data
}

function encodeWith(name: string, encoding: SettingEncoding, value: unknown): PropertyValue {
  if (encoding === 'json') {
    let text: string | undefined
    try {
      text = JSON.stringify(value)
    } catch (error) {
      throw new SettingsError('ENCODE_FAILED', `cannot encode "${name}" as JSON: ${describeError(error)}`, { cause: error })
    }
    if (text === undefined) {
      throw new SettingsError('ENCODE_FAILED', `cannot encode "${name}" as JSON: value has no JSON representation`)
    }
    return text
  }

  const result = PropertyValueSchema.safeParse(value)
  if (!result.success) {
    throw new SettingsError('ENCODE_FAILED', `value for "${name}" is not a storable property value`)
  }
  return result.data
}

function decodeWith<T>(name: string, encoding: SettingEncoding, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: PropertyValue): T {
  let candidate: unknown = raw
  if (encoding === 'json') {
    if (typeof raw !== 'string') {
      throw new SettingsError('DECODE_FAILED', `stored value for "${name}" must be a JSON string`)
    }
    try {
      candidate = JSON.parse(raw) as unknown
    } catch (error) {
      throw new SettingsError('DECODE_FAILED', `stored value for "${name}" is not valid JSON: ${describeError(error)}`, { cause: error })
    }
  }

  const result = schema.safeParse(candidate)
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new SettingsError('DECODE_FAILED', `stored value for "${name}" cannot be decoded: ${message}`)
  }
  return result.data
}

/**
 * Declare a setting that always has a value.
 *
 * @example
 * const theme = defineSetting({ name: 'theme', schema: z.enum(['light', 'dark']), default: 'light' })
 */
export function defineSetting<T>(input: {
  name: string
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  default: T
  encoding?: SettingEncoding
}): SettingDefinition<T> {
  const header = parseHeader(input)
  const { schema } = input
  // Fail at declaration time rather than on first read.
  encodeWith(header.name, header.encoding, input.default)

  return {
    name: header.name,
    encoding: header.encoding,
    optional: false,
    defaultValue: input.default,
    encode: (value) => encodeWith(header.name, header.encoding, value),
    decode: (raw) => decodeWith(header.name, header.encoding, schema, raw)
  }
}

/**
 * Declare a setting without a default. Absent values read as `undefined`;
 * writing `undefined` removes the stored value.
 */
export function defineOptionalSetting<T>(input: {
  name: string
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  encoding?: SettingEncoding
}): SettingDefinition<T | undefined> {
  const header = parseHeader(input)
  const { schema } = input

  return {
    name: header.name,
    encoding: header.encoding,
    optional: true,
    defaultValue: undefined,
    encode: (value) => (value === undefined ? undefined : encodeWith(header.name, header.encoding, value)),
    decode: (raw) => decodeWith(header.name, header.encoding, schema, raw)
  }
}
