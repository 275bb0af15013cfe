/**
 * Core - Errors
 *
 * Machine-readable error type for settings failures, plus the cancellation
 * signal used by change streams. Cancellation is never reported as a failure.
 */

export type SettingsErrorCode =
  | 'INVALID_KEY'
  | 'KEY_MISMATCH'
  | 'UNSUPPORTED_VALUE'
  | 'ENCODE_FAILED'
  | 'DECODE_FAILED'
  | 'ALREADY_SUBSCRIBED'

export class SettingsError extends Error {
  readonly code: SettingsErrorCode

  constructor(code: SettingsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SettingsError'
    this.code = code
  }
}

export class CancellationError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message)
    this.name = 'CancellationError'
  }
}

/**
 * True for our own `CancellationError` and for the `AbortError` raised by
 * AbortSignal-aware APIs.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancellationError) return true
  return error instanceof Error && error.name === 'AbortError'
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
