/**
 * Shared - Async Stream
 *
 * Single-consumer async sequence fed from callback code through a
 * continuation. Buffering is unbounded: values yielded before the consumer
 * pulls are queued in order.
 *
 * Termination happens once, either from the producer (`finish`, optionally
 * with an error delivered after the buffered values) or from the consumer
 * (`return()` on the iterator, e.g. a `break` out of `for await`). Either way
 * the `onTermination` handler runs exactly once, which is where producers
 * release whatever feeds the stream.
 */

import { SettingsError } from '../core/errors.js'

export type StreamTermination = 'finished' | 'cancelled'

type PendingPull<T> = {
  resolve: (result: IteratorResult<T>) => void
  reject: (error: unknown) => void
}

type StreamState =
  | { kind: 'open' }
  | { kind: 'finished'; error: unknown; errorDelivered: boolean; hasError: boolean }
  | { kind: 'cancelled' }

/** @internal Shared state between a stream and its continuation. */
export class StreamCore<T> {
  readonly buffer: Array<{ value: T }> = []
  pending: PendingPull<T> | null = null
  state: StreamState = { kind: 'open' }
  #onTermination: ((reason: StreamTermination) => void) | undefined
  #terminationReason: StreamTermination | null = null

  setTerminationHandler(handler: ((reason: StreamTermination) => void) | undefined): void {
    if (this.#terminationReason !== null) {
      // Already over: run the handler right away so producers still clean up.
      handler?.(this.#terminationReason)
      return
    }
    this.#onTermination = handler
  }

  terminate(reason: StreamTermination): void {
    if (this.#terminationReason !== null) return
    this.#terminationReason = reason
    const handler = this.#onTermination
    this.#onTermination = undefined
    handler?.(reason)
  }
}

export class StreamContinuation<T> {
  readonly #core: StreamCore<T>

  constructor(core: StreamCore<T>) {
    this.#core = core
  }

  get isTerminated(): boolean {
    return this.#core.state.kind !== 'open'
  }

  set onTermination(handler: ((reason: StreamTermination) => void) | undefined) {
    this.#core.setTerminationHandler(handler)
  }

  yield(value: T): void {
    const core = this.#core
    if (core.state.kind !== 'open') return
    const pending = core.pending
    if (pending) {
      core.pending = null
      pending.resolve({ value, done: false })
      return
    }
    core.buffer.push({ value })
  }

  /**
   * End the stream. Buffered values are still delivered; `error`, when
   * given, is thrown to the consumer after them.
   */
  finish(...args: [] | [error: unknown]): void {
    const core = this.#core
    if (core.state.kind !== 'open') return
    core.state = { kind: 'finished', error: args[0], errorDelivered: false, hasError: args.length > 0 }

    const pending = core.pending
    if (pending) {
      core.pending = null
      settleAfterBuffer(core, pending)
    }
    core.terminate('finished')
  }
}

function settleAfterBuffer<T>(core: StreamCore<T>, pull: PendingPull<T>): void {
  const state = core.state
  if (state.kind === 'finished' && state.hasError && !state.errorDelivered) {
    state.errorDelivered = true
    pull.reject(state.error)
    return
  }
  pull.resolve({ value: undefined, done: true })
}

export class AsyncStream<T> implements AsyncIterable<T> {
  readonly #core: StreamCore<T>
  #start: (() => void) | undefined
  #iterated = false

  private constructor(core: StreamCore<T>, start?: () => void) {
    this.#core = core
    this.#start = start
  }

  static make<T>(): { stream: AsyncStream<T>; continuation: StreamContinuation<T> } {
    const core = new StreamCore<T>()
    return { stream: new AsyncStream(core), continuation: new StreamContinuation(core) }
  }

  /**
   * Build a stream from a producer function. The producer runs when the
   * consumer asks for the iterator, so a stream nobody iterates holds no
   * resources. It may return a teardown, which becomes the termination
   * handler.
   */
  static create<T>(
    producer: (continuation: StreamContinuation<T>) => (() => void) | void
  ): AsyncStream<T> {
    const core = new StreamCore<T>()
    const continuation = new StreamContinuation(core)
    return new AsyncStream(core, () => {
      const teardown = producer(continuation)
      if (teardown) continuation.onTermination = () => teardown()
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.#iterated) {
      throw new SettingsError('ALREADY_SUBSCRIBED', 'AsyncStream supports a single consumer')
    }
    this.#iterated = true
    const core = this.#core
    const start = this.#start
    this.#start = undefined
    start?.()

    return {
      next: (): Promise<IteratorResult<T>> => {
        const buffered = core.buffer.shift()
        if (buffered) {
          return Promise.resolve({ value: buffered.value, done: false })
        }
        if (core.state.kind !== 'open') {
          return new Promise((resolve, reject) => settleAfterBuffer(core, { resolve, reject }))
        }
        if (core.pending) {
          return Promise.reject(new SettingsError('ALREADY_SUBSCRIBED', 'concurrent next() calls are not supported'))
        }
        return new Promise((resolve, reject) => {
          core.pending = { resolve, reject }
        })
      },

      return: (): Promise<IteratorResult<T>> => {
        if (core.state.kind === 'open') {
          core.state = { kind: 'cancelled' }
          core.buffer.length = 0
          const pending = core.pending
          core.pending = null
          pending?.resolve({ value: undefined, done: true })
          core.terminate('cancelled')
        }
        return Promise.resolve({ value: undefined, done: true })
      }
    }
  }
}
