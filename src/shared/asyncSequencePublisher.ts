/**
 * Shared - Async Sequence Publisher
 *
 * Republishes a pull-based async sequence as a push stream to exactly one
 * downstream sink.
 *
 * Each subscription runs its own pull loop as an independent async task:
 * - Values are delivered in source order. There is no demand accounting;
 *   `request()` is accepted and ignored, since the sources are low-volume.
 * - Exhaustion delivers `finished` once. A cancellation error from the source
 *   ends the loop silently. Any other error delivers `failed` once.
 * - `cancel()` clears the downstream reference synchronously, aborts the loop
 *   and asks the source iterator to return. The loop re-checks after every
 *   pulled element, so nothing is delivered once `cancel()` has returned.
 *
 * Deliveries go through a single `deliver` function, which lets callers pin
 * them to one execution context (e.g. a UI queue). The default calls through.
 */

import { nanoid } from 'nanoid'
import { Observable } from 'rxjs'
import { SettingsError, isCancellation } from '../core/errors.js'
import type { Completion, Demand, Publisher, Sink, StreamSubscription } from '../core/ports/sink.js'

export type Deliver = (delivery: () => void) => void

export type SubscriptionState = 'running' | 'completed' | 'failed' | 'cancelled'

const callThrough: Deliver = (delivery) => delivery()

function toSink<T>(downstream: Sink<T> | ((value: T) => void)): Sink<T> {
  if (typeof downstream !== 'function') return downstream
  return {
    receive: downstream,
    receiveCompletion: (completion) => {
      if (completion.kind === 'failed') {
        console.error('[AsyncSequencePublisher] unhandled stream failure:', completion.error)
      }
    }
  }
}

export class AsyncSequenceSubscription<T> implements StreamSubscription {
  readonly id = `sub_${nanoid(8)}`
  readonly #deliver: Deliver
  readonly #controller = new AbortController()
  #downstream: Sink<T> | null
  #iterator: AsyncIterator<T> | null = null
  #state: SubscriptionState = 'running'
  #done: Promise<void> = Promise.resolve()

  constructor(downstream: Sink<T>, deliver: Deliver) {
    this.#downstream = downstream
    this.#deliver = deliver
  }

  get state(): SubscriptionState {
    return this.#state
  }

  /** Settles when the pull loop has exited. Never rejects. */
  get done(): Promise<void> {
    return this.#done
  }

  start(sequence: AsyncIterable<T>): void {
    this.#done = this.#run(sequence)
  }

  /** Terminate before starting, e.g. when the sequence is already taken. */
  reject(error: unknown): void {
    this.#complete({ kind: 'failed', error })
  }

  request(_demand: Demand): void {
    // No demand accounting: values are pushed as they arrive.
  }

  cancel(): void {
    this.#downstream = null
    if (this.#state !== 'running') return
    this.#state = 'cancelled'
    this.#controller.abort()

    const iterator = this.#iterator
    this.#iterator = null
    const closing = iterator?.return?.()
    closing?.catch((err: unknown) => {
      console.error(`[AsyncSequencePublisher] ${this.id} failed to close its source:`, err)
    })
  }

  unsubscribe(): void {
    this.cancel()
  }

  async #run(sequence: AsyncIterable<T>): Promise<void> {
    const signal = this.#controller.signal
    try {
      const iterator = sequence[Symbol.asyncIterator]()
      this.#iterator = iterator

      while (!signal.aborted) {
        const result = await iterator.next()
        if (signal.aborted) return
        if (result.done) break
        this.#emit(result.value)
      }
      if (!signal.aborted) this.#complete({ kind: 'finished' })
    } catch (error) {
      if (signal.aborted) return
      if (isCancellation(error)) {
        this.#state = 'cancelled'
        this.#downstream = null
        return
      }
      this.#complete({ kind: 'failed', error })
    } finally {
      this.#iterator = null
    }
  }

  #emit(value: T): void {
    this.#deliver(() => {
      const downstream = this.#downstream
      if (!downstream) return
      try {
        downstream.receive(value)
      } catch (err) {
        console.error(`[AsyncSequencePublisher] ${this.id} downstream error during receive:`, err)
      }
    })
  }

  #complete(completion: Completion): void {
    if (this.#state !== 'running') return
    this.#state = completion.kind === 'finished' ? 'completed' : 'failed'
    this.#deliver(() => {
      const downstream = this.#downstream
      this.#downstream = null
      if (!downstream) return
      try {
        downstream.receiveCompletion(completion)
      } catch (err) {
        console.error(`[AsyncSequencePublisher] ${this.id} downstream error during completion:`, err)
      }
    })
  }
}

/**
 * Push-based view of a single-pass async sequence. Only one subscription
 * may ever be attached; later ones fail with `ALREADY_SUBSCRIBED`.
 */
export class AsyncSequencePublisher<T> implements Publisher<T> {
  readonly #sequence: AsyncIterable<T>
  readonly #deliver: Deliver
  #attached = false

  constructor(sequence: AsyncIterable<T>, opts: { deliver?: Deliver } = {}) {
    this.#sequence = sequence
    this.#deliver = opts.deliver ?? callThrough
  }

  subscribe(downstream: Sink<T> | ((value: T) => void)): AsyncSequenceSubscription<T> {
    const subscription = new AsyncSequenceSubscription(toSink(downstream), this.#deliver)
    if (this.#attached) {
      subscription.reject(new SettingsError('ALREADY_SUBSCRIBED', 'this publisher already has a subscriber'))
      return subscription
    }
    this.#attached = true
    subscription.start(this.#sequence)
    return subscription
  }
}

/**
 * Lift a publisher into an RxJS Observable. Unsubscribing cancels the
 * underlying subscription.
 */
export function toObservable<T>(publisher: Publisher<T>): Observable<T> {
  return new Observable<T>((subscriber) => {
    const subscription = publisher.subscribe({
      receive: (value) => subscriber.next(value),
      receiveCompletion: (completion) => {
        if (completion.kind === 'finished') subscriber.complete()
        else subscriber.error(completion.error)
      }
    })
    return () => subscription.cancel()
  })
}
