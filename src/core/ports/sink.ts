/**
 * Core - Ports
 *
 * Downstream protocol for push-based change streams.
 */

export type Completion =
  | { kind: 'finished' }
  | { kind: 'failed'; error: unknown }

/**
 * Requested element count. Accepted by subscriptions but never enforced.
 */
export type Demand = number | 'unlimited'

export interface Sink<T> {
  receive(value: T): void
  receiveCompletion(completion: Completion): void
}

export interface StreamSubscription {
  readonly id: string
  request(demand: Demand): void
  cancel(): void
  /** Alias of `cancel()`, so subscriptions fit `Subscription`-style consumers. */
  unsubscribe(): void
}

export interface Publisher<T> {
  subscribe(downstream: Sink<T> | ((value: T) => void)): StreamSubscription
}
