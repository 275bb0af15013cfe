import { lastValueFrom, toArray } from 'rxjs'
import { afterEach, describe, expect, test, vi } from 'vitest'
import { CancellationError, SettingsError } from '../../src/core/errors.js'
import type { KeyValueChange } from '../../src/core/ports/settingsStore.js'
import type { Completion, Sink } from '../../src/core/ports/sink.js'
import { observeChanges } from '../../src/infrastructure/observation/keyObserver.js'
import { MemorySettingsStore } from '../../src/infrastructure/stores/memorySettingsStore.js'
import { AsyncSequencePublisher, toObservable } from '../../src/shared/asyncSequencePublisher.js'
import { AsyncStream } from '../../src/shared/asyncStream.js'

const settle = () => new Promise<void>((resolve) => setTimeout(resolve, 0))

function recordingSink<T>() {
  const values: T[] = []
  const completions: Completion[] = []
  const sink: Sink<T> = {
    receive: (value) => values.push(value),
    receiveCompletion: (completion) => completions.push(completion)
  }
  return { sink, values, completions }
}

async function* numbers(...values: number[]): AsyncGenerator<number> {
  for (const value of values) yield value
}

async function* failingAfter(value: number, error: unknown): AsyncGenerator<number> {
  yield value
  throw error
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('AsyncSequencePublisher', () => {
  test('delivers every element in order, then finished once', async () => {
    const { sink, values, completions } = recordingSink<number>()
    const subscription = new AsyncSequencePublisher(numbers(1, 2, 3)).subscribe(sink)

    await subscription.done

    expect(values).toEqual([1, 2, 3])
    expect(completions).toEqual([{ kind: 'finished' }])
    expect(subscription.state).toBe('completed')
  })

  test('delivers failed with the source error', async () => {
    const { sink, values, completions } = recordingSink<number>()
    const error = new Error('boom')
    const subscription = new AsyncSequencePublisher(failingAfter(1, error)).subscribe(sink)

    await subscription.done

    expect(values).toEqual([1])
    expect(completions).toEqual([{ kind: 'failed', error }])
    expect(subscription.state).toBe('failed')
  })

  test('ends silently when the source throws a CancellationError', async () => {
    const { sink, values, completions } = recordingSink<number>()
    const subscription = new AsyncSequencePublisher(failingAfter(1, new CancellationError())).subscribe(sink)

    await subscription.done

    expect(values).toEqual([1])
    expect(completions).toEqual([])
    expect(subscription.state).toBe('cancelled')
  })

  test('treats an AbortError as cancellation too', async () => {
    const abort = new Error('aborted')
    abort.name = 'AbortError'
    const { sink, completions } = recordingSink<number>()
    const subscription = new AsyncSequencePublisher(failingAfter(1, abort)).subscribe(sink)

    await subscription.done

    expect(completions).toEqual([])
    expect(subscription.state).toBe('cancelled')
  })

  test('cancel stops delivery and closes the source', async () => {
    const { stream, continuation } = AsyncStream.make<number>()
    const onTermination = vi.fn()
    continuation.onTermination = onTermination
    const { sink, values, completions } = recordingSink<number>()
    const subscription = new AsyncSequencePublisher(stream).subscribe(sink)

    continuation.yield(1)
    await settle()
    subscription.cancel()
    continuation.yield(2)
    await subscription.done

    expect(values).toEqual([1])
    expect(completions).toEqual([])
    expect(subscription.state).toBe('cancelled')
    expect(onTermination).toHaveBeenCalledWith('cancelled')
  })

  test('an element already pulled when cancel() returns is not delivered', async () => {
    const { stream, continuation } = AsyncStream.make<number>()
    const { sink, values, completions } = recordingSink<number>()
    const subscription = new AsyncSequencePublisher(stream).subscribe(sink)

    continuation.yield(1)
    subscription.cancel()
    await subscription.done

    expect(values).toEqual([])
    expect(completions).toEqual([])
  })

  test('cancel is idempotent and unsubscribe is an alias', async () => {
    const { stream } = AsyncStream.make<number>()
    const subscription = new AsyncSequencePublisher(stream).subscribe(() => {})

    subscription.unsubscribe()
    subscription.cancel()
    await subscription.done

    expect(subscription.state).toBe('cancelled')
  })

  test('request() is accepted without changing delivery', async () => {
    const { sink, values } = recordingSink<number>()
    const subscription = new AsyncSequencePublisher(numbers(1, 2, 3)).subscribe(sink)
    subscription.request(1)

    await subscription.done

    expect(values).toEqual([1, 2, 3])
  })

  test('a second subscriber fails with ALREADY_SUBSCRIBED right away', () => {
    const publisher = new AsyncSequencePublisher(numbers(1))
    publisher.subscribe(() => {})
    const second = recordingSink<number>()

    const subscription = publisher.subscribe(second.sink)

    expect(subscription.state).toBe('failed')
    expect(second.values).toEqual([])
    expect(second.completions).toHaveLength(1)
    const completion = second.completions[0]
    expect(completion?.kind).toBe('failed')
    if (completion?.kind === 'failed') {
      expect(completion.error).toBeInstanceOf(SettingsError)
      expect(completion.error).toMatchObject({ code: 'ALREADY_SUBSCRIBED' })
    }
  })

  test('routes every delivery through the deliver function', async () => {
    const queue: Array<() => void> = []
    const { sink, values, completions } = recordingSink<string>()
    async function* letters(): AsyncGenerator<string> {
      yield 'a'
    }
    const subscription = new AsyncSequencePublisher(letters(), { deliver: (delivery) => queue.push(delivery) }).subscribe(
      sink
    )

    await subscription.done
    expect(values).toEqual([])
    expect(queue).toHaveLength(2)

    for (const delivery of queue) delivery()
    expect(values).toEqual(['a'])
    expect(completions).toEqual([{ kind: 'finished' }])
  })

  test('queued deliveries are dropped once cancel() has returned', async () => {
    const queue: Array<() => void> = []
    const { stream, continuation } = AsyncStream.make<number>()
    const { sink, values } = recordingSink<number>()
    const subscription = new AsyncSequencePublisher(stream, { deliver: (delivery) => queue.push(delivery) }).subscribe(
      sink
    )

    continuation.yield(1)
    await settle()
    expect(queue).toHaveLength(1)

    subscription.cancel()
    for (const delivery of queue) delivery()

    expect(values).toEqual([])
  })

  test('the callback form logs a failure instead of dropping it', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    const error = new Error('boom')
    const values: number[] = []
    const subscription = new AsyncSequencePublisher(failingAfter(7, error)).subscribe((value) => values.push(value))

    await subscription.done

    expect(values).toEqual([7])
    expect(consoleError).toHaveBeenCalledWith('[AsyncSequencePublisher] unhandled stream failure:', error)
  })

  test('republishes store changes until cancelled', async () => {
    const store = new MemorySettingsStore({ values: { count: 0 } })
    const { sink, values } = recordingSink<KeyValueChange>()
    const subscription = new AsyncSequencePublisher(observeChanges(store, 'count')).subscribe(sink)

    await settle()
    store.write('count', 1)
    store.write('count', 2)
    await settle()
    subscription.cancel()
    store.write('count', 3)
    await settle()

    expect(values).toEqual([
      { old: 0, new: 0 },
      { old: 0, new: 1 },
      { old: 1, new: 2 }
    ])
    expect(store.observerCount('count')).toBe(0)
  })
})

describe('toObservable', () => {
  test('completes with every element', async () => {
    const values = await lastValueFrom(toObservable(new AsyncSequencePublisher(numbers(1, 2, 3))).pipe(toArray()))

    expect(values).toEqual([1, 2, 3])
  })

  test('errors with the source failure', async () => {
    const observable = toObservable(new AsyncSequencePublisher(failingAfter(1, new Error('boom'))))

    await expect(lastValueFrom(observable)).rejects.toThrow('boom')
  })

  test('unsubscribing cancels the underlying subscription', async () => {
    const { stream, continuation } = AsyncStream.make<number>()
    const onTermination = vi.fn()
    continuation.onTermination = onTermination
    const values: number[] = []

    const subscription = toObservable(new AsyncSequencePublisher(stream)).subscribe((value) => values.push(value))
    continuation.yield(1)
    await settle()
    subscription.unsubscribe()
    continuation.yield(2)
    await settle()

    expect(values).toEqual([1])
    expect(onTermination).toHaveBeenCalledWith('cancelled')
  })
})
