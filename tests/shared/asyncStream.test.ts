import { describe, expect, test, vi } from 'vitest'
import { SettingsError } from '../../src/core/errors.js'
import { AsyncStream } from '../../src/shared/asyncStream.js'

async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = []
  for await (const value of stream) values.push(value)
  return values
}

describe('AsyncStream', () => {
  test('delivers buffered values in order, then ends', async () => {
    const { stream, continuation } = AsyncStream.make<number>()
    continuation.yield(1)
    continuation.yield(2)
    continuation.yield(3)
    continuation.finish()

    expect(await collect(stream)).toEqual([1, 2, 3])
  })

  test('resolves a waiting pull when a value arrives', async () => {
    const { stream, continuation } = AsyncStream.make<string>()
    const iterator = stream[Symbol.asyncIterator]()

    const pending = iterator.next()
    continuation.yield('late')

    expect(await pending).toEqual({ value: 'late', done: false })
  })

  test('throws the finishing error after the buffered values', async () => {
    const { stream, continuation } = AsyncStream.make<number>()
    continuation.yield(1)
    continuation.finish(new Error('bad'))

    const seen: number[] = []
    await expect(
      (async () => {
        for await (const value of stream) seen.push(value)
      })()
    ).rejects.toThrow('bad')
    expect(seen).toEqual([1])
  })

  test('keeps undefined as a value', async () => {
    const { stream, continuation } = AsyncStream.make<string | undefined>()
    continuation.yield(undefined)
    continuation.yield('x')
    continuation.finish()

    expect(await collect(stream)).toEqual([undefined, 'x'])
  })

  test('ignores values yielded after finish', async () => {
    const { stream, continuation } = AsyncStream.make<number>()
    continuation.yield(1)
    continuation.finish()
    continuation.yield(2)

    expect(continuation.isTerminated).toBe(true)
    expect(await collect(stream)).toEqual([1])
  })

  test('return() ends a pending pull and runs onTermination once', async () => {
    const { stream, continuation } = AsyncStream.make<number>()
    const onTermination = vi.fn()
    continuation.onTermination = onTermination
    const iterator = stream[Symbol.asyncIterator]()

    const pending = iterator.next()
    await iterator.return?.()
    await iterator.return?.()

    expect(await pending).toEqual({ value: undefined, done: true })
    expect(onTermination).toHaveBeenCalledTimes(1)
    expect(onTermination).toHaveBeenCalledWith('cancelled')
  })

  test('runs a handler set after termination right away', () => {
    const { continuation } = AsyncStream.make<number>()
    continuation.finish()

    const onTermination = vi.fn()
    continuation.onTermination = onTermination

    expect(onTermination).toHaveBeenCalledWith('finished')
  })

  test('create() runs the teardown when the consumer breaks out', async () => {
    const teardown = vi.fn()
    const stream = AsyncStream.create<number>((continuation) => {
      continuation.yield(1)
      continuation.yield(2)
      return teardown
    })

    for await (const value of stream) {
      if (value === 1) break
    }

    expect(teardown).toHaveBeenCalledTimes(1)
  })

  test('create() defers the producer until the iterator is requested', () => {
    const producer = vi.fn()
    const stream = AsyncStream.create<number>(producer)

    expect(producer).not.toHaveBeenCalled()
    stream[Symbol.asyncIterator]()
    expect(producer).toHaveBeenCalledTimes(1)
  })

  test('allows a single consumer', () => {
    const { stream } = AsyncStream.make<number>()
    stream[Symbol.asyncIterator]()

    expect(() => stream[Symbol.asyncIterator]()).toThrow(SettingsError)
  })
})
