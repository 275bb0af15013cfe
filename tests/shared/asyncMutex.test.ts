import { describe, expect, test } from 'vitest'
import { AsyncMutex } from '../../src/shared/asyncMutex.js'

describe('AsyncMutex', () => {
  test('runs exclusive sections one at a time, in submission order', async () => {
    const mutex = new AsyncMutex()
    const log: string[] = []

    const slow = mutex.runExclusive(async () => {
      log.push('slow:start')
      await new Promise<void>((resolve) => setTimeout(resolve, 5))
      log.push('slow:end')
    })
    const fast = mutex.runExclusive(async () => {
      log.push('fast')
    })

    expect(mutex.isLocked).toBe(true)
    await Promise.all([slow, fast])

    expect(log).toEqual(['slow:start', 'slow:end', 'fast'])
    expect(mutex.isLocked).toBe(false)
  })

  test('a failing section releases the lock for the next one', async () => {
    const mutex = new AsyncMutex()

    const failing = mutex.runExclusive(async () => {
      throw new Error('section failed')
    })
    const next = mutex.runExclusive(async () => 'ran')

    await expect(failing).rejects.toThrow('section failed')
    await expect(next).resolves.toBe('ran')
  })
})
