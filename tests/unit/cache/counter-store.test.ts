import { describe, it, expect, vi } from 'vitest'
import {
  createMemoryCounterStore,
  createValkeyCounterStore,
} from '../../../src/cache/counter-store.js'

describe('createMemoryCounterStore', () => {
  it('opens a window on the first increment', async () => {
    const store = createMemoryCounterStore(() => 1_000)
    await expect(store.increment('k', 60_000)).resolves.toEqual({ count: 1, resetInMs: 60_000 })
  })

  it('counts within the window and reports the time left', async () => {
    let now = 1_000
    const store = createMemoryCounterStore(() => now)

    await store.increment('k', 60_000)
    now = 21_000
    await expect(store.increment('k', 60_000)).resolves.toEqual({ count: 2, resetInMs: 40_000 })
    await expect(store.peek('k')).resolves.toBe(2)
  })

  it('resets once the window has elapsed', async () => {
    let now = 0
    const store = createMemoryCounterStore(() => now)

    await store.increment('k', 60_000)
    await store.increment('k', 60_000)
    now = 60_000

    await expect(store.peek('k')).resolves.toBe(0)
    await expect(store.increment('k', 60_000)).resolves.toEqual({ count: 1, resetInMs: 60_000 })
  })

  it('keeps keys independent', async () => {
    const store = createMemoryCounterStore(() => 0)
    await store.increment('a', 1_000)
    await store.increment('a', 1_000)
    await store.increment('b', 1_000)

    await expect(store.peek('a')).resolves.toBe(2)
    await expect(store.peek('b')).resolves.toBe(1)
    await expect(store.peek('c')).resolves.toBe(0)
  })
})

describe('createValkeyCounterStore', () => {
  function createMockCache() {
    return {
      eval: vi.fn(),
      get: vi.fn(),
    }
  }

  it('increments through the counter script with the window in ms', async () => {
    const cache = createMockCache()
    cache.eval.mockResolvedValue([3, 45_000])
    const store = createValkeyCounterStore(cache as never)

    await expect(store.increment('ratelimit:x', 60_000)).resolves.toEqual({
      count: 3,
      resetInMs: 45_000,
    })
    expect(cache.eval).toHaveBeenCalledWith(expect.any(String), 1, 'ratelimit:x', '60000')
  })

  it('rejects an unexpected script reply', async () => {
    const cache = createMockCache()
    cache.eval.mockResolvedValue('OK')
    const store = createValkeyCounterStore(cache as never)

    await expect(store.increment('k', 1_000)).rejects.toThrow('Unexpected reply from counter script')
  })

  it('peeks the stored count', async () => {
    const cache = createMockCache()
    cache.get.mockResolvedValueOnce('4').mockResolvedValueOnce(null)
    const store = createValkeyCounterStore(cache as never)

    await expect(store.peek('k')).resolves.toBe(4)
    await expect(store.peek('k')).resolves.toBe(0)
  })
})
