import type { Cache } from './index.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CounterHit {
  /** Count after this increment. */
  count: number
  /** Milliseconds until the window (and the count) resets. */
  resetInMs: number
}

/**
 * Fixed-window counters with time-based reset. A window opens on the first
 * increment of a key and the key disappears when it closes.
 */
export interface CounterStore {
  /** Atomically increment `key` and report the new count. */
  increment(key: string, windowMs: number): Promise<CounterHit>
  /** Current count for `key` without consuming a slot. */
  peek(key: string): Promise<number>
}

// ---------------------------------------------------------------------------
// Valkey
// ---------------------------------------------------------------------------

// INCR and PEXPIRE run as one script so no caller can observe the count
// between the increment and the window being set.
const INCREMENT_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return { count, ttl }
`

function toCounterHit(reply: unknown): CounterHit {
  if (Array.isArray(reply)) {
    const [count, ttl]: unknown[] = reply
    if (typeof count === 'number' && typeof ttl === 'number') {
      return { count, resetInMs: ttl }
    }
  }
  throw new Error('Unexpected reply from counter script')
}

export function createValkeyCounterStore(cache: Cache): CounterStore {
  return {
    async increment(key: string, windowMs: number): Promise<CounterHit> {
      const reply: unknown = await cache.eval(INCREMENT_SCRIPT, 1, key, String(windowMs))
      return toCounterHit(reply)
    },

    async peek(key: string): Promise<number> {
      const value = await cache.get(key)
      if (value === null) return 0
      const count = Number(value)
      return Number.isFinite(count) ? count : 0
    },
  }
}

// ---------------------------------------------------------------------------
// In-process
// ---------------------------------------------------------------------------

interface MemoryCounter {
  count: number
  expiresAt: number
}

/**
 * Counter store for tests and single-process deployments. Each operation
 * completes synchronously before its promise resolves, so increments never
 * interleave.
 */
export function createMemoryCounterStore(now: () => number = () => Date.now()): CounterStore {
  const counters = new Map<string, MemoryCounter>()

  function live(key: string, at: number): MemoryCounter | undefined {
    const counter = counters.get(key)
    if (counter && counter.expiresAt <= at) {
      counters.delete(key)
      return undefined
    }
    return counter
  }

  return {
    increment(key: string, windowMs: number): Promise<CounterHit> {
      const at = now()
      const counter = live(key, at)

      if (!counter) {
        counters.set(key, { count: 1, expiresAt: at + windowMs })
        return Promise.resolve({ count: 1, resetInMs: windowMs })
      }

      counter.count += 1
      return Promise.resolve({ count: counter.count, resetInMs: counter.expiresAt - at })
    },

    peek(key: string): Promise<number> {
      return Promise.resolve(live(key, now())?.count ?? 0)
    },
  }
}
