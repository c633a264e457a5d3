import { Redis } from 'ioredis'
import type { Logger } from '../lib/logger.js'

/**
 * Valkey connection shared by the rate-limit counters and readiness checks.
 * Connects lazily; the server connects before it starts listening.
 */
export function createCache(valkeyUrl: string, logger: Logger) {
  const cache = new Redis(valkeyUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      return Math.min(times * 200, 2000)
    },
    lazyConnect: true,
  })

  cache.on('error', (err: Error) => {
    logger.error({ err }, 'Valkey connection error')
  })

  cache.on('ready', () => {
    logger.info('Connected to Valkey')
  })

  return cache
}

export type Cache = ReturnType<typeof createCache>
