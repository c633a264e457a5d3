import type { CounterStore } from '../cache/counter-store.js'
import type { RateLimitConfig, WindowLimit } from '../config/pipeline.js'
import type { Logger } from './logger.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RateLimitDecision = { allowed: true } | { allowed: false; retryAfterMs: number }

export interface RemainingQuota {
  minute: number
  day: number
}

export interface RateLimiter {
  /** Per-user content creation: the minute and the day window must both allow. */
  checkContentCreation(userId: string): Promise<RateLimitDecision>
  /** Per-IP gate for unauthenticated submitters. */
  checkIpLimit(ip: string): Promise<RateLimitDecision>
  /** Per-user gate on moderation submissions (edit-and-resubmit loops). */
  checkModerationSubmission(userId: string): Promise<RateLimitDecision>
  /** Remaining content-creation slots. Does not consume. */
  getRemainingQuota(userId: string): Promise<RemainingQuota>
}

type Scope = 'user' | 'ip'
type WindowName = 'minute' | 'day'

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

export function rateLimitKey(
  operation: string,
  scope: Scope,
  window: WindowName,
  identifier: string
): string {
  return `ratelimit:${operation}:${scope}:${window}:${identifier}`
}

const CONTENT_CREATE = 'content_create'
const MODERATION_SUBMIT = 'moderation_submit'

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the submission rate limiter over an injected counter store.
 *
 * A failing store does not block submitters: the check is allowed and a
 * warning is logged.
 */
export function createRateLimiter(
  store: CounterStore,
  config: RateLimitConfig,
  logger: Logger
): RateLimiter {
  async function hit(key: string, window: WindowLimit): Promise<RateLimitDecision> {
    try {
      const { count, resetInMs } = await store.increment(key, window.windowMs)
      if (count > window.limit) {
        return { allowed: false, retryAfterMs: Math.max(0, resetInMs) }
      }
      return { allowed: true }
    } catch (err: unknown) {
      logger.warn({ err, key }, 'Rate limit store unavailable, allowing request')
      return { allowed: true }
    }
  }

  async function remaining(key: string, window: WindowLimit): Promise<number> {
    try {
      const used = await store.peek(key)
      return Math.max(0, window.limit - used)
    } catch (err: unknown) {
      logger.warn({ err, key }, 'Rate limit store unavailable, reporting full quota')
      return window.limit
    }
  }

  return {
    async checkContentCreation(userId: string): Promise<RateLimitDecision> {
      const minute = await hit(
        rateLimitKey(CONTENT_CREATE, 'user', 'minute', userId),
        config.contentPerMinute
      )
      if (!minute.allowed) return minute

      return hit(rateLimitKey(CONTENT_CREATE, 'user', 'day', userId), config.contentPerDay)
    },

    checkIpLimit(ip: string): Promise<RateLimitDecision> {
      return hit(rateLimitKey(CONTENT_CREATE, 'ip', 'minute', ip), config.ipPerMinute)
    },

    checkModerationSubmission(userId: string): Promise<RateLimitDecision> {
      return hit(
        rateLimitKey(MODERATION_SUBMIT, 'user', 'minute', userId),
        config.moderationPerMinute
      )
    },

    async getRemainingQuota(userId: string): Promise<RemainingQuota> {
      const [minute, day] = await Promise.all([
        remaining(rateLimitKey(CONTENT_CREATE, 'user', 'minute', userId), config.contentPerMinute),
        remaining(rateLimitKey(CONTENT_CREATE, 'user', 'day', userId), config.contentPerDay),
      ])
      return { minute, day }
    },
  }
}
