import type { Env } from './env.js'

// ---------------------------------------------------------------------------
// Per-component configuration
// ---------------------------------------------------------------------------

export interface SanitizerConfig {
  enabled: boolean
  stripUrls: boolean
}

export type InjectionAction = 'flag_for_review' | 'reject' | 'log_only'

export interface InjectionDetectorConfig {
  enabled: boolean
  action: InjectionAction
}

export interface ModeratorConfig {
  enabled: boolean
  /** Advisory: the moderator reports it, callers decide what "borderline" means. */
  autoApproveThreshold: number
}

export interface WindowLimit {
  limit: number
  windowMs: number
}

export interface RateLimitConfig {
  contentPerMinute: WindowLimit
  contentPerDay: WindowLimit
  ipPerMinute: WindowLimit
  moderationPerMinute: WindowLimit
}

export interface AiClientConfig {
  baseUrl: string
  apiKey: string | undefined
  model: string
  timeoutMs: number
}

export interface PipelineConfig {
  sanitizer: SanitizerConfig
  injectionDetector: InjectionDetectorConfig
  moderator: ModeratorConfig
  rateLimits: RateLimitConfig
  ai: AiClientConfig
}

const MINUTE_MS = 60_000
const DAY_MS = 86_400_000

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  sanitizer: { enabled: true, stripUrls: true },
  injectionDetector: { enabled: true, action: 'flag_for_review' },
  moderator: { enabled: true, autoApproveThreshold: 0.8 },
  rateLimits: {
    contentPerMinute: { limit: 10, windowMs: MINUTE_MS },
    contentPerDay: { limit: 100, windowMs: DAY_MS },
    ipPerMinute: { limit: 5, windowMs: MINUTE_MS },
    moderationPerMinute: { limit: 5, windowMs: MINUTE_MS },
  },
  ai: {
    baseUrl: 'https://api.openai.com/v1',
    apiKey: undefined,
    model: 'gpt-4o-mini',
    timeoutMs: 30_000,
  },
}

export function buildPipelineConfig(env: Env): PipelineConfig {
  return {
    sanitizer: {
      enabled: env.SANITIZER_ENABLED,
      stripUrls: env.SANITIZER_STRIP_URLS,
    },
    injectionDetector: {
      enabled: env.INJECTION_DETECTION_ENABLED,
      action: env.INJECTION_DETECTION_ACTION,
    },
    moderator: {
      enabled: env.MODERATION_ENABLED,
      autoApproveThreshold: env.MODERATION_AUTO_APPROVE_THRESHOLD,
    },
    rateLimits: {
      contentPerMinute: { limit: env.RATE_LIMIT_CONTENT_PER_MINUTE, windowMs: MINUTE_MS },
      contentPerDay: { limit: env.RATE_LIMIT_CONTENT_PER_DAY, windowMs: DAY_MS },
      ipPerMinute: { limit: env.RATE_LIMIT_IP_PER_MINUTE, windowMs: MINUTE_MS },
      moderationPerMinute: { limit: env.RATE_LIMIT_MODERATION_PER_MINUTE, windowMs: MINUTE_MS },
    },
    ai: {
      baseUrl: env.AI_API_URL,
      apiKey: env.AI_API_KEY,
      model: env.AI_MODEL,
      timeoutMs: env.AI_TIMEOUT_MS,
    },
  }
}
