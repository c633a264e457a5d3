import { z } from 'zod/v4'

const portSchema = z
  .string()
  .default('3000')
  .transform((val) => Number(val))
  .pipe(z.number().int().min(1).max(65535))

const positiveIntFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive())

const booleanFromString = (defaultVal: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultVal)
    .transform((v) => v === 'true')

const ratioFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().min(0).max(1))

export const envSchema = z.object({
  // Required
  DATABASE_URL: z.url(),
  VALKEY_URL: z.url(),
  MODERATION_API_TOKEN: z.string().min(32),

  // Server
  HOST: z.string().default('0.0.0.0'),
  PORT: portSchema,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // CORS
  CORS_ORIGINS: z.string().default('http://localhost:3001'),

  // Whole-API request limit (requests per minute per IP)
  RATE_LIMIT_API: positiveIntFromString('300'),

  // Monitoring (GlitchTip - Sentry SDK compatible)
  GLITCHTIP_DSN: z.string().optional(),

  // LLM provider (OpenAI-compatible chat completions)
  AI_API_URL: z.url().default('https://api.openai.com/v1'),
  AI_API_KEY: z.string().min(1).optional(),
  AI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  AI_TIMEOUT_MS: positiveIntFromString('30000'),

  // Moderation pipeline
  MODERATION_ENABLED: booleanFromString('true'),
  MODERATION_AUTO_APPROVE_THRESHOLD: ratioFromString('0.8'),
  INJECTION_DETECTION_ENABLED: booleanFromString('true'),
  INJECTION_DETECTION_ACTION: z
    .enum(['flag_for_review', 'reject', 'log_only'])
    .default('flag_for_review'),
  SANITIZER_ENABLED: booleanFromString('true'),
  SANITIZER_STRIP_URLS: booleanFromString('true'),

  // Submission rate limits
  RATE_LIMIT_CONTENT_PER_MINUTE: positiveIntFromString('10'),
  RATE_LIMIT_CONTENT_PER_DAY: positiveIntFromString('100'),
  RATE_LIMIT_IP_PER_MINUTE: positiveIntFromString('5'),
  RATE_LIMIT_MODERATION_PER_MINUTE: positiveIntFromString('5'),
})

export type Env = z.infer<typeof envSchema>

export function parseEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const formatted = z.prettifyError(result.error)
    throw new Error(`Invalid environment configuration:\n${formatted}`)
  }
  return result.data
}
