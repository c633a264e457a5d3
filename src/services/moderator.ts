import { z } from 'zod/v4'
import type { ModeratorConfig } from '../config/pipeline.js'
import type { Logger } from '../lib/logger.js'
import {
  MODERATION_FLAGS_MAX_COUNT,
  MODERATION_FLAG_MAX_LENGTH,
  MODERATION_REASON_MAX_LENGTH,
} from '../validation/moderation.js'
import type { ChatClient } from './ai-client.js'
import { buildModerationPrompt } from './moderation-prompt.js'
import {
  MODERATION_DECISIONS,
  SUSPICIOUS_OUTPUT_FLAG,
  type CandidateContent,
  type ModerationError,
  type ModerationOutcome,
  type ModerationResult,
  type Result,
  type ValidationVerdict,
} from './moderation-types.js'

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

const DEFAULT_CONFIDENCE = 0.5

const OPENING_FENCE_REGEX = /^\s*```(?:json)?\s*/i
const CLOSING_FENCE_REGEX = /\s*```\s*$/

const moderationResponseSchema = z.object({
  decision: z.enum(MODERATION_DECISIONS),
  confidence: z.unknown().optional(),
  reason: z.unknown().optional(),
  flags: z.unknown().optional(),
})

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value))
}

/**
 * Coerce a model-supplied confidence into [0, 1].
 * Numbers are clamped, numeric strings parsed then clamped, anything else is 0.5.
 */
export function parseConfidence(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? DEFAULT_CONFIDENCE : clamp(value)
  }
  if (typeof value === 'string') {
    const parsed = Number.parseFloat(value)
    return Number.isNaN(parsed) ? DEFAULT_CONFIDENCE : clamp(parsed)
  }
  return DEFAULT_CONFIDENCE
}

/** Cut `text` to at most `maxLength` UTF-16 units without splitting a code point. */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  let out = ''
  for (const char of text) {
    if (out.length + char.length > maxLength) break
    out += char
  }
  return out
}

function parseFlags(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value
    .filter((flag): flag is string => typeof flag === 'string')
    .slice(0, MODERATION_FLAGS_MAX_COUNT)
    .map((flag) => truncateText(flag, MODERATION_FLAG_MAX_LENGTH))
}

/**
 * Fit model-supplied text into what the moderation log stores. The reason and
 * flags come from the model and have no length limit of their own.
 */
export function boundModerationResult(result: ModerationResult): ModerationResult {
  return {
    ...result,
    reason: truncateText(result.reason, MODERATION_REASON_MAX_LENGTH),
    flags: result.flags
      .slice(0, MODERATION_FLAGS_MAX_COUNT)
      .map((flag) => truncateText(flag, MODERATION_FLAG_MAX_LENGTH)),
  }
}

/**
 * Parse the model's raw reply. Markdown code fences are stripped first.
 *
 * The raw reply goes to the log on failure; the returned error never carries it.
 */
export function parseModerationResponse(
  raw: string,
  logger?: Logger
): Result<ModerationResult, ModerationError> {
  const cleaned = raw.replace(OPENING_FENCE_REGEX, '').replace(CLOSING_FENCE_REGEX, '').trim()

  let decoded: unknown
  try {
    decoded = JSON.parse(cleaned)
  } catch (err: unknown) {
    logger?.warn(
      { response: raw, error: err instanceof Error ? err.message : String(err) },
      'Failed to parse moderation response'
    )
    return {
      ok: false,
      error: { kind: 'parse_error', message: 'Failed to parse moderation response' },
    }
  }

  const parsed = moderationResponseSchema.safeParse(decoded)
  if (!parsed.success) {
    logger?.warn({ response: raw }, 'Moderation response has an unexpected shape')
    return {
      ok: false,
      error: {
        kind: 'parse_error',
        message: 'Invalid moderation response format - unexpected decision value',
      },
    }
  }

  const { decision, confidence, reason, flags } = parsed.data
  return {
    ok: true,
    value: {
      decision,
      confidence: parseConfidence(confidence),
      reason: typeof reason === 'string' ? truncateText(reason, MODERATION_REASON_MAX_LENGTH) : '',
      flags: parseFlags(flags),
    },
  }
}

// ---------------------------------------------------------------------------
// Output validation
// ---------------------------------------------------------------------------

const MIN_EXPLAINED_REASON_LENGTH = 10
const OVERCONFIDENT_THRESHOLD = 0.99
const PARROT_MIN_LENGTH = 20

const INSTRUCTION_FOLLOWING_PATTERNS: readonly RegExp[] = [
  /as\s+(you\s+)?instructed/i,
  /following\s+your\s+instructions/i,
  /as\s+requested/i,
  /per\s+your\s+(instructions|request)/i,
]

const OVERRIDE_LANGUAGE_PATTERNS: readonly RegExp[] = [
  /ignoring\s+(the\s+)?(previous|above|system)/i,
  /overrid(e|ing)\s+(the\s+)?instructions/i,
  /disregard(ed|ing)\s+(the\s+)?/i,
]

function charLength(text: string): number {
  return Array.from(text).length
}

function parrots(reason: string, content: CandidateContent): boolean {
  return [content.title, content.summary].some(
    (text) => text !== null && charLength(text) > PARROT_MIN_LENGTH && reason.includes(text)
  )
}

/**
 * Look for signs that the moderating model itself was steered by the content.
 * Each check that fires contributes one reason.
 */
export function validateModerationResult(
  result: ModerationResult,
  content: CandidateContent
): ValidationVerdict {
  const reasons: string[] = []

  if (
    result.decision === 'approve' &&
    result.confidence >= OVERCONFIDENT_THRESHOLD &&
    charLength(result.reason) < MIN_EXPLAINED_REASON_LENGTH
  ) {
    reasons.push('suspiciously certain approval with minimal explanation')
  }

  if (parrots(result.reason, content)) {
    reasons.push('reason appears to parrot user input')
  }

  if (INSTRUCTION_FOLLOWING_PATTERNS.some((pattern) => pattern.test(result.reason))) {
    reasons.push('reason contains instruction-following language')
  }

  if (OVERRIDE_LANGUAGE_PATTERNS.some((pattern) => pattern.test(result.reason))) {
    reasons.push('reason mentions ignoring/overriding instructions')
  }

  return reasons.length === 0 ? { status: 'ok' } : { status: 'suspicious', reasons }
}

// ---------------------------------------------------------------------------
// Moderator
// ---------------------------------------------------------------------------

export const MODERATION_DISABLED_RESULT: ModerationResult = {
  decision: 'approve',
  confidence: 1,
  reason: 'Moderation disabled',
  flags: [],
}

export interface Moderator {
  /**
   * Run the LLM policy check on one piece of content.
   *
   * Never throws for provider or parse failures; those come back as typed
   * errors. A result whose output looks manipulated is returned as
   * `manual_review` with the `suspicious_output` flag.
   */
  moderate(content: CandidateContent): Promise<ModerationOutcome>
  /** Advisory threshold for callers separating confident approvals from borderline ones. */
  autoApproveThreshold(): number
  isEnabled(): boolean
}

export function createModerator(
  chatClient: ChatClient,
  config: ModeratorConfig,
  logger: Logger
): Moderator {
  async function moderate(content: CandidateContent): Promise<ModerationOutcome> {
    if (!config.enabled) {
      return { ok: true, value: { ...MODERATION_DISABLED_RESULT, flags: [] } }
    }

    if (!chatClient.isEnabled()) {
      logger.error({ diagramId: content.id }, 'Content moderation requested without an AI provider')
      return {
        ok: false,
        error: { kind: 'disabled', message: 'No AI provider is configured for moderation' },
      }
    }

    const prompt = buildModerationPrompt(content)

    let response: string
    try {
      response = await chatClient.complete([{ role: 'user', content: prompt }])
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      logger.error({ error: message, diagramId: content.id }, 'Content moderation failed')
      return {
        ok: false,
        error: { kind: 'provider_error', message: `Moderation request failed: ${message}` },
      }
    }

    const parsed = parseModerationResponse(response, logger)
    if (!parsed.ok) return parsed

    const verdict = validateModerationResult(parsed.value, content)
    if (verdict.status === 'ok') return parsed

    logger.warn(
      { diagramId: content.id, reasons: verdict.reasons, decision: parsed.value.decision },
      'Suspicious moderation result detected'
    )

    const flags = parsed.value.flags.includes(SUSPICIOUS_OUTPUT_FLAG)
      ? parsed.value.flags
      : [...parsed.value.flags.slice(0, MODERATION_FLAGS_MAX_COUNT - 1), SUSPICIOUS_OUTPUT_FLAG]

    return { ok: true, value: { ...parsed.value, decision: 'manual_review', flags } }
  }

  return {
    moderate,
    autoApproveThreshold: () => config.autoApproveThreshold,
    isEnabled: () => config.enabled,
  }
}
