// ---------------------------------------------------------------------------
// Closed enumerations
// ---------------------------------------------------------------------------

export const DIAGRAM_FORMATS = ['mermaid', 'plantuml'] as const
export type DiagramFormat = (typeof DIAGRAM_FORMATS)[number]

export const MODERATION_DECISIONS = ['approve', 'reject', 'manual_review'] as const
export type ModerationDecision = (typeof MODERATION_DECISIONS)[number]

export const MODERATION_STATUSES = ['pending', 'approved', 'rejected', 'manual_review'] as const
export type ModerationStatus = (typeof MODERATION_STATUSES)[number]

export const AI_ACTIONS = ['ai_approve', 'ai_reject', 'ai_manual_review'] as const
export const ADMIN_ACTIONS = ['admin_approve', 'admin_reject'] as const
export const MODERATION_ACTIONS = [...AI_ACTIONS, ...ADMIN_ACTIONS] as const
export type AiAction = (typeof AI_ACTIONS)[number]
export type AdminAction = (typeof ADMIN_ACTIONS)[number]
export type ModerationAction = (typeof MODERATION_ACTIONS)[number]

// ---------------------------------------------------------------------------
// Pipeline values
// ---------------------------------------------------------------------------

/** Read-only view of the content handed to the pipeline. */
export interface CandidateContent {
  id?: string
  title: string | null
  summary: string | null
  source: string | null
  format: DiagramFormat
}

export interface ModerationResult {
  decision: ModerationDecision
  /** Always within [0, 1]. */
  confidence: number
  reason: string
  flags: string[]
}

export type ModerationError =
  | { kind: 'provider_error'; message: string }
  | { kind: 'parse_error'; message: string }
  | { kind: 'disabled'; message: string }

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export type ModerationOutcome = Result<ModerationResult, ModerationError>

export type ValidationVerdict = { status: 'ok' } | { status: 'suspicious'; reasons: string[] }

/** Flag added when the moderator's own output looks manipulated. */
export const SUSPICIOUS_OUTPUT_FLAG = 'suspicious_output'
