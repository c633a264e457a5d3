import { and, count, desc, eq } from 'drizzle-orm'
import type { Database } from '../db/index.js'
import { diagrams } from '../db/schema/diagrams.js'
import type { DiagramRow } from '../db/schema/diagrams.js'
import { moderationLogs } from '../db/schema/moderation-logs.js'
import type { ModerationLogRow } from '../db/schema/moderation-logs.js'
import { badRequest, conflict, notFound } from '../lib/api-errors.js'
import type { InjectionDetector } from '../lib/injection-detector.js'
import type { Logger } from '../lib/logger.js'
import type { RateLimitDecision, RateLimiter, RemainingQuota } from '../lib/rate-limiter.js'
import type { Sanitizer } from '../lib/sanitize.js'
import {
  adminModerationLogSchema,
  aiModerationLogSchema,
  type ModerationLogEntry,
} from '../validation/moderation.js'
import { boundModerationResult, type Moderator } from './moderator.js'
import type {
  AdminAction,
  AiAction,
  CandidateContent,
  ModerationError,
  ModerationResult,
  ModerationStatus,
} from './moderation-types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const PROMPT_INJECTION_FLAG = 'prompt_injection'
export const MODERATION_ERROR_FLAG = 'moderation_error'

export const DEFAULT_ADMIN_APPROVE_REASON = 'Manually approved'
export const DEFAULT_REVIEW_QUEUE_LIMIT = 50

/** Reason shown to a submitter whose content was rejected by the injection policy. */
export const POLICY_REJECTION_REASON = 'Content violates the submission policy'

export interface SubmissionRequest {
  diagramId: string
  userId?: string | undefined
  ip: string
}

export interface ContentCheckRequest {
  userId?: string | undefined
  ip: string
}

export type SubmissionOutcome =
  | {
      kind: 'moderated'
      diagramId: string
      status: ModerationStatus
      /** Reason safe to show the submitter; set only for rejections. */
      publicReason: string | null
    }
  | { kind: 'rate_limited'; retryAfterMs: number }
  | { kind: 'failed'; error: ModerationError }

export interface AdminDecision {
  diagramId: string
  previousStatus: ModerationStatus
  status: ModerationStatus
}

export type ModerationStats = Record<ModerationStatus, number>

export interface ModerationService {
  submitForModeration(request: SubmissionRequest): Promise<SubmissionOutcome>
  adminApprove(diagramId: string, adminId: string, reason?: string): Promise<AdminDecision>
  adminReject(diagramId: string, adminId: string, reason: string): Promise<AdminDecision>
  checkContentCreation(request: ContentCheckRequest): Promise<RateLimitDecision>
  getRemainingQuota(userId: string): Promise<RemainingQuota>
  listPendingReview(limit?: number): Promise<DiagramRow[]>
  getModerationStats(): Promise<ModerationStats>
  listModerationLogs(diagramId: string): Promise<ModerationLogRow[]>
}

export interface ModerationServiceDeps {
  db: Database
  moderator: Moderator
  rateLimiter: RateLimiter
  sanitizer: Sanitizer
  injectionDetector: InjectionDetector
  logger: Logger
}

/** Logged in place of a model result the log schema refuses. */
const UNRECORDABLE_REASON = 'Moderation result could not be recorded'

// ---------------------------------------------------------------------------
// Decision mapping (pure)
// ---------------------------------------------------------------------------

/**
 * Map a moderation result onto the diagram status and log action.
 * Approvals below `autoApproveThreshold` go to a human.
 */
export function resolveAiTransition(
  result: ModerationResult,
  autoApproveThreshold: number
): { status: ModerationStatus; action: AiAction } {
  switch (result.decision) {
    case 'approve':
      return result.confidence >= autoApproveThreshold
        ? { status: 'approved', action: 'ai_approve' }
        : { status: 'manual_review', action: 'ai_manual_review' }
    case 'reject':
      return { status: 'rejected', action: 'ai_reject' }
    case 'manual_review':
      return { status: 'manual_review', action: 'ai_manual_review' }
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export function createModerationService(deps: ModerationServiceDeps): ModerationService {
  const { db, moderator, rateLimiter, sanitizer, injectionDetector, logger } = deps

  async function loadDiagram(diagramId: string): Promise<DiagramRow> {
    const rows = await db.select().from(diagrams).where(eq(diagrams.id, diagramId))
    const diagram = rows[0]
    if (!diagram) {
      throw notFound('Diagram not found')
    }
    return diagram
  }

  /**
   * Move the diagram and append its log entry atomically. The update is
   * conditional on the status we read, so a concurrent decision makes this
   * one fail with a conflict instead of overwriting it.
   */
  async function writeTransition(
    diagram: DiagramRow,
    entry: ModerationLogEntry,
    moderatedBy: string | null
  ): Promise<void> {
    const now = new Date()
    await db.transaction(async (tx) => {
      const updated = await tx
        .update(diagrams)
        .set({
          moderationStatus: entry.newStatus,
          moderationReason: entry.reason,
          moderatedAt: now,
          moderatedBy,
          updatedAt: now,
        })
        .where(and(eq(diagrams.id, diagram.id), eq(diagrams.moderationStatus, diagram.moderationStatus)))
        .returning({ id: diagrams.id })

      if (updated.length === 0) {
        throw conflict('Diagram moderation status changed concurrently')
      }

      await tx.insert(moderationLogs).values(entry)
    })
  }

  async function applyAiDecision(
    diagram: DiagramRow,
    result: ModerationResult,
    publicReason: string | null
  ): Promise<SubmissionOutcome> {
    const bounded = boundModerationResult(result)
    const transition = resolveAiTransition(bounded, moderator.autoApproveThreshold())

    let entry: ModerationLogEntry
    const parsed = aiModerationLogSchema.safeParse({
      diagramId: diagram.id,
      action: transition.action,
      previousStatus: diagram.moderationStatus,
      newStatus: transition.status,
      reason: bounded.reason,
      aiConfidence: bounded.confidence,
      aiFlags: bounded.flags,
    })
    if (parsed.success) {
      entry = parsed.data
    } else {
      logger.error({ diagramId: diagram.id, issues: parsed.error.issues }, UNRECORDABLE_REASON)
      entry = {
        diagramId: diagram.id,
        action: 'ai_manual_review',
        previousStatus: diagram.moderationStatus,
        newStatus: 'manual_review',
        reason: UNRECORDABLE_REASON,
        performedBy: null,
        aiConfidence: 0,
        aiFlags: [MODERATION_ERROR_FLAG],
      }
    }

    await writeTransition(diagram, entry, null)

    const status = entry.newStatus
    logger.info(
      {
        diagramId: diagram.id,
        action: entry.action,
        status,
        confidence: entry.aiConfidence,
        flags: entry.aiFlags,
      },
      'Content moderation completed'
    )

    return {
      kind: 'moderated',
      diagramId: diagram.id,
      status,
      publicReason: status === 'rejected' ? publicReason : null,
    }
  }

  async function submitForModeration(request: SubmissionRequest): Promise<SubmissionOutcome> {
    const diagram = await loadDiagram(request.diagramId)
    if (diagram.moderationStatus !== 'pending') {
      throw conflict(`Diagram is ${diagram.moderationStatus}, only pending diagrams can be moderated`)
    }

    const content: CandidateContent = {
      id: diagram.id,
      title: sanitizer.sanitizeField(diagram.title),
      summary: sanitizer.sanitizeField(diagram.summary),
      source: diagram.source,
      format: diagram.format,
    }

    const injection = injectionDetector.scanContent(content, diagram.id)

    const gate = request.userId
      ? await rateLimiter.checkModerationSubmission(request.userId)
      : await rateLimiter.checkIpLimit(request.ip)
    if (!gate.allowed) {
      logger.info({ diagramId: diagram.id, userId: request.userId }, 'Moderation submission rate limited')
      return { kind: 'rate_limited', retryAfterMs: gate.retryAfterMs }
    }

    if (injection.status === 'suspicious') {
      const reason = `Possible prompt injection: ${injection.reasons.join('; ')}`
      switch (injectionDetector.action()) {
        case 'flag_for_review':
          return applyAiDecision(
            diagram,
            { decision: 'manual_review', confidence: 0, reason, flags: [PROMPT_INJECTION_FLAG] },
            null
          )
        case 'reject':
          return applyAiDecision(
            diagram,
            { decision: 'reject', confidence: 0, reason, flags: [PROMPT_INJECTION_FLAG] },
            POLICY_REJECTION_REASON
          )
        case 'log_only':
          break
      }
    }

    const outcome = await moderator.moderate(content)
    if (outcome.ok) {
      const result = boundModerationResult(outcome.value)
      return applyAiDecision(diagram, result, result.reason)
    }

    if (outcome.error.kind === 'parse_error') {
      return applyAiDecision(
        diagram,
        {
          decision: 'manual_review',
          confidence: 0,
          reason: outcome.error.message,
          flags: [MODERATION_ERROR_FLAG],
        },
        null
      )
    }

    logger.warn(
      { diagramId: diagram.id, error: outcome.error.kind },
      'Moderation unavailable, diagram left pending'
    )
    return { kind: 'failed', error: outcome.error }
  }

  async function applyAdminDecision(
    diagramId: string,
    adminId: string,
    action: AdminAction,
    reason: string
  ): Promise<AdminDecision> {
    const diagram = await loadDiagram(diagramId)
    const status: ModerationStatus = action === 'admin_approve' ? 'approved' : 'rejected'
    if (diagram.moderationStatus === status) {
      throw conflict(`Diagram is already ${status}`)
    }

    const parsed = adminModerationLogSchema.safeParse({
      diagramId: diagram.id,
      action,
      previousStatus: diagram.moderationStatus,
      newStatus: status,
      reason,
      performedBy: adminId,
    })
    if (!parsed.success) {
      throw badRequest('A non-empty reason and administrator are required')
    }

    await writeTransition(diagram, parsed.data, adminId)

    logger.info(
      { diagramId: diagram.id, action, adminId, previousStatus: diagram.moderationStatus },
      'Diagram moderated by administrator'
    )

    return { diagramId: diagram.id, previousStatus: diagram.moderationStatus, status }
  }

  return {
    submitForModeration,

    adminApprove(diagramId, adminId, reason = DEFAULT_ADMIN_APPROVE_REASON) {
      return applyAdminDecision(diagramId, adminId, 'admin_approve', reason)
    },

    adminReject(diagramId, adminId, reason) {
      return applyAdminDecision(diagramId, adminId, 'admin_reject', reason)
    },

    checkContentCreation(request) {
      return request.userId
        ? rateLimiter.checkContentCreation(request.userId)
        : rateLimiter.checkIpLimit(request.ip)
    },

    getRemainingQuota(userId) {
      return rateLimiter.getRemainingQuota(userId)
    },

    async listPendingReview(limit = DEFAULT_REVIEW_QUEUE_LIMIT) {
      return db
        .select()
        .from(diagrams)
        .where(eq(diagrams.moderationStatus, 'manual_review'))
        .orderBy(desc(diagrams.createdAt))
        .limit(limit)
    },

    async getModerationStats() {
      const rows = await db
        .select({ status: diagrams.moderationStatus, total: count() })
        .from(diagrams)
        .groupBy(diagrams.moderationStatus)

      const stats: ModerationStats = { pending: 0, approved: 0, rejected: 0, manual_review: 0 }
      for (const row of rows) {
        stats[row.status] = row.total
      }
      return stats
    },

    async listModerationLogs(diagramId) {
      return db
        .select()
        .from(moderationLogs)
        .where(eq(moderationLogs.diagramId, diagramId))
        .orderBy(desc(moderationLogs.createdAt))
    },
  }
}
