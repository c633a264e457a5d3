import { z } from 'zod'
import {
  ADMIN_ACTIONS,
  AI_ACTIONS,
  MODERATION_ACTIONS,
  MODERATION_STATUSES,
} from '../services/moderation-types.js'

// ---------------------------------------------------------------------------
// Moderation log entries
// ---------------------------------------------------------------------------

export const MODERATION_REASON_MAX_LENGTH = 2000
export const MODERATION_FLAG_MAX_LENGTH = 64
export const MODERATION_FLAGS_MAX_COUNT = 20

const baseModerationLogSchema = z.object({
  diagramId: z.string().uuid(),
  action: z.enum(MODERATION_ACTIONS),
  previousStatus: z.enum(MODERATION_STATUSES),
  newStatus: z.enum(MODERATION_STATUSES),
  reason: z.string().max(MODERATION_REASON_MAX_LENGTH).nullable().default(null),
  performedBy: z.string().min(1).max(255).nullable().default(null),
  aiConfidence: z.number().min(0).max(1).nullable().default(null),
  aiFlags: z
    .array(z.string().max(MODERATION_FLAG_MAX_LENGTH))
    .max(MODERATION_FLAGS_MAX_COUNT)
    .default([]),
})

/** Entry for a decision made by the moderation model. */
export const aiModerationLogSchema = baseModerationLogSchema.extend({
  action: z.enum(AI_ACTIONS),
  aiConfidence: z.number().min(0).max(1),
})

/** Entry for a decision made by a human administrator. */
export const adminModerationLogSchema = baseModerationLogSchema.extend({
  action: z.enum(ADMIN_ACTIONS),
  performedBy: z.string().min(1).max(255),
  reason: z.string().trim().min(1).max(MODERATION_REASON_MAX_LENGTH),
})

export type ModerationLogEntry = z.output<typeof baseModerationLogSchema>

// ---------------------------------------------------------------------------
// Route schemas
// ---------------------------------------------------------------------------

export const diagramParamsSchema = z.object({
  id: z.string().uuid(),
})

export const userParamsSchema = z.object({
  userId: z.string().min(1).max(255),
})

/** Identifies the end user a calling service acts for. */
const submitterSchema = z.object({
  userId: z.string().min(1).max(255).optional(),
  ip: z.string().ip().optional(),
})

export const submitModerationSchema = submitterSchema

export const contentCheckSchema = submitterSchema

export const adminModerationActionSchema = z
  .object({
    action: z.enum(['approve', 'reject']),
    performedBy: z.string().min(1).max(255),
    reason: z.string().trim().min(1).max(MODERATION_REASON_MAX_LENGTH).optional(),
  })
  .refine((body) => body.action === 'approve' || body.reason !== undefined, {
    message: 'A reason is required to reject a diagram',
    path: ['reason'],
  })

export const reviewQueueQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
})
