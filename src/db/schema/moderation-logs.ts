import { pgTable, text, timestamp, uuid, jsonb, doublePrecision, index } from 'drizzle-orm/pg-core'
import { MODERATION_ACTIONS, MODERATION_STATUSES } from '../../services/moderation-types.js'
import { diagrams } from './diagrams.js'

/** Append-only audit trail: one row per status-changing decision, human or AI. */
export const moderationLogs = pgTable(
  'moderation_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    diagramId: uuid('diagram_id')
      .notNull()
      .references(() => diagrams.id, { onDelete: 'cascade' }),
    performedBy: text('performed_by'),
    action: text('action', { enum: MODERATION_ACTIONS }).notNull(),
    previousStatus: text('previous_status', { enum: MODERATION_STATUSES }).notNull(),
    newStatus: text('new_status', { enum: MODERATION_STATUSES }).notNull(),
    reason: text('reason'),
    aiConfidence: doublePrecision('ai_confidence'),
    aiFlags: jsonb('ai_flags').$type<string[]>().notNull().default([]),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('moderation_logs_diagram_id_idx').on(table.diagramId),
    index('moderation_logs_action_idx').on(table.action),
    index('moderation_logs_created_at_idx').on(table.createdAt),
  ]
)

export type ModerationLogRow = typeof moderationLogs.$inferSelect
