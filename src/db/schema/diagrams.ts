import { pgTable, text, timestamp, uuid, index } from 'drizzle-orm/pg-core'
import { DIAGRAM_FORMATS, MODERATION_STATUSES } from '../../services/moderation-types.js'

/**
 * Moderation-relevant projection of a diagram. Title, summary and source are
 * owned by the content subsystem; this service only moves `moderationStatus`.
 */
export const diagrams = pgTable(
  'diagrams',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    title: text('title').notNull(),
    summary: text('summary'),
    source: text('source').notNull(),
    format: text('format', { enum: DIAGRAM_FORMATS }).notNull(),
    moderationStatus: text('moderation_status', { enum: MODERATION_STATUSES })
      .notNull()
      .default('pending'),
    moderationReason: text('moderation_reason'),
    moderatedAt: timestamp('moderated_at', { withTimezone: true }),
    moderatedBy: text('moderated_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('diagrams_moderation_status_idx').on(table.moderationStatus),
    index('diagrams_created_at_idx').on(table.createdAt),
  ]
)

export type DiagramRow = typeof diagrams.$inferSelect
