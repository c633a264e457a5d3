import type { FastifyPluginCallback } from 'fastify'
import type { DiagramRow } from '../db/schema/diagrams.js'
import type { ModerationLogRow } from '../db/schema/moderation-logs.js'
import { badRequest } from '../lib/api-errors.js'
import {
  adminModerationActionSchema,
  diagramParamsSchema,
  reviewQueueQuerySchema,
} from '../validation/moderation.js'

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const errorJsonSchema = {
  type: 'object' as const,
  properties: {
    error: { type: 'string' as const },
    message: { type: 'string' as const },
    statusCode: { type: 'number' as const },
  },
}

const diagramParamsJsonSchema = {
  type: 'object' as const,
  required: ['id'],
  properties: { id: { type: 'string' as const } },
}

const queueItemJsonSchema = {
  type: 'object' as const,
  properties: {
    id: { type: 'string' as const },
    title: { type: 'string' as const },
    summary: { type: ['string', 'null'] as const },
    format: { type: 'string' as const },
    moderationStatus: { type: 'string' as const },
    moderationReason: { type: ['string', 'null'] as const },
    createdAt: { type: 'string' as const, format: 'date-time' as const },
  },
}

const logEntryJsonSchema = {
  type: 'object' as const,
  properties: {
    id: { type: 'string' as const },
    diagramId: { type: 'string' as const },
    action: { type: 'string' as const },
    previousStatus: { type: 'string' as const },
    newStatus: { type: 'string' as const },
    reason: { type: ['string', 'null'] as const },
    performedBy: { type: ['string', 'null'] as const },
    aiConfidence: { type: ['number', 'null'] as const },
    aiFlags: { type: 'array' as const, items: { type: 'string' as const } },
    createdAt: { type: 'string' as const, format: 'date-time' as const },
  },
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function serializeQueueItem(row: DiagramRow) {
  return {
    id: row.id,
    title: row.title,
    summary: row.summary ?? null,
    format: row.format,
    moderationStatus: row.moderationStatus,
    moderationReason: row.moderationReason ?? null,
    createdAt: row.createdAt.toISOString(),
  }
}

function serializeLogEntry(row: ModerationLogRow) {
  return {
    id: row.id,
    diagramId: row.diagramId,
    action: row.action,
    previousStatus: row.previousStatus,
    newStatus: row.newStatus,
    reason: row.reason ?? null,
    performedBy: row.performedBy ?? null,
    aiConfidence: row.aiConfidence ?? null,
    aiFlags: row.aiFlags,
    createdAt: row.createdAt.toISOString(),
  }
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function adminModerationRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { moderationService, requireServiceToken } = app

    // -------------------------------------------------------------------
    // GET /api/admin/moderation/queue
    // -------------------------------------------------------------------

    app.get(
      '/api/admin/moderation/queue',
      {
        preHandler: [requireServiceToken],
        schema: {
          tags: ['Admin'],
          summary: 'Diagrams awaiting human review, newest first',
          security: [{ bearerAuth: [] }],
          querystring: {
            type: 'object',
            properties: { limit: { type: 'string' } },
          },
          response: {
            200: {
              type: 'object',
              properties: { items: { type: 'array', items: queueItemJsonSchema } },
            },
            400: errorJsonSchema,
          },
        },
      },
      async (request, reply) => {
        const parsed = reviewQueueQuerySchema.safeParse(request.query)
        if (!parsed.success) {
          throw badRequest('Invalid query parameters')
        }

        const rows = await moderationService.listPendingReview(parsed.data.limit)
        return reply.status(200).send({ items: rows.map(serializeQueueItem) })
      }
    )

    // -------------------------------------------------------------------
    // GET /api/admin/moderation/stats
    // -------------------------------------------------------------------

    app.get(
      '/api/admin/moderation/stats',
      {
        preHandler: [requireServiceToken],
        schema: {
          tags: ['Admin'],
          summary: 'Diagram count per moderation status',
          security: [{ bearerAuth: [] }],
          response: {
            200: {
              type: 'object',
              properties: {
                pending: { type: 'number' },
                approved: { type: 'number' },
                rejected: { type: 'number' },
                manual_review: { type: 'number' },
              },
            },
          },
        },
      },
      async (_request, reply) => {
        const stats = await moderationService.getModerationStats()
        return reply.status(200).send(stats)
      }
    )

    // -------------------------------------------------------------------
    // GET /api/admin/moderation/diagrams/:id/logs
    // -------------------------------------------------------------------

    app.get(
      '/api/admin/moderation/diagrams/:id/logs',
      {
        preHandler: [requireServiceToken],
        schema: {
          tags: ['Admin'],
          summary: 'Moderation history of a diagram, newest first',
          security: [{ bearerAuth: [] }],
          params: diagramParamsJsonSchema,
          response: {
            200: {
              type: 'object',
              properties: { logs: { type: 'array', items: logEntryJsonSchema } },
            },
            400: errorJsonSchema,
          },
        },
      },
      async (request, reply) => {
        const params = diagramParamsSchema.safeParse(request.params)
        if (!params.success) {
          throw badRequest('Invalid diagram id')
        }

        const logs = await moderationService.listModerationLogs(params.data.id)
        return reply.status(200).send({ logs: logs.map(serializeLogEntry) })
      }
    )

    // -------------------------------------------------------------------
    // PUT /api/admin/moderation/diagrams/:id
    // -------------------------------------------------------------------

    app.put(
      '/api/admin/moderation/diagrams/:id',
      {
        preHandler: [requireServiceToken],
        schema: {
          tags: ['Admin'],
          summary: 'Approve or reject a diagram by hand',
          security: [{ bearerAuth: [] }],
          params: diagramParamsJsonSchema,
          body: {
            type: 'object',
            required: ['action', 'performedBy'],
            properties: {
              action: { type: 'string', enum: ['approve', 'reject'] },
              performedBy: { type: 'string', minLength: 1 },
              reason: { type: 'string' },
            },
          },
          response: {
            200: {
              type: 'object',
              properties: {
                diagramId: { type: 'string' },
                previousStatus: { type: 'string' },
                status: { type: 'string' },
              },
            },
            400: errorJsonSchema,
            404: errorJsonSchema,
            409: errorJsonSchema,
          },
        },
      },
      async (request, reply) => {
        const params = diagramParamsSchema.safeParse(request.params)
        if (!params.success) {
          throw badRequest('Invalid diagram id')
        }
        const body = adminModerationActionSchema.safeParse(request.body)
        if (!body.success) {
          throw badRequest(body.error.issues[0]?.message ?? 'Invalid request body')
        }

        const { action, performedBy, reason } = body.data
        const decision =
          action === 'approve'
            ? await moderationService.adminApprove(params.data.id, performedBy, reason)
            : await moderationService.adminReject(params.data.id, performedBy, reason ?? '')

        return reply.status(200).send(decision)
      }
    )

    done()
  }
}
