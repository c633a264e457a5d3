import type { FastifyPluginCallback, FastifyReply } from 'fastify'
import {
  badGateway,
  badRequest,
  serviceUnavailable,
} from '../lib/api-errors.js'
import {
  contentCheckSchema,
  diagramParamsSchema,
  submitModerationSchema,
  userParamsSchema,
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
    retryAfterMs: { type: 'number' as const },
  },
}

const submitterBodyJsonSchema = {
  type: 'object' as const,
  properties: {
    userId: { type: 'string' as const, minLength: 1, maxLength: 255 },
    ip: {
      type: 'string' as const,
      maxLength: 45,
      description: 'End-user address for anonymous limits; defaults to the caller address',
    },
  },
}

const submissionJsonSchema = {
  type: 'object' as const,
  properties: {
    diagramId: { type: 'string' as const },
    status: { type: 'string' as const },
    reason: { type: 'string' as const },
  },
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const RATE_LIMITED_MESSAGE = 'Too many submissions, try again later'

function sendRateLimited(reply: FastifyReply, retryAfterMs: number) {
  return reply
    .status(429)
    .header('Retry-After', String(Math.max(1, Math.ceil(retryAfterMs / 1000))))
    .send({ error: RATE_LIMITED_MESSAGE, retryAfterMs })
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function moderationRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { moderationService, requireServiceToken } = app

    // -------------------------------------------------------------------
    // POST /api/moderation/diagrams/:id/submissions
    // -------------------------------------------------------------------

    app.post(
      '/api/moderation/diagrams/:id/submissions',
      {
        preHandler: [requireServiceToken],
        schema: {
          tags: ['Moderation'],
          summary: 'Run the moderation pipeline on a pending diagram',
          security: [{ bearerAuth: [] }],
          params: {
            type: 'object',
            required: ['id'],
            properties: { id: { type: 'string' } },
          },
          body: submitterBodyJsonSchema,
          response: {
            200: submissionJsonSchema,
            400: errorJsonSchema,
            404: errorJsonSchema,
            409: errorJsonSchema,
            429: errorJsonSchema,
            502: errorJsonSchema,
            503: errorJsonSchema,
          },
        },
      },
      async (request, reply) => {
        const params = diagramParamsSchema.safeParse(request.params)
        if (!params.success) {
          throw badRequest('Invalid diagram id')
        }
        const body = submitModerationSchema.safeParse(request.body ?? {})
        if (!body.success) {
          throw badRequest('Invalid request body')
        }

        const outcome = await moderationService.submitForModeration({
          diagramId: params.data.id,
          userId: body.data.userId,
          ip: body.data.ip ?? request.ip,
        })

        switch (outcome.kind) {
          case 'rate_limited':
            return sendRateLimited(reply, outcome.retryAfterMs)
          case 'failed':
            throw outcome.error.kind === 'disabled'
              ? serviceUnavailable('Moderation is temporarily unavailable')
              : badGateway('Moderation provider failed, try again later')
          case 'moderated':
            return reply.status(200).send({
              diagramId: outcome.diagramId,
              status: outcome.status,
              ...(outcome.publicReason !== null ? { reason: outcome.publicReason } : {}),
            })
        }
      }
    )

    // -------------------------------------------------------------------
    // POST /api/moderation/content-checks
    // -------------------------------------------------------------------

    app.post(
      '/api/moderation/content-checks',
      {
        preHandler: [requireServiceToken],
        schema: {
          tags: ['Moderation'],
          summary: 'Consume one content-creation slot for a user or IP',
          security: [{ bearerAuth: [] }],
          body: submitterBodyJsonSchema,
          response: {
            400: errorJsonSchema,
            429: errorJsonSchema,
          },
        },
      },
      async (request, reply) => {
        const body = contentCheckSchema.safeParse(request.body ?? {})
        if (!body.success) {
          throw badRequest('Invalid request body')
        }

        const decision = await moderationService.checkContentCreation({
          userId: body.data.userId,
          ip: body.data.ip ?? request.ip,
        })
        if (!decision.allowed) {
          return sendRateLimited(reply, decision.retryAfterMs)
        }
        return reply.status(204).send()
      }
    )

    // -------------------------------------------------------------------
    // GET /api/moderation/quota/:userId
    // -------------------------------------------------------------------

    app.get(
      '/api/moderation/quota/:userId',
      {
        preHandler: [requireServiceToken],
        schema: {
          tags: ['Moderation'],
          summary: 'Remaining content-creation slots for a user',
          security: [{ bearerAuth: [] }],
          params: {
            type: 'object',
            required: ['userId'],
            properties: { userId: { type: 'string' } },
          },
          response: {
            200: {
              type: 'object',
              properties: {
                minute: { type: 'number' },
                day: { type: 'number' },
              },
            },
            400: errorJsonSchema,
          },
        },
      },
      async (request, reply) => {
        const params = userParamsSchema.safeParse(request.params)
        if (!params.success) {
          throw badRequest('Invalid user id')
        }

        const quota = await moderationService.getRemainingQuota(params.data.userId)
        return reply.status(200).send(quota)
      }
    )

    done()
  }
}
