import Fastify from 'fastify'
import helmet from '@fastify/helmet'
import cors from '@fastify/cors'
import rateLimit from '@fastify/rate-limit'
import swagger from '@fastify/swagger'
import scalarApiReference from '@scalar/fastify-api-reference'
import * as Sentry from '@sentry/node'
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify'
import type { Env } from './config/env.js'
import { buildPipelineConfig } from './config/pipeline.js'
import { createDb } from './db/index.js'
import type { Database } from './db/index.js'
import { createCache } from './cache/index.js'
import type { Cache } from './cache/index.js'
import { createValkeyCounterStore } from './cache/counter-store.js'
import { createRequireServiceToken } from './auth/require-service-token.js'
import { createSanitizer } from './lib/sanitize.js'
import { createInjectionDetector } from './lib/injection-detector.js'
import { createRateLimiter } from './lib/rate-limiter.js'
import { createChatClient } from './services/ai-client.js'
import { createModerator } from './services/moderator.js'
import { createModerationService } from './services/moderation.js'
import type { ModerationService } from './services/moderation.js'
import healthRoutes from './routes/health.js'
import { moderationRoutes } from './routes/moderation.js'
import { adminModerationRoutes } from './routes/admin-moderation.js'

// Extend Fastify types with decorated properties
declare module 'fastify' {
  interface FastifyInstance {
    db: Database
    cache: Cache
    env: Env
    moderationService: ModerationService
    requireServiceToken: (request: FastifyRequest, reply: FastifyReply) => Promise<void>
  }
}

function isDevelopment(env: Env): boolean {
  return env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'trace'
}

export async function buildApp(env: Env) {
  // Initialize GlitchTip/Sentry if DSN provided
  if (env.GLITCHTIP_DSN) {
    Sentry.init({
      dsn: env.GLITCHTIP_DSN,
      environment: isDevelopment(env) ? 'development' : 'production',
    })
  }

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(isDevelopment(env) ? { transport: { target: 'pino-pretty' } } : {}),
    },
    trustProxy: true,
  })

  // Database
  const { db, client: dbClient } = createDb(env.DATABASE_URL)
  app.decorate('db', db)
  app.decorate('env', env)

  // Cache
  const cache = createCache(env.VALKEY_URL, app.log)
  app.decorate('cache', cache)

  // Moderation pipeline
  const pipeline = buildPipelineConfig(env)
  const pipelineLog = app.log.child({ component: 'moderation' })
  const chatClient = createChatClient(pipeline.ai, pipelineLog)
  const moderator = createModerator(chatClient, pipeline.moderator, pipelineLog)
  const moderationService = createModerationService({
    db,
    sanitizer: createSanitizer(pipeline.sanitizer, pipelineLog),
    injectionDetector: createInjectionDetector(pipeline.injectionDetector, pipelineLog),
    rateLimiter: createRateLimiter(createValkeyCounterStore(cache), pipeline.rateLimits, pipelineLog),
    moderator,
    logger: pipelineLog,
  })
  app.decorate('moderationService', moderationService)

  if (moderator.isEnabled() && !chatClient.isEnabled()) {
    app.log.warn('MODERATION_ENABLED is set without AI_API_KEY; submissions will stay pending')
  }

  // Service-to-service auth
  app.decorate('requireServiceToken', createRequireServiceToken(env.MODERATION_API_TOKEN, app.log))

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'", 'https://cdn.jsdelivr.net'],
        styleSrc: ["'self'", "'unsafe-inline'", 'https://cdn.jsdelivr.net'],
        imgSrc: ["'self'", 'data:', 'https:'],
        connectSrc: ["'self'"],
        fontSrc: ["'self'", 'https://cdn.jsdelivr.net'],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    },
  })

  // CORS
  await app.register(cors, {
    origin: env.CORS_ORIGINS.split(',').map((o) => o.trim()),
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  })

  // Whole-API request limit, independent of the submission limits
  await app.register(rateLimit, {
    max: env.RATE_LIMIT_API,
    timeWindow: '1 minute',
  })

  // OpenAPI documentation (register before routes so schemas are collected)
  await app.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'Diagram Safety API',
        description:
          'Content-safety pipeline for user-submitted diagrams: sanitization, prompt-injection detection, rate limiting and LLM moderation.',
        version: '0.1.0',
      },
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            description: 'Shared service token (MODERATION_API_TOKEN)',
          },
        },
      },
    },
  })

  await app.register(scalarApiReference, {
    routePrefix: '/docs',
    configuration: {
      theme: 'kepler',
    },
  })

  // Routes
  await app.register(healthRoutes)
  await app.register(moderationRoutes())
  await app.register(adminModerationRoutes())

  // OpenAPI document endpoint (after routes so all schemas are registered)
  app.get('/api/openapi.json', { schema: { hide: true } }, async (_request, reply) => {
    return reply.header('Content-Type', 'application/json').send(app.swagger())
  })

  app.addHook('onClose', async () => {
    app.log.info('Shutting down...')
    await cache.quit()
    await dbClient.end()
    app.log.info('Connections closed')
  })

  // GlitchTip error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500

    if (statusCode < 500) {
      request.log.info({ err: error, statusCode }, 'Request rejected')
      return reply.status(statusCode).send({
        error: error.message,
        statusCode,
      })
    }

    if (env.GLITCHTIP_DSN) {
      Sentry.captureException(error)
    }
    app.log.error({ err: error, requestId: request.id }, 'Unhandled error')
    return reply.status(statusCode).send({
      error: statusCode === 500 ? 'Internal Server Error' : error.message,
      message: isDevelopment(env) ? error.message : 'An unexpected error occurred',
      statusCode,
    })
  })

  return app
}
