import { createHash, timingSafeEqual } from 'node:crypto'
import type { FastifyReply, FastifyRequest } from 'fastify'
import type { Logger } from '../lib/logger.js'

const BEARER_PREFIX = 'Bearer '

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest()
}

/**
 * Compare two secrets in constant time. Both sides are hashed first so the
 * comparison does not leak the expected token's length.
 */
export function tokensMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected))
}

/**
 * Create a preHandler that admits callers presenting the shared service token
 * as `Authorization: Bearer <token>`. Everything else gets a 401.
 */
export function createRequireServiceToken(
  expectedToken: string,
  logger?: Logger
): (request: FastifyRequest, reply: FastifyReply) => Promise<void> {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const header = request.headers.authorization

    if (!header?.startsWith(BEARER_PREFIX)) {
      logger?.debug({ url: request.url, method: request.method }, 'Missing bearer token')
      await reply.status(401).send({ error: 'Authentication required' })
      return
    }

    const token = header.slice(BEARER_PREFIX.length).trim()
    if (!tokensMatch(token, expectedToken)) {
      logger?.warn({ url: request.url, method: request.method }, 'Invalid service token')
      await reply.status(401).send({ error: 'Invalid service token' })
    }
  }
}
