// Fastify owns the Pino instance; components outside request context receive
// `app.log` (or a child of it) typed as this.
export type { FastifyBaseLogger as Logger } from 'fastify'
