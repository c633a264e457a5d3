// ---------------------------------------------------------------------------
// API error helpers
// ---------------------------------------------------------------------------
// Fastify reads `statusCode` off thrown errors; the app's error handler
// forwards the message of client errors (4xx) and masks the rest.
// ---------------------------------------------------------------------------

export class ApiError extends Error {
  readonly statusCode: number

  constructor(statusCode: number, message: string) {
    super(message)
    this.statusCode = statusCode
    this.name = 'ApiError'
  }
}

export function badRequest(message: string): ApiError {
  return new ApiError(400, message)
}

export function notFound(message: string): ApiError {
  return new ApiError(404, message)
}

export function conflict(message: string): ApiError {
  return new ApiError(409, message)
}

/** The upstream AI provider failed or answered with something unusable. */
export function badGateway(message: string): ApiError {
  return new ApiError(502, message)
}

/** A required collaborator (such as the AI provider) is not configured. */
export function serviceUnavailable(message: string): ApiError {
  return new ApiError(503, message)
}
