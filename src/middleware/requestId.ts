/**
 * Request ID Middleware
 * Reuses the caller's X-Request-ID or generates a UUID, stores it on the
 * context and echoes it on the response.
 */
import type { MiddlewareHandler } from 'hono'
import { v4 as uuidv4 } from 'uuid'
import type { AppEnv } from '../types/hono-env.js'

export const requestIdMiddleware: MiddlewareHandler<AppEnv> = async (c, next) => {
  const requestId = c.req.header('X-Request-ID') ?? uuidv4()
  c.set('requestId', requestId)
  await next()
  c.res.headers.set('X-Request-ID', requestId)
}
