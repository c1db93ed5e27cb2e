/**
 * Response Headers Middleware
 * Stamps the scoring model version and the security headers on every response.
 */
import type { MiddlewareHandler } from 'hono'
import { MODEL_VERSION } from '../config/constants.js'

export const responseHeadersMiddleware: MiddlewareHandler = async (c, next) => {
  await next()

  c.res.headers.set('X-Model-Version', MODEL_VERSION)
  c.res.headers.set('X-Score-Scale', '0-1000, relative to the scoring run population')

  // ── Security headers ──
  c.res.headers.set('X-Content-Type-Options', 'nosniff')
  c.res.headers.set('X-Frame-Options', 'DENY')
  c.res.headers.set('Referrer-Policy', 'strict-origin-when-cross-origin')
  c.res.headers.set('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'")
}
