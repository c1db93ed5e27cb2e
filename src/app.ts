import { Hono } from 'hono'
import { bodyLimit } from 'hono/body-limit'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'

import { API_CONFIG } from './config/constants.js'
import { AppError, errorResponse, ErrorCodes } from './errors.js'
import { log } from './logger.js'
import { requestIdMiddleware } from './middleware/requestId.js'
import { responseHeadersMiddleware } from './middleware/responseHeaders.js'
import healthRoute from './routes/health.js'
import leaderboardRoute from './routes/leaderboard.js'
import scoreRoute from './routes/score.js'
import type { AppEnv } from './types/hono-env.js'

const app = new Hono<AppEnv>()

// ---------- Global middleware (registration order = execution order) ----------

app.use('*', requestIdMiddleware)
if (!process.env.VITEST) app.use('*', logger((line) => log.info('http', line)))
app.use(
  '*',
  cors({
    origin: process.env.CORS_ORIGINS ? process.env.CORS_ORIGINS.split(',') : '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-ID'],
  }),
)
app.use(
  '*',
  bodyLimit({
    maxSize: API_CONFIG.MAX_BODY_SIZE,
    onError: (c) => c.json(errorResponse(ErrorCodes.BODY_TOO_LARGE, 'Request body too large'), 413),
  }),
)
app.use('*', responseHeadersMiddleware)

// ---------- Routes ----------

app.route('/health', healthRoute)
app.route('/v1/score', scoreRoute)
app.route('/v1/leaderboard', leaderboardRoute)

app.notFound((c) => c.json(errorResponse(ErrorCodes.NOT_FOUND, 'Not found'), 404))

app.onError((err, c) => {
  if (err instanceof AppError) {
    return c.json(err.toJSON(), err.statusCode)
  }
  log.error('http', `Unhandled error (request ${c.get('requestId')})`, err)
  return c.json(errorResponse(ErrorCodes.INTERNAL_ERROR, 'Internal server error'), 500)
})

export default app
