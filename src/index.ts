import { serve } from '@hono/node-server'

import app from './app.js'
import { API_CONFIG } from './config/constants.js'
import { db, DB_PATH, interruptPendingRuns } from './db.js'
import { defaultInputPath, getActiveRun } from './jobs/pipelineRunner.js'
import { log } from './logger.js'

// ---------- Config ----------

const PORT = Number(process.env.PORT ?? API_CONFIG.DEFAULT_PORT)
if (!Number.isInteger(PORT) || PORT < 1 || PORT > 65_535) throw new Error(`PORT must be a valid port, got ${process.env.PORT}`)

if (process.env.NODE_ENV === 'production' && !process.env.CORS_ORIGINS) {
  log.warn('config', 'CORS_ORIGINS not set; allowing every origin')
}

// Runs still pending from a previous process were cut off mid-flight.
interruptPendingRuns()

// ---------- Graceful shutdown ----------

let server: ReturnType<typeof serve> | null = null
let shuttingDown = false

function shutdown() {
  if (shuttingDown) return
  shuttingDown = true
  log.info('server', 'Shutting down...')

  const active = getActiveRun()
  if (active) log.warn('server', `Run ${active.runId} is still in flight and will be marked interrupted on next start`)

  if (server) {
    server.close(() => {
      log.info('server', 'All connections closed')
      db.close()
      process.exit(0)
    })
    setTimeout(() => {
      log.warn('server', 'Forcing exit after timeout')
      db.close()
      process.exit(1)
    }, API_CONFIG.SHUTDOWN_TIMEOUT_MS).unref()
  } else {
    db.close()
    process.exit(0)
  }
}
process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

// ---------- Start ----------

server = serve({ fetch: app.fetch, port: PORT }, (info) => {
  log.info('server', `Lending credit score API running on http://localhost:${info.port}`)
  log.info('server', `database: ${DB_PATH}`)
  log.info('server', `transaction log: ${defaultInputPath()}`)
})

export default app
