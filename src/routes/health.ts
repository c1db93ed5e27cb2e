import { Hono } from 'hono'
import { MODEL_VERSION } from '../config/constants.js'
import { countWalletScores, getLatestPublishedRun } from '../db.js'
import { getActiveRun } from '../jobs/pipelineRunner.js'
import { jobStats } from '../jobs/jobStats.js'

const startTime = Date.now()

const health = new Hono()

health.get('/', (c) => {
  const published = getLatestPublishedRun()
  const active = getActiveRun()

  return c.json({
    status: 'ok',
    modelVersion: MODEL_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    database: {
      walletsScored: countWalletScores(),
      publishedRunId: published?.run_id ?? null,
      publishedAt: published?.finished_at ?? null,
    },
    runner: {
      activeRunId: active?.runId ?? null,
      runsStarted: jobStats.runsStarted,
      lastRun: jobStats.lastRun,
    },
  })
})

export default health
