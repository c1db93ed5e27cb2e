import { Hono } from 'hono'
import { getLatestPublishedRun, getRun, getWalletScore } from '../db.js'
import { AppError, errorResponse, ErrorCodes } from '../errors.js'
import { getActiveRun, triggerRun } from '../jobs/pipelineRunner.js'
import { isValidAddress } from '../types.js'
import type { RunSummary, WalletScoreResponse } from '../types.js'

const RUN_ID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i

const score = new Hono()

// POST /v1/score/generate
// Starts a full scoring run in the background and returns its runId immediately.
score.post('/generate', (c) => {
  const active = getActiveRun()
  if (active) {
    return c.json(
      errorResponse(ErrorCodes.RUN_IN_PROGRESS, 'A scoring run is already in progress', { runId: active.runId }),
      409,
    )
  }

  let runId: string
  try {
    runId = triggerRun()
  } catch (err) {
    // Another process sharing the store holds a pending run
    if (err instanceof AppError) return c.json(err.toJSON(), err.statusCode)
    throw err
  }
  return c.json({ runId, status: 'pending', pollUrl: `/v1/score/runs/${runId}` }, 202)
})

// GET /v1/score/runs/:runId
score.get('/runs/:runId', (c) => {
  const runId = c.req.param('runId')
  if (!RUN_ID_RE.test(runId)) {
    return c.json(errorResponse(ErrorCodes.INVALID_RUN_ID, 'Invalid run ID format'), 400)
  }

  const run = getRun(runId)
  if (!run) {
    return c.json(errorResponse(ErrorCodes.RUN_NOT_FOUND, 'Run not found'), 404)
  }

  const summary: RunSummary | null = run.summary_json ? JSON.parse(run.summary_json) : null
  return c.json({
    runId: run.run_id,
    status: run.status,
    source: run.source,
    startedAt: run.started_at,
    finishedAt: run.finished_at,
    walletCount: run.wallet_count,
    summary,
    error: run.error,
  })
})

// GET /v1/score/:wallet
score.get('/:wallet', (c) => {
  const wallet = c.req.param('wallet')
  if (!isValidAddress(wallet)) {
    return c.json(errorResponse(ErrorCodes.INVALID_WALLET, 'Invalid wallet address'), 400)
  }

  if (!getLatestPublishedRun()) {
    return c.json(errorResponse(ErrorCodes.NO_SCORES, 'No scoring run has been published yet'), 404)
  }

  const row = getWalletScore(wallet)
  if (!row) {
    return c.json(
      errorResponse(ErrorCodes.WALLET_NOT_FOUND, 'Wallet was not part of the last scoring run', {
        wallet: wallet.toLowerCase(),
      }),
      404,
    )
  }

  const response: WalletScoreResponse = {
    wallet: row.wallet,
    score: row.score,
    clusterLabel: row.cluster_label ?? 'noise',
    runId: row.run_id,
    calculatedAt: row.calculated_at,
  }
  return c.json(response)
})

export default score
