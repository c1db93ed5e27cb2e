/**
 * Background scoring runs.
 *
 * At most one run is in flight per store; a second trigger is rejected
 * rather than queued. A pending row in `scoring_runs` blocks triggers from
 * other processes sharing the database file, such as the CLI. A run reads the transaction log, executes the whole
 * pipeline and publishes its table atomically when the outcome is 'ok' or
 * 'degraded'. A fatal outcome leaves the previously published table intact.
 */
import { v4 as uuidv4 } from 'uuid'
import { DATA_CONFIG } from '../config/constants.js'
import { claimRun, failRun, publishRun } from '../db.js'
import { AppError, ErrorCodes } from '../errors.js'
import { log } from '../logger.js'
import { type PipelineOptions, runPipeline } from '../scoring/engine.js'
import { readTransactionFile } from '../scoring/transactions.js'
import type { PipelineOutcome } from '../types.js'
import { jobStats } from './jobStats.js'

export interface ActiveRun {
  runId: string
  source: string
  done: Promise<void>
}

let activeRun: ActiveRun | null = null

export function defaultInputPath(): string {
  return process.env.TRANSACTIONS_PATH ?? DATA_CONFIG.DEFAULT_TRANSACTIONS_PATH
}

/**
 * Run the pipeline over `source` under an already-inserted run id and
 * persist the result. Synchronous; used by the CLI directly.
 */
export function executeRun(runId: string, source: string, options: PipelineOptions = {}): PipelineOutcome {
  const input = readTransactionFile(source)
  const outcome = input.status === 'fatal' ? input : runPipeline(input.value, options)

  if (outcome.status === 'fatal') {
    failRun(runId, `${outcome.stage}: ${outcome.code}: ${outcome.message}`)
    jobStats.lastRun = {
      runId,
      status: 'fatal',
      finishedAt: new Date().toISOString(),
      walletCount: 0,
      durationMs: 0,
    }
    return outcome
  }

  publishRun(runId, outcome.status, outcome.scores, outcome.summary)
  jobStats.lastRun = {
    runId,
    status: outcome.status,
    finishedAt: new Date().toISOString(),
    walletCount: outcome.scores.length,
    durationMs: outcome.summary.durationMs,
  }
  log.info('runner', `Run ${runId} published ${outcome.scores.length} scores (${outcome.status})`)
  return outcome
}

/**
 * Start a background run and return its id immediately.
 * Throws a 409 AppError while another run is in flight.
 */
export function triggerRun(source: string = defaultInputPath(), options: PipelineOptions = {}): string {
  if (activeRun) {
    throw new AppError(ErrorCodes.RUN_IN_PROGRESS, 'A scoring run is already in progress', 409, {
      runId: activeRun.runId,
    })
  }

  const runId = uuidv4()
  const blocking = claimRun(runId, source)
  if (blocking) {
    throw new AppError(ErrorCodes.RUN_IN_PROGRESS, 'A scoring run is already in progress', 409, {
      runId: blocking.run_id,
    })
  }
  jobStats.runsStarted++
  log.info('runner', `Run ${runId} started on ${source}`)

  // Yield first so the trigger's response goes out before the CPU-bound work.
  const done = new Promise<void>((resolve) => setImmediate(() => resolve()))
    .then(() => {
      executeRun(runId, source, options)
    })
    .catch((err: unknown) => {
      log.error('runner', `Run ${runId} crashed`, err)
      try {
        failRun(runId, err instanceof Error ? err.message : String(err))
      } catch (dbErr) {
        log.error('runner', `Could not record failure of run ${runId}`, dbErr)
      }
    })
    .finally(() => {
      activeRun = null
    })

  activeRun = { runId, source, done }
  return runId
}

export function getActiveRun(): ActiveRun | null {
  return activeRun
}
