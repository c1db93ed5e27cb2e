/**
 * Shared in-memory run statistics.
 * The pipeline runner updates this after every run; /health reads it.
 */
import type { RunStatus } from '../types.js'

export interface LastRunStats {
  runId: string
  status: Exclude<RunStatus, 'pending'>
  finishedAt: string
  walletCount: number
  durationMs: number
}

export const jobStats: { runsStarted: number; lastRun: LastRunStats | null } = {
  runsStarted: 0,
  lastRun: null,
}
