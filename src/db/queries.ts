/**
 * Prepared statements and exported query helpers.
 *
 * Imported AFTER schema.ts has created all tables.
 */

import { log } from '../logger.js'
import type { RunStatus, RunSummary, ScoringRunRow, WalletScore, WalletScoreRow } from '../types.js'
import { db } from './connection.js'

// ---------- Prepared statements ----------

const stmtInsertRun = db.prepare<[string, string, string]>(`
  INSERT INTO scoring_runs (run_id, status, source, started_at) VALUES (?, 'pending', ?, ?)
`)

const stmtFinishRun = db.prepare<{
  run_id: string
  status: RunStatus
  finished_at: string
  wallet_count: number
  summary_json: string | null
  error: string | null
}>(`
  UPDATE scoring_runs
     SET status = @status, finished_at = @finished_at, wallet_count = @wallet_count,
         summary_json = @summary_json, error = @error
   WHERE run_id = @run_id
`)

const stmtGetRun = db.prepare<[string], ScoringRunRow>(`SELECT * FROM scoring_runs WHERE run_id = ?`)

const stmtLatestPublishedRun = db.prepare<[], ScoringRunRow>(`
  SELECT * FROM scoring_runs
   WHERE status IN ('ok', 'degraded')
   ORDER BY finished_at DESC, rowid DESC LIMIT 1
`)

const stmtPendingRun = db.prepare<[], ScoringRunRow>(`
  SELECT * FROM scoring_runs WHERE status = 'pending' ORDER BY started_at DESC, rowid DESC LIMIT 1
`)

const stmtInterruptRuns = db.prepare<[string, string]>(`
  UPDATE scoring_runs SET status = 'fatal', finished_at = ?, error = ? WHERE status = 'pending'
`)

const stmtClearScores = db.prepare(`DELETE FROM wallet_scores`)

const stmtInsertScore = db.prepare<WalletScoreRow>(`
  INSERT INTO wallet_scores
    (wallet, score, raw_score, heuristic_score, cluster_adjustment, cluster_label, run_id, calculated_at)
  VALUES
    (@wallet, @score, @raw_score, @heuristic_score, @cluster_adjustment, @cluster_label, @run_id, @calculated_at)
`)

const stmtGetScore = db.prepare<[string], WalletScoreRow>(`SELECT * FROM wallet_scores WHERE wallet = ?`)

const stmtCountScores = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM wallet_scores`)

const stmtTopScores = db.prepare<[number], WalletScoreRow>(`
  SELECT * FROM wallet_scores ORDER BY score DESC, raw_score DESC, wallet ASC LIMIT ?
`)

const stmtBottomScores = db.prepare<[number], WalletScoreRow>(`
  SELECT * FROM wallet_scores ORDER BY score ASC, raw_score ASC, wallet ASC LIMIT ?
`)

// ---------- Runs ----------

export function insertRun(runId: string, source: string, startedAt: string = new Date().toISOString()): void {
  stmtInsertRun.run(runId, source, startedAt)
}

export function getRun(runId: string): ScoringRunRow | undefined {
  return stmtGetRun.get(runId)
}

export function getPendingRun(): ScoringRunRow | undefined {
  return stmtPendingRun.get()
}

const claimRunTx = db.transaction((runId: string, source: string, startedAt: string): ScoringRunRow | undefined => {
  const pending = stmtPendingRun.get()
  if (pending) return pending
  stmtInsertRun.run(runId, source, startedAt)
  return undefined
})

/**
 * Insert a pending run unless the store already has one, possibly opened by
 * another process on the same file. Returns the blocking run when refused.
 * Runs as an IMMEDIATE transaction so two writers cannot both pass the check.
 */
export function claimRun(
  runId: string,
  source: string,
  startedAt: string = new Date().toISOString(),
): ScoringRunRow | undefined {
  return claimRunTx.immediate(runId, source, startedAt)
}

export function getLatestPublishedRun(): ScoringRunRow | undefined {
  return stmtLatestPublishedRun.get()
}

/** Record a run that ended without publishing anything. */
export function failRun(runId: string, error: string): void {
  stmtFinishRun.run({
    run_id: runId,
    status: 'fatal',
    finished_at: new Date().toISOString(),
    wallet_count: 0,
    summary_json: null,
    error,
  })
}

/**
 * Pending runs left behind by a previous process can never finish.
 * Returns how many were closed.
 */
export function interruptPendingRuns(): number {
  const result = stmtInterruptRuns.run(new Date().toISOString(), 'Interrupted by restart')
  if (result.changes > 0) log.warn('db', `Marked ${result.changes} interrupted run(s) as fatal`)
  return result.changes
}

// ---------- Published scores ----------

/**
 * Replace the published table with a run's scores and close the run, in one
 * transaction. Readers see either the previous table or the new one.
 */
export const publishRun = db.transaction(
  (runId: string, status: 'ok' | 'degraded', scores: readonly WalletScore[], summary: RunSummary): void => {
    const calculatedAt = new Date().toISOString()
    stmtClearScores.run()
    for (const s of scores) {
      stmtInsertScore.run({
        wallet: s.wallet,
        score: s.score,
        raw_score: s.rawScore,
        heuristic_score: s.heuristicScore,
        cluster_adjustment: s.clusterAdjustment,
        cluster_label: s.clusterLabel === 'noise' ? null : s.clusterLabel,
        run_id: runId,
        calculated_at: calculatedAt,
      })
    }
    stmtFinishRun.run({
      run_id: runId,
      status,
      finished_at: calculatedAt,
      wallet_count: scores.length,
      summary_json: JSON.stringify(summary),
      error: null,
    })
  },
)

export function getWalletScore(wallet: string): WalletScoreRow | undefined {
  return stmtGetScore.get(wallet.toLowerCase())
}

export function countWalletScores(): number {
  return stmtCountScores.get()?.count ?? 0
}

export function getLeaderboard(order: 'top' | 'bottom', limit: number): WalletScoreRow[] {
  return order === 'top' ? stmtTopScores.all(limit) : stmtBottomScores.all(limit)
}
