/**
 * Schema — CREATE TABLE statements.
 *
 * This module is imported for its side-effects (table creation).
 * It must run BEFORE queries.ts so that prepared statements can compile.
 */

import { db } from './connection.js'

db.exec(`
  -- One row per scoring run, including runs that never published
  CREATE TABLE IF NOT EXISTS scoring_runs (
    run_id        TEXT PRIMARY KEY,
    status        TEXT NOT NULL DEFAULT 'pending',
    source        TEXT NOT NULL,
    started_at    TEXT NOT NULL,
    finished_at   TEXT,
    wallet_count  INTEGER NOT NULL DEFAULT 0,
    summary_json  TEXT,
    error         TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_runs_finished ON scoring_runs(finished_at DESC);

  -- The published (wallet, score) table of the most recent successful run
  CREATE TABLE IF NOT EXISTS wallet_scores (
    wallet              TEXT PRIMARY KEY,
    score               INTEGER NOT NULL CHECK (score BETWEEN 0 AND 1000),
    raw_score           REAL NOT NULL,
    heuristic_score     REAL NOT NULL,
    cluster_adjustment  REAL NOT NULL DEFAULT 0,
    cluster_label       INTEGER,
    run_id              TEXT NOT NULL REFERENCES scoring_runs(run_id),
    calculated_at       TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_wallet_scores_score ON wallet_scores(score DESC);
`)
