#!/usr/bin/env node
/**
 * One-shot batch scoring:
 *
 *   lending-credit-score --input data/raw/user-wallet-transactions.json [--db scores.db] [--top 10]
 *                        [--features feature_matrix.csv]
 *
 * Scores every wallet in the log, publishes the table to the store, and
 * prints the run summary with the highest and lowest scored wallets.
 * With --features, the per-wallet feature matrix is also written as CSV.
 * Exits 1 when the run is fatal or the arguments are unusable.
 *
 * The store refuses a new run while another one is pending in it, including
 * a run started by a server on the same database file.
 */
import fs from 'node:fs'
import path from 'node:path'
import { parseArgs } from 'node:util'
import { v4 as uuidv4 } from 'uuid'
import { LEADERBOARD_CONFIG } from './config/constants.js'
import { formatFeatureMatrix, formatReport } from './report.js'

function usage(): string {
  return 'Usage: lending-credit-score --input <file> [--db <file>] [--top <n>] [--features <file>]\n'
}

async function main(argv: string[]): Promise<number> {
  let values: { input?: string; db?: string; top?: string; features?: string }
  try {
    values = parseArgs({
      args: argv,
      options: {
        input: { type: 'string', short: 'i' },
        db: { type: 'string' },
        top: { type: 'string' },
        features: { type: 'string' },
      },
    }).values
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n${usage()}`)
    return 1
  }

  const top = values.top === undefined ? LEADERBOARD_CONFIG.DEFAULT_LIMIT : Number(values.top)
  if (!Number.isInteger(top) || top < 1) {
    process.stderr.write(`--top must be a positive integer\n${usage()}`)
    return 1
  }

  // The store opens on import, so its path must be set first.
  if (values.db) process.env.DB_PATH = values.db
  const { claimRun, DB_PATH } = await import('./db.js')
  const { defaultInputPath, executeRun } = await import('./jobs/pipelineRunner.js')

  const source = values.input ?? defaultInputPath()
  const runId = uuidv4()
  const blocking = claimRun(runId, source)
  if (blocking) {
    process.stderr.write(`Run ${blocking.run_id} is still pending in ${DB_PATH}; wait for it or restart the server\n`)
    return 1
  }
  const outcome = executeRun(runId, source)

  if (outcome.status === 'fatal') {
    process.stderr.write(`Run failed at ${outcome.stage} (${outcome.code}): ${outcome.message}\n`)
    return 1
  }

  if (values.features) {
    fs.mkdirSync(path.dirname(values.features), { recursive: true })
    fs.writeFileSync(values.features, formatFeatureMatrix(outcome.features))
  }

  process.stdout.write(`Run ${runId}\n${formatReport(outcome, top)}`)
  if (values.features) process.stdout.write(`\nFeature matrix written to ${values.features}\n`)
  return 0
}

process.exitCode = await main(process.argv.slice(2))
