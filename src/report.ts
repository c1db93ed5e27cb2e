/**
 * Plain-text run report printed by the CLI: summary counts, the score
 * distribution, and the highest and lowest ranked wallets.
 */
import { FEATURE_COLUMNS } from './scoring/features.js'
import type { PipelineOutcome, WalletFeatureVector, WalletScore } from './types.js'

function formatRow(rank: number, s: WalletScore): string {
  const label = s.clusterLabel === 'noise' ? 'noise' : `cluster ${s.clusterLabel}`
  return `  ${String(rank).padStart(3)}. ${s.wallet}  ${String(s.score).padStart(4)}  (raw ${s.rawScore.toFixed(2)}, ${label})\n`
}

export function formatReport(outcome: Extract<PipelineOutcome, { status: 'ok' | 'degraded' }>, top: number): string {
  const { summary, scores } = outcome
  const d = summary.distribution
  let out = ''
  out += `Status: ${outcome.status}${summary.clustering.reason ? ` (${summary.clustering.reason})` : ''}\n`
  out += `Records read: ${summary.recordsRead}, loaded: ${summary.transactionsLoaded}, dropped: ${summary.dropped}\n`
  out += `Wallets scored: ${summary.walletCount}\n`
  out += `Clusters: ${summary.clustering.clusterCount}, noise wallets: ${summary.clustering.noiseCount}`
  out += summary.clustering.riskyClusters.length > 0 ? `, risky: ${summary.clustering.riskyClusters.join(', ')}\n` : '\n'
  out += `Score distribution: mean ${d.mean}, std ${d.std}, min ${d.min}, p25 ${d.p25}, p50 ${d.p50}, p75 ${d.p75}, max ${d.max}\n`

  const n = Math.min(top, scores.length)
  out += `\nTop ${n} wallets:\n`
  scores.slice(0, n).forEach((s, i) => {
    out += formatRow(i + 1, s)
  })
  out += `\nBottom ${n} wallets:\n`
  scores
    .slice(-n)
    .reverse()
    .forEach((s, i) => {
      out += formatRow(scores.length - i, s)
    })
  return out
}

/** Feature matrix as CSV: a header row, then one row per wallet. */
export function formatFeatureMatrix(vectors: readonly WalletFeatureVector[]): string {
  let out = `${FEATURE_COLUMNS.join(',')}\n`
  for (const v of vectors) {
    out += `${FEATURE_COLUMNS.map((column) => String(v[column])).join(',')}\n`
  }
  return out
}
