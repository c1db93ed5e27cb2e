/**
 * Quantile normalization of raw scores onto the 0–1000 scale.
 *
 * Each wallet's mid-rank percentile within the run's population,
 *
 *   p = (below + (equal − 1) / 2) / (n − 1)
 *
 * is scaled to [0, 1000] and rounded half up. Equal raw scores share a
 * percentile, so ties map to ties and the mapping is monotone. The lowest
 * distinct raw score maps to 0 and the highest to 1000 unless tied; a lone
 * wallet (or an all-tied population) sits at the midpoint.
 *
 * Scores are relative to the population of the run that produced them.
 */
import { NORMALIZER_CONFIG } from '../config/constants.js'
import { ErrorCodes, PipelineError } from '../errors.js'

const { MIN_SCORE, MAX_SCORE } = NORMALIZER_CONFIG

/** Round half up: 0.5 → 1, 2.5 → 3. */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5)
}

export function percentileRanks(rawScores: ReadonlyMap<string, number>): Map<string, number> {
  const entries = [...rawScores.entries()]
  for (const [wallet, raw] of entries) {
    if (!Number.isFinite(raw)) {
      throw new PipelineError('normalize', ErrorCodes.NON_FINITE_SCORE, `Raw score for ${wallet} is not finite`)
    }
  }

  const n = entries.length
  const ranks = new Map<string, number>()
  if (n === 0) return ranks
  if (n === 1) {
    ranks.set(entries[0][0], 0.5)
    return ranks
  }

  const sorted = [...entries].sort((a, b) => a[1] - b[1])
  let start = 0
  while (start < n) {
    let end = start
    while (end + 1 < n && sorted[end + 1][1] === sorted[start][1]) end++
    const equal = end - start + 1
    const p = (start + (equal - 1) / 2) / (n - 1)
    for (let i = start; i <= end; i++) ranks.set(sorted[i][0], p)
    start = end + 1
  }
  return ranks
}

/** wallet → integer FinalScore in [0, 1000]. */
export function normalizeScores(rawScores: ReadonlyMap<string, number>): Map<string, number> {
  const finals = new Map<string, number>()
  for (const [wallet, p] of percentileRanks(rawScores)) {
    const scaled = MIN_SCORE + p * (MAX_SCORE - MIN_SCORE)
    finals.set(wallet, Math.min(MAX_SCORE, Math.max(MIN_SCORE, roundHalfUp(scaled))))
  }
  return finals
}
