import type { ScoreDistribution } from '../types.js'

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/** Linear-interpolated quantile of an ascending array. */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0
  const pos = (sorted.length - 1) * q
  const lo = Math.floor(pos)
  const hi = Math.ceil(pos)
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo)
}

/** count / mean / sample std / min / quartiles / max, two decimals. */
export function describeScores(scores: readonly number[]): ScoreDistribution {
  const n = scores.length
  if (n === 0) {
    return { count: 0, mean: 0, std: 0, min: 0, p25: 0, p50: 0, p75: 0, max: 0 }
  }
  const sorted = [...scores].sort((a, b) => a - b)
  const mean = sorted.reduce((s, x) => s + x, 0) / n
  const variance = n > 1 ? sorted.reduce((s, x) => s + (x - mean) ** 2, 0) / (n - 1) : 0

  return {
    count: n,
    mean: round2(mean),
    std: round2(Math.sqrt(variance)),
    min: sorted[0],
    p25: round2(quantile(sorted, 0.25)),
    p50: round2(quantile(sorted, 0.5)),
    p75: round2(quantile(sorted, 0.75)),
    max: sorted[n - 1],
  }
}
