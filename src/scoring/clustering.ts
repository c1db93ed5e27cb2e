/**
 * Behavioral clustering — DBSCAN over standardized wallet features.
 *
 * Population-wide: the whole set of feature vectors is clustered at once.
 * Low-density wallets stay labelled 'noise' instead of being pulled into a
 * majority cluster; outliers are exactly the wallets worth looking at.
 *
 * Output is advisory. A population too small or too diffuse to cluster comes
 * back as a degraded outcome with every wallet marked noise, and scoring
 * carries on heuristic-only.
 */
import { CLUSTER_CONFIG, CLUSTER_FEATURE_KEYS } from '../config/constants.js'
import { ErrorCodes } from '../errors.js'
import { childLogger } from '../logger.js'
import type {
  ClusterAssignment,
  ClusteringResult,
  ClusterProfile,
  FeatureKey,
  HeuristicBreakdown,
  StageOutcome,
  WalletFeatureVector,
} from '../types.js'

const clog = childLogger('cluster')

const UNVISITED = -2
const NOISE = -1

export interface ClusteringConfig {
  /** Neighbourhood radius in standardized units */
  eps: number
  /** Neighbours (self included) needed for a core point */
  minPoints: number
  /** Clusters below this size are dissolved into noise */
  minClusterSize: number
  featureKeys: readonly FeatureKey[]
}

export const DEFAULT_CLUSTERING_CONFIG: Readonly<ClusteringConfig> = {
  eps: CLUSTER_CONFIG.EPS,
  minPoints: CLUSTER_CONFIG.MIN_POINTS,
  minClusterSize: CLUSTER_CONFIG.MIN_CLUSTER_SIZE,
  featureKeys: CLUSTER_FEATURE_KEYS,
}

function allNoise(vectors: readonly WalletFeatureVector[]): ClusteringResult {
  return {
    assignments: vectors.map((v): ClusterAssignment => ({ wallet: v.wallet, label: 'noise' })),
    clusterCount: 0,
    noiseCount: vectors.length,
  }
}

export class BehavioralClusterer {
  private readonly config: ClusteringConfig

  constructor(config?: Partial<ClusteringConfig>) {
    this.config = { ...DEFAULT_CLUSTERING_CONFIG, ...config }
  }

  cluster(vectors: readonly WalletFeatureVector[]): StageOutcome<ClusteringResult> {
    const { minClusterSize, minPoints } = this.config
    const needed = Math.max(minClusterSize, minPoints)

    if (vectors.length < needed) {
      const reason = `Population of ${vectors.length} wallet(s) is below the minimum cluster size of ${needed}`
      clog.info({ wallets: vectors.length, code: ErrorCodes.DEGENERATE_POPULATION }, reason)
      return { status: 'degraded', value: allNoise(vectors), reason }
    }

    const matrix = this.standardize(vectors)
    const labels = this.dissolveSmallClusters(this.dbscan(matrix))

    const assignments = vectors.map((v, i): ClusterAssignment => ({
      wallet: v.wallet,
      label: labels[i] === NOISE ? 'noise' : labels[i],
    }))
    const noiseCount = labels.filter((l) => l === NOISE).length
    const clusterCount = new Set(labels.filter((l) => l !== NOISE)).size

    clog.info({ clusterCount, noiseCount }, `Identified ${clusterCount} cluster(s) and ${noiseCount} outlier(s)`)

    if (clusterCount === 0) {
      clog.info({ code: ErrorCodes.DEGENERATE_POPULATION }, 'No dense cluster found')
      return {
        status: 'degraded',
        value: { assignments, clusterCount, noiseCount },
        reason: 'No dense cluster found; every wallet is noise',
      }
    }
    return { status: 'ok', value: { assignments, clusterCount, noiseCount } }
  }

  // ── Feature matrix ───────────────────────────────────────────────────────

  /** z-score each configured feature; zero-variance columns use σ = 1. */
  private standardize(vectors: readonly WalletFeatureVector[]): number[][] {
    const keys = this.config.featureKeys
    const n = vectors.length
    const means = keys.map((k) => vectors.reduce((s, v) => s + v[k], 0) / n)
    const stds = keys.map((k, j) => {
      const variance = vectors.reduce((s, v) => s + (v[k] - means[j]) ** 2, 0) / n
      return Math.sqrt(variance) || 1
    })
    return vectors.map((v) => keys.map((k, j) => (v[k] - means[j]) / stds[j]))
  }

  // ── DBSCAN ───────────────────────────────────────────────────────────────

  /** Points are visited in input order, so labels are deterministic. */
  private dbscan(matrix: number[][]): number[] {
    const labels = new Array<number>(matrix.length).fill(UNVISITED)
    let nextId = 0

    for (let i = 0; i < matrix.length; i++) {
      if (labels[i] !== UNVISITED) continue

      const neighbors = this.regionQuery(matrix, i)
      if (neighbors.length < this.config.minPoints) {
        labels[i] = NOISE
        continue
      }

      const clusterId = nextId++
      labels[i] = clusterId
      const queue = neighbors.filter((j) => j !== i)

      for (let k = 0; k < queue.length; k++) {
        const j = queue[k]
        if (labels[j] === NOISE) {
          // border point
          labels[j] = clusterId
          continue
        }
        if (labels[j] !== UNVISITED) continue

        labels[j] = clusterId
        const expansion = this.regionQuery(matrix, j)
        if (expansion.length >= this.config.minPoints) {
          for (const m of expansion) {
            if (labels[m] === UNVISITED || labels[m] === NOISE) queue.push(m)
          }
        }
      }
    }

    return labels
  }

  private regionQuery(matrix: number[][], index: number): number[] {
    const point = matrix[index]
    const epsSquared = this.config.eps ** 2
    const neighbors: number[] = []
    for (let i = 0; i < matrix.length; i++) {
      let dist = 0
      const other = matrix[i]
      for (let d = 0; d < point.length; d++) {
        dist += (point[d] - other[d]) ** 2
      }
      if (dist <= epsSquared) neighbors.push(i)
    }
    return neighbors
  }

  /** Clusters under minClusterSize become noise; survivors are renumbered 0, 1, 2… */
  private dissolveSmallClusters(labels: number[]): number[] {
    const sizes = new Map<number, number>()
    for (const l of labels) {
      if (l !== NOISE) sizes.set(l, (sizes.get(l) ?? 0) + 1)
    }

    const renumbered = new Map<number, number>()
    return labels.map((l) => {
      if (l === NOISE || (sizes.get(l) ?? 0) < this.config.minClusterSize) return NOISE
      let id = renumbered.get(l)
      if (id === undefined) {
        id = renumbered.size
        renumbered.set(l, id)
      }
      return id
    })
  }
}

// ── Cluster-informed adjustment ─────────────────────────────────────────────

/**
 * Summarize each cluster. A cluster is risky when at least `riskyRate` of its
 * members have been liquidated.
 */
export function profileClusters(
  assignments: readonly ClusterAssignment[],
  vectors: ReadonlyMap<string, WalletFeatureVector>,
  heuristics: ReadonlyMap<string, HeuristicBreakdown>,
  riskyRate: number = CLUSTER_CONFIG.RISKY_LIQUIDATION_RATE,
): ClusterProfile[] {
  const acc = new Map<number, { size: number; liquidated: number; scoreSum: number }>()

  for (const { wallet, label } of assignments) {
    if (label === 'noise') continue
    const entry = acc.get(label) ?? { size: 0, liquidated: 0, scoreSum: 0 }
    entry.size++
    if ((vectors.get(wallet)?.liquidationCount ?? 0) > 0) entry.liquidated++
    entry.scoreSum += heuristics.get(wallet)?.score ?? 0
    acc.set(label, entry)
  }

  return [...acc.entries()]
    .sort(([a], [b]) => a - b)
    .map(([clusterId, e]) => {
      const liquidationRate = e.liquidated / e.size
      return {
        clusterId,
        size: e.size,
        liquidationRate,
        meanHeuristicScore: e.scoreSum / e.size,
        risky: liquidationRate >= riskyRate,
      }
    })
}

/** Raw-score adjustment per wallet: members of risky clusters get `penalty`, everyone else 0. */
export function clusterAdjustments(
  assignments: readonly ClusterAssignment[],
  profiles: readonly ClusterProfile[],
  penalty: number = CLUSTER_CONFIG.RISKY_CLUSTER_PENALTY,
): Map<string, number> {
  const risky = new Set(profiles.filter((p) => p.risky).map((p) => p.clusterId))
  const adjustments = new Map<string, number>()
  for (const { wallet, label } of assignments) {
    adjustments.set(wallet, label !== 'noise' && risky.has(label) ? penalty : 0)
  }
  return adjustments
}
