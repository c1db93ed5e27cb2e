/**
 * Scoring engine — sequences loading, feature aggregation, heuristic scoring,
 * behavioral clustering and quantile normalization over the whole wallet set.
 *
 * Every call recomputes everything from the records it is given. The result
 * is a tagged outcome: 'ok', 'degraded' (clustering could not help, scores
 * are heuristic-only) or 'fatal' (nothing may be published).
 */
import { CLUSTER_CONFIG, DEFAULT_HEURISTIC_WEIGHTS } from '../config/constants.js'
import { ErrorCodes, PipelineError } from '../errors.js'
import { log } from '../logger.js'
import type {
  ClusterAssignment,
  ClusteringResult,
  ClusterLabel,
  HeuristicBreakdown,
  HeuristicWeights,
  PipelineOutcome,
  RunSummary,
  StageOutcome,
  WalletFeatureVector,
  WalletScore,
} from '../types.js'
import { BehavioralClusterer, type ClusteringConfig, clusterAdjustments, profileClusters } from './clustering.js'
import { describeScores } from './distribution.js'
import { aggregateFeatures } from './features.js'
import { HeuristicScorer } from './heuristic.js'
import { normalizeScores } from './normalizer.js'
import { loadTransactions } from './transactions.js'

export interface PipelineOptions {
  weights?: Readonly<HeuristicWeights>
  clustering?: Partial<ClusteringConfig>
  riskyLiquidationRate?: number
  riskyClusterPenalty?: number
}

function runClustering(
  clusterer: BehavioralClusterer,
  vectors: readonly WalletFeatureVector[],
): Extract<StageOutcome<ClusteringResult>, { status: 'ok' | 'degraded' }> {
  try {
    const outcome = clusterer.cluster(vectors)
    if (outcome.status !== 'fatal') return outcome
    log.warn('pipeline', `Clustering failed (${outcome.code}); continuing heuristic-only`, outcome.message)
  } catch (err) {
    log.warn('pipeline', 'Clustering threw; continuing heuristic-only', err)
  }
  return {
    status: 'degraded',
    value: {
      assignments: vectors.map((v): ClusterAssignment => ({ wallet: v.wallet, label: 'noise' })),
      clusterCount: 0,
      noiseCount: vectors.length,
    },
    reason: 'Clustering failed; every wallet is noise',
  }
}

export function runPipeline(input: unknown, options: PipelineOptions = {}): PipelineOutcome {
  const startedAt = Date.now()

  // ── STEP 1: Load & validate ────────────────────────────────────────────────
  const loaded = loadTransactions(input)
  if (loaded.status === 'fatal') {
    log.error('pipeline', `Run aborted at ${loaded.stage}: ${loaded.message}`)
    return loaded
  }
  const { groups, recordsRead, transactionsLoaded, dropped, dropReasons } = loaded.value

  // ── STEP 2: Feature vectors (per wallet, independent) ─────────────────────
  const vectors = aggregateFeatures(groups)
  const vectorByWallet = new Map(vectors.map((v): [string, WalletFeatureVector] => [v.wallet, v]))

  // ── STEP 3: Heuristic raw scores ──────────────────────────────────────────
  const scorer = new HeuristicScorer(options.weights ?? DEFAULT_HEURISTIC_WEIGHTS)
  const heuristics = new Map(scorer.scoreAll(vectors).map((h): [string, HeuristicBreakdown] => [h.wallet, h]))
  log.debug('heuristic', `Computed ${heuristics.size} raw scores`)

  // ── STEP 4: Clustering (population barrier, advisory) ─────────────────────
  const clustering = runClustering(new BehavioralClusterer(options.clustering), vectors)
  const profiles = profileClusters(
    clustering.value.assignments,
    vectorByWallet,
    heuristics,
    options.riskyLiquidationRate ?? CLUSTER_CONFIG.RISKY_LIQUIDATION_RATE,
  )
  const adjustments = clusterAdjustments(
    clustering.value.assignments,
    profiles,
    options.riskyClusterPenalty ?? CLUSTER_CONFIG.RISKY_CLUSTER_PENALTY,
  )
  const labels = new Map(clustering.value.assignments.map((a): [string, ClusterLabel] => [a.wallet, a.label]))

  // ── STEP 5: Normalize (population barrier) ────────────────────────────────
  const rawScores = new Map<string, number>()
  for (const wallet of groups.keys()) {
    const heuristic = vectorByWallet.has(wallet) ? heuristics.get(wallet) : undefined
    if (!heuristic) {
      const message = `Wallet ${wallet} reached normalization without a feature vector`
      log.error('pipeline', message)
      return { status: 'fatal', stage: 'normalize', code: ErrorCodes.MISSING_FEATURE_VECTOR, message }
    }
    rawScores.set(wallet, heuristic.score + (adjustments.get(wallet) ?? 0))
  }

  let finals: Map<string, number>
  try {
    finals = normalizeScores(rawScores)
  } catch (err) {
    if (err instanceof PipelineError) {
      log.error('pipeline', `Run aborted at ${err.stage}: ${err.message}`)
      return { status: 'fatal', stage: err.stage, code: err.code, message: err.message }
    }
    throw err
  }
  log.debug('normalize', `Normalized ${finals.size} scores onto the 0-1000 scale`)

  // ── STEP 6: Assemble ──────────────────────────────────────────────────────
  const scores: WalletScore[] = []
  for (const [wallet, rawScore] of rawScores) {
    scores.push({
      wallet,
      score: finals.get(wallet) ?? 0,
      rawScore,
      heuristicScore: heuristics.get(wallet)?.score ?? 0,
      clusterAdjustment: adjustments.get(wallet) ?? 0,
      clusterLabel: labels.get(wallet) ?? 'noise',
    })
  }
  scores.sort((a, b) => b.score - a.score || b.rawScore - a.rawScore || (a.wallet < b.wallet ? -1 : 1))

  const summary: RunSummary = {
    recordsRead,
    transactionsLoaded,
    dropped,
    dropReasons,
    walletCount: scores.length,
    clustering: {
      status: clustering.status,
      reason: clustering.status === 'degraded' ? clustering.reason : null,
      clusterCount: clustering.value.clusterCount,
      noiseCount: clustering.value.noiseCount,
      riskyClusters: profiles.filter((p) => p.risky).map((p) => p.clusterId),
    },
    distribution: describeScores(scores.map((s) => s.score)),
    durationMs: Date.now() - startedAt,
  }

  log.info('pipeline', `Scored ${scores.length} wallets (${clustering.status}) in ${summary.durationMs}ms`)

  return { status: clustering.status, scores, features: vectors, profiles, summary }
}
