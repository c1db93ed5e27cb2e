export type Address = `0x${string}`

/** Type guard: validates a 0x-prefixed, 40-hex-char Ethereum address. */
export function isValidAddress(addr: string): addr is Address {
  return /^0x[0-9a-fA-F]{40}$/.test(addr)
}

// ---------- Transactions ----------

export type ActionKind = 'deposit' | 'borrow' | 'repay' | 'redeem' | 'liquidation'

/** One validated lending-protocol event. Wallet is always lower-cased. */
export interface Transaction {
  readonly wallet: string
  readonly action: ActionKind
  readonly asset: string
  /** Protocol-native amount as reported by the record */
  readonly amount: number
  /** amount × assetPriceUSD, or 0 when the record carries no price */
  readonly valueUsd: number
  /** Epoch seconds, UTC */
  readonly timestamp: number
  readonly txHash?: string
  /** USD value of collateral seized (liquidations only) */
  readonly collateralUsd?: number
  /** The liquidated user, when the record names one */
  readonly borrower?: string
}

export type DropReason =
  | 'not_an_object'
  | 'missing_wallet'
  | 'unknown_action'
  | 'invalid_amount'
  | 'invalid_timestamp'
  | 'invalid_metadata'

export interface LoadedTransactions {
  /** Wallet → events, ascending by timestamp */
  groups: Map<string, Transaction[]>
  recordsRead: number
  transactionsLoaded: number
  dropped: number
  dropReasons: Partial<Record<DropReason, number>>
}

// ---------- Features ----------

export interface WalletFeatureVector {
  wallet: string

  // Stability
  walletAgeDays: number
  totalTransactions: number
  uniqueActiveDays: number
  transactionFrequency: number

  // Activity
  depositCount: number
  borrowCount: number
  repayCount: number
  redeemCount: number
  liquidationCount: number
  assetDiversity: number

  // Financial health
  totalDepositUsd: number
  totalBorrowUsd: number
  totalRepayUsd: number
  totalRedeemUsd: number
  totalLiquidationUsd: number
  averageTransactionUsd: number
  netDepositUsd: number

  // Risk
  minHealthFactorProxy: number
  meanHealthFactorProxy: number
  healthFactorObservations: number
  repayToBorrowRatio: number
  borrowToDepositRatio: number
}

/** Numeric feature names, usable as clustering coordinates. */
export type FeatureKey = Exclude<keyof WalletFeatureVector, 'wallet'>

// ---------- Heuristic model ----------

export interface HeuristicTerm {
  /** Signed: negative = penalty, positive = reward */
  weight: number
  /** Upper bound on the absolute contribution, if any */
  cap?: number
}

export interface HeuristicWeights {
  base: number
  liquidations: HeuristicTerm & { maxCount: number }
  riskyHealthFactor: HeuristicTerm & { threshold: number }
  leverage: HeuristicTerm
  botFrequency: HeuristicTerm & { threshold: number }
  walletAge: HeuristicTerm
  meanHealthFactor: HeuristicTerm & { ceiling: number }
  repayment: HeuristicTerm
  netDeposit: HeuristicTerm
  activeDays: HeuristicTerm
  assetDiversity: HeuristicTerm
}

export type HeuristicTermName = Exclude<keyof HeuristicWeights, 'base'>

export interface HeuristicBreakdown {
  wallet: string
  score: number
  contributions: Record<HeuristicTermName, number>
}

// ---------- Clustering ----------

export type ClusterLabel = number | 'noise'

export interface ClusterAssignment {
  wallet: string
  label: ClusterLabel
}

export interface ClusterProfile {
  clusterId: number
  size: number
  /** Share of members with at least one liquidation */
  liquidationRate: number
  meanHeuristicScore: number
  risky: boolean
}

export interface ClusteringResult {
  assignments: ClusterAssignment[]
  clusterCount: number
  noiseCount: number
}

// ---------- Stage outcomes ----------

export type PipelineStage = 'load' | 'aggregate' | 'score' | 'cluster' | 'normalize'

export type StageOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string }
  | { status: 'fatal'; stage: PipelineStage; code: string; message: string }

// ---------- Pipeline output ----------

export interface WalletScore {
  wallet: string
  score: number
  rawScore: number
  heuristicScore: number
  clusterAdjustment: number
  clusterLabel: ClusterLabel
}

export interface ScoreDistribution {
  count: number
  mean: number
  std: number
  min: number
  p25: number
  p50: number
  p75: number
  max: number
}

export interface RunSummary {
  recordsRead: number
  transactionsLoaded: number
  dropped: number
  dropReasons: Partial<Record<DropReason, number>>
  walletCount: number
  clustering: {
    status: 'ok' | 'degraded'
    reason: string | null
    clusterCount: number
    noiseCount: number
    riskyClusters: number[]
  }
  distribution: ScoreDistribution
  durationMs: number
}

export type PipelineOutcome =
  | {
      status: 'ok' | 'degraded'
      scores: WalletScore[]
      /** Per-wallet feature matrix, in wallet order */
      features: WalletFeatureVector[]
      profiles: ClusterProfile[]
      summary: RunSummary
    }
  | { status: 'fatal'; stage: PipelineStage; code: string; message: string }

// ---------- Persistence rows ----------

export interface WalletScoreRow {
  wallet: string
  score: number
  raw_score: number
  heuristic_score: number
  cluster_adjustment: number
  cluster_label: number | null
  run_id: string
  calculated_at: string
}

export type RunStatus = 'pending' | 'ok' | 'degraded' | 'fatal'

export interface ScoringRunRow {
  run_id: string
  status: RunStatus
  source: string
  started_at: string
  finished_at: string | null
  wallet_count: number
  summary_json: string | null
  error: string | null
}

// ---------- API responses ----------

export interface WalletScoreResponse {
  wallet: string
  score: number
  clusterLabel: ClusterLabel
  runId: string
  calculatedAt: string
}

export interface LeaderboardEntry {
  rank: number
  wallet: string
  score: number
  clusterLabel: ClusterLabel
}

export interface LeaderboardResponse {
  order: 'top' | 'bottom'
  leaderboard: LeaderboardEntry[]
  totalWalletsScored: number
  runId: string | null
}
