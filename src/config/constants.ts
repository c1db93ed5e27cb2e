/**
 * Centralized configuration constants.
 *
 * Weights and thresholds for the scoring model are tunable here. They are
 * plain values handed to the scorer/clusterer at construction, so tests and
 * experiments can pass their own tables side by side.
 */
import type { FeatureKey, HeuristicWeights } from '../types.js'

export const MODEL_VERSION = '1.0.0'

// ── API ─────────────────────────────────────────────────────────────────────

export const API_CONFIG = {
  DEFAULT_PORT: 3000,
  /** Trigger/lookup bodies are tiny; anything larger is abuse */
  MAX_BODY_SIZE: 16 * 1024,
  /** Graceful shutdown timeout (ms) */
  SHUTDOWN_TIMEOUT_MS: 10_000,
} as const

export const LEADERBOARD_CONFIG = {
  DEFAULT_LIMIT: 10,
  MAX_LIMIT: 100,
} as const

// ── Data loading ────────────────────────────────────────────────────────────

export const DATA_CONFIG = {
  /** Default transaction log, relative to the working directory */
  DEFAULT_TRANSACTIONS_PATH: 'data/raw/user-wallet-transactions.json',
  /** Asset label for records that name none */
  UNKNOWN_ASSET: 'UNKNOWN',
} as const

// ── Feature aggregation ─────────────────────────────────────────────────────

export const FEATURE_CONFIG = {
  SECONDS_PER_DAY: 86_400,
  /** Health-factor proxies are capped here; also the no-debt sentinel */
  HEALTH_FACTOR_CAP: 10,
  /** min/mean health factor for wallets that never carried debt */
  NO_DEBT_HEALTH_FACTOR: 10,
  /** repay/borrow ratio for wallets that never borrowed */
  FULLY_REPAID_RATIO: 1,
  /** borrow/deposit ratio ceiling, also used for borrow-without-deposit */
  MAX_BORROW_TO_DEPOSIT: 10,
} as const

// ── Heuristic model ─────────────────────────────────────────────────────────

/**
 * Default weight table. Every unbounded feature is capped or log-scaled so
 * no single one dominates; liquidations are the one deliberately heavy term.
 */
export const DEFAULT_HEURISTIC_WEIGHTS: Readonly<HeuristicWeights> = Object.freeze({
  base: 500,
  liquidations: { weight: -400, maxCount: 5 },
  riskyHealthFactor: { weight: -100, threshold: 1.5 },
  leverage: { weight: -50, cap: 150 },
  botFrequency: { weight: -5, threshold: 10, cap: 100 },
  walletAge: { weight: 0.3, cap: 75 },
  meanHealthFactor: { weight: 10, ceiling: 10, cap: 100 },
  repayment: { weight: 50, cap: 50 },
  netDeposit: { weight: 5, cap: 75 },
  activeDays: { weight: 1, cap: 50 },
  assetDiversity: { weight: 5, cap: 25 },
})

// ── Clustering ──────────────────────────────────────────────────────────────

export const CLUSTER_FEATURE_KEYS: readonly FeatureKey[] = [
  'walletAgeDays',
  'transactionFrequency',
  'liquidationCount',
  'minHealthFactorProxy',
  'repayToBorrowRatio',
  'borrowToDepositRatio',
  'assetDiversity',
  'uniqueActiveDays',
]

export const CLUSTER_CONFIG = {
  /** Neighbourhood radius in standardized feature space */
  EPS: 0.75,
  /** Neighbours (self included) for a core point */
  MIN_POINTS: 5,
  /** Clusters smaller than this are dissolved into noise */
  MIN_CLUSTER_SIZE: 15,
  /** Clusters where at least this share of members was liquidated are risky */
  RISKY_LIQUIDATION_RATE: 0.5,
  /** Raw-score adjustment for members of a risky cluster */
  RISKY_CLUSTER_PENALTY: -50,
} as const

// ── Normalization ───────────────────────────────────────────────────────────

export const NORMALIZER_CONFIG = {
  MIN_SCORE: 0,
  MAX_SCORE: 1000,
} as const
