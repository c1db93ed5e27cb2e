/**
 * Feature aggregation — one forward scan per wallet over its time-ordered
 * events, accumulating running sums, counts and extremes.
 *
 * Every field of the result is finite. Ratios that would divide by zero
 * resolve to the sentinels in FEATURE_CONFIG.
 */
import { FEATURE_CONFIG } from '../config/constants.js'
import { log } from '../logger.js'
import type { Transaction, WalletFeatureVector } from '../types.js'

const {
  SECONDS_PER_DAY,
  HEALTH_FACTOR_CAP,
  NO_DEBT_HEALTH_FACTOR,
  FULLY_REPAID_RATIO,
  MAX_BORROW_TO_DEPOSIT,
} = FEATURE_CONFIG

/** Column order for the exported feature matrix. */
export const FEATURE_COLUMNS: readonly (keyof WalletFeatureVector)[] = [
  'wallet',
  'walletAgeDays',
  'totalTransactions',
  'uniqueActiveDays',
  'transactionFrequency',
  'depositCount',
  'borrowCount',
  'repayCount',
  'redeemCount',
  'liquidationCount',
  'assetDiversity',
  'totalDepositUsd',
  'totalBorrowUsd',
  'totalRepayUsd',
  'totalRedeemUsd',
  'totalLiquidationUsd',
  'averageTransactionUsd',
  'netDepositUsd',
  'minHealthFactorProxy',
  'meanHealthFactorProxy',
  'healthFactorObservations',
  'repayToBorrowRatio',
  'borrowToDepositRatio',
]

function utcDay(timestamp: number): number {
  return Math.floor(timestamp / SECONDS_PER_DAY)
}

/**
 * Aggregate one wallet. `txs` must be sorted ascending by timestamp, as the
 * loader returns them.
 */
export function aggregateWallet(wallet: string, txs: readonly Transaction[]): WalletFeatureVector {
  const counts = { deposit: 0, borrow: 0, repay: 0, redeem: 0, liquidation: 0 }
  const totals = { deposit: 0, borrow: 0, repay: 0, redeem: 0, liquidation: 0 }
  const assets = new Set<string>()
  const activeDays = new Set<number>()

  // Running position for the health-factor proxy
  let collateral = 0
  let debt = 0
  let hfMin = Infinity
  let hfSum = 0
  let hfObservations = 0

  let totalValue = 0
  let liquidatedAsBorrower = 0

  for (const tx of txs) {
    counts[tx.action]++
    totals[tx.action] += tx.valueUsd
    totalValue += tx.valueUsd
    assets.add(tx.asset)
    activeDays.add(utcDay(tx.timestamp))

    switch (tx.action) {
      case 'deposit':
        collateral += tx.valueUsd
        break
      case 'redeem':
        collateral = Math.max(0, collateral - tx.valueUsd)
        break
      case 'borrow':
        debt += tx.valueUsd
        break
      case 'repay':
        debt = Math.max(0, debt - tx.valueUsd)
        break
      case 'liquidation':
        // Records naming another user are this wallet acting as liquidator
        if (tx.borrower !== undefined && tx.borrower !== wallet) break
        liquidatedAsBorrower++
        debt = Math.max(0, debt - tx.valueUsd)
        collateral = Math.max(0, collateral - (tx.collateralUsd ?? 0))
        break
    }

    if (debt > 0) {
      const hf = Math.min(collateral / debt, HEALTH_FACTOR_CAP)
      if (hf < hfMin) hfMin = hf
      hfSum += hf
      hfObservations++
    }
  }

  const first = txs.length > 0 ? txs[0].timestamp : 0
  const last = txs.length > 0 ? txs[txs.length - 1].timestamp : 0
  const uniqueActiveDays = activeDays.size

  // ── Ratios with documented sentinels ─────────────────────────────────────
  let repayToBorrowRatio: number
  if (totals.borrow > 0) {
    repayToBorrowRatio = totals.repay / totals.borrow
  } else if (counts.borrow > 0) {
    // Borrowed, but no priced value to compare against
    repayToBorrowRatio = counts.repay > 0 ? FULLY_REPAID_RATIO : 0
  } else {
    repayToBorrowRatio = FULLY_REPAID_RATIO
  }

  let borrowToDepositRatio: number
  if (totals.deposit > 0) {
    borrowToDepositRatio = Math.min(totals.borrow / totals.deposit, MAX_BORROW_TO_DEPOSIT)
  } else {
    borrowToDepositRatio = totals.borrow > 0 ? MAX_BORROW_TO_DEPOSIT : 0
  }

  return {
    wallet,
    walletAgeDays: (last - first) / SECONDS_PER_DAY,
    totalTransactions: txs.length,
    uniqueActiveDays,
    transactionFrequency: uniqueActiveDays > 0 ? txs.length / uniqueActiveDays : 0,

    depositCount: counts.deposit,
    borrowCount: counts.borrow,
    repayCount: counts.repay,
    redeemCount: counts.redeem,
    liquidationCount: liquidatedAsBorrower,
    assetDiversity: assets.size,

    totalDepositUsd: totals.deposit,
    totalBorrowUsd: totals.borrow,
    totalRepayUsd: totals.repay,
    totalRedeemUsd: totals.redeem,
    totalLiquidationUsd: totals.liquidation,
    averageTransactionUsd: txs.length > 0 ? totalValue / txs.length : 0,
    netDepositUsd: totals.deposit - totals.redeem,

    minHealthFactorProxy: hfObservations > 0 ? hfMin : NO_DEBT_HEALTH_FACTOR,
    meanHealthFactorProxy: hfObservations > 0 ? hfSum / hfObservations : NO_DEBT_HEALTH_FACTOR,
    healthFactorObservations: hfObservations,
    repayToBorrowRatio,
    borrowToDepositRatio,
  }
}

/** One vector per wallet group, in the groups' iteration order. */
export function aggregateFeatures(groups: ReadonlyMap<string, readonly Transaction[]>): WalletFeatureVector[] {
  const vectors: WalletFeatureVector[] = []
  for (const [wallet, txs] of groups) {
    vectors.push(aggregateWallet(wallet, txs))
  }
  log.info('features', `Aggregated ${vectors.length} feature vectors`)
  return vectors
}
