/**
 * Heuristic risk/reward model.
 *
 * raw = base + Σ term contributions. Each term transforms one feature
 * (count cap, threshold, log1p) and multiplies it by its signed weight; the
 * term's cap then bounds the absolute contribution.
 *
 *   liquidations       weight × min(count, maxCount)
 *   riskyHealthFactor  weight × (threshold − minHF)    only when minHF < threshold
 *   leverage           weight × borrow/deposit
 *   botFrequency       weight × (tx/day − threshold)   only above threshold
 *   walletAge          weight × days
 *   meanHealthFactor   weight × min(meanHF, ceiling)   borrowers only
 *   repayment          weight × repay/borrow
 *   netDeposit         weight × ln(1 + max(0, net USD))
 *   activeDays         weight × distinct active days
 *   assetDiversity     weight × distinct assets
 */
import { DEFAULT_HEURISTIC_WEIGHTS } from '../config/constants.js'
import type { HeuristicBreakdown, HeuristicTermName, HeuristicWeights, WalletFeatureVector } from '../types.js'

function bounded(value: number, cap: number | undefined): number {
  if (cap === undefined) return value
  return Math.max(-cap, Math.min(cap, value))
}

export class HeuristicScorer {
  constructor(private readonly weights: Readonly<HeuristicWeights> = DEFAULT_HEURISTIC_WEIGHTS) {}

  contributions(v: WalletFeatureVector): Record<HeuristicTermName, number> {
    const w = this.weights
    const hasDebtHistory = v.healthFactorObservations > 0

    const riskyHf =
      hasDebtHistory && v.minHealthFactorProxy < w.riskyHealthFactor.threshold
        ? w.riskyHealthFactor.weight * (w.riskyHealthFactor.threshold - v.minHealthFactorProxy)
        : 0

    const excessFrequency = Math.max(0, v.transactionFrequency - w.botFrequency.threshold)

    const meanHf =
      v.borrowCount > 0 && hasDebtHistory
        ? w.meanHealthFactor.weight * Math.min(v.meanHealthFactorProxy, w.meanHealthFactor.ceiling)
        : 0

    return {
      liquidations: bounded(w.liquidations.weight * Math.min(v.liquidationCount, w.liquidations.maxCount), w.liquidations.cap),
      riskyHealthFactor: bounded(riskyHf, w.riskyHealthFactor.cap),
      leverage: bounded(w.leverage.weight * v.borrowToDepositRatio, w.leverage.cap),
      botFrequency: bounded(w.botFrequency.weight * excessFrequency, w.botFrequency.cap),
      walletAge: bounded(w.walletAge.weight * v.walletAgeDays, w.walletAge.cap),
      meanHealthFactor: bounded(meanHf, w.meanHealthFactor.cap),
      repayment: bounded(w.repayment.weight * v.repayToBorrowRatio, w.repayment.cap),
      netDeposit: bounded(w.netDeposit.weight * Math.log1p(Math.max(0, v.netDepositUsd)), w.netDeposit.cap),
      activeDays: bounded(w.activeDays.weight * v.uniqueActiveDays, w.activeDays.cap),
      assetDiversity: bounded(w.assetDiversity.weight * v.assetDiversity, w.assetDiversity.cap),
    }
  }

  score(v: WalletFeatureVector): HeuristicBreakdown {
    const contributions = this.contributions(v)
    let score = this.weights.base
    for (const value of Object.values(contributions)) score += value
    return { wallet: v.wallet, score, contributions }
  }

  scoreAll(vectors: readonly WalletFeatureVector[]): HeuristicBreakdown[] {
    return vectors.map((v) => this.score(v))
  }
}
