import { describe, expect, it } from 'vitest'
import { formatFeatureMatrix, formatReport } from '../src/report.js'
import { FEATURE_COLUMNS } from '../src/scoring/features.js'
import { runSummary, vector, walletScore } from './factories.js'

const high = walletScore({ wallet: '0xhigh', score: 1000, rawScore: 640.25, clusterLabel: 0 })
const mid = walletScore({ wallet: '0xmid', score: 500, rawScore: 500 })
const low = walletScore({ wallet: '0xlow', score: 0, rawScore: -310.5, clusterLabel: 1 })

const summary = runSummary({
  recordsRead: 10,
  transactionsLoaded: 9,
  dropped: 1,
  walletCount: 3,
  clustering: { status: 'ok', reason: null, clusterCount: 2, noiseCount: 1, riskyClusters: [1] },
  distribution: { count: 3, mean: 500, std: 500, min: 0, p25: 250, p50: 500, p75: 750, max: 1000 },
})

describe('formatReport', () => {
  it('prints the run summary and both ends of the table', () => {
    const lines = formatReport({ status: 'ok', scores: [high, mid, low], features: [], profiles: [], summary }, 2).split('\n')

    expect(lines).toEqual([
      'Status: ok',
      'Records read: 10, loaded: 9, dropped: 1',
      'Wallets scored: 3',
      'Clusters: 2, noise wallets: 1, risky: 1',
      'Score distribution: mean 500, std 500, min 0, p25 250, p50 500, p75 750, max 1000',
      '',
      'Top 2 wallets:',
      '    1. 0xhigh  1000  (raw 640.25, cluster 0)',
      '    2. 0xmid   500  (raw 500.00, noise)',
      '',
      'Bottom 2 wallets:',
      '    3. 0xlow     0  (raw -310.50, cluster 1)',
      '    2. 0xmid   500  (raw 500.00, noise)',
      '',
    ])
  })

  it('names the reason for a degraded run', () => {
    const degraded = runSummary({
      clustering: { status: 'degraded', reason: 'too few wallets', clusterCount: 0, noiseCount: 3, riskyClusters: [] },
    })
    const out = formatReport({ status: 'degraded', scores: [], features: [], profiles: [], summary: degraded }, 10)
    expect(out.split('\n')[0]).toBe('Status: degraded (too few wallets)')
    expect(out.split('\n')[3]).toBe('Clusters: 0, noise wallets: 3')
  })
})

describe('formatFeatureMatrix', () => {
  it('writes a header and one row per wallet', () => {
    const csv = formatFeatureMatrix([vector({ wallet: '0xabc', walletAgeDays: 2.5, liquidationCount: 1 })])
    expect(csv.split('\n')).toEqual([
      FEATURE_COLUMNS.join(','),
      '0xabc,2.5,1,1,1,1,0,0,0,1,1,0,0,0,0,0,0,0,10,10,0,1,0',
      '',
    ])
  })

  it('covers every feature', () => {
    expect([...FEATURE_COLUMNS].sort()).toEqual(Object.keys(vector()).sort())
  })
})
