import { Hono } from 'hono'
import { beforeAll, describe, expect, it } from 'vitest'
import { db, insertRun, publishRun } from '../../src/db.js'
import leaderboardRoute from '../../src/routes/leaderboard.js'
import { runSummary, walletScore } from '../factories.js'

const app = new Hono()
app.route('/v1/leaderboard', leaderboardRoute)

beforeAll(() => {
  db.exec('DELETE FROM wallet_scores; DELETE FROM scoring_runs;')
  insertRun('run-1', 'a.json')
  publishRun(
    'run-1',
    'ok',
    Array.from({ length: 12 }, (_, i) =>
      walletScore({
        wallet: `0x${String(i).padStart(40, '0')}`,
        score: i * 80,
        rawScore: i,
        clusterLabel: i % 2 === 0 ? 0 : 'noise',
      }),
    ),
    runSummary({ walletCount: 12 }),
  )
})

describe('GET /v1/leaderboard', () => {
  it('lists the top 10 by default', async () => {
    const res = await app.request('/v1/leaderboard')
    expect(res.status).toBe(200)
    const body: unknown = await res.json()
    expect(body).toMatchObject({ order: 'top', totalWalletsScored: 12, runId: 'run-1' })
    expect(body).toHaveProperty('leaderboard.length', 10)
    expect(body).toHaveProperty('leaderboard.0', {
      rank: 1,
      wallet: `0x${'11'.padStart(40, '0')}`,
      score: 880,
      clusterLabel: 'noise',
    })
  })

  it('lists the bottom of the table', async () => {
    const res = await app.request('/v1/leaderboard?order=bottom&limit=2')
    const body: unknown = await res.json()
    expect(body).toEqual({
      order: 'bottom',
      leaderboard: [
        { rank: 1, wallet: `0x${'0'.padStart(40, '0')}`, score: 0, clusterLabel: 0 },
        { rank: 2, wallet: `0x${'1'.padStart(40, '0')}`, score: 80, clusterLabel: 'noise' },
      ],
      totalWalletsScored: 12,
      runId: 'run-1',
    })
  })

  it('rejects an unknown order', async () => {
    const res = await app.request('/v1/leaderboard?order=middle')
    expect(res.status).toBe(400)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: { code: 'invalid_query', message: 'order must be "top" or "bottom"' } })
  })

  it.each(['0', '101', '2.5', 'ten'])('rejects limit=%s', async (limit) => {
    const res = await app.request(`/v1/leaderboard?limit=${limit}`)
    expect(res.status).toBe(400)
    const body: unknown = await res.json()
    expect(body).toEqual({
      error: { code: 'invalid_query', message: 'limit must be an integer between 1 and 100' },
    })
  })

  it('accepts the maximum limit', async () => {
    const res = await app.request('/v1/leaderboard?limit=100')
    expect(res.status).toBe(200)
    const body: unknown = await res.json()
    expect(body).toHaveProperty('leaderboard.length', 12)
  })
})
