import { Hono } from 'hono'
import { beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { db, insertRun, publishRun } from '../../src/db.js'
import { getActiveRun, triggerRun } from '../../src/jobs/pipelineRunner.js'
import scoreRoute from '../../src/routes/score.js'
import { event, fakeWallet, liquidatedHistory, prudentHistory, runSummary, walletScore, writeLog } from '../factories.js'

const app = new Hono()
app.route('/v1/score', scoreRoute)

const triggered = z.object({ runId: z.string(), status: z.literal('pending'), pollUrl: z.string() })

beforeEach(async () => {
  await getActiveRun()?.done
  db.exec('DELETE FROM wallet_scores; DELETE FROM scoring_runs;')
})

describe('POST /v1/score/generate', () => {
  it('starts a run, returns 202 and the run becomes pollable', async () => {
    const prudent = fakeWallet()
    const risky = fakeWallet()
    process.env.TRANSACTIONS_PATH = writeLog([...prudentHistory(prudent), ...liquidatedHistory(risky)])

    const res = await app.request('/v1/score/generate', { method: 'POST' })
    expect(res.status).toBe(202)
    const body = triggered.parse(await res.json())
    expect(body.pollUrl).toBe(`/v1/score/runs/${body.runId}`)

    await getActiveRun()?.done

    const poll = await app.request(body.pollUrl)
    expect(poll.status).toBe(200)
    const run: unknown = await poll.json()
    expect(run).toMatchObject({
      runId: body.runId,
      status: 'degraded',
      walletCount: 2,
      error: null,
      summary: { recordsRead: 6, transactionsLoaded: 6, dropped: 0, walletCount: 2 },
    })

    const lookup = await app.request(`/v1/score/${prudent}`)
    const score: unknown = await lookup.json()
    expect(score).toEqual({
      wallet: prudent,
      score: 1000,
      clusterLabel: 'noise',
      runId: body.runId,
      calculatedAt: expect.any(String),
    })
  })

  it('returns 409 while another run is in flight', async () => {
    const runId = triggerRun(writeLog([event(fakeWallet(), 'deposit', 1)]))

    const res = await app.request('/v1/score/generate', { method: 'POST' })
    expect(res.status).toBe(409)
    const body: unknown = await res.json()
    expect(body).toEqual({
      error: { code: 'run_in_progress', message: 'A scoring run is already in progress', details: { runId } },
    })
  })

  it('returns 409 when the store already holds a pending run', async () => {
    insertRun('cli-run', 'a.json')

    const res = await app.request('/v1/score/generate', { method: 'POST' })
    expect(res.status).toBe(409)
    const body: unknown = await res.json()
    expect(body).toEqual({
      error: { code: 'run_in_progress', message: 'A scoring run is already in progress', details: { runId: 'cli-run' } },
    })
  })
})

describe('GET /v1/score/runs/:runId', () => {
  it('rejects a malformed run id', async () => {
    const res = await app.request('/v1/score/runs/not-a-uuid')
    expect(res.status).toBe(400)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: { code: 'invalid_run_id', message: 'Invalid run ID format' } })
  })

  it('returns 404 for an unknown run', async () => {
    const res = await app.request('/v1/score/runs/1b4e28ba-2fa1-41d2-883f-0016d3cca427')
    expect(res.status).toBe(404)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: { code: 'run_not_found', message: 'Run not found' } })
  })
})

describe('GET /v1/score/:wallet', () => {
  it('rejects an invalid address', async () => {
    const res = await app.request('/v1/score/0x123')
    expect(res.status).toBe(400)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: { code: 'invalid_wallet', message: 'Invalid wallet address' } })
  })

  it('returns no_scores before any run has published', async () => {
    const res = await app.request(`/v1/score/${fakeWallet()}`)
    expect(res.status).toBe(404)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: { code: 'no_scores', message: 'No scoring run has been published yet' } })
  })

  it('returns wallet_not_found for a wallet outside the last run', async () => {
    insertRun('run-1', 'a.json')
    publishRun('run-1', 'ok', [walletScore()], runSummary())
    const stranger = fakeWallet()

    const res = await app.request(`/v1/score/${stranger}`)
    expect(res.status).toBe(404)
    const body: unknown = await res.json()
    expect(body).toEqual({
      error: {
        code: 'wallet_not_found',
        message: 'Wallet was not part of the last scoring run',
        details: { wallet: stranger },
      },
    })
  })

  it('returns wallet_not_found when the last run published no wallets', async () => {
    insertRun('run-empty', 'a.json')
    publishRun('run-empty', 'degraded', [], runSummary())
    const wallet = fakeWallet()

    const res = await app.request(`/v1/score/${wallet}`)
    expect(res.status).toBe(404)
    const body: unknown = await res.json()
    expect(body).toEqual({
      error: {
        code: 'wallet_not_found',
        message: 'Wallet was not part of the last scoring run',
        details: { wallet },
      },
    })
  })

  it('looks a wallet up case-insensitively and reports its cluster', async () => {
    const wallet = '0x00000000000000000000000000000000000000ef'
    insertRun('run-1', 'a.json')
    publishRun('run-1', 'ok', [walletScore({ wallet, score: 321, clusterLabel: 2 })], runSummary())

    const res = await app.request('/v1/score/0x00000000000000000000000000000000000000EF')
    expect(res.status).toBe(200)
    const body: unknown = await res.json()
    expect(body).toEqual({
      wallet,
      score: 321,
      clusterLabel: 2,
      runId: 'run-1',
      calculatedAt: expect.any(String),
    })
  })
})
