import { describe, expect, it, vi } from 'vitest'
import { MODEL_VERSION } from '../../src/config/constants.js'

vi.mock('../../src/db.js', () => ({
  countWalletScores: vi.fn().mockReturnValue(42),
  getLatestPublishedRun: vi.fn().mockReturnValue({
    run_id: 'run-7',
    status: 'ok',
    source: 'a.json',
    started_at: '2024-01-01T00:00:00.000Z',
    finished_at: '2024-01-01T00:00:05.000Z',
    wallet_count: 42,
    summary_json: '{}',
    error: null,
  }),
}))

vi.mock('../../src/jobs/pipelineRunner.js', () => ({
  getActiveRun: vi.fn().mockReturnValue(null),
}))

vi.mock('../../src/jobs/jobStats.js', () => ({
  jobStats: {
    runsStarted: 3,
    lastRun: { runId: 'run-7', status: 'ok', finishedAt: '2024-01-01T00:00:05.000Z', walletCount: 42, durationMs: 12 },
  },
}))

describe('GET /health', () => {
  it('reports the model version, the published run and the runner', async () => {
    const { Hono } = await import('hono')
    const { default: healthRoute } = await import('../../src/routes/health.js')

    const app = new Hono()
    app.route('/health', healthRoute)

    const res = await app.request('/health')
    expect(res.status).toBe(200)
    const body: unknown = await res.json()
    expect(body).toEqual({
      status: 'ok',
      modelVersion: MODEL_VERSION,
      uptime: expect.any(Number),
      database: {
        walletsScored: 42,
        publishedRunId: 'run-7',
        publishedAt: '2024-01-01T00:00:05.000Z',
      },
      runner: {
        activeRunId: null,
        runsStarted: 3,
        lastRun: { runId: 'run-7', status: 'ok', finishedAt: '2024-01-01T00:00:05.000Z', walletCount: 42, durationMs: 12 },
      },
    })
  })
})
