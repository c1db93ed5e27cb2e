import { describe, expect, it } from 'vitest'
import app from '../src/app.js'
import { MODEL_VERSION } from '../src/config/constants.js'

describe('app', () => {
  it('answers unknown paths with a JSON 404', async () => {
    const res = await app.request('/nope')
    expect(res.status).toBe(404)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: { code: 'not_found', message: 'Not found' } })
  })

  it('runs the global middleware on every route', async () => {
    const res = await app.request('/health', { headers: { 'X-Request-ID': 'abc' } })
    expect(res.status).toBe(200)
    expect(res.headers.get('X-Request-ID')).toBe('abc')
    expect(res.headers.get('X-Model-Version')).toBe(MODEL_VERSION)
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*')
  })

  it('rejects oversized bodies', async () => {
    const res = await app.request('/v1/score/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Content-Length': String(64 * 1024) },
      body: 'x'.repeat(64 * 1024),
    })
    expect(res.status).toBe(413)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: { code: 'body_too_large', message: 'Request body too large' } })
  })

  it('mounts the score and leaderboard routes', async () => {
    const lookup = await app.request('/v1/score/0xnotanaddress')
    expect(lookup.status).toBe(400)

    const board = await app.request('/v1/leaderboard?order=sideways')
    expect(board.status).toBe(400)
  })
})
