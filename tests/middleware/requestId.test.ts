import { Hono } from 'hono'
import { describe, expect, it } from 'vitest'
import { requestIdMiddleware } from '../../src/middleware/requestId.js'
import type { AppEnv } from '../../src/types/hono-env.js'

function buildApp() {
  const app = new Hono<AppEnv>()
  app.use('*', requestIdMiddleware)
  app.get('/echo', (c) => c.text(c.get('requestId')))
  return app
}

describe('requestIdMiddleware', () => {
  it('reuses the caller-supplied request id', async () => {
    const res = await buildApp().request('/echo', { headers: { 'X-Request-ID': 'req-123' } })
    expect(res.headers.get('X-Request-ID')).toBe('req-123')
    expect(await res.text()).toBe('req-123')
  })

  it('generates a UUID when none is supplied', async () => {
    const res = await buildApp().request('/echo')
    const id = res.headers.get('X-Request-ID')
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
    expect(await res.text()).toBe(id)
  })
})
