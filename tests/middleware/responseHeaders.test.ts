import { Hono } from 'hono'
import { describe, expect, it } from 'vitest'
import { MODEL_VERSION } from '../../src/config/constants.js'
import { responseHeadersMiddleware } from '../../src/middleware/responseHeaders.js'

describe('responseHeadersMiddleware', () => {
  it('stamps the model version and security headers', async () => {
    const app = new Hono()
    app.use('*', responseHeadersMiddleware)
    app.get('/test', (c) => c.text('ok'))

    const res = await app.request('/test')
    expect(res.headers.get('X-Model-Version')).toBe(MODEL_VERSION)
    expect(MODEL_VERSION).toBe('1.0.0')
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
    expect(res.headers.get('X-Frame-Options')).toBe('DENY')
    expect(res.headers.get('Content-Security-Policy')).toBe("default-src 'none'; frame-ancestors 'none'")
  })
})
