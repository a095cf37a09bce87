import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { loadConfigFromEnv } from '../src/core/config.js'
import { createHttpApp } from '../src/transports/http.js'

describe('HTTP transport', () => {
  const app = createHttpApp(loadConfigFromEnv({ SMTP_REGION: 'us-east-1' }))

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('reports health', async () => {
    const res = await app.request('/health')

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      status: 'ok',
      service: 'mcp-ses-smtp',
      version: '0.1.0',
    })
  })

  it('describes its endpoints', async () => {
    const res = await app.request('/')

    expect(await res.json()).toMatchObject({
      name: 'MCP SES SMTP Server',
      transport: 'Streamable HTTP',
      endpoints: {
        mcp: {
          path: '/mcp',
          methods: ['POST', 'DELETE'],
          description: 'MCP Streamable HTTP endpoint',
        },
      },
    })
  })

  it('acknowledges session deletion', async () => {
    const res = await app.request('/mcp', { method: 'DELETE' })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok' })
  })

  it('answers malformed requests with a JSON-RPC internal error', async () => {
    const res = await app.request('/mcp', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    })

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      error: {
        code: -32603,
        message: expect.stringMatching(/^Internal error: /),
      },
      id: null,
    })
  })

  it('allows cross-origin MCP clients', async () => {
    const res = await app.request('/health', { headers: { Origin: 'https://client.example.com' } })

    expect(res.headers.get('access-control-allow-origin')).toBe('*')
    expect(res.headers.get('access-control-expose-headers')).toBe('mcp-session-id')
  })
})
