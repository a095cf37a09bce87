/**
 * Streamable HTTP 传输
 *
 * 无状态模式：每个请求创建独立的 Server 与 Transport
 */
import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import { toReqRes, toFetchResponse } from 'fetch-to-node'
import type { AppConfig } from '../core/config.js'
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from '../core/server.js'

function logCloseError(error: unknown) {
  console.error('Failed to close MCP session:', error instanceof Error ? error.message : error)
}

export function createHttpApp(config: AppConfig): Hono {
  const app = new Hono()

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'mcp-session-id'],
      exposeHeaders: ['mcp-session-id'],
    })
  )

  /**
   * MCP 端点 - 处理 Streamable HTTP 请求
   */
  app.post('/mcp', async (c) => {
    try {
      const server = createMcpServer(config)

      const { req, res } = toReqRes(c.req.raw)

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      })

      res.on('close', () => {
        transport.close().catch(logCloseError)
        server.close().catch(logCloseError)
      })

      await server.connect(transport)

      const body: unknown = await c.req.json()
      await transport.handleRequest(req, res, body)

      return toFetchResponse(res)
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error'
      console.error('MCP request error:', message)

      return c.json(
        {
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: `Internal error: ${message}`,
          },
          id: null,
        },
        500
      )
    }
  })

  /**
   * 无状态模式下没有需要关闭的会话
   */
  app.delete('/mcp', (c) => {
    return c.json({ status: 'ok' })
  })

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: `mcp-${SERVER_NAME}`,
      version: SERVER_VERSION,
      timestamp: new Date().toISOString(),
    })
  })

  app.get('/', (c) => {
    return c.json({
      name: 'MCP SES SMTP Server',
      version: SERVER_VERSION,
      description: 'Amazon SES SMTP credentials and email delivery',
      transport: 'Streamable HTTP',
      endpoints: {
        mcp: {
          path: '/mcp',
          methods: ['POST', 'DELETE'],
          description: 'MCP Streamable HTTP endpoint',
        },
        health: {
          path: '/health',
          methods: ['GET'],
          description: 'Health check',
        },
      },
    })
  })

  return app
}
