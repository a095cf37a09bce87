#!/usr/bin/env node
/**
 * HTTP 传输入口（Node.js）
 */
import { serve } from '@hono/node-server'
import { loadConfigFromEnv } from '../core/config.js'
import { createHttpApp } from './http.js'

function main() {
  const config = loadConfigFromEnv()
  const app = createHttpApp(config)

  serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    console.error(`MCP HTTP server listening on http://localhost:${info.port}`)
  })
}

try {
  main()
} catch (error) {
  console.error('MCP HTTP server failed to start:', error)
  process.exit(1)
}
