#!/usr/bin/env node
/**
 * SES SMTP MCP Server 的 stdio 入口（bin: ses-smtp-mcp）
 *
 * list_smtp_regions、derive_smtp_credentials 无需任何环境变量；
 * send_email、test_connection 需要 SMTP_REGION（或受支持的 AWS_REGION）、
 * SMTP_ACCESS_KEY_ID、SMTP_SECRET_ACCESS_KEY 和 SMTP_FROM，见 .env.example。
 */
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { createMcpServer } from '../core/server.js'
import { loadConfigFromEnv } from '../core/config.js'

async function main() {
  const config = loadConfigFromEnv()

  const server = createMcpServer(config)

  // stdout 由 MCP 协议占用，日志只能写 stderr
  const transport = new StdioServerTransport()
  await server.connect(transport)
}

main().catch((error) => {
  console.error('MCP Server failed to start:', error)
  process.exit(1)
})
