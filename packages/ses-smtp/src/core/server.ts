import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { AppConfig } from './config.js'
import { registerAllTools } from './tools/index.js'

export const SERVER_NAME = 'ses-smtp'
export const SERVER_VERSION = '0.1.0'

/**
 * 创建 MCP Server 实例
 *
 * @param config - 应用配置
 * @returns 配置好的 MCP Server
 */
export function createMcpServer(config: AppConfig): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  })

  registerAllTools(server, config)

  return server
}
