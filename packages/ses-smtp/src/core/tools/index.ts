import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { AppConfig } from '../config.js'
import { registerCredentialTools } from './credentials.js'
import { registerSendTools } from './send.js'

/**
 * 注册所有 MCP 工具
 */
export function registerAllTools(server: McpServer, config: AppConfig) {
  registerCredentialTools(server)
  registerSendTools(server, config)
}
