import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { UnsupportedRegionError, deriveSmtpCredentials } from '../credentials.js'
import { SMTP_REGIONS, SMTP_REGION_NAMES, isSmtpPort, smtpEndpoint } from '../regions.js'

/**
 * 注册凭证相关工具
 */
export function registerCredentialTools(server: McpServer) {
  /**
   * 工具：列出支持 SMTP 的区域
   */
  server.registerTool(
    'list_smtp_regions',
    {
      title: 'List SMTP Regions',
      description: 'List AWS regions that provide an Amazon SES SMTP endpoint',
      inputSchema: {},
    },
    async () => {
      const lines = SMTP_REGIONS.map(
        (region) =>
          `- **${region}** ${SMTP_REGION_NAMES[region]}: ${smtpEndpoint(region).host}`
      )

      return {
        content: [
          {
            type: 'text',
            text: `# SES SMTP Regions\n\n${lines.join('\n')}\n\nTotal: ${SMTP_REGIONS.length} region(s)`,
          },
        ],
      }
    }
  )

  /**
   * 工具：由 Secret Access Key 计算 SMTP 凭证
   */
  server.registerTool(
    'derive_smtp_credentials',
    {
      title: 'Derive SMTP Credentials',
      description:
        'Convert an IAM secret access key into an Amazon SES SMTP password for the given region',
      inputSchema: {
        secret_access_key: z.string().describe('IAM secret access key'),
        region: z.string().describe('AWS region of the SES SMTP endpoint, e.g. us-east-1'),
        access_key_id: z
          .string()
          .optional()
          .describe('IAM access key ID, used as the SMTP username'),
        port: z
          .number()
          .optional()
          .describe('SMTP port: 25, 587, 2587 (STARTTLS) or 465, 2465 (TLS). Default: 587'),
      },
    },
    async ({ secret_access_key, region, access_key_id, port }) => {
      if (port !== undefined && !isSmtpPort(port)) {
        return {
          content: [{ type: 'text', text: `Port ${port} is not an SES SMTP port` }],
          isError: true,
        }
      }

      try {
        const credentials = deriveSmtpCredentials({
          accessKeyId: access_key_id ?? '',
          secretAccessKey: secret_access_key,
          region,
          port,
        })

        const lines = [
          `# SMTP Credentials (${credentials.region})`,
          '',
          `- **Server:** ${credentials.host}:${credentials.port} (${credentials.secure ? 'TLS' : 'STARTTLS'})`,
        ]
        if (access_key_id) {
          lines.push(`- **Username:** ${credentials.username}`)
        }
        lines.push(`- **Password:** ${credentials.password}`)

        return {
          content: [{ type: 'text', text: lines.join('\n') }],
        }
      } catch (error) {
        if (error instanceof UnsupportedRegionError) {
          return {
            content: [{ type: 'text', text: error.message }],
            isError: true,
          }
        }
        throw error
      }
    }
  )
}
