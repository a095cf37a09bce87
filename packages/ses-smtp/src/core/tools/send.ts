import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { AppConfig, ResolvedSender } from '../config.js'
import { resolveSender } from '../config.js'
import { SesSmtpClient } from '../smtp-client.js'

/**
 * 注册邮件发送相关工具
 */
export function registerSendTools(server: McpServer, config: AppConfig) {
  /**
   * 工具：发送邮件
   */
  server.registerTool(
    'send_email',
    {
      title: 'Send Email',
      description: 'Send an email through the configured Amazon SES SMTP endpoint',
      inputSchema: {
        to: z
          .array(z.string())
          .min(1)
          .describe('List of recipient email addresses'),
        subject: z.string().describe('Email subject'),
        body: z.string().describe('Email body content'),
        is_html: z
          .boolean()
          .optional()
          .describe('Whether the body is HTML format (default: false)'),
        cc: z
          .array(z.string())
          .optional()
          .describe('List of CC recipients'),
        bcc: z
          .array(z.string())
          .optional()
          .describe('List of BCC recipients'),
      },
    },
    async ({ to, subject, body, is_html, cc, bcc }) => {
      try {
        const client = new SesSmtpClient(resolveSender(config))
        const result = await client.sendEmail({
          to,
          subject,
          body,
          isHtml: is_html ?? false,
          cc,
          bcc,
        })

        if (!result.success) {
          return {
            content: [
              {
                type: 'text',
                text: `Failed to send email: ${result.error}`,
              },
            ],
            isError: true,
          }
        }

        const recipientCount =
          to.length + (cc?.length ?? 0) + (bcc?.length ?? 0)

        return {
          content: [
            {
              type: 'text',
              text: `Email sent successfully!\n\n**To:** ${to.join(', ')}\n**Subject:** ${subject}\n**Message-ID:** ${result.messageId}\n\nSent to ${recipientCount} recipient(s)`,
            },
          ],
        }
      } catch (error) {
        return {
          content: [
            {
              type: 'text',
              text: `Failed to send email: ${error instanceof Error ? error.message : error}`,
            },
          ],
          isError: true,
        }
      }
    }
  )

  /**
   * 工具：测试连接
   */
  server.registerTool(
    'test_connection',
    {
      title: 'Test Connection',
      description: 'Verify the SES SMTP endpoint accepts the configured credentials',
      inputSchema: {},
    },
    async () => {
      let sender: ResolvedSender
      try {
        sender = resolveSender(config)
      } catch (error) {
        return {
          content: [
            {
              type: 'text',
              text: error instanceof Error ? error.message : String(error),
            },
          ],
          isError: true,
        }
      }

      const result = await new SesSmtpClient(sender).testConnection()
      const { host, port, region } = sender.credentials

      const lines = [
        `# Connection Test: ${region}`,
        '',
        `- **Server:** ${host}:${port}`,
        `- **From:** ${sender.from}`,
        `- **Status:** ${result.success ? '✅ Connected' : '❌ Failed'}`,
      ]

      if (result.error) {
        lines.push(`- **Error:** ${result.error}`)
      }

      return {
        content: [{ type: 'text', text: lines.join('\n') }],
        isError: !result.success,
      }
    }
  )
}
