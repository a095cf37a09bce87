import nodemailer, { type SendMailOptions } from 'nodemailer'
import type { ResolvedSender } from './config.js'

/**
 * 发送邮件选项
 */
export interface SendEmailOptions {
  /** 收件人列表 */
  to: string[]
  subject: string
  /** 正文（纯文本或 HTML） */
  body: string
  isHtml?: boolean
  cc?: string[]
  bcc?: string[]
  replyTo?: string
}

/**
 * 发送结果
 */
export interface SendResult {
  success: boolean
  messageId?: string
  error?: string
}

/**
 * SES SMTP 客户端
 */
export class SesSmtpClient {
  private sender: ResolvedSender

  constructor(sender: ResolvedSender) {
    this.sender = sender
  }

  private createTransporter() {
    const { host, port, secure, username, password } = this.sender.credentials

    return nodemailer.createTransport({
      host,
      port,
      secure,
      // STARTTLS 端口强制升级，SES 不接受明文认证
      requireTLS: !secure,
      auth: {
        user: username,
        pass: password,
      },
    })
  }

  async sendEmail(options: SendEmailOptions): Promise<SendResult> {
    const transporter = this.createTransporter()

    try {
      const mailOptions: SendMailOptions = {
        from: this.sender.from,
        to: options.to.join(', '),
        subject: options.subject,
        replyTo: options.replyTo,
      }

      if (options.isHtml) {
        mailOptions.html = options.body
        mailOptions.text = stripHtml(options.body)
      } else {
        mailOptions.text = options.body
      }

      if (options.cc && options.cc.length > 0) {
        mailOptions.cc = options.cc.join(', ')
      }
      if (options.bcc && options.bcc.length > 0) {
        mailOptions.bcc = options.bcc.join(', ')
      }

      const info = await transporter.sendMail(mailOptions)

      return {
        success: true,
        messageId: info.messageId,
      }
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      }
    } finally {
      transporter.close()
    }
  }

  /**
   * 测试 SMTP 连接与认证
   */
  async testConnection(): Promise<{ success: boolean; error?: string }> {
    const transporter = this.createTransporter()

    try {
      await transporter.verify()
      return { success: true }
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      }
    } finally {
      transporter.close()
    }
  }
}

/**
 * 去除 HTML 标签
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>/gi, '\n\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&')
    .trim()
}
