import { createHmac } from 'node:crypto'
import {
  DEFAULT_SMTP_PORT,
  isSmtpRegion,
  smtpEndpoint,
  type SmtpPort,
  type SmtpRegion,
} from './regions.js'

/**
 * SMTP 密码签名常量
 *
 * 与 SES 服务端校验方式绑定，不可修改
 */
export const SMTP_SIGNING = {
  date: '11111111',
  service: 'ses',
  terminal: 'aws4_request',
  message: 'SendRawEmail',
  version: 0x04,
} as const

/**
 * 区域不提供 SMTP 端点
 */
export class UnsupportedRegionError extends Error {
  readonly region: string

  constructor(region: string) {
    super(`The ${region} Region doesn't have an SMTP endpoint.`)
    this.name = 'UnsupportedRegionError'
    this.region = region
  }
}

/**
 * SES SMTP 凭证
 */
export interface SmtpCredentials {
  /** SMTP 用户名（即 IAM Access Key ID） */
  username: string
  /** SMTP 密码 */
  password: string
  region: SmtpRegion
  host: string
  port: SmtpPort
  secure: boolean
}

function sign(key: Buffer, message: string): Buffer {
  return createHmac('sha256', key).update(message, 'utf8').digest()
}

function assertSmtpRegion(region: string): asserts region is SmtpRegion {
  if (!isSmtpRegion(region)) {
    throw new UnsupportedRegionError(region)
  }
}

/**
 * 由 IAM Secret Access Key 计算 SES SMTP 密码
 *
 * @throws UnsupportedRegionError 区域不在支持列表中
 */
export function deriveSmtpPassword(secretAccessKey: string, region: string): string {
  assertSmtpRegion(region)

  let signature = sign(Buffer.from(`AWS4${secretAccessKey}`, 'utf8'), SMTP_SIGNING.date)
  signature = sign(signature, region)
  signature = sign(signature, SMTP_SIGNING.service)
  signature = sign(signature, SMTP_SIGNING.terminal)
  signature = sign(signature, SMTP_SIGNING.message)

  return Buffer.concat([Buffer.from([SMTP_SIGNING.version]), signature]).toString('base64')
}

/**
 * 生成完整的 SMTP 凭证（含端点信息）
 */
export function deriveSmtpCredentials(options: {
  accessKeyId: string
  secretAccessKey: string
  region: string
  port?: SmtpPort
}): SmtpCredentials {
  const { accessKeyId, secretAccessKey, region, port = DEFAULT_SMTP_PORT } = options
  assertSmtpRegion(region)

  const endpoint = smtpEndpoint(region, port)

  return {
    username: accessKeyId,
    password: deriveSmtpPassword(secretAccessKey, region),
    region,
    ...endpoint,
  }
}
