/**
 * 提供 SES SMTP 端点的区域（顺序与 AWS 文档一致）
 */
export const SMTP_REGIONS = [
  'us-east-2',
  'us-east-1',
  'us-west-2',
  'ap-south-1',
  'ap-northeast-2',
  'ap-southeast-1',
  'ap-southeast-2',
  'ap-northeast-1',
  'ca-central-1',
  'eu-central-1',
  'eu-west-1',
  'eu-west-2',
  'sa-east-1',
  'us-gov-west-1',
] as const

export type SmtpRegion = (typeof SMTP_REGIONS)[number]

/**
 * 区域显示名称
 */
export const SMTP_REGION_NAMES: Record<SmtpRegion, string> = {
  'us-east-2': 'US East (Ohio)',
  'us-east-1': 'US East (N. Virginia)',
  'us-west-2': 'US West (Oregon)',
  'ap-south-1': 'Asia Pacific (Mumbai)',
  'ap-northeast-2': 'Asia Pacific (Seoul)',
  'ap-southeast-1': 'Asia Pacific (Singapore)',
  'ap-southeast-2': 'Asia Pacific (Sydney)',
  'ap-northeast-1': 'Asia Pacific (Tokyo)',
  'ca-central-1': 'Canada (Central)',
  'eu-central-1': 'Europe (Frankfurt)',
  'eu-west-1': 'Europe (Ireland)',
  'eu-west-2': 'Europe (London)',
  'sa-east-1': 'South America (Sao Paulo)',
  'us-gov-west-1': 'AWS GovCloud (US)',
}

/**
 * SES SMTP 支持的端口
 *
 * 465 / 2465 为隐式 TLS，其余使用 STARTTLS
 */
export const SMTP_PORTS = [25, 587, 2587, 465, 2465] as const

export type SmtpPort = (typeof SMTP_PORTS)[number]

export const DEFAULT_SMTP_PORT: SmtpPort = 587

/**
 * SMTP 端点信息
 */
export interface SmtpEndpoint {
  host: string
  port: SmtpPort
  /** true=SSL, false=STARTTLS */
  secure: boolean
}

export function isSmtpRegion(value: string): value is SmtpRegion {
  return SMTP_REGIONS.some((region) => region === value)
}

export function isSmtpPort(value: number): value is SmtpPort {
  return SMTP_PORTS.some((port) => port === value)
}

/**
 * 端口是否使用隐式 TLS
 */
export function resolveSmtpSecure(port: SmtpPort): boolean {
  return port === 465 || port === 2465
}

/**
 * 获取区域对应的 SMTP 端点
 */
export function smtpEndpoint(
  region: SmtpRegion,
  port: SmtpPort = DEFAULT_SMTP_PORT
): SmtpEndpoint {
  return {
    host: `email-smtp.${region}.amazonaws.com`,
    port,
    secure: resolveSmtpSecure(port),
  }
}
