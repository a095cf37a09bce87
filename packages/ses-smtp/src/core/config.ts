import 'dotenv/config'
import { z } from 'zod'
import { deriveSmtpCredentials, type SmtpCredentials } from './credentials.js'
import { DEFAULT_SMTP_PORT, SMTP_REGIONS, isSmtpPort, isSmtpRegion } from './regions.js'

type Env = Record<string, string | undefined>

/**
 * MCP Server 配置 Schema
 */
export const AppConfigSchema = z.object({
  /** SES 所在区域（未设置时取 AWS_REGION） */
  SMTP_REGION: z.enum(SMTP_REGIONS).optional(),
  /** IAM Access Key ID，同时作为 SMTP 用户名 */
  SMTP_ACCESS_KEY_ID: z.string().min(1).optional(),
  /** IAM Secret Access Key */
  SMTP_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  /** 发件人地址（需已在 SES 中验证） */
  SMTP_FROM: z.string().email().optional(),
  /** SMTP 端口 */
  SMTP_PORT: z.coerce
    .number()
    .int()
    .refine(isSmtpPort, 'SMTP_PORT must be one of 25, 587, 2587, 465, 2465')
    .default(DEFAULT_SMTP_PORT),
  /** HTTP 传输监听端口 */
  PORT: z.coerce.number().int().positive().default(3000),
})

export type AppConfig = z.infer<typeof AppConfigSchema>

/**
 * Lambda（CloudFormation 自定义资源）配置 Schema
 */
export const LambdaConfigSchema = z.object({
  /** Lambda 运行时自动注入 */
  AWS_REGION: z.string().min(1),
  /** 加密 SecureString 参数使用的 KMS Key */
  KMS_KEY_ARN: z.string().min(1).optional(),
  /** 参数名前缀，最终名称为 `<prefix>username` / `<prefix>password` */
  PARAMETER_PREFIX: z.string().default('smtp-'),
  PARAMETER_TIER: z.enum(['Standard', 'Advanced', 'Intelligent-Tiering']).default('Standard'),
})

export type LambdaConfig = z.infer<typeof LambdaConfigSchema>

/**
 * 发件账户（已计算好 SMTP 凭证）
 */
export interface ResolvedSender {
  from: string
  credentials: SmtpCredentials
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')
}

/**
 * 从环境变量加载 MCP Server 配置
 */
export function loadConfigFromEnv(env: Env = process.env): AppConfig {
  // AWS_REGION 只在提供 SMTP 端点时作为默认值，SMTP_REGION 严格校验
  const fallbackRegion = env.AWS_REGION && isSmtpRegion(env.AWS_REGION) ? env.AWS_REGION : undefined

  const result = AppConfigSchema.safeParse({
    ...env,
    SMTP_REGION: env.SMTP_REGION ?? fallbackRegion,
  })

  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`)
  }

  return result.data
}

/**
 * 从 Lambda 环境变量加载配置
 */
export function loadLambdaConfigFromEnv(env: Env = process.env): LambdaConfig {
  const result = LambdaConfigSchema.safeParse(env)

  if (!result.success) {
    throw new Error(`Invalid Lambda configuration: ${formatIssues(result.error)}`)
  }

  return result.data
}

/**
 * 解析发件账户，计算 SMTP 凭证
 */
export function resolveSender(config: AppConfig): ResolvedSender {
  const { SMTP_REGION, SMTP_ACCESS_KEY_ID, SMTP_SECRET_ACCESS_KEY, SMTP_FROM, SMTP_PORT } = config

  const missing = [
    ['SMTP_REGION', SMTP_REGION],
    ['SMTP_ACCESS_KEY_ID', SMTP_ACCESS_KEY_ID],
    ['SMTP_SECRET_ACCESS_KEY', SMTP_SECRET_ACCESS_KEY],
    ['SMTP_FROM', SMTP_FROM],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name)

  if (!SMTP_REGION || !SMTP_ACCESS_KEY_ID || !SMTP_SECRET_ACCESS_KEY || !SMTP_FROM) {
    throw new Error(`SMTP sender is not configured. Missing: ${missing.join(', ')}`)
  }

  return {
    from: SMTP_FROM,
    credentials: deriveSmtpCredentials({
      accessKeyId: SMTP_ACCESS_KEY_ID,
      secretAccessKey: SMTP_SECRET_ACCESS_KEY,
      region: SMTP_REGION,
      port: SMTP_PORT,
    }),
  }
}
