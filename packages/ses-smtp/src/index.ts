/**
 * SES SMTP Credentials
 *
 * 由 IAM Secret Access Key 计算 Amazon SES SMTP 密码，并提供：
 * - CloudFormation 自定义资源（写入 SSM Parameter Store）
 * - MCP Server（计算凭证、测试连接、发送邮件）
 */

// 凭证计算
export {
  deriveSmtpPassword,
  deriveSmtpCredentials,
  UnsupportedRegionError,
  SMTP_SIGNING,
  type SmtpCredentials,
} from './core/credentials.js'
export {
  SMTP_REGIONS,
  SMTP_REGION_NAMES,
  SMTP_PORTS,
  DEFAULT_SMTP_PORT,
  isSmtpRegion,
  isSmtpPort,
  resolveSmtpSecure,
  smtpEndpoint,
  type SmtpRegion,
  type SmtpPort,
  type SmtpEndpoint,
} from './core/regions.js'

// 配置
export {
  loadConfigFromEnv,
  loadLambdaConfigFromEnv,
  resolveSender,
  type AppConfig,
  type LambdaConfig,
  type ResolvedSender,
} from './core/config.js'

// 自定义资源
export {
  handleCustomResourceEvent,
  parameterArn,
  parameterNameFromArn,
  putResponse,
  type CustomResourceOptions,
  type CustomResourceResponse,
  type ResponseSender,
} from './core/custom-resource.js'
export { SsmParameterStore, type ParameterStore, type StoreResult } from './core/parameter-store.js'

// Server
export { createMcpServer } from './core/server.js'
export { createHttpApp } from './transports/http.js'

// 客户端（可单独使用）
export { SesSmtpClient, type SendEmailOptions, type SendResult } from './core/smtp-client.js'
