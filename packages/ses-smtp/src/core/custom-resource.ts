import type { CloudFormationCustomResourceEvent, Context } from 'aws-lambda'
import { z } from 'zod'
import { deriveSmtpPassword } from './credentials.js'
import type { ParameterStore, StoreResult } from './parameter-store.js'

export const ParameterTypeSchema = z.enum(['username', 'password'])

export type ParameterType = z.infer<typeof ParameterTypeSchema>

/**
 * 自定义资源属性 Schema
 *
 * Key 为 IAM Access Key ID（username）或 Secret Access Key（password）
 */
export const CustomResourcePropertiesSchema = z.object({
  Key: z.string().min(1),
  ParameterType: ParameterTypeSchema,
})

/**
 * 回传给 CloudFormation 的响应体
 */
export interface CustomResourceResponse {
  Status: 'SUCCESS' | 'FAILED'
  Reason: string
  PhysicalResourceId: string
  StackId: string
  RequestId: string
  LogicalResourceId: string
  NoEcho: boolean
  Data: { Reason: string }
}

export type ResponseSender = (url: string, body: string) => Promise<void>

export interface CustomResourceOptions {
  store: ParameterStore
  /** 计算密码使用的区域（Lambda 所在区域） */
  region: string
  parameterPrefix?: string
  sendResponse?: ResponseSender
}

/**
 * 通过预签名 URL 回传结果
 *
 * Content-Type 必须为空，否则签名校验失败
 */
export const putResponse: ResponseSender = async (url, body) => {
  const response = await fetch(url, {
    method: 'PUT',
    headers: { 'content-type': '' },
    body,
  })

  if (!response.ok) {
    throw new Error(
      `Failed to send custom resource response: ${response.status} ${response.statusText}`
    )
  }
}

/**
 * 由函数 ARN 推导参数 ARN（arn:<partition>:lambda:<region>:<account>:function:<name>）
 */
export function parameterArn(invokedFunctionArn: string, region: string, name: string): string {
  const [, partition = 'aws', , , accountId = ''] = invokedFunctionArn.split(':')
  return `arn:${partition}:ssm:${region}:${accountId}:parameter/${name}`
}

/**
 * 从参数 ARN 中取出参数名，非参数 ARN 返回 undefined
 */
export function parameterNameFromArn(arn: string): string | undefined {
  const marker = ':parameter/'
  const index = arn.indexOf(marker)
  if (!arn.startsWith('arn:') || index === -1) {
    return undefined
  }
  return arn.slice(index + marker.length) || undefined
}

function redactEvent(event: CloudFormationCustomResourceEvent): CloudFormationCustomResourceEvent {
  return {
    ...event,
    ResponseURL: '[redacted]',
    ResourceProperties: { ...event.ResourceProperties, Key: '[redacted]' },
  }
}

async function storeCredential(
  options: CustomResourceOptions,
  name: string,
  type: ParameterType,
  key: string
): Promise<StoreResult> {
  const value = type === 'password' ? deriveSmtpPassword(key, options.region) : key
  return options.store.put(name, value, `SMTP ${type} for email communications`)
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')
}

async function applyEvent(
  event: CloudFormationCustomResourceEvent,
  options: CustomResourceOptions,
  name: string
): Promise<{ result: StoreResult; reason: string }> {
  const requestType: string = event.RequestType

  // 删除以 PhysicalResourceId 记录的参数为准，与当前前缀无关
  if (event.RequestType === 'Delete') {
    const stored = parameterNameFromArn(event.PhysicalResourceId)
    if (!stored) {
      return { result: { success: true }, reason: 'Nothing to delete' }
    }
    const type = ParameterTypeSchema.safeParse(event.ResourceProperties.ParameterType)
    return {
      result: await options.store.delete(stored),
      reason: type.success ? `Deleted SMTP ${type.data}` : `Deleted parameter ${stored}`,
    }
  }

  const properties = CustomResourcePropertiesSchema.safeParse(event.ResourceProperties)
  if (!properties.success) {
    return {
      result: { success: false },
      reason: `Invalid resource properties: ${formatIssues(properties.error)}`,
    }
  }

  const { Key: key, ParameterType: type } = properties.data

  switch (requestType) {
    case 'Create':
      return { result: await storeCredential(options, name, type, key), reason: `Created SMTP ${type}` }
    case 'Update':
      return { result: await storeCredential(options, name, type, key), reason: `Updated SMTP ${type}` }
    default:
      return { result: { success: false }, reason: `Operation ${requestType} is unsupported` }
  }
}

/**
 * 处理 Custom::SmtpUsername / Custom::SmtpPassword 事件
 *
 * 创建和更新时写入 SSM 参数，PhysicalResourceId 为参数 ARN；删除时移除该 ARN
 * 指向的参数并原样回传 PhysicalResourceId。失败时回传 FAILED。
 */
export async function handleCustomResourceEvent(
  event: CloudFormationCustomResourceEvent,
  context: Pick<Context, 'invokedFunctionArn' | 'logStreamName'>,
  options: CustomResourceOptions
): Promise<CustomResourceResponse> {
  console.log('Received event:', JSON.stringify(redactEvent(event)))

  const prefix = options.parameterPrefix ?? 'smtp-'
  const rawType: unknown = event.ResourceProperties.ParameterType
  const name = `${prefix}${typeof rawType === 'string' ? rawType : ''}`

  let outcome: { result: StoreResult; reason: string }
  try {
    outcome = await applyEvent(event, options, name)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error('Custom resource request failed:', message)
    outcome = { result: { success: false, error: message }, reason: message }
  }

  const { result, reason } = outcome
  const detail = result.error && result.error !== reason ? `${reason}: ${result.error}` : reason

  const response: CustomResourceResponse = {
    Status: result.success ? 'SUCCESS' : 'FAILED',
    Reason: `${detail} (CloudWatch Log Stream: ${context.logStreamName})`,
    PhysicalResourceId:
      event.RequestType === 'Delete'
        ? event.PhysicalResourceId
        : parameterArn(context.invokedFunctionArn, options.region, name),
    StackId: event.StackId,
    RequestId: event.RequestId,
    LogicalResourceId: event.LogicalResourceId,
    NoEcho: rawType === 'password',
    Data: { Reason: reason },
  }

  const body = JSON.stringify(response)
  console.log('Response body:', body)

  await (options.sendResponse ?? putResponse)(event.ResponseURL, body)

  return response
}
