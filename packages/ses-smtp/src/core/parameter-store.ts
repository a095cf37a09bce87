import {
  DeleteParameterCommand,
  ParameterNotFound,
  PutParameterCommand,
  type ParameterTier,
  type SSMClient,
} from '@aws-sdk/client-ssm'

/**
 * 参数写入/删除结果
 */
export interface StoreResult {
  success: boolean
  error?: string
}

/**
 * 凭证存储接口
 */
export interface ParameterStore {
  put(name: string, value: string, description: string): Promise<StoreResult>
  delete(name: string): Promise<StoreResult>
}

export interface SsmParameterStoreOptions {
  /** 加密使用的 KMS Key，不设置时使用账户默认的 aws/ssm */
  kmsKeyId?: string
  tier?: ParameterTier
}

/**
 * 基于 SSM Parameter Store 的实现，以 SecureString 保存
 */
export class SsmParameterStore implements ParameterStore {
  private client: SSMClient
  private options: SsmParameterStoreOptions

  constructor(client: SSMClient, options: SsmParameterStoreOptions = {}) {
    this.client = client
    this.options = options
  }

  async put(name: string, value: string, description: string): Promise<StoreResult> {
    try {
      await this.client.send(
        new PutParameterCommand({
          Name: name,
          Description: description,
          Value: value,
          Type: 'SecureString',
          KeyId: this.options.kmsKeyId,
          Overwrite: true,
          Tier: this.options.tier ?? 'Standard',
        })
      )
      return { success: true }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`Error putting parameter ${name}:`, message)
      return { success: false, error: message }
    }
  }

  async delete(name: string): Promise<StoreResult> {
    try {
      await this.client.send(new DeleteParameterCommand({ Name: name }))
      return { success: true }
    } catch (error) {
      // 参数已不存在，视为删除成功
      if (error instanceof ParameterNotFound) {
        return { success: true }
      }
      const message = error instanceof Error ? error.message : String(error)
      console.error(`Error deleting parameter ${name}:`, message)
      return { success: false, error: message }
    }
  }
}
