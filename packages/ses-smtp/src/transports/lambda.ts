/**
 * Lambda 入口：CloudFormation 自定义资源
 *
 * 环境变量见 LambdaConfigSchema
 */
import { SSMClient } from '@aws-sdk/client-ssm'
import type { CloudFormationCustomResourceEvent, Context } from 'aws-lambda'
import { loadLambdaConfigFromEnv } from '../core/config.js'
import { handleCustomResourceEvent } from '../core/custom-resource.js'
import { SsmParameterStore } from '../core/parameter-store.js'

const config = loadLambdaConfigFromEnv()

const store = new SsmParameterStore(new SSMClient({ region: config.AWS_REGION }), {
  kmsKeyId: config.KMS_KEY_ARN,
  tier: config.PARAMETER_TIER,
})

export const handler = async (event: CloudFormationCustomResourceEvent, context: Context) => {
  await handleCustomResourceEvent(event, context, {
    store,
    region: config.AWS_REGION,
    parameterPrefix: config.PARAMETER_PREFIX,
  })
}
