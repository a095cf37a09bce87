import { describe, expect, it } from 'vitest'
import {
  SMTP_REGIONS,
  SMTP_REGION_NAMES,
  isSmtpPort,
  isSmtpRegion,
  smtpEndpoint,
} from '../src/core/regions.js'

describe('regions', () => {
  it('lists the SES SMTP regions in order', () => {
    expect(SMTP_REGIONS).toEqual([
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
    ])
    expect(SMTP_REGION_NAMES['us-gov-west-1']).toBe('AWS GovCloud (US)')
  })

  it('recognises allow-listed regions only', () => {
    expect(isSmtpRegion('ap-northeast-2')).toBe(true)
    expect(isSmtpRegion('eu-north-1')).toBe(false)
    expect(isSmtpRegion('')).toBe(false)
  })

  it('recognises SES SMTP ports', () => {
    expect(isSmtpPort(2587)).toBe(true)
    expect(isSmtpPort(2525)).toBe(false)
  })

  it('builds the regional endpoint', () => {
    expect(smtpEndpoint('ca-central-1')).toEqual({
      host: 'email-smtp.ca-central-1.amazonaws.com',
      port: 587,
      secure: false,
    })
    expect(smtpEndpoint('ca-central-1', 2465).secure).toBe(true)
    expect(smtpEndpoint('ca-central-1', 25).secure).toBe(false)
  })
})
