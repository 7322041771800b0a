import { describe, it, expect } from 'vitest'
import { phoneTransform } from '../../../src/transforms/phone'
import { ConfigError, TransformError } from '../../../src/utils/errors'

describe('phone transform', () => {
  it('normalizes international numbers to E.164', () => {
    expect(phoneTransform({})('+44 20 7123 4567')).toBe('+442071234567')
  })

  it('uses the default country for national numbers', () => {
    expect(phoneTransform({ country: 'US' })('(213) 373-4253')).toBe('+12133734253')
  })

  it('accepts lower-case country codes', () => {
    expect(phoneTransform({ country: 'us' })('213-373-4253')).toBe('+12133734253')
  })

  it('rejects invalid numbers', () => {
    const transform = phoneTransform({ country: 'US' })
    expect(() => transform('12')).toThrow(TransformError)
    expect(() => transform('not a phone')).toThrow(TransformError)
  })

  it('rejects unknown countries', () => {
    expect(() => phoneTransform({ country: 'ZZ' })).toThrow(ConfigError)
    expect(() => phoneTransform({ country: 1 })).toThrow(ConfigError)
  })
})
