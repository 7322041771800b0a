import { getCountries, parsePhoneNumberFromString } from 'libphonenumber-js'
import type { CountryCode } from 'libphonenumber-js'
import { ConfigError, TransformError } from '../utils/errors'
import type { TransformFactory } from './types'

/**
 * `phone { country? }`: normalizes a phone number to E.164.
 * `country` is the ISO 3166-1 alpha-2 code used for numbers written without
 * an international prefix.
 *
 * @example
 * ```typescript
 * phoneTransform({ country: 'US' })('(213) 373-4253') // '+12133734253'
 * ```
 */
export const phoneTransform: TransformFactory = (params) => {
  const country = resolveCountry(params.country)

  return (value) => {
    const phoneNumber = parsePhoneNumberFromString(String(value).trim(), country)
    if (!phoneNumber || !phoneNumber.isValid()) {
      throw new TransformError('phone', value, 'not a valid phone number', {
        country,
      })
    }
    return phoneNumber.number
  }
}

function resolveCountry(country: unknown): CountryCode | undefined {
  if (country === undefined) {
    return undefined
  }
  if (typeof country !== 'string') {
    throw new ConfigError("phone 'country' must be a string", { country })
  }
  const code = country.toUpperCase()
  const known = getCountries().find((candidate) => candidate === code)
  if (!known) {
    throw new ConfigError(`phone 'country' '${country}' is not a known country code`, { country })
  }
  return known
}
