import { ConfigError, TransformError } from '../utils/errors'
import type { TransformFactory } from './types'

/**
 * `multiply { factor }`: scales a numeric value. Numeric strings are
 * accepted; the result is always a number.
 */
export const multiplyTransform: TransformFactory = (params) => {
  const { factor } = params
  if (typeof factor !== 'number' || !Number.isFinite(factor)) {
    throw new ConfigError("multiply requires a finite numeric 'factor'", { params })
  }

  return (value) => {
    const numeric = typeof value === 'number' ? value : parseNumeric(value)
    if (numeric === null) {
      throw new TransformError('multiply', value, 'not a number')
    }
    return numeric * factor
  }
}

function parseNumeric(value: string): number | null {
  const trimmed = value.trim()
  if (trimmed === '') {
    return null
  }
  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : null
}
