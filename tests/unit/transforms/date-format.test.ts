import { describe, it, expect } from 'vitest'
import {
  dateFormatTransform,
  isValidDate,
  tokenizeFormat,
} from '../../../src/transforms/date-format'
import { ConfigError, TransformError } from '../../../src/utils/errors'

describe('date_format transform', () => {
  describe('tokenizeFormat', () => {
    it('splits tokens and literals', () => {
      expect(tokenizeFormat('MM/DD/YYYY')).toEqual([
        { kind: 'token', token: 'MM' },
        { kind: 'literal', text: '/' },
        { kind: 'token', token: 'DD' },
        { kind: 'literal', text: '/' },
        { kind: 'token', token: 'YYYY' },
      ])
    })

    it('prefers the longest token', () => {
      expect(tokenizeFormat('YYYYMD')).toEqual([
        { kind: 'token', token: 'YYYY' },
        { kind: 'token', token: 'M' },
        { kind: 'token', token: 'D' },
      ])
    })
  })

  describe('isValidDate', () => {
    it('handles leap years', () => {
      expect(isValidDate(2024, 2, 29)).toBe(true)
      expect(isValidDate(2023, 2, 29)).toBe(false)
      expect(isValidDate(1900, 2, 29)).toBe(false)
      expect(isValidDate(2000, 2, 29)).toBe(true)
    })

    it('rejects out-of-range months and days', () => {
      expect(isValidDate(2024, 13, 1)).toBe(false)
      expect(isValidDate(2024, 4, 31)).toBe(false)
      expect(isValidDate(2024, 1, 0)).toBe(false)
    })
  })

  it('converts US dates to ISO dates', () => {
    const toIso = dateFormatTransform({ from: 'MM/DD/YYYY', to: 'YYYY-MM-DD' })
    expect(toIso('03/15/2024')).toBe('2024-03-15')
  })

  it('round-trips when from and to are swapped', () => {
    const toIso = dateFormatTransform({ from: 'MM/DD/YYYY', to: 'YYYY-MM-DD' })
    const toUs = dateFormatTransform({ from: 'YYYY-MM-DD', to: 'MM/DD/YYYY' })
    expect(toUs(toIso('03/15/2024') ?? '')).toBe('03/15/2024')
  })

  it('reads unpadded fields and two-digit years', () => {
    const transform = dateFormatTransform({ from: 'D/M/YY', to: 'YYYY-MM-DD' })
    expect(transform('5/7/24')).toBe('2024-07-05')
    expect(transform('5/7/85')).toBe('1985-07-05')
  })

  it('carries time components', () => {
    const transform = dateFormatTransform({ from: 'YYYY-MM-DD HH:mm:ss', to: 'DD.MM.YYYY H:mm' })
    expect(transform('2024-03-15 14:05:09')).toBe('15.03.2024 14:05')
  })

  it('trims surrounding whitespace', () => {
    const transform = dateFormatTransform({ from: 'YYYY-MM-DD', to: 'DD/MM/YYYY' })
    expect(transform('  2024-03-15 ')).toBe('15/03/2024')
  })

  it('rejects impossible dates', () => {
    const transform = dateFormatTransform({ from: 'MM/DD/YYYY', to: 'YYYY-MM-DD' })
    expect(() => transform('02/30/2024')).toThrow(TransformError)
  })

  it('rejects input that does not match the format', () => {
    const transform = dateFormatTransform({ from: 'MM/DD/YYYY', to: 'YYYY-MM-DD' })
    expect(() => transform('2024-03-15')).toThrow(TransformError)
  })

  it('rejects impossible times', () => {
    const transform = dateFormatTransform({ from: 'YYYY-MM-DD HH:mm', to: 'YYYY' })
    expect(() => transform('2024-03-15 24:00')).toThrow(TransformError)
  })

  it('requires both formats', () => {
    expect(() => dateFormatTransform({ to: 'YYYY-MM-DD' })).toThrow(ConfigError)
    expect(() => dateFormatTransform({ from: 'YYYY-MM-DD', to: 7 })).toThrow(ConfigError)
  })

  it('requires year, month and day in the input format', () => {
    expect(() => dateFormatTransform({ from: 'MM/YYYY', to: 'YYYY-MM' })).toThrow(ConfigError)
  })
})
