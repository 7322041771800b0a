import { ConfigError, TransformError } from '../utils/errors'
import type { TransformFactory } from './types'

type DateToken = 'YYYY' | 'YY' | 'MM' | 'M' | 'DD' | 'D' | 'HH' | 'H' | 'mm' | 'ss'

type FormatPart = { kind: 'token'; token: DateToken } | { kind: 'literal'; text: string }

interface DateParts {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

// Longest tokens first so 'YYYY' wins over 'YY' and 'MM' over 'M'
const TOKENS: readonly DateToken[] = ['YYYY', 'YY', 'MM', 'M', 'DD', 'D', 'HH', 'H', 'mm', 'ss']

const TOKEN_PATTERNS: Record<DateToken, string> = {
  YYYY: '(\\d{4})',
  YY: '(\\d{2})',
  MM: '(\\d{2})',
  M: '(\\d{1,2})',
  DD: '(\\d{2})',
  D: '(\\d{1,2})',
  HH: '(\\d{2})',
  H: '(\\d{1,2})',
  mm: '(\\d{2})',
  ss: '(\\d{2})',
}

/** Two-digit years below this value are read as 20xx, the rest as 19xx */
const TWO_DIGIT_YEAR_PIVOT = 70

/**
 * Splits a format string into tokens and literal runs.
 *
 * @example
 * ```typescript
 * tokenizeFormat('MM/DD/YYYY')
 * // [{token MM}, {literal '/'}, {token DD}, {literal '/'}, {token YYYY}]
 * ```
 */
export function tokenizeFormat(format: string): FormatPart[] {
  const parts: FormatPart[] = []
  let literal = ''
  let index = 0

  while (index < format.length) {
    const token = TOKENS.find((candidate) => format.startsWith(candidate, index))
    if (token) {
      if (literal) {
        parts.push({ kind: 'literal', text: literal })
        literal = ''
      }
      parts.push({ kind: 'token', token })
      index += token.length
    } else {
      literal += format[index]
      index += 1
    }
  }

  if (literal) {
    parts.push({ kind: 'literal', text: literal })
  }
  return parts
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Checks if a date is valid (handles leap years and month lengths).
 */
export function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false
  }
  const daysInMonth = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  const isLeapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
  if (isLeapYear && month === 2) {
    return day <= 29
  }
  return day <= daysInMonth[month - 1]
}

function pad(num: number, length: number): string {
  return String(num).padStart(length, '0')
}

function hasToken(parts: FormatPart[], tokens: DateToken[]): boolean {
  return parts.some((part) => part.kind === 'token' && tokens.includes(part.token))
}

/**
 * Compiles a parser for one input format. Returns `null` for input that does
 * not match the format or names an impossible date.
 */
export function compileDateParser(format: string): (input: string) => DateParts | null {
  const parts = tokenizeFormat(format)
  const captured: DateToken[] = []
  const source = parts
    .map((part) => {
      if (part.kind === 'literal') {
        return escapeRegExp(part.text)
      }
      captured.push(part.token)
      return TOKEN_PATTERNS[part.token]
    })
    .join('')
  const pattern = new RegExp(`^${source}$`)

  return (input: string) => {
    const match = pattern.exec(input)
    if (!match) {
      return null
    }

    const date: DateParts = { year: 0, month: 1, day: 1, hour: 0, minute: 0, second: 0 }
    captured.forEach((token, position) => {
      const value = Number.parseInt(match[position + 1], 10)
      switch (token) {
        case 'YYYY':
          date.year = value
          break
        case 'YY':
          date.year = value < TWO_DIGIT_YEAR_PIVOT ? 2000 + value : 1900 + value
          break
        case 'MM':
        case 'M':
          date.month = value
          break
        case 'DD':
        case 'D':
          date.day = value
          break
        case 'HH':
        case 'H':
          date.hour = value
          break
        case 'mm':
          date.minute = value
          break
        case 'ss':
          date.second = value
          break
      }
    })

    if (!isValidDate(date.year, date.month, date.day)) {
      return null
    }
    if (date.hour > 23 || date.minute > 59 || date.second > 59) {
      return null
    }
    return date
  }
}

/**
 * Compiles a formatter for one output format.
 */
export function compileDateFormatter(format: string): (date: DateParts) => string {
  const parts = tokenizeFormat(format)
  return (date) =>
    parts
      .map((part) => {
        if (part.kind === 'literal') {
          return part.text
        }
        switch (part.token) {
          case 'YYYY':
            return pad(date.year, 4)
          case 'YY':
            return pad(date.year % 100, 2)
          case 'MM':
            return pad(date.month, 2)
          case 'M':
            return String(date.month)
          case 'DD':
            return pad(date.day, 2)
          case 'D':
            return String(date.day)
          case 'HH':
            return pad(date.hour, 2)
          case 'H':
            return String(date.hour)
          case 'mm':
            return pad(date.minute, 2)
          case 'ss':
            return pad(date.second, 2)
        }
      })
      .join('')
}

/**
 * `date_format { from, to }`: re-formats a date string.
 *
 * @example
 * ```typescript
 * const toIso = dateFormatTransform({ from: 'MM/DD/YYYY', to: 'YYYY-MM-DD' })
 * toIso('03/15/2024') // '2024-03-15'
 * ```
 */
export const dateFormatTransform: TransformFactory = (params) => {
  const { from, to } = params
  if (typeof from !== 'string' || from.length === 0) {
    throw new ConfigError("date_format requires a non-empty 'from' format", { params })
  }
  if (typeof to !== 'string' || to.length === 0) {
    throw new ConfigError("date_format requires a non-empty 'to' format", { params })
  }

  const fromParts = tokenizeFormat(from)
  if (
    !hasToken(fromParts, ['YYYY', 'YY']) ||
    !hasToken(fromParts, ['MM', 'M']) ||
    !hasToken(fromParts, ['DD', 'D'])
  ) {
    throw new ConfigError(
      `date_format 'from' format '${from}' must contain year, month and day tokens`,
      { params }
    )
  }

  const parse = compileDateParser(from)
  const format = compileDateFormatter(to)

  return (value) => {
    const input = String(value).trim()
    const date = parse(input)
    if (!date) {
      throw new TransformError('date_format', value, `does not match '${from}' or is not a valid date`)
    }
    return format(date)
  }
}
