import { z } from 'zod'

import { decodeWith } from '../helpers/zod-error.helper.js'

// Decoders for the loosely typed fields of variables.json and geography.json.
// Each schema lists every JSON shape it accepts and maps it to one canonical
// value; any other shape is rejected with a custom issue.

export interface SplitRule {
  readonly pattern: RegExp
  readonly trimChar: string
}

// "Estimate!!Total:!!Male:" -> ["Estimate", "Total", "Male"]
export const LABEL_SPLIT_RULE: SplitRule = Object.freeze({
  pattern: /:?!!/,
  trimChar: ':',
})

export const COMMA_SPLIT_RULE: SplitRule = Object.freeze({
  pattern: /,/,
  trimChar: ' ',
})

/**
 * Removes one `rule.trimChar` from each end of `value` and splits the rest on
 * `rule.pattern`. A value without the delimiter yields a single element.
 */
export function splitDelimited(value: string, rule: SplitRule): string[] {
  let trimmed = value
  if (trimmed.startsWith(rule.trimChar)) {
    trimmed = trimmed.slice(rule.trimChar.length)
  }
  if (trimmed.endsWith(rule.trimChar)) {
    trimmed = trimmed.slice(0, trimmed.length - rule.trimChar.length)
  }
  return trimmed.split(rule.pattern)
}

export const LabelSchema = z
  .string()
  .transform((value) => splitDelimited(value, LABEL_SPLIT_RULE))

export const CommaListSchema = z
  .string()
  .nullish()
  .transform((value) =>
    value == null ? null : splitDelimited(value, COMMA_SPLIT_RULE),
  )

export const OptionalStringSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? null)

export const OptionalBooleanSchema = z
  .boolean()
  .nullish()
  .transform((value) => value ?? null)

export const OptionalStringListSchema = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? null)

// ISO "YYYY-MM-DD" string of a valid calendar date.
export type CalendarDate = string

const YEAR_ONLY = /^\d{4}$/
const FULL_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

export function toCalendarDate(
  year: number,
  month: number,
  day: number,
): CalendarDate | null {
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null
  }

  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-')
}

export const ReferenceDateSchema = z
  .string()
  .nullish()
  .transform((value, ctx): CalendarDate | null => {
    if (value == null) return null

    if (YEAR_ONLY.test(value)) {
      const yearStart = toCalendarDate(Number(value), 1, 1)
      if (yearStart !== null) return yearStart
    }

    const match = FULL_DATE.exec(value)
    const date = match
      ? toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))
      : null

    if (date === null) {
      ctx.addIssue({
        code: 'custom',
        message: `Expected a 4-digit year or a YYYY-MM-DD date but got "${value}"`,
      })
      return z.NEVER
    }

    return date
  })

export const WildcardSchema = z
  .union([z.array(z.string()), z.boolean()])
  .nullish()
  .transform((value, ctx): string[] | null => {
    if (value == null) return null

    if (typeof value === 'boolean') {
      if (value) {
        ctx.addIssue({
          code: 'custom',
          message: 'Boolean value `true` is not allowed for `wildcard`',
        })
        return z.NEVER
      }
      return []
    }

    return value
  })

export interface IntegerRange {
  readonly min: number
  readonly max: number
}

export const SMALLINT_RANGE: IntegerRange = { min: -32768, max: 32767 }
export const INTEGER_RANGE: IntegerRange = { min: -2147483648, max: 2147483647 }

const INTEGER_STRING = /^[+-]?\d+$/

// `"51`, `51"` and `"51"` all become `51`.
export function parseQuotedInteger(value: string): number | null {
  const cleaned = value.replace(/^"+|"+$/g, '')
  return INTEGER_STRING.test(cleaned) ? Number(cleaned) : null
}

export const GeographyLimitSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value, ctx): number | null => {
    if (value == null) return null

    const parsed = typeof value === 'number' ? value : parseQuotedInteger(value)

    if (parsed === null || !Number.isInteger(parsed)) {
      ctx.addIssue({
        code: 'custom',
        message: `Invalid value for 'limit' field: ${JSON.stringify(value)}`,
      })
      return z.NEVER
    }

    if (parsed < INTEGER_RANGE.min || parsed > INTEGER_RANGE.max) {
      ctx.addIssue({
        code: 'custom',
        message: `Value for 'limit' field is out of range: ${JSON.stringify(value)}`,
      })
      return z.NEVER
    }

    return parsed
  })

export const VariableLimitSchema = z
  .number()
  .int()
  .min(SMALLINT_RANGE.min)
  .max(SMALLINT_RANGE.max)
  .nullish()
  .transform((value) => value ?? null)

export function decodeReferenceDate(raw: unknown): CalendarDate | null {
  return decodeWith(ReferenceDateSchema, raw, 'referenceDate')
}

export function decodeWildcard(raw: unknown): string[] | null {
  return decodeWith(WildcardSchema, raw, 'wildcard')
}

export function decodeGeographyLimit(raw: unknown): number | null {
  return decodeWith(GeographyLimitSchema, raw, 'limit')
}
