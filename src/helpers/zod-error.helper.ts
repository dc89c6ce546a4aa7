import { z } from 'zod'

import { DecodeError } from '../errors/census-metadata.errors.js'

export function issuePath(
  path: ReadonlyArray<PropertyKey>,
): Array<string | number> {
  return path.map((key) => (typeof key === 'symbol' ? key.toString() : key))
}

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? path.join('.') : 'root'
}

// Walks the raw document along a zod issue path to recover the value the
// issue was raised for.
export function valueAtPath(
  raw: unknown,
  path: ReadonlyArray<string | number>,
): unknown {
  return path.reduce<unknown>((current, key) => {
    if (current === null || typeof current !== 'object') {
      return undefined
    }
    if (Array.isArray(current)) {
      return typeof key === 'number' ? current[key] : undefined
    }
    const descriptor: PropertyDescriptor | undefined =
      Object.getOwnPropertyDescriptor(current, key)
    return descriptor?.value
  }, raw)
}

export function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined'
  return JSON.stringify(value)
}

// Converts the first issue of a failed parse into a DecodeError; every issue
// is logged so a malformed document can be diagnosed in one run.
export function toDecodeError(
  error: z.ZodError,
  raw: unknown,
  source: string,
): DecodeError {
  error.issues.forEach((issue, i) => {
    console.error(
      `${i + 1}. ${source} ${formatIssuePath(issuePath(issue.path))}: ${issue.message}`,
    )
  })

  const [first] = error.issues
  const path = first ? issuePath(first.path) : []
  const value = valueAtPath(raw, path)
  const message = first ? first.message : error.message

  return new DecodeError(
    `Failed to decode ${source} at "${formatIssuePath(path)}": ${message} (value: ${describeValue(value)})`,
    path,
    value,
    { cause: error },
  )
}

export function decodeWith<Output>(
  schema: z.ZodType<Output>,
  raw: unknown,
  source: string,
): Output {
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw toDecodeError(result.error, raw, source)
  }
  return result.data
}

export function parseJsonDocument(rawText: string, source: string): unknown {
  try {
    return JSON.parse(rawText)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new DecodeError(
      `Failed to decode ${source}: invalid JSON (${reason})`,
      [],
      rawText.slice(0, 200),
      { cause: error },
    )
  }
}
