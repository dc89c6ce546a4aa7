import { z } from 'zod'

import {
  CommaListSchema,
  LabelSchema,
  OptionalBooleanSchema,
  OptionalStringSchema,
  VariableLimitSchema,
} from './field-decoders.schema.js'
import {
  decodeWith,
  parseJsonDocument,
  valueAtPath,
} from '../helpers/zod-error.helper.js'

/**
 * One query-able variable of an API endpoint, shaped like a row of the
 * `variables` table.
 */
export interface VariableRecord {
  /** Key of the entry in the `variables` map of variables.json. */
  name: string
  label: string[]
  concept: string | null
  required: string | null
  predicate_type: string | null
  group: string[] | null
  limit: number | null
  predicate_only: boolean | null
  attributes: string[] | null
}

// A `name` nested inside an entry is dropped by the object schema; the map
// key is the only source of the variable name.
export const RawVariableEntrySchema = z.object({
  label: LabelSchema,
  concept: OptionalStringSchema,
  required: OptionalStringSchema,
  predicateType: OptionalStringSchema,
  group: CommaListSchema,
  limit: VariableLimitSchema,
  predicateOnly: OptionalBooleanSchema,
  attributes: CommaListSchema,
})

export type RawVariableEntry = z.infer<typeof RawVariableEntrySchema>

export const VariablesDocumentSchema = z.object({
  variables: z.record(z.string().min(1), RawVariableEntrySchema),
})

export function toVariableRecord(
  name: string,
  entry: RawVariableEntry,
): VariableRecord {
  return {
    name,
    label: entry.label,
    concept: entry.concept,
    required: entry.required,
    predicate_type: entry.predicateType,
    group: entry.group,
    limit: entry.limit,
    predicate_only: entry.predicateOnly,
    attributes: entry.attributes,
  }
}

/**
 * Parses a variables.json document into one record per entry of its
 * `variables` map, in the map's iteration order.
 */
export function parseVariables(rawText: string): VariableRecord[] {
  const raw = parseJsonDocument(rawText, 'variables.json')
  decodeWith(VariablesDocumentSchema, raw, 'variables.json')

  // The decoded map is a plain object, where a "__proto__" key replaces the
  // prototype instead of adding an entry. JSON.parse keeps it as an own
  // property, so records are built from the raw map.
  const rawVariables = valueAtPath(raw, ['variables'])
  if (rawVariables === null || typeof rawVariables !== 'object') {
    return []
  }

  return Object.entries(rawVariables).map(([name, entry]) =>
    toVariableRecord(name, RawVariableEntrySchema.parse(entry)),
  )
}
