import { z } from 'zod'

import {
  type CalendarDate,
  GeographyLimitSchema,
  OptionalStringListSchema,
  OptionalStringSchema,
  ReferenceDateSchema,
  WildcardSchema,
} from './field-decoders.schema.js'
import {
  decodeWith,
  parseJsonDocument,
} from '../helpers/zod-error.helper.js'

export interface GeographyRecord {
  name: string
  geo_level_display: string | null
  reference_date: CalendarDate | null
  requires: string[] | null
  wildcard: string[] | null
  limit: number | null
  geo_level_id: string | null
  optional_with_wildcard_for: string | null
}

export const RawGeographyEntrySchema = z
  .object({
    name: z.string().min(1, 'Geography name is required'),
    geoLevelDisplay: OptionalStringSchema,
    referenceDate: ReferenceDateSchema,
    requires: OptionalStringListSchema,
    wildcard: WildcardSchema,
    limit: GeographyLimitSchema,
    geoLevelId: OptionalStringSchema,
    optionalWithWCFor: OptionalStringSchema,
  })
  .transform(
    (entry): GeographyRecord => ({
      name: entry.name,
      geo_level_display: entry.geoLevelDisplay,
      reference_date: entry.referenceDate,
      requires: entry.requires,
      wildcard: entry.wildcard,
      limit: entry.limit,
      geo_level_id: entry.geoLevelId,
      optional_with_wildcard_for: entry.optionalWithWCFor,
    }),
  )

// Some endpoints publish a geography.json without a `fips` array.
export const GeographyDocumentSchema = z.object({
  fips: z
    .array(RawGeographyEntrySchema)
    .optional()
    .transform((entries) => entries ?? []),
})

export function parseGeography(rawText: string): GeographyRecord[] {
  const raw = parseJsonDocument(rawText, 'geography.json')
  return decodeWith(GeographyDocumentSchema, raw, 'geography.json').fips
}
