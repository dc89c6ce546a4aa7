import { z } from 'zod'

import {
  decodeWith,
  parseJsonDocument,
} from '../helpers/zod-error.helper.js'

// One entry of https://api.census.gov/data.json, shaped like a row of the
// `api_paths` table.
export interface ApiPathRecord {
  c_vintage: number | null
  c_dataset: Array<string | null>
  c_geography_link: string
  c_variables_link: string
  title: string
  description: string
}

export interface ApiPathRow extends ApiPathRecord {
  id: number
}

export const RawApiPathSchema = z
  .object({
    c_vintage: z
      .number()
      .int()
      .nullish()
      .transform((value) => value ?? null),
    c_dataset: z.array(z.string().nullable()),
    c_geographyLink: z.string().min(1),
    c_variablesLink: z.string().min(1),
    title: z.string(),
    description: z.string(),
  })
  .transform(
    (item): ApiPathRecord => ({
      c_vintage: item.c_vintage,
      c_dataset: item.c_dataset,
      c_geography_link: item.c_geographyLink,
      c_variables_link: item.c_variablesLink,
      title: item.title,
      description: item.description,
    }),
  )

export const ApiCatalogSchema = z.object({
  dataset: z.array(RawApiPathSchema),
})

export function parseApiCatalog(rawText: string): ApiPathRecord[] {
  const raw = parseJsonDocument(rawText, 'data.json')
  return decodeWith(ApiCatalogSchema, raw, 'data.json').dataset
}
