import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import {
  DatasetLocatorInputSchema,
  datasetLocatorProperties,
  filterProperties,
  FilterInputSchema,
} from './filters.schema.js'

export const FetchDatasetGeographyInputSchema = DatasetLocatorInputSchema.merge(
  FilterInputSchema,
)

export const FetchDatasetGeographyArgsSchema = {
  type: 'object',
  properties: {
    ...datasetLocatorProperties,
    ...filterProperties(['name', 'geoLevel']),
  },
  required: ['dataset', 'year'],
} satisfies Tool['inputSchema']

// Schema for individual geography object in the fips array
export const GeographyFipsEntrySchema = z.object({
  name: z
    .string()
    .describe(
      "Geography name (e.g., 'state', 'county', 'congressional district')",
    ),
  geoLevelDisplay: z
    .string()
    .describe("3-digit geography code (e.g., '040', '050', '500')"),
  referenceDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD reference date')
    .describe("Reference date (e.g., '2022-01-01')"),
  requires: z
    .array(z.string())
    .optional()
    .describe('Required parent geographies for this level'),
  wildcard: z
    .array(z.string())
    .optional()
    .describe('Geographies that can use wildcards'),
  optionalWithWCFor: z
    .string()
    .optional()
    .describe('Optional wildcard geography'),
})

// Schema for the Census geography.json API response
export const GeographyJsonSchema = z.object({
  fips: z
    .array(GeographyFipsEntrySchema)
    .default([])
    .describe('Array of available geography levels'),
})

export function parseReferenceDate(value: string): Date {
  return new Date(`${value}T00:00:00.000Z`)
}

export type FetchDatasetGeographyArgs = z.infer<
  typeof FetchDatasetGeographyInputSchema
>
export type GeographyFipsEntry = z.infer<typeof GeographyFipsEntrySchema>
export type GeographyJson = z.infer<typeof GeographyJsonSchema>
