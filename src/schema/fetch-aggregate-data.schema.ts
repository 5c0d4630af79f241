import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import {
  DatasetLocatorInputSchema,
  datasetLocatorProperties,
} from './filters.schema.js'

export const FetchAggregateDataInputSchema = DatasetLocatorInputSchema.extend({
  geoLevel: z
    .string()
    .describe("3-digit geography level, e.g. '050' for counties")
    .optional(),
  geography: z
    .string()
    .describe("Geography name, e.g. 'county'")
    .optional(),
  geoFilters: z
    .array(z.tuple([z.string(), z.string()]))
    .describe("Geography filters as [field, value] pairs, e.g. ['state', '06']")
    .optional(),
  variables: z.array(z.string()).min(1).describe('Variable names to fetch'),
})

export const FetchAggregateDataArgsSchema = {
  type: 'object',
  properties: {
    ...datasetLocatorProperties,
    geoLevel: {
      type: 'string',
      description:
        "3-digit geography level to fetch, e.g. '050'. Takes precedence over 'geography'.",
      examples: ['040', '050'],
    },
    geography: {
      type: 'string',
      description: "Geography name to fetch, e.g. 'county'.",
      examples: ['state', 'county'],
    },
    geoFilters: {
      type: 'array',
      description:
        'Geography filters as [field, value] pairs. Repeated fields are comma-joined.',
      items: {
        type: 'array',
        items: { type: 'string' },
        minItems: 2,
        maxItems: 2,
      },
      examples: [[['state', '06'], ['county', '*']]],
    },
    variables: {
      type: 'array',
      items: { type: 'string' },
      description: 'Variable names to fetch.',
      examples: [['NAME', 'B01001_001E']],
    },
  },
  required: ['dataset', 'year', 'variables'],
} satisfies Tool['inputSchema']

export const CensusCellSchema = z.string().nullable()

// Header row followed by data rows
export const DataTableSchema = z.array(z.array(CensusCellSchema))

export type FetchAggregateDataArgs = z.infer<typeof FetchAggregateDataInputSchema>
export type CensusCell = z.infer<typeof CensusCellSchema>
export type DataTable = z.infer<typeof DataTableSchema>
