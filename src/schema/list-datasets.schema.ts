import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import { filterProperties, FilterInputSchema } from './filters.schema.js'

export const ListDatasetsInputSchema = z
  .object({
    year: z.number().int().describe('The year or vintage of the catalog'),
    path: z
      .string()
      .describe("Dataset path to match, e.g. 'acs/acs5'")
      .optional(),
    includeSubDatasets: z.boolean().optional(),
  })
  .merge(FilterInputSchema)

export const ListDatasetsArgsSchema = {
  type: 'object',
  properties: {
    year: {
      type: 'number',
      description: 'The year or vintage of the catalog.',
      examples: [2022],
    },
    path: {
      type: 'string',
      description:
        'Dataset path to match. Omit to list every dataset of the year.',
      examples: ['acs/acs5'],
    },
    includeSubDatasets: {
      type: 'boolean',
      description:
        'When true (default) match paths containing `path`; when false only paths ending with it.',
    },
    ...filterProperties(['title', 'description', 'path']),
  },
  required: ['year'],
} satisfies Tool['inputSchema']

const DistributionSchema = z.object({
  format: z.string(),
  accessURL: z.string().optional(),
})

// Only the catalog fields the client reads are checked
export const CatalogDatasetSchema = z.object({
  title: z.string(),
  description: z.string(),
  c_dataset: z.array(z.string()),
  c_geographyLink: z.string(),
  c_variablesLink: z.string(),
  c_groupsLink: z.string(),
  distribution: z.array(DistributionSchema),
})

export const CatalogJsonSchema = z.object({
  dataset: z.array(CatalogDatasetSchema).default([]),
})

export function findApiAccessUrl(
  entry: CatalogDatasetType,
): string | undefined {
  return entry.distribution.find((dist) => dist.format === 'API')?.accessURL
}

export type ListDatasetsArgs = z.infer<typeof ListDatasetsInputSchema>
export type CatalogDatasetType = z.infer<typeof CatalogDatasetSchema>
export type CatalogJsonType = z.infer<typeof CatalogJsonSchema>
