import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import {
  DatasetLocatorInputSchema,
  datasetLocatorProperties,
  filterProperties,
  FilterInputSchema,
} from './filters.schema.js'

//Argument Validation
export const FetchDatasetVariablesInputSchema = DatasetLocatorInputSchema.merge(
  FilterInputSchema,
).extend({
  group: z
    .string()
    .describe(
      "Restrict the search to a single group of this dataset, e.g. 'B01001'",
    )
    .optional(),
})

export const FetchDatasetVariablesArgsSchema = {
  type: 'object',
  properties: {
    ...datasetLocatorProperties,
    group: {
      type: 'string',
      description:
        "Restrict the search to a single group of this dataset, e.g. 'B01001'",
    },
    ...filterProperties(['name', 'label', 'concept', 'groupName']),
  },
  required: ['dataset', 'year'],
} satisfies Tool['inputSchema']

//API Response Validation
const VariableSchema = z.object({
  label: z.string(),
  concept: z.string().optional(),
  predicateType: z.string().optional(),
  group: z.string(),
  limit: z.number(),
  attributes: z.string().optional(),
})

export const VariablesJsonSchema = z.object({
  variables: z.record(z.string(), VariableSchema).default({}),
})

export function splitAttributes(attributes?: string): string[] | undefined {
  return attributes ? attributes.split(',') : undefined
}

//Export Types for Validation
export type FetchDatasetVariablesArgs = z.infer<
  typeof FetchDatasetVariablesInputSchema
>
export type VariableEntry = z.infer<typeof VariableSchema>
export type VariablesJsonResponse = z.infer<typeof VariablesJsonSchema>
