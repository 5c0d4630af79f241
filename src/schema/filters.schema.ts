import { z } from 'zod'

import type { RegexFilter } from '../helpers/filters.helper.js'

export const DatasetLocatorInputSchema = z.object({
  dataset: z.string().describe("Dataset path, e.g. 'acs/acs5'"),
  year: z.number().int().describe('The year or vintage of the data, e.g. 2022'),
})

export const FilterEntrySchema = z.object({
  field: z.string().describe('Name of the field to match against'),
  pattern: z
    .string()
    .describe('Case-insensitive regular expression matched as a substring'),
})

export const FilterInputSchema = z.object({
  filters: z.array(FilterEntrySchema).optional(),
  mode: z.enum(['and', 'or']).optional(),
})

export const datasetLocatorProperties = {
  dataset: {
    type: 'string',
    description: "The dataset path, e.g. 'acs/acs5'",
    examples: ['acs/acs5', 'dec/pl'],
  },
  year: {
    type: 'number',
    description: 'The year or vintage of the data.',
    examples: [2022],
  },
}

export function filterProperties(fields: readonly string[]) {
  return {
    filters: {
      type: 'array',
      description: `Regex filters narrowing the results. Filterable fields: ${fields.join(', ')}.`,
      items: {
        type: 'object',
        properties: {
          field: { type: 'string', enum: [...fields] },
          pattern: { type: 'string' },
        },
        required: ['field', 'pattern'],
      },
    },
    mode: {
      type: 'string',
      enum: ['and', 'or'],
      description: "How filters combine. Defaults to 'and'.",
    },
  }
}

export function toRegexFilters(
  entries: readonly FilterEntry[] = [],
): RegexFilter[] {
  return entries.map(({ field, pattern }) => [field, pattern] as const)
}

export type DatasetLocatorArgs = z.infer<typeof DatasetLocatorInputSchema>
export type FilterEntry = z.infer<typeof FilterEntrySchema>
export type FilterInput = z.infer<typeof FilterInputSchema>
