import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import {
  DatasetLocatorInputSchema,
  datasetLocatorProperties,
  filterProperties,
  FilterInputSchema,
} from './filters.schema.js'

export const FetchDatasetGroupsInputSchema =
  DatasetLocatorInputSchema.merge(FilterInputSchema)

export const FetchDatasetGroupsArgsSchema = {
  type: 'object',
  properties: {
    ...datasetLocatorProperties,
    ...filterProperties(['name', 'description']),
  },
  required: ['dataset', 'year'],
} satisfies Tool['inputSchema']

export const GroupEntrySchema = z.object({
  name: z.string().describe("Group identifier, e.g. 'B01001'"),
  description: z.string().describe("Group title, e.g. 'SEX BY AGE'"),
  variables: z.string().describe('URL of the variables in this group'),
})

export const GroupsJsonSchema = z.object({
  groups: z.array(GroupEntrySchema).default([]),
})

export type FetchDatasetGroupsArgs = z.infer<typeof FetchDatasetGroupsInputSchema>
export type GroupEntry = z.infer<typeof GroupEntrySchema>
export type GroupsJson = z.infer<typeof GroupsJsonSchema>
