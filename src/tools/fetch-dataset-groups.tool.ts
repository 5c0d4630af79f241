import type { Tool } from '@modelcontextprotocol/sdk/types.js'

import { BaseTool } from './base.tool.js'
import { Dataset } from '../models/dataset.model.js'
import {
  type FetchDatasetGroupsArgs,
  FetchDatasetGroupsArgsSchema,
  FetchDatasetGroupsInputSchema,
} from '../schema/dataset-groups.schema.js'
import { toRegexFilters } from '../schema/filters.schema.js'
import type { ToolResponse } from '../types/base.types.js'

export class FetchDatasetGroupsTool extends BaseTool<FetchDatasetGroupsArgs> {
  name = 'fetch-dataset-groups'
  description =
    'Fetch the variable groups (tables) of a dataset, optionally narrowed by regex filters on name or description.'

  inputSchema: Tool['inputSchema'] = FetchDatasetGroupsArgsSchema

  get argsSchema() {
    return FetchDatasetGroupsInputSchema
  }

  protected async toolHandler(
    args: FetchDatasetGroupsArgs,
  ): Promise<ToolResponse> {
    const dataset = await Dataset.initialize(args.year, args.dataset, this.api)
    const groups = await dataset.searchGroups(
      toRegexFilters(args.filters),
      args.mode,
    )

    const responseText = [
      `Dataset: ${dataset.path} (${dataset.year})`,
      `Total Groups: ${groups.length}`,
      ``,
      JSON.stringify(
        groups.map(({ name, description }) => ({ name, description })),
        null,
        2,
      ),
    ].join('\n')

    return this.createSuccessResponse(responseText)
  }
}
