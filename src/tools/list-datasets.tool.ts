import type { Tool } from '@modelcontextprotocol/sdk/types.js'

import { BaseTool } from './base.tool.js'
import { type Dataset, searchDatasets } from '../models/dataset.model.js'
import { toRegexFilters } from '../schema/filters.schema.js'
import {
  type ListDatasetsArgs,
  ListDatasetsArgsSchema,
  ListDatasetsInputSchema,
} from '../schema/list-datasets.schema.js'
import type { ToolResponse } from '../types/base.types.js'

export const toolDescription = `
  Lists the Census Data API datasets published for a given year. Narrow the catalog with a dataset path (e.g. 'acs/acs5') and optional regex filters on title, description or path. Use the returned path and year with the geography, group, variable and data tools.
`

export interface DatasetSummary {
  title: string
  path: string
  year: number
  description: string
  accessUrl?: string
}

export class ListDatasetsTool extends BaseTool<ListDatasetsArgs> {
  name = 'list-datasets'
  description = toolDescription
  inputSchema: Tool['inputSchema'] = ListDatasetsArgsSchema

  get argsSchema() {
    return ListDatasetsInputSchema
  }

  private summarize(dataset: Dataset): DatasetSummary {
    return {
      title: dataset.title,
      path: dataset.path,
      year: dataset.year,
      description: dataset.description,
      accessUrl: dataset.accessUrl,
    }
  }

  protected async toolHandler(args: ListDatasetsArgs): Promise<ToolResponse> {
    const datasets = await searchDatasets(
      args.year,
      args.path,
      args.includeSubDatasets,
      {
        filters: toRegexFilters(args.filters),
        mode: args.mode,
        api: this.api,
      },
    )

    return this.createSuccessResponse(
      JSON.stringify(datasets.map((dataset) => this.summarize(dataset))),
    )
  }
}
