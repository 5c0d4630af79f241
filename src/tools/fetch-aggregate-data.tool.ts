import type { Tool } from '@modelcontextprotocol/sdk/types.js'

import { BaseTool } from './base.tool.js'
import { buildCitation } from '../helpers/citation.js'
import { NotFoundError } from '../errors.js'
import { Dataset } from '../models/dataset.model.js'
import type { Geography } from '../models/geography.model.js'
import {
  type DataTable,
  type FetchAggregateDataArgs,
  FetchAggregateDataArgsSchema,
  FetchAggregateDataInputSchema,
} from '../schema/fetch-aggregate-data.schema.js'
import { validateGeographyArgs } from '../schema/validators.js'
import type { ToolResponse } from '../types/base.types.js'

export const toolDescription = `
  Fetches statistical data from a Census Data API dataset for a geography level and a list of variables. Requests larger than the per-call variable limit are split into batches and stitched back into a single table. Use fetch-dataset-geography to find the geography and its required filters, and fetch-dataset-variables to find variable names.
`

export class FetchAggregateDataTool extends BaseTool<FetchAggregateDataArgs> {
  name = 'fetch-aggregate-data'
  description = toolDescription
  inputSchema: Tool['inputSchema'] = FetchAggregateDataArgsSchema

  get argsSchema() {
    return FetchAggregateDataInputSchema.superRefine((args, ctx) => {
      validateGeographyArgs(args, ctx)
    })
  }

  // Resolves the geography by level or by name, matching exactly
  private async findGeography(
    dataset: Dataset,
    args: FetchAggregateDataArgs,
  ): Promise<Geography> {
    const [field, wanted] = args.geoLevel
      ? (['geoLevel', args.geoLevel] as const)
      : (['name', args.geography ?? ''] as const)

    const [geography] = await dataset.searchGeography([
      [field, (value: string) => value === wanted],
    ])
    if (!geography) {
      throw new NotFoundError(
        `No geography with ${field} '${wanted}' in dataset '${dataset.path}'`,
      )
    }
    return geography
  }

  protected async toolHandler(
    args: FetchAggregateDataArgs,
  ): Promise<ToolResponse> {
    const dataset = await Dataset.initialize(args.year, args.dataset, this.api)
    const geography = await this.findGeography(dataset, args)

    const data = await dataset.download({
      geography,
      geoFilters: args.geoFilters,
      variableNames: args.variables,
    })

    const citation = buildCitation(
      dataset.accessUrl ?? dataset.path,
      geography.filterToParams(args.geoFilters),
    )
    return this.createSuccessResponse(
      this.createSuccessResponseText(data, dataset.path, citation),
    )
  }

  private createSuccessResponseText(
    responseData: DataTable,
    dataset: string,
    citation: string,
  ): string {
    const [headers = [], ...rows] = responseData

    const output = rows
      .map((row) => headers.map((h, i) => `${h}: ${row[i]}`).join(', '))
      .join('\n')

    return `Response from ${dataset}:\n${output}\n${citation}`
  }
}
