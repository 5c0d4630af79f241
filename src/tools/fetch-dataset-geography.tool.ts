import type { Tool } from '@modelcontextprotocol/sdk/types.js'

import { BaseTool } from './base.tool.js'
import { Dataset } from '../models/dataset.model.js'
import type { Geography } from '../models/geography.model.js'
import {
  type FetchDatasetGeographyArgs,
  FetchDatasetGeographyArgsSchema,
  FetchDatasetGeographyInputSchema,
} from '../schema/dataset-geography.schema.js'
import { toRegexFilters } from '../schema/filters.schema.js'
import type { ToolResponse } from '../types/base.types.js'

export interface GeographySummary {
  name: string
  geoLevel: string
  referenceDate: string
  requires: string[]
  allowsWildcard: string[]
  wildcardFor?: string
  complexity: number
  queryExample: string
}

export function buildQueryExample(geography: Geography): string {
  const querySyntax = geography.name.replace(/\s+/g, '+')

  if (geography.requires.length === 0) {
    return `for=${querySyntax}:*`
  }

  const parentSyntax = geography.requires
    .map((req) => req.replace(/\s+/g, '+'))
    .join(':*&in=')
  return `for=${querySyntax}:*&in=${parentSyntax}:*`
}

export class FetchDatasetGeographyTool extends BaseTool<FetchDatasetGeographyArgs> {
  name = 'fetch-dataset-geography'
  description =
    'Fetch the geography levels available for filtering a dataset, with the companion fields each level requires.'

  inputSchema: Tool['inputSchema'] = FetchDatasetGeographyArgsSchema

  get argsSchema() {
    return FetchDatasetGeographyInputSchema
  }

  private summarize(geography: Geography): GeographySummary {
    return {
      name: geography.name,
      geoLevel: geography.geoLevel,
      referenceDate: geography.referenceDate.toISOString().slice(0, 10),
      requires: [...geography.requires],
      allowsWildcard: [...geography.wildcard],
      wildcardFor: geography.optionalWildcard || undefined,
      complexity: geography.complexity,
      queryExample: buildQueryExample(geography),
    }
  }

  protected async toolHandler(
    args: FetchDatasetGeographyArgs,
  ): Promise<ToolResponse> {
    const dataset = await Dataset.initialize(args.year, args.dataset, this.api)
    const geographies = await dataset.searchGeography(
      toRegexFilters(args.filters),
      args.mode,
    )

    return this.createSuccessResponse(
      `Available geographies for ${dataset.path} (${dataset.year}):\n\n${JSON.stringify(
        geographies.map((geography) => this.summarize(geography)),
        null,
        2,
      )}`,
    )
  }
}
