import type { Tool } from '@modelcontextprotocol/sdk/types.js'

import { BaseTool } from './base.tool.js'
import { NotFoundError } from '../errors.js'
import type { RegexFilter } from '../helpers/filters.helper.js'
import { Dataset } from '../models/dataset.model.js'
import type { Variable } from '../models/variable.model.js'
import {
  type FetchDatasetVariablesArgs,
  FetchDatasetVariablesArgsSchema,
  FetchDatasetVariablesInputSchema,
} from '../schema/dataset-variables.schema.js'
import { toRegexFilters } from '../schema/filters.schema.js'
import type { ToolResponse } from '../types/base.types.js'

export class FetchDatasetVariablesTool extends BaseTool<FetchDatasetVariablesArgs> {
  name = 'fetch-dataset-variables'
  description =
    'Fetch the variables available for querying a dataset, optionally restricted to one group and narrowed by regex filters.'

  inputSchema: Tool['inputSchema'] = FetchDatasetVariablesArgsSchema

  get argsSchema() {
    return FetchDatasetVariablesInputSchema
  }

  private async findVariables(
    dataset: Dataset,
    filters: RegexFilter[],
    args: FetchDatasetVariablesArgs,
  ): Promise<Variable[]> {
    const groupName = args.group
    if (groupName === undefined) {
      return dataset.searchVariables(filters, args.mode)
    }

    const [group] = await dataset.searchGroups([
      ['name', (value: string) => value === groupName],
    ])
    if (!group) {
      throw new NotFoundError(
        `No group '${groupName}' in dataset '${dataset.path}'`,
      )
    }
    return group.searchVariables(filters, args.mode)
  }

  protected async toolHandler(
    args: FetchDatasetVariablesArgs,
  ): Promise<ToolResponse> {
    const dataset = await Dataset.initialize(args.year, args.dataset, this.api)
    const variables = await this.findVariables(
      dataset,
      toRegexFilters(args.filters),
      args,
    )

    const responseText = [
      `Dataset: ${dataset.path} (${dataset.year})`,
      ...(args.group ? [`Group: ${args.group}`] : []),
      `Total Variables: ${variables.length}`,
      ``,
      `Complete variable list:`,
      JSON.stringify(
        variables.map((variable) => ({
          name: variable.name,
          label: variable.label,
          concept: variable.concept,
          group: variable.groupName,
          predicateType: variable.predicateType,
          attributes: variable.attributes,
        })),
        null,
        2,
      ),
    ].join('\n')

    return this.createSuccessResponse(responseText)
  }
}
