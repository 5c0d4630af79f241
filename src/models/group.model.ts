import {
  checkFilters,
  type FilterableRecord,
  type FilterMode,
  normalizeFilters,
  type RegexFilter,
} from '../helpers/filters.helper.js'
import { GroupsJsonSchema } from '../schema/dataset-groups.schema.js'
import { CensusApiService } from '../services/censusApi.service.js'
import { searchVariables, type Variable } from './variable.model.js'

export interface GroupProps {
  name: string
  description: string
  varUrl: string
}

export class Group implements FilterableRecord {
  static readonly filterableAttrs = ['name', 'description'] as const

  readonly filterableAttrs: readonly string[] = Group.filterableAttrs
  readonly name: string
  readonly description: string
  readonly varUrl: string

  constructor(
    props: GroupProps,
    private readonly api: CensusApiService = CensusApiService.getInstance(),
  ) {
    this.name = props.name
    this.description = props.description
    this.varUrl = props.varUrl
  }

  // Searches only the variables belonging to this group
  searchVariables(
    filters?: readonly RegexFilter[],
    mode: FilterMode = 'and',
  ): Promise<Variable[]> {
    return searchVariables(this.varUrl, filters, mode, this.api)
  }
}

export async function searchGroups(
  groupUrl: string,
  filters?: readonly RegexFilter[],
  mode: FilterMode = 'and',
  api: CensusApiService = CensusApiService.getInstance(),
): Promise<Group[]> {
  const matchFilters = normalizeFilters(filters)
  const data = await api.getJson(groupUrl, GroupsJsonSchema)

  return data.groups
    .map(
      (entry) =>
        new Group(
          {
            name: entry.name,
            description: entry.description,
            varUrl: entry.variables,
          },
          api,
        ),
    )
    .filter((group) => checkFilters(group, matchFilters, mode))
}
