import {
  checkFilters,
  type FilterableRecord,
  type FilterMode,
  normalizeFilters,
  type RegexFilter,
} from '../helpers/filters.helper.js'
import {
  splitAttributes,
  type VariableEntry,
  VariablesJsonSchema,
} from '../schema/dataset-variables.schema.js'
import { CensusApiService } from '../services/censusApi.service.js'
import { VariableCacheService } from '../services/variableCache.service.js'

export interface VariableProps {
  name: string
  label: string
  groupName: string
  limit: number
  concept?: string
  predicateType?: string
  attributes?: string[]
}

export class Variable implements FilterableRecord {
  static readonly filterableAttrs = [
    'name',
    'label',
    'concept',
    'groupName',
  ] as const

  readonly filterableAttrs: readonly string[] = Variable.filterableAttrs
  readonly name: string
  readonly label: string
  readonly groupName: string
  readonly limit: number
  readonly concept: string
  readonly predicateType: string
  readonly attributes?: readonly string[]

  constructor(props: VariableProps) {
    this.name = props.name
    this.label = props.label
    this.groupName = props.groupName
    this.limit = props.limit
    this.concept = props.concept ?? ''
    this.predicateType = props.predicateType ?? ''
    this.attributes = props.attributes
  }

  static fromEntry(name: string, entry: VariableEntry): Variable {
    return new Variable({
      name,
      label: entry.label,
      groupName: entry.group,
      limit: entry.limit,
      concept: entry.concept,
      predicateType: entry.predicateType,
      attributes: splitAttributes(entry.attributes),
    })
  }
}

/**
 * Fetches the variables document at `varUrl` and keeps the variables passing
 * `filters`. The last couple of searches are memoized per URL, filters and
 * mode.
 */
export async function searchVariables(
  varUrl: string,
  filters: readonly RegexFilter[] = [],
  mode: FilterMode = 'and',
  api: CensusApiService = CensusApiService.getInstance(),
  cache: VariableCacheService = VariableCacheService.getInstance(),
): Promise<Variable[]> {
  const matchFilters = normalizeFilters(filters)
  const cacheParams = { url: varUrl, filters, mode }

  const cached = cache.get(cacheParams)
  if (cached) {
    console.log(`Retrieving variables for ${varUrl} from cache`)
    return cached
  }

  const data = await api.getJson(varUrl, VariablesJsonSchema)

  const hits = Object.entries(data.variables)
    .map(([name, entry]) => Variable.fromEntry(name, entry))
    .filter((variable) => checkFilters(variable, matchFilters, mode))

  cache.set(cacheParams, hits)
  return hits
}
