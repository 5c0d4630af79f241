import { MissingRequiredFieldError, UnsupportedWildcardError } from '../errors.js'
import {
  checkFilters,
  type FilterableRecord,
  type FilterMode,
  normalizeFilters,
  type RegexFilter,
} from '../helpers/filters.helper.js'
import {
  type GeographyFipsEntry,
  GeographyJsonSchema,
  parseReferenceDate,
} from '../schema/dataset-geography.schema.js'
import { CensusApiService } from '../services/censusApi.service.js'

// A [field, value] pair, e.g. ['state', '06'] or ['county', '*']
export type GeoFilter = readonly [field: string, value: string]
export type GeoParam = [key: 'for' | 'in', value: string]

export interface GeographyProps {
  name: string
  geoLevel: string
  referenceDate: Date
  requires?: string[]
  wildcard?: string[]
  optionalWildcard?: string
}

export class Geography implements FilterableRecord {
  static readonly filterableAttrs = ['name', 'geoLevel'] as const

  readonly filterableAttrs: readonly string[] = Geography.filterableAttrs
  readonly name: string
  readonly geoLevel: string
  readonly referenceDate: Date
  readonly requires: readonly string[]
  readonly wildcard: readonly string[]
  readonly optionalWildcard: string

  constructor(props: GeographyProps) {
    this.name = props.name
    this.geoLevel = props.geoLevel
    this.referenceDate = props.referenceDate
    this.requires = props.requires ?? []
    this.wildcard = props.wildcard ?? []
    this.optionalWildcard = props.optionalWildcard ?? ''
  }

  static fromEntry(entry: GeographyFipsEntry): Geography {
    return new Geography({
      name: entry.name,
      geoLevel: entry.geoLevelDisplay,
      referenceDate: parseReferenceDate(entry.referenceDate),
      requires: entry.requires,
      wildcard: entry.wildcard,
      optionalWildcard: entry.optionalWithWCFor,
    })
  }

  get sortIndex(): number {
    return Number(this.geoLevel)
  }

  // Number of trailing identifier columns the API appends for this geography
  get complexity(): number {
    return this.requires.length + 1
  }

  /**
   * Converts geography filters into `for`/`in` query parameters. Values given
   * for the same field are comma-joined. Without filters every unit of this
   * geography is requested.
   */
  filterToParams(geoFilters?: readonly GeoFilter[]): GeoParam[] {
    if (geoFilters === undefined) {
      return [['for', `${this.name}:*`]]
    }

    const grouped = new Map<string, string[]>()
    for (const [field, value] of geoFilters) {
      const values = grouped.get(field) ?? []
      values.push(value)
      grouped.set(field, values)
    }
    const filters = new Map(
      Array.from(grouped, ([field, values]) => [field, values.join(',')]),
    )

    for (const field of [this.name, ...this.requires]) {
      if (!filters.has(field) && field !== this.optionalWildcard) {
        throw new MissingRequiredFieldError(field, this.name)
      }
    }

    const forValue = filters.get(this.name) ?? '*'
    filters.delete(this.name)

    const inParams: GeoParam[] = []
    for (const [field, value] of filters) {
      if (value === '*' && !this.wildcard.includes(field)) {
        throw new UnsupportedWildcardError(field, this.name)
      }
      inParams.push(['in', `${field}:${value}`])
    }

    return [['for', `${this.name}:${forValue}`], ...inParams]
  }
}

export function compareGeographies(a: Geography, b: Geography): number {
  return a.sortIndex - b.sortIndex
}

export async function searchGeography(
  geoUrl: string,
  filters?: readonly RegexFilter[],
  mode: FilterMode = 'and',
  api: CensusApiService = CensusApiService.getInstance(),
): Promise<Geography[]> {
  const matchFilters = normalizeFilters(filters)
  const data = await api.getJson(geoUrl, GeographyJsonSchema)

  if (data.fips.length === 0) {
    console.log('No FIPS geography data found in response')
  }

  return data.fips
    .map((entry) => Geography.fromEntry(entry))
    .filter((geography) => checkFilters(geography, matchFilters, mode))
    .sort(compareGeographies)
}
