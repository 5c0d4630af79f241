import { config } from '../config.js'
import { MissingArgumentError, NotFoundError } from '../errors.js'
import { batcher } from '../helpers/batcher.helper.js'
import {
  checkFilters,
  type FilterableRecord,
  type FilterMode,
  normalizeFilters,
  type RegexFilter,
} from '../helpers/filters.helper.js'
import {
  type DataTable,
  DataTableSchema,
} from '../schema/fetch-aggregate-data.schema.js'
import {
  type CatalogDatasetType,
  CatalogJsonSchema,
  findApiAccessUrl,
} from '../schema/list-datasets.schema.js'
import {
  CensusApiService,
  type QueryParams,
} from '../services/censusApi.service.js'
import {
  type GeoFilter,
  type Geography,
  searchGeography,
} from './geography.model.js'
import { type Group, searchGroups } from './group.model.js'
import { searchVariables, type Variable } from './variable.model.js'

export interface DatasetProps {
  title: string
  description: string
  year: number
  path: string
  geoUrl: string
  varUrl: string
  groupUrl: string
  accessUrl?: string
}

export interface DownloadOptions {
  // Geography level as shown by the API, e.g. '050'; takes precedence over geography
  geoLevel?: string
  geography?: Geography
  geoFilters?: readonly GeoFilter[]
  // Takes precedence over variables
  variableNames?: readonly string[]
  variables?: readonly Variable[]
  batchSize?: number
}

export interface SearchDatasetsOptions {
  filters?: readonly RegexFilter[]
  mode?: FilterMode
  api?: CensusApiService
}

export class Dataset implements FilterableRecord {
  static readonly filterableAttrs = ['title', 'description', 'path'] as const

  readonly filterableAttrs: readonly string[] = Dataset.filterableAttrs
  readonly title: string
  readonly description: string
  readonly year: number
  readonly path: string
  readonly geoUrl: string
  readonly varUrl: string
  readonly groupUrl: string
  readonly accessUrl?: string

  constructor(
    props: DatasetProps,
    private readonly api: CensusApiService = CensusApiService.getInstance(),
  ) {
    this.title = props.title
    this.description = props.description
    this.year = props.year
    this.path = props.path
    this.geoUrl = props.geoUrl
    this.varUrl = props.varUrl
    this.groupUrl = props.groupUrl
    this.accessUrl = props.accessUrl
  }

  static fromCatalogEntry(
    entry: CatalogDatasetType,
    year: number,
    api?: CensusApiService,
  ): Dataset {
    return new Dataset(
      {
        title: entry.title,
        description: entry.description,
        year,
        path: entry.c_dataset.join('/'),
        geoUrl: entry.c_geographyLink,
        varUrl: entry.c_variablesLink,
        groupUrl: entry.c_groupsLink,
        accessUrl: findApiAccessUrl(entry),
      },
      api,
    )
  }

  /**
   * Resolves exactly one dataset by year and path. Sub datasets sharing the
   * path as a prefix (e.g. acs/acs5/profile for acs5) are not considered;
   * when several datasets still match, the first is returned.
   */
  static async initialize(
    year: number,
    path: string,
    api?: CensusApiService,
  ): Promise<Dataset> {
    const datasets = await searchDatasets(year, path, false, { api })
    const [first] = datasets
    if (!first) {
      throw new NotFoundError(
        `No dataset found for year ${year} and path '${path}'`,
      )
    }
    return first
  }

  searchGeography(
    filters?: readonly RegexFilter[],
    mode: FilterMode = 'and',
  ): Promise<Geography[]> {
    return searchGeography(this.geoUrl, filters, mode, this.api)
  }

  searchGroups(
    filters?: readonly RegexFilter[],
    mode: FilterMode = 'and',
  ): Promise<Group[]> {
    return searchGroups(this.groupUrl, filters, mode, this.api)
  }

  searchVariables(
    filters?: readonly RegexFilter[],
    mode: FilterMode = 'and',
  ): Promise<Variable[]> {
    return searchVariables(this.varUrl, filters, mode, this.api)
  }

  async download(options: DownloadOptions): Promise<DataTable> {
    const geography = await this.resolveGeography(options)
    const geoParams = geography.filterToParams(options.geoFilters)

    let varNames: readonly string[]
    if (options.variableNames !== undefined) {
      varNames = options.variableNames
    } else if (options.variables !== undefined) {
      varNames = options.variables.map((variable) => variable.name)
    } else {
      throw new MissingArgumentError(
        "Must specify either 'variableNames' or 'variables'",
      )
    }

    return this.downloadBatches(
      geography.complexity,
      geoParams,
      varNames,
      options.batchSize,
    )
  }

  /**
   * Requests the variables in batches of at most `batchSize` and stitches the
   * responses side by side. The API appends `geoComplexity` geography columns
   * to every response; only the last batch keeps them.
   */
  async downloadBatches(
    geoComplexity: number,
    geoParams: QueryParams,
    varNames: readonly string[],
    batchSize: number = config.variableBatchSize,
  ): Promise<DataTable> {
    const accessUrl = this.accessUrl
    if (accessUrl === undefined) {
      throw new NotFoundError(`Dataset '${this.path}' has no API access URL`)
    }

    const batches = batcher(varNames, batchSize)
    const batchOutputs: DataTable[] = []

    for (const [index, batch] of batches.entries()) {
      const params: QueryParams = [['get', batch.join(',')], ...geoParams]
      const results = await this.api.getJson(accessUrl, DataTableSchema, params)

      const isLastBatch = index === batches.length - 1
      batchOutputs.push(
        isLastBatch
          ? results
          : results.map((row) => row.slice(0, row.length - geoComplexity)),
      )
    }

    return stitchColumns(batchOutputs)
  }

  private async resolveGeography(options: DownloadOptions): Promise<Geography> {
    if (options.geoLevel !== undefined) {
      const geoLevel = options.geoLevel
      const [geography] = await this.searchGeography([
        ['geoLevel', (value: string) => value === geoLevel],
      ])
      if (!geography) {
        throw new NotFoundError(
          `No geography with level '${geoLevel}' in dataset '${this.path}'`,
        )
      }
      return geography
    }

    if (options.geography !== undefined) {
      return options.geography
    }

    throw new MissingArgumentError(
      "Must specify either 'geoLevel' or 'geography'",
    )
  }
}

// Concatenates tables horizontally, truncated to the shortest table
export function stitchColumns(tables: readonly DataTable[]): DataTable {
  if (tables.length === 0) {
    return []
  }

  const rowCount = Math.min(...tables.map((table) => table.length))
  const stitched: DataTable = []
  for (let i = 0; i < rowCount; i++) {
    stitched.push(tables.flatMap((table) => table[i] ?? []))
  }
  return stitched
}

/**
 * Lists the datasets of a year whose path matches `path`. With
 * `includeSubDatasets` the path may appear anywhere in the dataset path;
 * otherwise the dataset path must end with it.
 */
export async function searchDatasets(
  year: number,
  path: string = '',
  includeSubDatasets: boolean = true,
  options: SearchDatasetsOptions = {},
): Promise<Dataset[]> {
  const api = options.api ?? CensusApiService.getInstance()
  const matchFilters = normalizeFilters(options.filters)
  const mode = options.mode ?? 'and'

  const data = await api.getJson(api.catalogUrl(year), CatalogJsonSchema)

  return data.dataset
    .map((entry) => Dataset.fromCatalogEntry(entry, year, api))
    .filter((dataset) =>
      includeSubDatasets
        ? dataset.path.includes(path)
        : dataset.path.endsWith(path),
    )
    .filter((dataset) => checkFilters(dataset, matchFilters, mode))
}
