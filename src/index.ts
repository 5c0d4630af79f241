export { config, loadConfig } from './config.js'
export type { CensusClientConfig } from './config.js'
export {
  CensusClientError,
  HTTPError,
  InvalidCriterionError,
  InvalidFilterFieldError,
  JSONError,
  MissingArgumentError,
  MissingRequiredFieldError,
  NetworkError,
  NotFoundError,
  UnsupportedWildcardError,
} from './errors.js'
export { batcher } from './helpers/batcher.helper.js'
export {
  checkFilters,
  normalizeFilters,
  parseFilterMode,
} from './helpers/filters.helper.js'
export type {
  Criterion,
  FilterableRecord,
  FilterMode,
  MatchFilter,
  MatchFunction,
  RegexFilter,
} from './helpers/filters.helper.js'
export {
  Dataset,
  searchDatasets,
  stitchColumns,
} from './models/dataset.model.js'
export type {
  DatasetProps,
  DownloadOptions,
  SearchDatasetsOptions,
} from './models/dataset.model.js'
export {
  compareGeographies,
  Geography,
  searchGeography,
} from './models/geography.model.js'
export type {
  GeoFilter,
  GeographyProps,
  GeoParam,
} from './models/geography.model.js'
export { Group, searchGroups } from './models/group.model.js'
export type { GroupProps } from './models/group.model.js'
export { searchVariables, Variable } from './models/variable.model.js'
export type { VariableProps } from './models/variable.model.js'
export type { CensusCell, DataTable } from './schema/fetch-aggregate-data.schema.js'
export { buildUrl, CensusApiService } from './services/censusApi.service.js'
export type { QueryParams } from './services/censusApi.service.js'
export { VariableCacheService } from './services/variableCache.service.js'
