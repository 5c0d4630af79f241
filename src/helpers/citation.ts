import { buildUrl, type QueryParams } from '../services/censusApi.service.js'

export function buildCitation(accessUrl: string, params: QueryParams): string {
  return `Source: U.S. Census Bureau Data API (${buildUrl(accessUrl, params)})`
}
