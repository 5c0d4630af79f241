import 'dotenv/config'
import { z } from 'zod'

export const ConfigSchema = z.object({
  CENSUS_API_BASE_URL: z
    .string()
    .url()
    .default('https://api.census.gov/data')
    .describe('Root of the Census Data API'),
  CENSUS_VARIABLE_BATCH_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(50)
    .describe('Maximum number of variables requested per API call'),
  DEBUG_LOGS: z
    .enum(['true', 'false'])
    .default('false')
    .describe('Keep console logging enabled in the stdio server'),
})

export interface CensusClientConfig {
  baseUrl: string
  variableBatchSize: number
  debugLogs: boolean
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CensusClientConfig {
  const parsed = ConfigSchema.parse({
    CENSUS_API_BASE_URL: env.CENSUS_API_BASE_URL || undefined,
    CENSUS_VARIABLE_BATCH_SIZE: env.CENSUS_VARIABLE_BATCH_SIZE || undefined,
    DEBUG_LOGS: env.DEBUG_LOGS || undefined,
  })

  return {
    baseUrl: parsed.CENSUS_API_BASE_URL.replace(/\/+$/, ''),
    variableBatchSize: parsed.CENSUS_VARIABLE_BATCH_SIZE,
    debugLogs: parsed.DEBUG_LOGS === 'true',
  }
}

export const config = loadConfig()
