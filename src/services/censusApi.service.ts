import fetch from 'node-fetch'
import type { Response } from 'node-fetch'
import { z } from 'zod'

import { config } from '../config.js'
import { HTTPError, JSONError, NetworkError } from '../errors.js'

// Ordered query parameters; keys may repeat (e.g. several 'in' clauses)
export type QueryParams = ReadonlyArray<readonly [string, string]>

export function buildUrl(url: string, params: QueryParams = []): string {
  if (params.length === 0) {
    return url
  }

  const query = new URLSearchParams()
  for (const [key, value] of params) {
    query.append(key, value)
  }

  return `${url}?${query.toString()}`
}

export class CensusApiService {
  private static instance: CensusApiService

  constructor(public readonly baseUrl: string = config.baseUrl) {}

  public static getInstance(): CensusApiService {
    if (!CensusApiService.instance) {
      CensusApiService.instance = new CensusApiService()
    }
    return CensusApiService.instance
  }

  catalogUrl(year: number): string {
    return `${this.baseUrl}/${year}.json`
  }

  /**
   * Issues a single GET and validates the JSON body against `schema`.
   * Non-2xx responses raise HTTPError, transport failures NetworkError and
   * unparsable or unexpected bodies JSONError.
   */
  async getJson<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    params: QueryParams = [],
  ): Promise<z.output<S>> {
    const target = buildUrl(url, params)

    let res: Response
    try {
      res = await fetch(target)
    } catch (err) {
      throw new NetworkError(target, err)
    }

    console.log(`URL Attempted: ${target}`)

    if (!res.ok) {
      throw new HTTPError(res.status, res.statusText, target)
    }

    let body: unknown
    try {
      body = await res.json()
    } catch (err) {
      throw new JSONError(target, err)
    }

    const result = schema.safeParse(body)
    if (!result.success) {
      throw new JSONError(target, result.error)
    }

    return result.data
  }
}
