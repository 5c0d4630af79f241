import type {
  FilterMode,
  MatchFunction,
  RegexFilter,
} from '../helpers/filters.helper.js'
import type { Variable } from '../models/variable.model.js'

export interface VariableCacheRequest {
  url: string
  filters: readonly RegexFilter[]
  mode: FilterMode
}

// Predicates have no value identity, so each one gets a stable id
const predicateIds = new WeakMap<MatchFunction, number>()
let nextPredicateId = 0

function predicateId(fn: MatchFunction): number {
  let id = predicateIds.get(fn)
  if (id === undefined) {
    id = nextPredicateId++
    predicateIds.set(fn, id)
  }
  return id
}

export function cacheKey(params: VariableCacheRequest): string {
  const filters = params.filters.map(([field, criterion]) => [
    field,
    typeof criterion === 'string'
      ? `pattern:${criterion}`
      : `predicate:${predicateId(criterion)}`,
  ])
  return JSON.stringify([params.url, params.mode, filters])
}

/**
 * Remembers the last few variable searches. Least recently used entries are
 * evicted once `capacity` is exceeded.
 */
export class VariableCacheService {
  private static instance: VariableCacheService
  private entries = new Map<string, Variable[]>()

  constructor(public readonly capacity: number = 2) {
    if (!Number.isInteger(capacity)) {
      throw new Error(
        `Expected 'capacity' argument to be an integer but got ${capacity}.`,
      )
    }
    if (capacity <= 0) {
      throw new Error(
        `Expected 'capacity' argument to be greater than zero but got ${capacity}.`,
      )
    }
  }

  public static getInstance(): VariableCacheService {
    if (!VariableCacheService.instance) {
      VariableCacheService.instance = new VariableCacheService()
    }
    return VariableCacheService.instance
  }

  get size(): number {
    return this.entries.size
  }

  get(params: VariableCacheRequest): Variable[] | undefined {
    const key = cacheKey(params)
    const cached = this.entries.get(key)
    if (cached === undefined) {
      return undefined
    }

    // Re-insert to mark as most recently used
    this.entries.delete(key)
    this.entries.set(key, cached)
    return [...cached]
  }

  set(params: VariableCacheRequest, variables: readonly Variable[]): void {
    const key = cacheKey(params)
    this.entries.delete(key)
    this.entries.set(key, [...variables])

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next()
      if (oldest.done) {
        break
      }
      this.entries.delete(oldest.value)
    }
  }

  clear(): void {
    this.entries.clear()
  }
}
