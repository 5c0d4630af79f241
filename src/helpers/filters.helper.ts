import { InvalidCriterionError, InvalidFilterFieldError } from '../errors.js'

export type MatchFunction = (value: string) => boolean
export type Criterion = string | MatchFunction
export type RegexFilter = readonly [field: string, criterion: Criterion]
export type MatchFilter = readonly [field: string, match: MatchFunction]
export type FilterMode = 'and' | 'or'

// Any record searchable by the metadata filter
export interface FilterableRecord {
  readonly filterableAttrs: readonly string[]
}

function toMatchFunction(pattern: string): MatchFunction {
  let regex: RegExp
  try {
    regex = new RegExp(pattern, 'i')
  } catch (error) {
    throw new InvalidCriterionError(`Invalid regex pattern '${pattern}'`, {
      cause: error,
    })
  }

  return (value: string) => regex.test(value)
}

/**
 * Coerces every criterion into a predicate. String criteria become
 * case-insensitive substring regex matches; predicates pass through as-is.
 */
export function normalizeFilters(
  filters: readonly RegexFilter[] = [],
): MatchFilter[] {
  return filters.map(([field, criterion]) => {
    if (typeof criterion === 'function') {
      return [field, criterion] as const
    }
    if (typeof criterion === 'string') {
      return [field, toMatchFunction(criterion)] as const
    }
    throw new InvalidCriterionError(
      `Criterion for '${field}' must be a string pattern or a predicate function`,
    )
  })
}

export function parseFilterMode(value: string): FilterMode {
  if (value === 'and' || value === 'or') {
    return value
  }
  throw new InvalidCriterionError(
    `Filter mode must be 'and' or 'or' but got '${value}'`,
  )
}

function readField(record: object, field: string): string {
  const value: unknown = Reflect.get(record, field)
  if (value === undefined || value === null) {
    return ''
  }
  return String(value)
}

export function checkFilters(
  record: FilterableRecord,
  filters: readonly MatchFilter[],
  mode: FilterMode = 'and',
): boolean {
  const combine = parseFilterMode(mode)

  const results = filters.map(([field, match]) => {
    if (!record.filterableAttrs.includes(field)) {
      throw new InvalidFilterFieldError(field, record.constructor.name)
    }
    return match(readField(record, field))
  })

  if (results.length === 0) {
    return true
  }

  return combine === 'and' ? results.every(Boolean) : results.some(Boolean)
}
