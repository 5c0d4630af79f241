export class CensusClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CensusClientError'
  }
}

export class InvalidFilterFieldError extends CensusClientError {
  constructor(
    public readonly field: string,
    public readonly recordType: string,
  ) {
    super(`Field '${field}' cannot be used as a regex filter on '${recordType}'`)
    this.name = 'InvalidFilterFieldError'
  }
}

export class InvalidCriterionError extends CensusClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'InvalidCriterionError'
  }
}

export class MissingRequiredFieldError extends CensusClientError {
  constructor(
    public readonly field: string,
    public readonly geography: string,
  ) {
    super(
      `Required geography field '${field}' not found in filters for '${geography}'`,
    )
    this.name = 'MissingRequiredFieldError'
  }
}

export class UnsupportedWildcardError extends CensusClientError {
  constructor(
    public readonly field: string,
    public readonly geography: string,
  ) {
    super(`Geography field '${field}' does not accept wildcards for '${geography}'`)
    this.name = 'UnsupportedWildcardError'
  }
}

export class MissingArgumentError extends CensusClientError {
  constructor(message: string) {
    super(message)
    this.name = 'MissingArgumentError'
  }
}

export class NotFoundError extends CensusClientError {
  constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

export class HTTPError extends CensusClientError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
  ) {
    super(`Census API error: ${status} ${statusText} (${url})`)
    this.name = 'HTTPError'
  }
}

export class NetworkError extends CensusClientError {
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Fetch failed for ${url}: ${reason}`, { cause })
    this.name = 'NetworkError'
  }
}

export class JSONError extends CensusClientError {
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Malformed response from ${url}: ${reason}`, { cause })
    this.name = 'JSONError'
  }
}
