export type CensusMetadataErrorKind =
  | 'url-parse'
  | 'path-derivation'
  | 'io'
  | 'network'
  | 'decode'
  | 'persistence'
  | 'ingest'
  | 'config'

export abstract class CensusMetadataError extends Error {
  abstract readonly kind: CensusMetadataErrorKind

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class UrlParseError extends CensusMetadataError {
  readonly kind = 'url-parse'

  constructor(
    readonly url: string,
    options?: ErrorOptions,
  ) {
    super(`URL parsing error: '${url}' is not a valid URL`, options)
  }
}

export class PathDerivationError extends CensusMetadataError {
  readonly kind = 'path-derivation'
}

export class IoError extends CensusMetadataError {
  readonly kind = 'io'

  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

export class NetworkError extends CensusMetadataError {
  readonly kind = 'network'

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

// `path` locates the offending value inside the decoded document, e.g.
// ['fips', 0, 'wildcard'].
export class DecodeError extends CensusMetadataError {
  readonly kind = 'decode'

  constructor(
    message: string,
    readonly path: ReadonlyArray<string | number>,
    readonly value: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

export class PersistenceError extends CensusMetadataError {
  readonly kind = 'persistence'
}

export class ConfigError extends CensusMetadataError {
  readonly kind = 'config'
}

export type IngestStage =
  | 'fetch-variables'
  | 'fetch-geography'
  | 'parse-variables'
  | 'parse-geography'
  | 'persist'

export class IngestError extends CensusMetadataError {
  readonly kind = 'ingest'

  constructor(
    readonly apiPathId: number,
    readonly stage: IngestStage,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Ingestion of API path ${apiPathId} failed at ${stage}: ${reason}`, {
      cause,
    })
  }
}
