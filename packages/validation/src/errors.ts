// --- Base Error ---

export type ErrorKind =
  | 'NotFound'
  | 'InvalidColumn'
  | 'MalformedInput'
  | 'StoreUnavailable'
  | 'RegistryLoadFailure'
  | 'Configuration'

export class DatasetError extends Error {
  readonly code: string
  readonly kind: ErrorKind

  constructor(code: string, kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DatasetError'
    this.code = code
    this.kind = kind
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      kind: this.kind,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Not Found ---

export class DatasetNotFoundError extends DatasetError {
  declare readonly code: 'DATASET_NOT_FOUND'
  readonly datasetId: string

  constructor(datasetId: string) {
    super('DATASET_NOT_FOUND', 'NotFound', `Dataset '${datasetId}' not found`)
    this.name = 'DatasetNotFoundError'
    this.datasetId = datasetId
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      datasetId: this.datasetId,
    }
  }
}

// --- Invalid Column ---

export interface ColumnErrorEntry {
  code: 'UNKNOWN_COLUMN'
  message: string
  details: {
    column: string
    source: 'projection' | 'filter'
    filterIndex?: number | undefined
  }
}

export class InvalidColumnError extends DatasetError {
  declare readonly code: 'INVALID_COLUMN'
  readonly datasetId: string
  readonly errors: readonly ColumnErrorEntry[]

  constructor(datasetId: string, errors: readonly ColumnErrorEntry[]) {
    const names = uniqueColumns(errors)
    super(
      'INVALID_COLUMN',
      'InvalidColumn',
      `Unknown column${names.length === 1 ? '' : 's'} in dataset '${datasetId}': ${names.join(', ')}`,
    )
    this.name = 'InvalidColumnError'
    this.datasetId = datasetId
    this.errors = errors
  }

  /** Offending column names, deduplicated, in the order first seen. */
  get columns(): string[] {
    return uniqueColumns(this.errors)
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      datasetId: this.datasetId,
      columns: this.columns,
      errors: this.errors,
    }
  }
}

// --- Malformed Input ---

export interface InputErrorEntry {
  code: 'INVALID_JSON' | 'INVALID_TYPE' | 'INVALID_OPERATOR' | 'INVALID_VALUE' | 'OUT_OF_RANGE'
  message: string
  details: {
    field: string
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class MalformedInputError extends DatasetError {
  declare readonly code: 'MALFORMED_INPUT'
  readonly errors: readonly InputErrorEntry[]

  constructor(errors: readonly InputErrorEntry[]) {
    super('MALFORMED_INPUT', 'MalformedInput', `Malformed input: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'MalformedInputError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Connection Error ---

export interface ConnectionErrorDetails {
  url?: string | undefined
  timeoutMs?: number | undefined
}

export class ConnectionError extends DatasetError {
  declare readonly code: 'CONNECTION_FAILED' | 'NETWORK_ERROR' | 'REQUEST_TIMEOUT'
  readonly details: ConnectionErrorDetails

  constructor(
    code: 'CONNECTION_FAILED' | 'NETWORK_ERROR' | 'REQUEST_TIMEOUT',
    message: string,
    details: ConnectionErrorDetails,
    cause?: Error | undefined,
  ) {
    super(code, 'StoreUnavailable', message, cause ? { cause } : undefined)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Execution Error ---

export type ExecutionErrorDetails =
  | {
      code: 'QUERY_FAILED'
      sql: string
      params: unknown[]
      cause?: Error | undefined
    }
  | {
      code: 'QUERY_TIMEOUT'
      sql: string
      /** Absent when the executor cannot tell which limit fired. */
      timeoutMs?: number | undefined
    }
  | {
      code: 'UNEXPECTED_RESULT'
      sql: string
      actual: string
    }

export class ExecutionError extends DatasetError {
  declare readonly code: 'QUERY_FAILED' | 'QUERY_TIMEOUT' | 'UNEXPECTED_RESULT'
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, cause?: Error | undefined) {
    super(details.code, 'StoreUnavailable', defaultExecutionMessage(details), cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeExecutionDetails(this.details),
    }
  }
}

// --- Registry Error ---

export interface RegistryErrorEntry {
  code:
    | 'INVALID_FILE'
    | 'MISSING_FIELD'
    | 'INVALID_FIELD'
    | 'NO_COLUMNS'
    | 'DUPLICATE_COLUMN'
    | 'INVALID_PRIMARY_KEY'
    | 'DUPLICATE_DATASET_ID'
    | 'EMPTY_CATALOG'
    | 'FILE_EXISTS'
  message: string
  details: {
    source?: string | undefined
    datasetId?: string | undefined
    field?: string | undefined
    actual?: string | undefined
  }
}

export class RegistryError extends DatasetError {
  declare readonly code: 'REGISTRY_INVALID' | 'REGISTRY_LOAD_FAILED'
  readonly errors: readonly RegistryErrorEntry[]

  constructor(
    code: 'REGISTRY_INVALID' | 'REGISTRY_LOAD_FAILED',
    errors: readonly RegistryErrorEntry[],
    message?: string | undefined,
    cause?: Error | undefined,
  ) {
    super(
      code,
      'RegistryLoadFailure',
      message ?? `Registry invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`,
      cause ? { cause } : undefined,
    )
    this.name = 'RegistryError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  variable: string
  message: string
  actual?: string | undefined
}

export class ConfigError extends DatasetError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', 'Configuration', `Config invalid: ${errors.map((e) => e.message).join('; ')}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Helpers ---

function uniqueColumns(errors: readonly ColumnErrorEntry[]): string[] {
  return [...new Set(errors.map((e) => e.details.column))]
}

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof DatasetError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function serializeExecutionDetails(details: ExecutionErrorDetails): unknown {
  if (details.code === 'QUERY_FAILED' && details.cause !== undefined) {
    const { cause, ...rest } = details
    return { ...rest, cause: serializeError(cause) }
  }
  return details
}

function defaultExecutionMessage(details: ExecutionErrorDetails): string {
  switch (details.code) {
    case 'QUERY_FAILED':
      return details.cause !== undefined ? `Query failed: ${details.cause.message}` : 'Query failed'
    case 'QUERY_TIMEOUT':
      return details.timeoutMs !== undefined ? `Query timeout (${details.timeoutMs}ms)` : 'Query timeout'
    case 'UNEXPECTED_RESULT':
      return `Unexpected query result: ${details.actual}`
  }
}
