import type {
  ColumnErrorEntry,
  ConnectionErrorDetails,
  ErrorKind,
  ExecutionErrorDetails,
  InputErrorEntry,
} from '@dataset-gateway/validation'
import {
  ConnectionError,
  DatasetError,
  DatasetNotFoundError,
  ExecutionError,
  InvalidColumnError,
  isRecord,
  MalformedInputError,
} from '@dataset-gateway/validation'

const INPUT_CODES = new Set<InputErrorEntry['code']>([
  'INVALID_JSON',
  'INVALID_TYPE',
  'INVALID_OPERATOR',
  'INVALID_VALUE',
  'OUT_OF_RANGE',
])
const KINDS = new Set<ErrorKind>([
  'NotFound',
  'InvalidColumn',
  'MalformedInput',
  'StoreUnavailable',
  'RegistryLoadFailure',
  'Configuration',
])

/**
 * Reconstruct a typed error from a JSON body returned by the server.
 * Maps the `code` field to the matching error class, rebuilding execution
 * details from `details` when present; codes without a
 * client-side class come back as a plain `DatasetError` keeping code and kind.
 */
export function deserializeError(body: unknown, status: number): Error {
  if (!isRecord(body)) {
    return new DatasetError('UNEXPECTED_RESPONSE', 'StoreUnavailable', `HTTP ${status} with a non-JSON-object body`)
  }

  const code = typeof body.code === 'string' ? body.code : ''
  const message = typeof body.message === 'string' ? body.message : `HTTP ${status}`

  switch (code) {
    case 'DATASET_NOT_FOUND':
      return new DatasetNotFoundError(typeof body.datasetId === 'string' ? body.datasetId : '')

    case 'INVALID_COLUMN':
      return new InvalidColumnError(typeof body.datasetId === 'string' ? body.datasetId : '', columnEntries(body))

    case 'MALFORMED_INPUT':
      return new MalformedInputError(inputEntries(body.errors))

    case 'CONNECTION_FAILED':
    case 'NETWORK_ERROR':
    case 'REQUEST_TIMEOUT':
      return new ConnectionError(code, message, connectionDetails(body.details))

    case 'QUERY_FAILED':
    case 'QUERY_TIMEOUT':
    case 'UNEXPECTED_RESULT': {
      const details = executionDetails(code, body.details)
      return new ExecutionError(details, details.code === 'QUERY_FAILED' ? details.cause : undefined)
    }
  }

  return new DatasetError(
    code || `HTTP_${status}`,
    kindOf(body.kind) ?? (status === 404 ? 'NotFound' : status >= 500 ? 'StoreUnavailable' : 'MalformedInput'),
    message,
  )
}

// --- Entry decoding ---

function columnEntries(body: Record<string, unknown>): ColumnErrorEntry[] {
  const entries: ColumnErrorEntry[] = []
  if (Array.isArray(body.errors)) {
    for (const item of body.errors) {
      if (!isRecord(item) || !isRecord(item.details)) continue
      const details = item.details
      const column = details.column
      if (typeof column !== 'string') continue
      const filterIndex = details.filterIndex
      entries.push({
        code: 'UNKNOWN_COLUMN',
        message: typeof item.message === 'string' ? item.message : `Unknown column '${column}'`,
        details: {
          column,
          source: details.source === 'filter' ? 'filter' : 'projection',
          ...(typeof filterIndex === 'number' ? { filterIndex } : {}),
        },
      })
    }
  }
  if (entries.length === 0 && Array.isArray(body.columns)) {
    for (const column of body.columns) {
      if (typeof column !== 'string') continue
      entries.push({
        code: 'UNKNOWN_COLUMN',
        message: `Unknown column '${column}'`,
        details: { column, source: 'projection' },
      })
    }
  }
  return entries
}

function inputEntries(value: unknown): InputErrorEntry[] {
  if (!Array.isArray(value)) return []
  const entries: InputErrorEntry[] = []
  for (const item of value) {
    if (!isRecord(item) || !isRecord(item.details)) continue
    const { field, expected, actual } = item.details
    entries.push({
      code: inputCode(item.code),
      message: typeof item.message === 'string' ? item.message : '',
      details: {
        field: typeof field === 'string' ? field : '',
        ...(typeof expected === 'string' ? { expected } : {}),
        ...(typeof actual === 'string' ? { actual } : {}),
      },
    })
  }
  return entries
}

function connectionDetails(value: unknown): ConnectionErrorDetails {
  if (!isRecord(value)) return {}
  return {
    ...(typeof value.url === 'string' ? { url: value.url } : {}),
    ...(typeof value.timeoutMs === 'number' ? { timeoutMs: value.timeoutMs } : {}),
  }
}

function executionDetails(
  code: ExecutionErrorDetails['code'],
  value: unknown,
): ExecutionErrorDetails {
  const details = isRecord(value) ? value : {}
  const sql = typeof details.sql === 'string' ? details.sql : ''
  switch (code) {
    case 'QUERY_FAILED': {
      const cause = details.cause
      return {
        code,
        sql,
        params: Array.isArray(details.params) ? details.params : [],
        ...(isRecord(cause) && typeof cause.message === 'string' ? { cause: new Error(cause.message) } : {}),
      }
    }
    case 'QUERY_TIMEOUT':
      return {
        code,
        sql,
        ...(typeof details.timeoutMs === 'number' ? { timeoutMs: details.timeoutMs } : {}),
      }
    case 'UNEXPECTED_RESULT':
      return { code, sql, actual: typeof details.actual === 'string' ? details.actual : '' }
  }
}

// --- Narrowing ---

function inputCode(value: unknown): InputErrorEntry['code'] {
  for (const code of INPUT_CODES) {
    if (code === value) return code
  }
  return 'INVALID_VALUE'
}

function kindOf(value: unknown): ErrorKind | undefined {
  for (const kind of KINDS) {
    if (kind === value) return kind
  }
  return undefined
}
