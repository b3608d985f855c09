import type { InputErrorEntry } from './errors.js'
import { MalformedInputError } from './errors.js'
import type { DatasetQuery, QueryFilter } from './types/query.js'
import {
  DEFAULT_LIMIT,
  DEFAULT_OFFSET,
  FILTER_OPERATORS,
  isFilterOperator,
  isFilterValue,
  isRecord,
  MAX_LIMIT,
  MIN_LIMIT,
  typeOf,
} from './validation/rules.js'

/**
 * Structural decoding of a query body at the transport boundary.
 *
 * Applies defaults and rejects wrong types, unknown operators, non-scalar
 * filter values and out-of-range `limit`/`offset`. Column names are not
 * checked here; that needs the dataset descriptor.
 *
 * An absent body decodes to the all-defaults query. Unknown keys are ignored.
 */
export function decodeDatasetQuery(body: unknown): DatasetQuery {
  const errors: InputErrorEntry[] = []

  if (body === undefined || body === null) {
    return { filters: [], columns: null, limit: DEFAULT_LIMIT, offset: DEFAULT_OFFSET, debug: false }
  }

  if (!isRecord(body)) {
    throw new MalformedInputError([
      {
        code: 'INVALID_TYPE',
        message: 'Request body must be a JSON object',
        details: { field: 'body', expected: 'object', actual: typeOf(body) },
      },
    ])
  }

  const filters = decodeFilters(body.filters, errors)
  const columns = decodeColumns(body.columns, errors)
  const limit = decodeInteger(body.limit, 'limit', DEFAULT_LIMIT, MIN_LIMIT, MAX_LIMIT, errors)
  const offset = decodeInteger(body.offset, 'offset', DEFAULT_OFFSET, 0, undefined, errors)

  let debug = false
  if (body.debug !== undefined && body.debug !== null) {
    if (typeof body.debug === 'boolean') {
      debug = body.debug
    } else {
      errors.push(typeError('debug', 'boolean', body.debug))
    }
  }

  if (errors.length > 0) {
    throw new MalformedInputError(errors)
  }

  return { filters, columns, limit, offset, debug }
}

// --- Fields ---

function decodeFilters(value: unknown, errors: InputErrorEntry[]): QueryFilter[] {
  if (value === undefined || value === null) return []
  if (!Array.isArray(value)) {
    errors.push(typeError('filters', 'array', value))
    return []
  }

  const filters: QueryFilter[] = []
  value.forEach((item: unknown, i: number) => {
    const field = `filters[${i}]`
    if (!isRecord(item)) {
      errors.push(typeError(field, 'object', item))
      return
    }

    if (typeof item.column !== 'string' || item.column.length === 0) {
      errors.push(typeError(`${field}.column`, 'non-empty string', item.column))
    }
    if (!isFilterOperator(item.op)) {
      errors.push({
        code: 'INVALID_OPERATOR',
        message: `${field}.op must be one of: ${FILTER_OPERATORS.join(', ')}`,
        details: {
          field: `${field}.op`,
          expected: FILTER_OPERATORS.join(' | '),
          actual: typeof item.op === 'string' ? item.op : typeOf(item.op),
        },
      })
    }
    if (!isFilterValue(item.value)) {
      errors.push({
        code: 'INVALID_VALUE',
        message: `${field}.value must be a string, finite number or boolean`,
        details: { field: `${field}.value`, expected: 'string | number | boolean', actual: typeOf(item.value) },
      })
    }

    if (typeof item.column === 'string' && isFilterOperator(item.op) && isFilterValue(item.value)) {
      filters.push({ column: item.column, op: item.op, value: item.value })
    }
  })
  return filters
}

function decodeColumns(value: unknown, errors: InputErrorEntry[]): string[] | null {
  if (value === undefined || value === null) return null
  if (!Array.isArray(value)) {
    errors.push(typeError('columns', 'array of strings', value))
    return null
  }

  const columns: string[] = []
  value.forEach((item: unknown, i: number) => {
    if (typeof item === 'string' && item.length > 0) {
      columns.push(item)
    } else {
      errors.push(typeError(`columns[${i}]`, 'non-empty string', item))
    }
  })
  return columns
}

function decodeInteger(
  value: unknown,
  field: string,
  fallback: number,
  min: number,
  max: number | undefined,
  errors: InputErrorEntry[],
): number {
  if (value === undefined || value === null) return fallback
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    errors.push(typeError(field, 'integer', value))
    return fallback
  }
  if (value < min || (max !== undefined && value > max)) {
    errors.push({
      code: 'OUT_OF_RANGE',
      message: `${field} must be ${max !== undefined ? `between ${min} and ${max}` : `>= ${min}`}, got ${value}`,
      details: { field, expected: max !== undefined ? `[${min}, ${max}]` : `>= ${min}`, actual: String(value) },
    })
    return fallback
  }
  return value
}

function typeError(field: string, expected: string, value: unknown): InputErrorEntry {
  return {
    code: 'INVALID_TYPE',
    message: `${field} must be ${expected}, got ${typeOf(value)}`,
    details: { field, expected, actual: typeOf(value) },
  }
}
