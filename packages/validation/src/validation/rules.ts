import type { FilterOperator, FilterValue } from '../types/query.js'

// --- Constants ---

export const FILTER_OPERATORS: readonly FilterOperator[] = ['eq', 'gte', 'lte']

export const DEFAULT_LIMIT = 100
export const MIN_LIMIT = 1
export const MAX_LIMIT = 500
export const DEFAULT_OFFSET = 0

// --- Guards ---

export function isFilterOperator(value: unknown): value is FilterOperator {
  return FILTER_OPERATORS.some((op) => op === value)
}

export function isFilterValue(value: unknown): value is FilterValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true
  return typeof value === 'number' && Number.isFinite(value)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function typeOf(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value)
  return typeof value
}
