import type { FilterOperator } from '@dataset-gateway/validation'

// ── Shared SQL helpers ─────────────────────────────────────────

export const COMPARISON_SYMBOLS = {
  eq: '=',
  gte: '>=',
  lte: '<=',
} as const satisfies Record<FilterOperator, string>

export function comparisonSymbol(op: FilterOperator): (typeof COMPARISON_SYMBOLS)[FilterOperator] {
  return COMPARISON_SYMBOLS[op]
}

/** Escape a double-quoted SQL identifier by doubling internal double-quotes. */
export function escapeIdentDQ(value: string): string {
  return value.replace(/"/g, '""')
}

export function quoteIdentDQ(value: string): string {
  return `"${escapeIdentDQ(value)}"`
}
