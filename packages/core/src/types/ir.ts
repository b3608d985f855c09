import type { FilterOperator, SqlStatement } from '@dataset-gateway/validation'

// --- Statement IR ---
// Dialect-neutral statement description. Values never appear here: conditions
// and pagination point into a parameter list by index, and each dialect decides
// how placeholders are written.

export interface TableRef {
  readonly schema: string
  readonly table: string
}

export interface WhereCondition {
  readonly column: string
  readonly operator: FilterOperator
  readonly paramIndex: number
}

export interface StatementParts {
  readonly countMode: boolean
  readonly select: readonly string[]
  readonly from: TableRef
  /** AND-combined, in request order. */
  readonly where: readonly WhereCondition[]
  readonly orderBy: readonly string[]
  readonly limitParamIndex?: number | undefined
  readonly offsetParamIndex?: number | undefined
}

export interface SqlDialect {
  generate(parts: StatementParts, params: readonly unknown[]): SqlStatement
}
