import type { SqlStatement } from '@dataset-gateway/validation'
import { comparisonSymbol, quoteIdentDQ } from '../generator/fragments.js'
import type { SqlDialect, StatementParts, TableRef, WhereCondition } from '../types/ir.js'

// --- Postgres Dialect ---

export class PostgresDialect implements SqlDialect {
  generate(parts: StatementParts, params: readonly unknown[]): SqlStatement {
    const gen = new PgGenerator(params)
    const sql = gen.build(parts)
    return { sql, params: gen.outParams }
  }
}

// --- Internal generator ---

/**
 * Emits `$n` placeholders in order of appearance and collects the bound
 * values alongside, so the output parameter list always lines up with the
 * statement text.
 */
class PgGenerator {
  readonly outParams: unknown[] = []
  private readonly input: readonly unknown[]

  constructor(inputParams: readonly unknown[]) {
    this.input = inputParams
  }

  build(parts: StatementParts): string {
    const clauses: string[] = []

    clauses.push(this.selectClause(parts))
    clauses.push(`FROM ${quoteTable(parts.from)}`)

    if (parts.where.length > 0) {
      clauses.push(`WHERE ${parts.where.map((c) => this.whereCond(c)).join(' AND ')}`)
    }

    // A scalar count ignores ordering and paging.
    if (parts.countMode) {
      return clauses.join(' ')
    }

    if (parts.orderBy.length > 0) {
      clauses.push(`ORDER BY ${parts.orderBy.map((c) => quoteIdentDQ(c)).join(', ')}`)
    }

    if (parts.limitParamIndex !== undefined) {
      clauses.push(`LIMIT ${this.ref(parts.limitParamIndex)}`)
    }

    if (parts.offsetParamIndex !== undefined) {
      clauses.push(`OFFSET ${this.ref(parts.offsetParamIndex)}`)
    }

    return clauses.join(' ')
  }

  // --- SELECT ---

  private selectClause(parts: StatementParts): string {
    if (parts.countMode) {
      return 'SELECT COUNT(*)'
    }
    if (parts.select.length === 0) {
      return 'SELECT *'
    }
    return `SELECT ${parts.select.map((c) => quoteIdentDQ(c)).join(', ')}`
  }

  // --- WHERE ---

  private whereCond(c: WhereCondition): string {
    return `${quoteIdentDQ(c.column)} ${comparisonSymbol(c.operator)} ${this.ref(c.paramIndex)}`
  }

  // --- Params ---

  private ref(paramIndex: number): string {
    if (paramIndex < 0 || paramIndex >= this.input.length) {
      throw new Error(`Parameter index ${paramIndex} out of range (${this.input.length} params)`)
    }
    this.outParams.push(this.input[paramIndex])
    return `$${this.outParams.length}`
  }
}

function quoteTable(ref: TableRef): string {
  return `${quoteIdentDQ(ref.schema)}.${quoteIdentDQ(ref.table)}`
}
