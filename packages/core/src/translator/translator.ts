import type { DatasetDescriptor, TranslatedQuery, ValidatedQuery } from '@dataset-gateway/validation'
import { PostgresDialect } from '../dialects/postgres.js'
import type { SqlDialect, StatementParts, TableRef, WhereCondition } from '../types/ir.js'

export interface PageRequest {
  readonly limit: number
  readonly offset: number
}

const defaultDialect = new PostgresDialect()

/**
 * Compile a validated query into a count statement and a fetch statement that
 * share one predicate.
 *
 * Parameter layout fed to the dialect: filter values in request order, then
 * limit, then offset. The count statement references only the filter values.
 */
export function translateQuery(
  descriptor: DatasetDescriptor,
  query: ValidatedQuery,
  page: PageRequest,
  dialect: SqlDialect = defaultDialect,
): TranslatedQuery {
  const params: unknown[] = []
  const where: WhereCondition[] = query.filters.map((f) => {
    params.push(f.value)
    return { column: f.column, operator: f.op, paramIndex: params.length - 1 }
  })

  const from: TableRef = { schema: descriptor.schema, table: descriptor.table }

  const countParts: StatementParts = {
    countMode: true,
    select: [],
    from,
    where,
    orderBy: [],
  }

  params.push(page.limit)
  const limitParamIndex = params.length - 1
  params.push(page.offset)
  const offsetParamIndex = params.length - 1

  // No primary key → no ORDER BY; page boundaries are then store-defined.
  const fetchParts: StatementParts = {
    countMode: false,
    select: query.columns,
    from,
    where,
    orderBy: descriptor.primaryKey,
    limitParamIndex,
    offsetParamIndex,
  }

  return {
    datasetId: descriptor.datasetId,
    count: dialect.generate(countParts, params),
    fetch: dialect.generate(fetchParts, params),
    columns: query.columns,
  }
}
