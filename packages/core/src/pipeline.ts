import type {
  DatasetDescriptor,
  DatasetQueryInput,
  DatasetSlice,
  DebugLogEntry,
  HealthCheckResult,
  SqlStatement,
  TranslatedQuery,
} from '@dataset-gateway/validation'
import {
  ConnectionError,
  DatasetError,
  DatasetNotFoundError,
  decodeDatasetQuery,
  ExecutionError,
  validateDatasetQuery,
} from '@dataset-gateway/validation'

import { debugEntry, withDebugLog } from './debug/logger.js'
import { PostgresDialect } from './dialects/postgres.js'
import type { DatasetRegistry } from './metadata/registry.js'
import { translateQuery } from './translator/translator.js'
import type { DbExecutor } from './types/interfaces.js'
import type { SqlDialect } from './types/ir.js'

// ── Public Types ───────────────────────────────────────────────

export interface CreateDatasetServiceOptions {
  readonly registry: DatasetRegistry
  readonly executor: DbExecutor
  readonly dialect?: SqlDialect | undefined
  /** Run count and fetch against one read-only snapshot. Defaults to true. */
  readonly consistentReads?: boolean | undefined
  /** Ping the executor before returning the service. Defaults to true. */
  readonly validateConnection?: boolean | undefined
}

export interface DatasetService {
  listDatasets(): readonly DatasetDescriptor[]
  describeDataset(datasetId: string): DatasetDescriptor
  query(datasetId: string, request?: DatasetQueryInput | undefined): Promise<DatasetSlice>
  /** Compile a query without executing it. */
  translate(datasetId: string, request?: DatasetQueryInput | undefined): TranslatedQuery
  healthCheck(): Promise<HealthCheckResult>
  close(): Promise<void>
}

// ── createDatasetService ───────────────────────────────────────

export async function createDatasetService(options: CreateDatasetServiceOptions): Promise<DatasetService> {
  const { registry, executor } = options
  const dialect = options.dialect ?? new PostgresDialect()
  const consistentReads = options.consistentReads !== false

  if (options.validateConnection !== false) {
    await executor.ping()
  }

  let closed = false

  function lookup(datasetId: string): DatasetDescriptor {
    const descriptor = registry.getDataset(datasetId)
    if (descriptor === undefined) {
      throw new DatasetNotFoundError(datasetId)
    }
    return descriptor
  }

  return {
    listDatasets() {
      return registry.datasets
    },

    describeDataset(datasetId) {
      return lookup(datasetId)
    },

    async query(datasetId, request) {
      const descriptor = lookup(datasetId)
      if (closed) {
        throw new ConnectionError('CONNECTION_FAILED', 'Dataset service is closed', {})
      }
      return runQuery(descriptor, request, executor, dialect, consistentReads)
    },

    translate(datasetId, request) {
      const descriptor = lookup(datasetId)
      const query = decodeDatasetQuery(request)
      const validated = validateDatasetQuery(descriptor, query.columns, query.filters)
      return translateQuery(descriptor, validated, query, dialect)
    },

    async healthCheck() {
      return measureHealth(executor, registry.datasets.length)
    },

    async close() {
      closed = true
      await executor.close()
    },
  }
}

// ── Query Pipeline ─────────────────────────────────────────────

async function runQuery(
  descriptor: DatasetDescriptor,
  request: DatasetQueryInput | undefined,
  executor: DbExecutor,
  dialect: SqlDialect,
  consistentReads: boolean,
): Promise<DatasetSlice> {
  const log: DebugLogEntry[] = []

  // 1. Decode (defensive: transports decode first) + validate
  const t0 = performance.now()
  const query = decodeDatasetQuery(request)
  const debug = query.debug
  const validated = validateDatasetQuery(descriptor, query.columns, query.filters)
  if (debug) log.push(debugEntry('validation', 'Validated', performance.now() - t0))

  // 2. Translate
  const t1 = performance.now()
  const translated = translateQuery(descriptor, validated, query, dialect)
  if (debug) {
    log.push(
      debugEntry('translation', 'Translated', performance.now() - t1, {
        count: translated.count.sql,
        fetch: translated.fetch.sql,
      }),
    )
  }

  // 3. Execute count + fetch on one connection
  const t2 = performance.now()
  const { total, rows } = await executeTranslated(executor, translated, consistentReads)
  if (debug) log.push(debugEntry('execution', `Executed (${rows.length} of ${total} rows)`, performance.now() - t2))

  // 4. Build the page
  const data = materializeRows(rows, translated.columns)
  const end = query.offset + query.limit

  return withDebugLog(
    {
      datasetId: descriptor.datasetId,
      total,
      returned: data.length,
      offset: query.offset,
      // Arithmetic on total only; a short page does not change it.
      nextOffset: end < total ? end : null,
      data,
    },
    debug,
    log,
  )
}

async function executeTranslated(
  executor: DbExecutor,
  translated: TranslatedQuery,
  consistentSnapshot: boolean,
): Promise<{ total: number; rows: Record<string, unknown>[] }> {
  let current: SqlStatement = translated.count
  try {
    return await executor.session(
      async (session) => {
        const countRows = await session.execute(translated.count.sql, translated.count.params)
        const total = coerceCount(countRows[0], translated.count.sql)
        current = translated.fetch
        const rows = await session.execute(translated.fetch.sql, translated.fetch.params)
        return { total, rows }
      },
      { consistentSnapshot },
    )
  } catch (err) {
    throw toStoreError(err, current)
  }
}

/** Rebuild each row in projection order; columns the store left out become `null`. */
function materializeRows(rows: readonly Record<string, unknown>[], columns: readonly string[]): Record<string, unknown>[] {
  return rows.map((row) => {
    const out: Record<string, unknown> = {}
    for (const col of columns) {
      out[col] = Object.hasOwn(row, col) ? row[col] : null
    }
    return out
  })
}

function coerceCount(row: Record<string, unknown> | undefined, sql: string): number {
  if (row === undefined) return 0

  const value = Object.values(row)[0]
  if (value === undefined || value === null) return 0

  let n = Number.NaN
  if (typeof value === 'number') n = value
  else if (typeof value === 'bigint') n = Number(value)
  else if (typeof value === 'string' && value.trim() !== '') n = Number(value)

  if (!Number.isSafeInteger(n)) {
    throw new ExecutionError({ code: 'UNEXPECTED_RESULT', sql, actual: `count value ${String(value)}` })
  }
  return Math.max(0, n)
}

// ── Health / Error Helpers ─────────────────────────────────────

async function measureHealth(executor: DbExecutor, datasets: number): Promise<HealthCheckResult> {
  const start = Date.now()
  try {
    await executor.ping()
    return { healthy: true, datasets, store: { healthy: true, latencyMs: Date.now() - start } }
  } catch (err) {
    return {
      healthy: false,
      datasets,
      store: {
        healthy: false,
        latencyMs: Date.now() - start,
        error: err instanceof Error ? err.message : String(err),
      },
    }
  }
}

function toStoreError(err: unknown, statement: SqlStatement): DatasetError {
  if (err instanceof DatasetError) return err
  const cause = err instanceof Error ? err : new Error(String(err))
  if (isTimeout(cause)) {
    return new ExecutionError({ code: 'QUERY_TIMEOUT', sql: statement.sql }, cause)
  }
  return new ExecutionError({ code: 'QUERY_FAILED', sql: statement.sql, params: [...statement.params], cause }, cause)
}

function isTimeout(err: Error): boolean {
  const m = err.message.toLowerCase()
  return m.includes('timeout') || m.includes('statement_timeout')
}
