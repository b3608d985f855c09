export interface DebugLogEntry {
  timestamp: number
  phase: 'validation' | 'translation' | 'execution'
  message: string
  details?: unknown
}

export interface DatasetSlice {
  readonly datasetId: string
  /** Rows matching the filters, ignoring limit and offset. */
  readonly total: number
  readonly returned: number
  readonly offset: number
  readonly nextOffset: number | null
  readonly data: Record<string, unknown>[]
  readonly debugLog?: DebugLogEntry[] | undefined
}

export interface SqlStatement {
  readonly sql: string
  readonly params: unknown[]
}

export interface TranslatedQuery {
  readonly datasetId: string
  readonly count: SqlStatement
  readonly fetch: SqlStatement
  /** Projection, in output order. */
  readonly columns: readonly string[]
}

export interface HealthCheckResult {
  healthy: boolean
  datasets: number
  store: {
    healthy: boolean
    latencyMs: number
    error?: string | undefined
  }
}
