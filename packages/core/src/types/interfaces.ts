// --- DbExecutor (implemented by executor packages) ---

/** Statement runner bound to one pooled connection. */
export interface DbSession {
  execute(sql: string, params: unknown[]): Promise<Record<string, unknown>[]>
}

export interface SessionOptions {
  /**
   * Run the session inside one read-only transaction so every statement
   * sees the same snapshot.
   */
  readonly consistentSnapshot?: boolean | undefined
}

/**
 * Database executor interface.
 *
 * Error contract:
 * - `execute()` and session statements must throw `ExecutionError` (code `'QUERY_FAILED'`
 *   or `'QUERY_TIMEOUT'`) on statement failure.
 * - `session()` must throw `ConnectionError` (code `'CONNECTION_FAILED'`) when no
 *   connection can be acquired, and must release the connection on every exit path.
 * - `ping()` must throw `ConnectionError` (code `'CONNECTION_FAILED'`) on any failure.
 * - `close()` should attempt cleanup; failures may propagate as raw errors.
 */
export interface DbExecutor extends DbSession {
  session<T>(fn: (session: DbSession) => Promise<T>, options?: SessionOptions): Promise<T>
  ping(): Promise<void>
  close(): Promise<void>
}
