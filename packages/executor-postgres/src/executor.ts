import type { DbExecutor, DbSession, SessionOptions } from '@dataset-gateway/core'
import { ConnectionError, ExecutionError } from '@dataset-gateway/core'
import pg from 'pg'
import type { PoolClient } from 'pg'

// Parse NUMERIC/DECIMAL and INT8 as JavaScript numbers instead of strings
pg.types.setTypeParser(1700, parseFloat) // numeric / decimal
pg.types.setTypeParser(20, Number) // int8 / bigint, including COUNT(*)

const QUERY_CANCELED = '57014'

export interface PostgresExecutorConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: boolean | undefined
  readonly max?: number | undefined
  readonly timeoutMs?: number | undefined
  readonly connectionTimeoutMs?: number | undefined
  /** Errors raised by idle pooled clients (e.g. the server went away). */
  readonly onIdleError?: ((err: Error) => void) | undefined
}

export function createPostgresExecutor(config: PostgresExecutorConfig): DbExecutor {
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  })

  pool.on('error', (err: Error) => {
    config.onIdleError?.(err)
  })

  const target = describeTarget(config)

  async function run(client: PoolClient, sql: string, params: unknown[]): Promise<Record<string, unknown>[]> {
    try {
      const result = await client.query<Record<string, unknown>>(sql, params)
      return result.rows
    } catch (err) {
      throw toExecutionError(err, sql, params, config.timeoutMs)
    }
  }

  async function session<T>(fn: (session: DbSession) => Promise<T>, options?: SessionOptions): Promise<T> {
    const client = await pool.connect().catch((err: unknown) => {
      const cause = err instanceof Error ? err : new Error(String(err))
      throw new ConnectionError(
        'CONNECTION_FAILED',
        `PostgreSQL connection failed: ${cause.message}`,
        { url: target, timeoutMs: config.connectionTimeoutMs },
        cause,
      )
    })

    const transactional = options?.consistentSnapshot === true
    const session: DbSession = {
      execute: (sql, params) => run(client, sql, params),
    }

    // Set when ROLLBACK fails; the connection is then destroyed instead of reused.
    let discard: Error | undefined
    try {
      if (transactional) await run(client, 'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY', [])
      const result = await fn(session)
      if (transactional) await run(client, 'COMMIT', [])
      return result
    } catch (err) {
      if (transactional) {
        discard = await rollback(client)
      }
      throw err
    } finally {
      client.release(discard)
    }
  }

  return {
    async execute(sql: string, params: unknown[]): Promise<Record<string, unknown>[]> {
      return session((s) => s.execute(sql, params))
    },

    session,

    async ping(): Promise<void> {
      try {
        await pool.query('SELECT 1')
      } catch (err) {
        throw new ConnectionError(
          'CONNECTION_FAILED',
          'PostgreSQL ping failed',
          { url: target },
          err instanceof Error ? err : undefined,
        )
      }
    },

    async close(): Promise<void> {
      await pool.end()
    },
  }
}

// --- Helpers ---

async function rollback(client: PoolClient): Promise<Error | undefined> {
  try {
    await client.query('ROLLBACK')
    return undefined
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err))
  }
}

function toExecutionError(err: unknown, sql: string, params: unknown[], timeoutMs: number | undefined): ExecutionError {
  const cause = err instanceof Error ? err : new Error(String(err))
  if ('code' in cause && cause.code === QUERY_CANCELED && timeoutMs !== undefined) {
    return new ExecutionError({ code: 'QUERY_TIMEOUT', sql, timeoutMs }, cause)
  }
  return new ExecutionError({ code: 'QUERY_FAILED', sql, params: [...params], cause }, cause)
}

/** Connection target for error details, never carrying the password. */
function describeTarget(config: PostgresExecutorConfig): string | undefined {
  if (config.connectionString !== undefined) {
    return config.connectionString.replace(/\/\/([^:@/]+):[^@/]*@/, '//$1:***@')
  }
  if (config.host !== undefined) {
    return `postgresql://${config.host}:${config.port ?? 5432}/${config.database ?? ''}`
  }
  return undefined
}
