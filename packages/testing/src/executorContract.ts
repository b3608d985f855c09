import type { DbExecutor } from '@dataset-gateway/core'
import { ConnectionError, ExecutionError } from '@dataset-gateway/core'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

// ── Types ──────────────────────────────────────────────────────

export interface ExecutorContractConfig {
  /** A statement that returns at least one row. */
  readonly validQuery: string
  /** A statement the store rejects (e.g. one naming a missing table). */
  readonly invalidQuery: string
}

// ── describeExecutorContract ───────────────────────────────────

/**
 * Behaviour every `DbExecutor` must share, whatever store sits behind it.
 * `factory` is called once for the shared instance and again for the
 * close tests.
 */
export function describeExecutorContract(
  name: string,
  factory: () => DbExecutor,
  config: ExecutorContractConfig,
): void {
  describe(`ExecutorContract: ${name}`, () => {
    let executor: DbExecutor

    beforeAll(() => {
      executor = factory()
    })

    afterAll(async () => {
      await executor.close()
    })

    it('ping() resolves for a healthy executor', async () => {
      await expect(executor.ping()).resolves.toBeUndefined()
    })

    it('execute() returns row objects for a valid statement', async () => {
      const rows = await executor.execute(config.validQuery, [])
      expect(rows.length).toBeGreaterThanOrEqual(1)
      for (const row of rows) {
        expect(typeof row).toBe('object')
        expect(row).not.toBeNull()
      }
    })

    it('execute() throws ExecutionError QUERY_FAILED for a rejected statement', async () => {
      const err = await executor.execute(config.invalidQuery, []).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(ExecutionError)
      if (err instanceof ExecutionError) {
        expect(err.code).toBe('QUERY_FAILED')
      }
    })

    it('session() returns the callback result', async () => {
      const result = await executor.session(async (session) => {
        const first = await session.execute(config.validQuery, [])
        const second = await session.execute(config.validQuery, [])
        return first.length + second.length
      })
      expect(result).toBeGreaterThanOrEqual(2)
    })

    it('session() with a consistent snapshot runs statements', async () => {
      const rows = await executor.session((session) => session.execute(config.validQuery, []), {
        consistentSnapshot: true,
      })
      expect(rows.length).toBeGreaterThanOrEqual(1)
    })

    it('session() rethrows the callback error unchanged', async () => {
      const boom = new Error('callback failed')
      await expect(
        executor.session(async () => {
          throw boom
        }),
      ).rejects.toBe(boom)
      // The connection was handed back: the executor still works.
      await expect(executor.execute(config.validQuery, [])).resolves.toBeDefined()
    })

    it('close() resolves without error', async () => {
      const temp = factory()
      await expect(temp.close()).resolves.toBeUndefined()
    })

    it('ping() throws ConnectionError after close', async () => {
      const temp = factory()
      await temp.close()
      await expect(temp.ping()).rejects.toBeInstanceOf(ConnectionError)
    })
  })
}
