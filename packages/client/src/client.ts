import type { DatasetMetaJson, DatasetQueryInput, DatasetSlice } from '@dataset-gateway/validation'
import { ConnectionError, DatasetError, fromDatasetSliceJson } from '@dataset-gateway/validation'

import { deserializeError } from './errors.js'
import type { GatewayHealth } from './responses.js'
import { parseDatasetList, parseDatasetMeta, parseDatasetSlice, parseHealth } from './responses.js'

// ── Types ──────────────────────────────────────────────────────

export interface FetchInit {
  method: string
  headers: Record<string, string>
  body?: string | undefined
  signal?: AbortSignal | undefined
}

export interface FetchResponse {
  readonly ok: boolean
  readonly status: number
  json(): Promise<unknown>
}

/** The subset of `fetch` the client calls; the global `fetch` satisfies it. */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>

export interface DatasetClientConfig {
  readonly baseUrl: string
  readonly headers?: Record<string, string> | undefined
  readonly fetch?: FetchLike | undefined
  /** Per-request timeout in milliseconds; 0 disables it. Defaults to 30s. */
  readonly timeout?: number | undefined
}

export interface DatasetClient {
  listDatasets(): Promise<DatasetMetaJson[]>
  describeDataset(datasetId: string): Promise<DatasetMetaJson>
  query(datasetId: string, query?: DatasetQueryInput | undefined): Promise<DatasetSlice>
  /** Request pages one after another, following `next_offset` until it is `null`. */
  paginate(datasetId: string, query?: DatasetQueryInput | undefined): AsyncGenerator<DatasetSlice, void, undefined>
  healthCheck(): Promise<GatewayHealth>
}

// ── Factory ────────────────────────────────────────────────────

export function createDatasetClient(config: DatasetClientConfig): DatasetClient {
  const { timeout = 30_000 } = config
  const baseUrl = config.baseUrl.replace(/\/+$/, '')
  const customHeaders = config.headers ?? {}
  const fetchFn: FetchLike = config.fetch ?? globalThis.fetch

  /** Send one request; non-2xx statuses not listed in `accept` become typed errors. */
  async function request(method: string, path: string, body?: unknown, accept: readonly number[] = []): Promise<unknown> {
    const controller = new AbortController()
    const timer = timeout > 0 ? setTimeout(() => controller.abort(), timeout) : undefined

    try {
      const res = await fetchFn(`${baseUrl}${path}`, {
        method,
        headers:
          body !== undefined ? { 'Content-Type': 'application/json', ...customHeaders } : { ...customHeaders },
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        signal: controller.signal,
      })

      const json = await res.json()
      if (!res.ok && !accept.includes(res.status)) {
        throw deserializeError(json, res.status)
      }
      return json
    } catch (err) {
      if (err instanceof DatasetError) throw err
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ConnectionError('REQUEST_TIMEOUT', `Request timed out after ${timeout}ms`, {
          url: baseUrl,
          timeoutMs: timeout,
        })
      }
      throw new ConnectionError(
        'NETWORK_ERROR',
        err instanceof Error ? err.message : String(err),
        { url: baseUrl },
        err instanceof Error ? err : undefined,
      )
    } finally {
      if (timer !== undefined) clearTimeout(timer)
    }
  }

  const datasetPath = (datasetId: string): string => `/datasets/${encodeURIComponent(datasetId)}`

  async function query(datasetId: string, input?: DatasetQueryInput | undefined): Promise<DatasetSlice> {
    const body = await request('POST', `${datasetPath(datasetId)}/query`, input ?? {})
    return fromDatasetSliceJson(parseDatasetSlice(body))
  }

  return {
    async listDatasets() {
      return parseDatasetList(await request('GET', '/datasets'))
    },

    async describeDataset(datasetId) {
      return parseDatasetMeta(await request('GET', datasetPath(datasetId)))
    },

    query,

    async *paginate(datasetId, input) {
      let offset: number | null = input?.offset ?? 0
      while (offset !== null) {
        const page = await query(datasetId, { ...input, offset })
        yield page
        offset = page.nextOffset
      }
    },

    async healthCheck() {
      // 503 carries the same body with `status: 'unavailable'`
      return parseHealth(await request('GET', '/healthz', undefined, [503]))
    },
  }
}
