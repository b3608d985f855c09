import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from 'node:http'
import type { DatasetService } from '@dataset-gateway/core'
import {
  ConnectionError,
  DatasetError,
  DatasetNotFoundError,
  decodeDatasetQuery,
  ExecutionError,
  InvalidColumnError,
  MalformedInputError,
  toDatasetMetaJson,
  toDatasetSliceJson,
} from '@dataset-gateway/validation'
import type { Logger } from './logger.js'

// ── Types ──────────────────────────────────────────────────────

export interface ServerConfig {
  readonly port?: number | undefined
  readonly host?: string | undefined
  readonly service: DatasetService
  readonly logger: Logger
}

export interface GatewayServer {
  start(): Promise<void>
  /** Stops accepting connections, then closes the dataset service. */
  stop(): Promise<void>
  readonly url: string
}

class HttpError extends Error {
  readonly status: number
  readonly code: string
  constructor(status: number, code: string, message: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.code = code
  }
}

// ── Error mapping ──────────────────────────────────────────────

function errorToStatus(err: unknown): number {
  if (err instanceof HttpError) return err.status
  if (err instanceof DatasetNotFoundError) return 404
  if (err instanceof InvalidColumnError) return 400
  if (err instanceof MalformedInputError) return 422
  if (err instanceof ConnectionError) return 503
  if (err instanceof ExecutionError) return 500
  return 500
}

function errorToBody(err: unknown): object {
  if (err instanceof HttpError) return { code: err.code, message: err.message }
  if (err instanceof DatasetError) return err.toJSON()
  const msg = err instanceof Error ? err.message : String(err)
  return { code: 'INTERNAL_ERROR', message: msg }
}

// ── Helpers ────────────────────────────────────────────────────

function readBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf-8')
      if (raw.trim().length === 0) {
        resolve(undefined)
        return
      }
      try {
        resolve(JSON.parse(raw))
      } catch (err) {
        reject(
          new MalformedInputError([
            {
              code: 'INVALID_JSON',
              message: `Request body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
              details: { field: 'body' },
            },
          ]),
        )
      }
    })
    req.on('error', reject)
  })
}

function respond(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body)
  res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(json) })
  res.end(json)
}

function datasetIdFrom(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    throw new HttpError(400, 'INVALID_PATH', `Dataset id '${segment}' is not valid URL encoding`)
  }
}

const DATASET_ROUTE = /^\/datasets\/([^/]+)(?:\/(query|sql))?\/?$/

// ── Server factory ─────────────────────────────────────────────

export function createServer(config: ServerConfig): GatewayServer {
  const port = config.port ?? 8080
  const host = config.host ?? '0.0.0.0'
  const { service, logger } = config

  async function route(method: string, path: string, req: IncomingMessage, res: ServerResponse): Promise<number> {
    if (method === 'GET' && path === '/healthz') {
      const health = await service.healthCheck()
      const status = health.healthy ? 200 : 503
      respond(res, status, {
        status: health.healthy ? 'ok' : 'unavailable',
        datasets: health.datasets,
        store: health.store,
      })
      return status
    }

    if (method === 'GET' && (path === '/datasets' || path === '/datasets/')) {
      respond(res, 200, service.listDatasets().map(toDatasetMetaJson))
      return 200
    }

    const match = DATASET_ROUTE.exec(path)
    const segment = match?.[1]
    if (match !== null && segment !== undefined) {
      const datasetId = datasetIdFrom(segment)
      const action = match[2]

      if (method === 'GET' && action === undefined) {
        respond(res, 200, toDatasetMetaJson(service.describeDataset(datasetId)))
        return 200
      }

      if (method === 'POST' && action !== undefined) {
        // Unknown datasets are reported before anything about the body.
        service.describeDataset(datasetId)
        const query = decodeDatasetQuery(await readBody(req))
        if (action === 'query') {
          respond(res, 200, toDatasetSliceJson(await service.query(datasetId, query)))
        } else {
          const translated = service.translate(datasetId, query)
          respond(res, 200, {
            dataset_id: translated.datasetId,
            columns: translated.columns,
            count: translated.count,
            fetch: translated.fetch,
          })
        }
        return 200
      }
    }

    throw new HttpError(404, 'ROUTE_NOT_FOUND', `${method} ${path} not found`)
  }

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = Date.now()
    const method = req.method ?? 'GET'
    const path = (req.url ?? '/').split('?')[0] ?? '/'

    let status: number
    try {
      status = await route(method, path, req, res)
    } catch (err) {
      status = errorToStatus(err)
      if (status >= 500) {
        logger.error('Request failed', { method, path, status, error: errorToBody(err) })
      }
      respond(res, status, errorToBody(err))
    }
    logger.info('request', { method, path, status, durationMs: Date.now() - started })
  }

  const server = createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    handleRequest(req, res).catch((err: unknown) => {
      logger.error('Unhandled request error', { error: err instanceof Error ? err.message : String(err) })
      if (!res.headersSent) {
        respond(res, 500, { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) })
      }
    })
  })

  const displayHost = host === '0.0.0.0' ? 'localhost' : host

  const result = {
    url: `http://${displayHost}:${port}`,
    start() {
      return new Promise<void>((resolve, reject) => {
        server.once('error', reject)
        server.listen(port, host, () => {
          const addr = server.address()
          if (addr !== null && typeof addr === 'object') {
            result.url = `http://${displayHost}:${addr.port}`
          }
          logger.info('Listening', { url: result.url })
          resolve()
        })
      })
    },
    async stop() {
      await new Promise<void>((resolve, reject) => {
        server.close((err: Error | undefined) => (err ? reject(err) : resolve()))
        server.closeAllConnections()
      })
      await service.close()
      logger.info('Stopped')
    },
  }

  return result
}
