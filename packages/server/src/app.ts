import type { DbExecutor } from '@dataset-gateway/core'
import { createDatasetService, DatasetRegistry, directoryDatasets, writeRegistryDirectory } from '@dataset-gateway/core'
import { createPostgresExecutor, introspectDatasets } from '@dataset-gateway/executor-postgres'
import type { GatewayConfig } from './config.js'
import type { Logger } from './logger.js'
import type { GatewayServer } from './server.js'
import { createServer } from './server.js'

export type ExecutorFactory = (config: GatewayConfig, logger: Logger) => DbExecutor

export const postgresExecutorFactory: ExecutorFactory = (config, logger) =>
  createPostgresExecutor({
    connectionString: config.databaseUrl,
    max: config.poolMax,
    timeoutMs: config.statementTimeoutMs,
    onIdleError: (err) => logger.warn('Idle PostgreSQL client error', { error: err.message }),
  })

// ── serve ──────────────────────────────────────────────────────

/**
 * Load and validate the registry, verify the store is reachable, then start
 * listening. Any failure before listening is fatal and propagates.
 */
export async function startGateway(
  config: GatewayConfig,
  logger: Logger,
  createExecutor: ExecutorFactory = postgresExecutorFactory,
): Promise<GatewayServer> {
  const registry = await DatasetRegistry.create(directoryDatasets(config.registryDir))
  logger.info('Registry loaded', {
    registryDir: config.registryDir,
    datasets: registry.datasets.map((d) => d.datasetId),
  })

  const executor = createExecutor(config, logger)
  const service = await createDatasetService({
    registry,
    executor,
    consistentReads: config.consistentReads,
  }).catch(async (err: unknown) => {
    await executor.close()
    throw err
  })

  const server = createServer({ port: config.port, host: config.host, service, logger })
  await server.start()
  return server
}

// ── generate-registry ──────────────────────────────────────────

export interface GenerateRegistryOptions {
  readonly schemas: readonly string[]
  readonly outputDir: string
  /** Replace descriptor files already in `outputDir`. */
  readonly overwrite?: boolean | undefined
}

/** Write one descriptor file per base table found in `schemas`. Returns the written paths. */
export async function generateRegistry(
  config: GatewayConfig,
  options: GenerateRegistryOptions,
  logger: Logger,
  createExecutor: ExecutorFactory = postgresExecutorFactory,
): Promise<string[]> {
  const executor = createExecutor(config, logger)
  try {
    const descriptors = await introspectDatasets(executor, { schemas: options.schemas })
    const written = await writeRegistryDirectory(options.outputDir, descriptors, { overwrite: options.overwrite })
    logger.info('Registry generated', { outputDir: options.outputDir, files: written.length })
    return written
  } finally {
    await executor.close()
  }
}
