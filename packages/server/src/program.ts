import { Command } from 'commander'
import { generateRegistry, startGateway } from './app.js'
import { loadConfig } from './config.js'
import { createLogger } from './logger.js'

/** Default target of generate-registry, apart from the directory the server loads. */
export const DEFAULT_GENERATED_DIR = 'dataset_registry.generated'

export function buildProgram(): Command {
  const program = new Command()

  program.name('dataset-gateway').description('Read-only query service over registered datasets').version('0.1.0')

  program
    .command('serve')
    .description('Load the dataset registry and serve the HTTP API')
    .action(async () => {
      const config = loadConfig(process.env)
      const logger = createLogger({ level: config.logLevel })
      const server = await startGateway(config, logger)

      let stopping = false
      const shutdown = (signal: string): void => {
        if (stopping) return
        stopping = true
        logger.info('Shutting down', { signal })
        server.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) })
            process.exit(1)
          },
        )
      }
      process.once('SIGINT', () => shutdown('SIGINT'))
      process.once('SIGTERM', () => shutdown('SIGTERM'))
    })

  program
    .command('generate-registry')
    .description('Introspect the store and write one descriptor file per table')
    .requiredOption('-s, --schemas <schemas>', 'comma-separated schemas to scan')
    .option('-o, --output-dir <dir>', 'directory to write descriptors into', DEFAULT_GENERATED_DIR)
    .option('-f, --force', 'replace descriptor files that already exist')
    .action(async (opts: { schemas: string; outputDir: string; force?: boolean | undefined }) => {
      const config = loadConfig(process.env)
      const logger = createLogger({ level: config.logLevel })
      const schemas = opts.schemas
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
      const written = await generateRegistry(
        config,
        { schemas, outputDir: opts.outputDir, overwrite: opts.force === true },
        logger,
      )
      for (const file of written) process.stdout.write(`${file}\n`)
    })

  return program
}
