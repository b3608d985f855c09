export type { ExecutorFactory, GenerateRegistryOptions } from './app.js'
export { generateRegistry, postgresExecutorFactory, startGateway } from './app.js'
export type { Env, GatewayConfig, LogLevel } from './config.js'
export { LOG_LEVELS, loadConfig } from './config.js'
export type { Logger, LoggerOptions } from './logger.js'
export { createLogger } from './logger.js'
export { buildProgram, DEFAULT_GENERATED_DIR } from './program.js'
export type { GatewayServer, ServerConfig } from './server.js'
export { createServer } from './server.js'
