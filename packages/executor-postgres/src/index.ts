export type { PostgresExecutorConfig } from './executor.js'
export { createPostgresExecutor } from './executor.js'
export type { IntrospectOptions } from './introspect.js'
export { introspectDatasets } from './introspect.js'

export type { DbExecutor, DbSession, SessionOptions } from '@dataset-gateway/core'
