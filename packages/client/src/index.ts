// Re-export types from validation package
export type {
  DatasetMetaJson,
  DatasetQueryInput,
  DatasetSlice,
  DebugLogEntry,
  FilterOperator,
  FilterValue,
  QueryFilter,
} from '@dataset-gateway/validation'
// Re-export error classes so callers can match on them
export {
  ConnectionError,
  DatasetError,
  DatasetNotFoundError,
  ExecutionError,
  InvalidColumnError,
  MalformedInputError,
} from '@dataset-gateway/validation'
// Client
export type { DatasetClient, DatasetClientConfig, FetchInit, FetchLike, FetchResponse } from './client.js'
export { createDatasetClient } from './client.js'
// Error deserialization
export { deserializeError } from './errors.js'
// Response shapes
export type { GatewayHealth } from './responses.js'
