// Re-export types from validation package
export type {
  ColumnDescriptor,
  DatasetDescriptor,
  DatasetDescriptorFile,
  DatasetQuery,
  DatasetQueryInput,
  DatasetSlice,
  DebugLogEntry,
  DescriptorSource,
  FilterOperator,
  FilterValue,
  HealthCheckResult,
  QueryFilter,
  SqlStatement,
  TranslatedQuery,
  ValidatedQuery,
} from '@dataset-gateway/validation'
// Re-export validation functions and classes
export {
  CatalogIndex,
  ConnectionError,
  DatasetError,
  DatasetNotFoundError,
  decodeDatasetQuery,
  ExecutionError,
  InvalidColumnError,
  MalformedInputError,
  RegistryError,
  validateDatasetQuery,
} from '@dataset-gateway/validation'
// Debug
export { debugEntry, withDebugLog } from './debug/logger.js'
// Dialects
export { PostgresDialect } from './dialects/postgres.js'
export { COMPARISON_SYMBOLS, escapeIdentDQ, quoteIdentDQ } from './generator/fragments.js'
// Registry
export { loadRegistryDirectory } from './metadata/loader.js'
export { directoryDatasets, staticDatasets } from './metadata/providers.js'
export { DatasetRegistry } from './metadata/registry.js'
export type { WriteRegistryOptions } from './metadata/writer.js'
export { writeRegistryDirectory } from './metadata/writer.js'
// Pipeline
export type { CreateDatasetServiceOptions, DatasetService } from './pipeline.js'
export { createDatasetService } from './pipeline.js'
// Translator
export type { PageRequest } from './translator/translator.js'
export { translateQuery } from './translator/translator.js'
// Public interfaces
export type { DbExecutor, DbSession, SessionOptions } from './types/interfaces.js'
// IR types (internal)
export type { SqlDialect, StatementParts, TableRef, WhereCondition } from './types/ir.js'
// Providers
export type { DatasetProvider } from './types/providers.js'
