// Catalog index
export { CatalogIndex } from './catalogIndex.js'

// Descriptor validation
export { friendlyName, parseDescriptors } from './descriptorValidation.js'

// Errors
export type {
  ColumnErrorEntry,
  ConfigErrorEntry,
  ConnectionErrorDetails,
  ErrorKind,
  ExecutionErrorDetails,
  InputErrorEntry,
  RegistryErrorEntry,
} from './errors.js'
export {
  ConfigError,
  ConnectionError,
  DatasetError,
  DatasetNotFoundError,
  ExecutionError,
  InvalidColumnError,
  MalformedInputError,
  RegistryError,
} from './errors.js'

// Request decoding
export { decodeDatasetQuery } from './requestDecoding.js'

// Types — descriptor
export type {
  ColumnDescriptor,
  ColumnDescriptorFile,
  DatasetDescriptor,
  DatasetDescriptorFile,
  DescriptorSource,
} from './types/descriptor.js'
// Types — query
export type {
  DatasetQuery,
  DatasetQueryInput,
  FilterOperator,
  FilterValue,
  QueryFilter,
  ValidatedQuery,
} from './types/query.js'
// Types — result
export type {
  DatasetSlice,
  DebugLogEntry,
  HealthCheckResult,
  SqlStatement,
  TranslatedQuery,
} from './types/result.js'

// Query validation
export { validateDatasetQuery } from './validation/queryValidator.js'
export {
  DEFAULT_LIMIT,
  DEFAULT_OFFSET,
  FILTER_OPERATORS,
  isFilterOperator,
  isRecord,
  MAX_LIMIT,
  MIN_LIMIT,
} from './validation/rules.js'

// Wire format
export type { DatasetMetaJson, DatasetSliceJson } from './wire.js'
export { fromDatasetSliceJson, toDatasetMetaJson, toDatasetSliceJson } from './wire.js'
