import type { ColumnDescriptorFile, DatasetDescriptor } from './types/descriptor.js'
import type { DatasetSlice, DebugLogEntry } from './types/result.js'

// --- JSON shapes served over HTTP ---

export interface DatasetMetaJson {
  dataset_id: string
  name: string
  description: string
  schema: string
  table: string
  primary_key: string[]
  columns: ColumnDescriptorFile[]
  sample_size: number | null
}

export interface DatasetSliceJson {
  dataset_id: string
  total: number
  returned: number
  offset: number
  next_offset: number | null
  data: Record<string, unknown>[]
  debug_log?: DebugLogEntry[] | undefined
}

// --- Mapping ---

export function toDatasetMetaJson(descriptor: DatasetDescriptor): DatasetMetaJson {
  return {
    dataset_id: descriptor.datasetId,
    name: descriptor.name,
    description: descriptor.description,
    schema: descriptor.schema,
    table: descriptor.table,
    primary_key: [...descriptor.primaryKey],
    columns: descriptor.columns.map((c) => ({
      name: c.name,
      dtype: c.dtype,
      ...(c.description !== undefined ? { description: c.description } : {}),
      ...(c.units !== undefined ? { units: c.units } : {}),
      ...(c.nullable !== undefined ? { nullable: c.nullable } : {}),
    })),
    sample_size: descriptor.sampleSize,
  }
}

export function toDatasetSliceJson(slice: DatasetSlice): DatasetSliceJson {
  const json: DatasetSliceJson = {
    dataset_id: slice.datasetId,
    total: slice.total,
    returned: slice.returned,
    offset: slice.offset,
    next_offset: slice.nextOffset,
    data: slice.data,
  }
  if (slice.debugLog !== undefined) json.debug_log = slice.debugLog
  return json
}

export function fromDatasetSliceJson(json: DatasetSliceJson): DatasetSlice {
  return {
    datasetId: json.dataset_id,
    total: json.total,
    returned: json.returned,
    offset: json.offset,
    nextOffset: json.next_offset,
    data: json.data,
    ...(json.debug_log !== undefined ? { debugLog: json.debug_log } : {}),
  }
}
