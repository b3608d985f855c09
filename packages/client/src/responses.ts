import type { ColumnDescriptorFile, DatasetMetaJson, DatasetSliceJson, DebugLogEntry } from '@dataset-gateway/validation'
import { DatasetError, isRecord } from '@dataset-gateway/validation'

// ── Health ─────────────────────────────────────────────────────

export interface GatewayHealth {
  status: 'ok' | 'unavailable'
  datasets: number
  store: {
    healthy: boolean
    latencyMs: number
    error?: string | undefined
  }
}

// ── Shape checks for server responses ──────────────────────────

export function parseDatasetMeta(value: unknown): DatasetMetaJson {
  if (
    !isRecord(value) ||
    typeof value.dataset_id !== 'string' ||
    typeof value.schema !== 'string' ||
    typeof value.table !== 'string' ||
    !Array.isArray(value.columns)
  ) {
    throw unexpected('dataset metadata')
  }
  return {
    dataset_id: value.dataset_id,
    name: typeof value.name === 'string' ? value.name : value.dataset_id,
    description: typeof value.description === 'string' ? value.description : '',
    schema: value.schema,
    table: value.table,
    primary_key: strings(value.primary_key),
    columns: value.columns.map(parseColumn),
    sample_size: typeof value.sample_size === 'number' ? value.sample_size : null,
  }
}

export function parseDatasetList(value: unknown): DatasetMetaJson[] {
  if (!Array.isArray(value)) throw unexpected('dataset list')
  return value.map(parseDatasetMeta)
}

export function parseDatasetSlice(value: unknown): DatasetSliceJson {
  if (
    !isRecord(value) ||
    typeof value.dataset_id !== 'string' ||
    typeof value.total !== 'number' ||
    typeof value.returned !== 'number' ||
    typeof value.offset !== 'number' ||
    !(typeof value.next_offset === 'number' || value.next_offset === null) ||
    !Array.isArray(value.data)
  ) {
    throw unexpected('dataset slice')
  }
  const data: Record<string, unknown>[] = []
  for (const row of value.data) {
    if (!isRecord(row)) throw unexpected('dataset slice row')
    data.push(row)
  }
  const slice: DatasetSliceJson = {
    dataset_id: value.dataset_id,
    total: value.total,
    returned: value.returned,
    offset: value.offset,
    next_offset: value.next_offset,
    data,
  }
  if (Array.isArray(value.debug_log)) {
    slice.debug_log = value.debug_log.filter(isDebugLogEntry)
  }
  return slice
}

export function parseHealth(value: unknown): GatewayHealth {
  if (!isRecord(value) || typeof value.datasets !== 'number' || !isRecord(value.store)) {
    throw unexpected('health check')
  }
  const store = value.store
  return {
    status: value.status === 'ok' ? 'ok' : 'unavailable',
    datasets: value.datasets,
    store: {
      healthy: store.healthy === true,
      latencyMs: typeof store.latencyMs === 'number' ? store.latencyMs : 0,
      ...(typeof store.error === 'string' ? { error: store.error } : {}),
    },
  }
}

// --- Helpers ---

function parseColumn(value: unknown): ColumnDescriptorFile {
  if (!isRecord(value) || typeof value.name !== 'string') throw unexpected('column descriptor')
  return {
    name: value.name,
    dtype: typeof value.dtype === 'string' ? value.dtype : 'unknown',
    ...(typeof value.description === 'string' ? { description: value.description } : {}),
    ...(typeof value.units === 'string' ? { units: value.units } : {}),
    ...(typeof value.nullable === 'boolean' ? { nullable: value.nullable } : {}),
  }
}

function isDebugLogEntry(value: unknown): value is DebugLogEntry {
  return (
    isRecord(value) &&
    typeof value.timestamp === 'number' &&
    (value.phase === 'validation' || value.phase === 'translation' || value.phase === 'execution') &&
    typeof value.message === 'string'
  )
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

function unexpected(what: string): DatasetError {
  return new DatasetError('UNEXPECTED_RESPONSE', 'StoreUnavailable', `Unexpected ${what} in server response`)
}
