import type { RegistryErrorEntry } from './errors.js'
import { RegistryError } from './errors.js'
import type { ColumnDescriptor, DatasetDescriptor, DescriptorSource } from './types/descriptor.js'
import { isRecord } from './validation/rules.js'

// --- Descriptor Parsing ---

/**
 * Parse and validate every registry source into frozen descriptors.
 *
 * All problems across all sources are collected before throwing, so one
 * `RegistryError` lists everything wrong with the registry. Sources are
 * expected in a deterministic order; catalog order follows it.
 */
export function parseDescriptors(sources: readonly DescriptorSource[]): DatasetDescriptor[] {
  const errors: RegistryErrorEntry[] = []
  const descriptors: DatasetDescriptor[] = []
  const sourceById = new Map<string, string>()

  for (const { source, raw } of sources) {
    const descriptor = parseDescriptor(source, raw, errors)
    if (descriptor === undefined) continue

    const existing = sourceById.get(descriptor.datasetId)
    if (existing !== undefined) {
      errors.push({
        code: 'DUPLICATE_DATASET_ID',
        message: `Duplicate dataset_id '${descriptor.datasetId}' (${existing} and ${source})`,
        details: { source, datasetId: descriptor.datasetId, field: 'dataset_id' },
      })
      continue
    }
    sourceById.set(descriptor.datasetId, source)
    descriptors.push(descriptor)
  }

  if (sources.length === 0) {
    errors.push({
      code: 'EMPTY_CATALOG',
      message: 'Registry contains no datasets',
      details: {},
    })
  }

  if (errors.length > 0) {
    throw new RegistryError('REGISTRY_INVALID', errors)
  }

  return descriptors
}

/** Display name derived from a table name: `pitching_outings` → `Pitching Outings`. */
export function friendlyName(table: string): string {
  return table
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ')
}

// --- Helpers ---

function parseDescriptor(
  source: string,
  raw: unknown,
  errors: RegistryErrorEntry[],
): DatasetDescriptor | undefined {
  if (!isRecord(raw)) {
    errors.push({
      code: 'INVALID_FILE',
      message: `${source}: descriptor must be a JSON object`,
      details: { source, actual: describeValue(raw) },
    })
    return undefined
  }

  const before = errors.length
  const datasetId = requireString(raw, 'dataset_id', source, errors)
  const label = datasetId ?? source
  const schema = requireString(raw, 'schema', label, errors, source)
  const table = requireString(raw, 'table', label, errors, source)
  const columns = parseColumns(raw.columns, label, source, errors)
  const primaryKey = parsePrimaryKey(raw.primary_key, columns, label, source, errors)

  if (errors.length > before || datasetId === undefined || schema === undefined || table === undefined) {
    return undefined
  }

  const columnNames: ReadonlySet<string> = new Set(columns.map((c) => c.name))

  return Object.freeze({
    datasetId,
    schema,
    table,
    name: nonEmptyString(raw.name) ?? friendlyName(table),
    description: typeof raw.description === 'string' ? raw.description : '',
    primaryKey: Object.freeze(primaryKey),
    columns: Object.freeze(columns),
    columnNames,
    sampleSize: isCount(raw.sample_size) ? raw.sample_size : null,
  })
}

function requireString(
  raw: Record<string, unknown>,
  field: string,
  label: string,
  errors: RegistryErrorEntry[],
  source: string = label,
): string | undefined {
  const value = nonEmptyString(raw[field])
  if (value === undefined) {
    errors.push({
      code: 'MISSING_FIELD',
      message: `${label}: missing required field '${field}'`,
      details: { source, field, actual: describeValue(raw[field]) },
    })
  }
  return value
}

function parseColumns(value: unknown, label: string, source: string, errors: RegistryErrorEntry[]): ColumnDescriptor[] {
  if (!Array.isArray(value) || value.length === 0) {
    errors.push({
      code: 'NO_COLUMNS',
      message: `${label}: dataset must declare at least one column`,
      details: { source, field: 'columns', actual: describeValue(value) },
    })
    return []
  }

  const columns: ColumnDescriptor[] = []
  const seen = new Set<string>()

  value.forEach((entry: unknown, i: number) => {
    const name = isRecord(entry) ? nonEmptyString(entry.name) : undefined
    if (!isRecord(entry) || name === undefined) {
      errors.push({
        code: 'INVALID_FIELD',
        message: `${label}: columns[${i}] must be an object with a non-empty 'name'`,
        details: { source, field: `columns[${i}]`, actual: describeValue(entry) },
      })
      return
    }

    if (seen.has(name)) {
      errors.push({
        code: 'DUPLICATE_COLUMN',
        message: `${label}: duplicate column '${name}'`,
        details: { source, field: `columns[${i}]`, actual: name },
      })
      return
    }
    seen.add(name)

    // Optional fields are taken only when well-typed; anything else is dropped.
    const column: ColumnDescriptor = {
      name,
      dtype: nonEmptyString(entry.dtype) ?? 'unknown',
      ...(typeof entry.description === 'string' ? { description: entry.description } : {}),
      ...(nonEmptyString(entry.units) !== undefined ? { units: nonEmptyString(entry.units) } : {}),
      ...(typeof entry.nullable === 'boolean' ? { nullable: entry.nullable } : {}),
    }
    columns.push(Object.freeze(column))
  })

  return columns
}

function parsePrimaryKey(
  value: unknown,
  columns: readonly ColumnDescriptor[],
  label: string,
  source: string,
  errors: RegistryErrorEntry[],
): string[] {
  if (value === undefined || value === null) return []

  if (!Array.isArray(value) || !value.every((v: unknown): v is string => typeof v === 'string')) {
    errors.push({
      code: 'INVALID_FIELD',
      message: `${label}: primary_key must be an array of column names`,
      details: { source, field: 'primary_key', actual: describeValue(value) },
    })
    return []
  }

  // Column errors are reported on their own; don't pile key errors on top.
  if (columns.length === 0) return value

  const known = new Set(columns.map((c) => c.name))
  for (const key of value) {
    if (!known.has(key)) {
      errors.push({
        code: 'INVALID_PRIMARY_KEY',
        message: `${label}: primary key column '${key}' is not a declared column`,
        details: { source, field: 'primary_key', actual: key },
      })
    }
  }
  return value
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
}

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return `array(${value.length})`
  return typeof value
}
