import type { DbExecutor, DbSession, DatasetDescriptorFile } from '@dataset-gateway/core'
import type { ColumnDescriptorFile } from '@dataset-gateway/validation'
import { friendlyName } from '@dataset-gateway/validation'

export interface IntrospectOptions {
  /** Schemas to scan. Every base table in them becomes one descriptor. */
  readonly schemas: readonly string[]
}

// ── Catalog queries ────────────────────────────────────────────

const TABLES_SQL = `SELECT table_schema, table_name
FROM information_schema.tables
WHERE table_schema = ANY($1) AND table_type = 'BASE TABLE'
ORDER BY table_schema, table_name`

const COLUMNS_SQL = `SELECT table_schema, table_name, column_name, COALESCE(udt_name, data_type) AS dtype, is_nullable
FROM information_schema.columns
WHERE table_schema = ANY($1)
ORDER BY table_schema, table_name, ordinal_position`

const PRIMARY_KEYS_SQL = `SELECT kcu.table_schema, kcu.table_name, kcu.column_name
FROM information_schema.table_constraints tc
JOIN information_schema.key_column_usage kcu
  ON kcu.constraint_schema = tc.constraint_schema
  AND kcu.constraint_name = tc.constraint_name
  AND kcu.table_name = tc.table_name
WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = ANY($1)
ORDER BY kcu.table_schema, kcu.table_name, kcu.ordinal_position`

// ── introspectDatasets ─────────────────────────────────────────

/**
 * Build registry descriptors from the live catalog. All three catalog reads
 * share one snapshot. Tables without visible columns are skipped.
 */
export async function introspectDatasets(
  executor: DbExecutor,
  options: IntrospectOptions,
): Promise<DatasetDescriptorFile[]> {
  const schemas = [...options.schemas]
  if (schemas.length === 0) return []

  return executor.session((session) => readCatalog(session, schemas), { consistentSnapshot: true })
}

async function readCatalog(session: DbSession, schemas: string[]): Promise<DatasetDescriptorFile[]> {
  const tables = await session.execute(TABLES_SQL, [schemas])
  const columnRows = await session.execute(COLUMNS_SQL, [schemas])
  const keyRows = await session.execute(PRIMARY_KEYS_SQL, [schemas])

  const columns = new Map<string, ColumnDescriptorFile[]>()
  for (const row of columnRows) {
    const key = tableKey(row)
    const list = columns.get(key) ?? []
    list.push({
      name: text(row.column_name),
      dtype: text(row.dtype) || 'unknown',
      nullable: row.is_nullable === 'YES',
    })
    columns.set(key, list)
  }

  const primaryKeys = new Map<string, string[]>()
  for (const row of keyRows) {
    const key = tableKey(row)
    const list = primaryKeys.get(key) ?? []
    list.push(text(row.column_name))
    primaryKeys.set(key, list)
  }

  const descriptors: DatasetDescriptorFile[] = []
  for (const row of tables) {
    const schema = text(row.table_schema)
    const table = text(row.table_name)
    const key = tableKey(row)
    const tableColumns = columns.get(key)
    if (tableColumns === undefined || tableColumns.length === 0) continue

    descriptors.push({
      dataset_id: key,
      name: friendlyName(table),
      description: '',
      schema,
      table,
      primary_key: primaryKeys.get(key) ?? [],
      columns: tableColumns,
      sample_size: null,
    })
  }
  return descriptors
}

// --- Helpers ---

function tableKey(row: Record<string, unknown>): string {
  return `${text(row.table_schema)}.${text(row.table_name)}`
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : value === null || value === undefined ? '' : String(value)
}
