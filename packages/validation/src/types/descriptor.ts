// --- In-memory descriptors ---

export interface ColumnDescriptor {
  readonly name: string
  /** Free-form store type name, carried for display only. */
  readonly dtype: string
  readonly description?: string | undefined
  readonly units?: string | undefined
  readonly nullable?: boolean | undefined
}

/**
 * Immutable description of one dataset and the table backing it.
 * Built once by the registry and shared across all requests.
 */
export interface DatasetDescriptor {
  readonly datasetId: string
  readonly schema: string
  readonly table: string
  readonly name: string
  readonly description: string
  /** Sort key for pagination. Empty means store-defined row order. */
  readonly primaryKey: readonly string[]
  readonly columns: readonly ColumnDescriptor[]
  readonly columnNames: ReadonlySet<string>
  readonly sampleSize: number | null
}

// --- Registry files ---

/** One registry file, as written by `generate-registry`. */
export interface DatasetDescriptorFile {
  dataset_id: string
  name: string
  description: string
  schema: string
  table: string
  primary_key: string[]
  columns: ColumnDescriptorFile[]
  sample_size: number | null
}

export interface ColumnDescriptorFile {
  name: string
  dtype: string
  description?: string | undefined
  units?: string | null | undefined
  nullable?: boolean | undefined
}

/** A not-yet-validated descriptor and where it came from (file path or label). */
export interface DescriptorSource {
  readonly source: string
  readonly raw: unknown
}
