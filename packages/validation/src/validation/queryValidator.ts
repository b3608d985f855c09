import type { ColumnErrorEntry } from '../errors.js'
import { InvalidColumnError } from '../errors.js'
import type { DatasetDescriptor } from '../types/descriptor.js'
import type { QueryFilter, ValidatedQuery } from '../types/query.js'

// --- Main Validation ---

/**
 * Resolve the projection and check every referenced column against the
 * descriptor. Unknown names from the projection and the filters are reported
 * together in one `InvalidColumnError`.
 */
export function validateDatasetQuery(
  descriptor: DatasetDescriptor,
  requestedColumns: readonly string[] | null | undefined,
  filters: readonly QueryFilter[],
): ValidatedQuery {
  const errors: ColumnErrorEntry[] = []

  const columns =
    requestedColumns === null || requestedColumns === undefined || requestedColumns.length === 0
      ? descriptor.columns.map((c) => c.name)
      : [...requestedColumns]

  for (const column of columns) {
    if (!descriptor.columnNames.has(column)) {
      errors.push({
        code: 'UNKNOWN_COLUMN',
        message: `Column '${column}' does not exist in dataset '${descriptor.datasetId}'`,
        details: { column, source: 'projection' },
      })
    }
  }

  // Filter columns need not be projected
  filters.forEach((filter, filterIndex) => {
    if (!descriptor.columnNames.has(filter.column)) {
      errors.push({
        code: 'UNKNOWN_COLUMN',
        message: `Filter column '${filter.column}' does not exist in dataset '${descriptor.datasetId}'`,
        details: { column: filter.column, source: 'filter', filterIndex },
      })
    }
  })

  if (errors.length > 0) {
    throw new InvalidColumnError(descriptor.datasetId, errors)
  }

  return { columns, filters: [...filters] }
}
