import type { DatasetDescriptor } from './types/descriptor.js'

/**
 * Pre-indexed, read-only catalog for O(1) lookups during query handling.
 * Column membership lives on each descriptor (`columnNames`).
 */
export class CatalogIndex {
  /** Catalog order (sorted registry order). */
  readonly datasets: readonly DatasetDescriptor[]
  readonly datasetsById: ReadonlyMap<string, DatasetDescriptor>

  constructor(descriptors: readonly DatasetDescriptor[]) {
    const datasetsById = new Map<string, DatasetDescriptor>()
    for (const descriptor of descriptors) {
      datasetsById.set(descriptor.datasetId, descriptor)
    }

    this.datasets = Object.freeze([...descriptors])
    this.datasetsById = datasetsById
  }

  get size(): number {
    return this.datasets.length
  }

  getDataset(datasetId: string): DatasetDescriptor | undefined {
    return this.datasetsById.get(datasetId)
  }
}
