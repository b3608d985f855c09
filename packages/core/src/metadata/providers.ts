import type { DatasetProvider } from '../types/providers.js'
import { loadRegistryDirectory } from './loader.js'

/**
 * Creates a DatasetProvider reading descriptor files from a registry directory.
 */
export function directoryDatasets(root: string): DatasetProvider {
  return {
    load: () => loadRegistryDirectory(root),
  }
}

/**
 * Creates a DatasetProvider that always returns the same descriptors.
 * Entries are labelled `static[i]` in error messages.
 */
export function staticDatasets(descriptors: readonly unknown[]): DatasetProvider {
  return {
    load: () => Promise.resolve(descriptors.map((raw, i) => ({ source: `static[${i}]`, raw }))),
  }
}
