import type { DatasetDescriptor, DescriptorSource } from '@dataset-gateway/validation'
import { CatalogIndex, parseDescriptors, RegistryError } from '@dataset-gateway/validation'
import type { DatasetProvider } from '../types/providers.js'

/**
 * Immutable dataset catalog.
 *
 * - Loads from a provider → validates → throws `RegistryError` on any problem
 * - Never partially loaded: an empty catalog or a single bad descriptor fails creation
 * - Read-only after construction; share one instance across requests
 */
export class DatasetRegistry {
  readonly index: CatalogIndex

  private constructor(index: CatalogIndex) {
    this.index = index
  }

  /**
   * Create a registry by loading from a provider.
   * Validates every descriptor and throws on failure.
   */
  static async create(provider: DatasetProvider): Promise<DatasetRegistry> {
    const sources = await DatasetRegistry.loadSources(provider)
    return new DatasetRegistry(new CatalogIndex(parseDescriptors(sources)))
  }

  get datasets(): readonly DatasetDescriptor[] {
    return this.index.datasets
  }

  getDataset(datasetId: string): DatasetDescriptor | undefined {
    return this.index.getDataset(datasetId)
  }

  // --- Internal helpers ---

  private static async loadSources(provider: DatasetProvider): Promise<DescriptorSource[]> {
    try {
      return await provider.load()
    } catch (err) {
      if (err instanceof RegistryError) throw err
      throw new RegistryError(
        'REGISTRY_LOAD_FAILED',
        [],
        `Dataset provider failed to load: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      )
    }
  }
}
