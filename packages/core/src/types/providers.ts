import type { DescriptorSource } from '@dataset-gateway/validation'

export interface DatasetProvider {
  load(): Promise<DescriptorSource[]>
}
