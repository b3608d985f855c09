import type { MemoryExecutor, MemoryExecutorOptions } from '@dataset-gateway/testing'
import { createMemoryExecutor, fixtureTables, pitchingOutingsFile, teamsFile } from '@dataset-gateway/testing'
import type { DatasetService } from '../src/index.js'
import { createDatasetService, DatasetRegistry, staticDatasets } from '../src/index.js'

export function fixtureRegistry(): Promise<DatasetRegistry> {
  return DatasetRegistry.create(staticDatasets([pitchingOutingsFile, teamsFile]))
}

export interface FixtureService {
  readonly service: DatasetService
  readonly executor: MemoryExecutor
}

export async function fixtureService(
  options: Omit<MemoryExecutorOptions, 'tables'> & { consistentReads?: boolean | undefined } = {},
): Promise<FixtureService> {
  const { consistentReads, ...executorOptions } = options
  const executor = createMemoryExecutor({ ...executorOptions, tables: fixtureTables() })
  const service = await createDatasetService({ registry: await fixtureRegistry(), executor, consistentReads })
  return { service, executor }
}
