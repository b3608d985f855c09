import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { DatasetDescriptorFile, RegistryErrorEntry } from '@dataset-gateway/validation'
import { RegistryError } from '@dataset-gateway/validation'

export interface WriteRegistryOptions {
  /** Replace descriptor files that already exist. Off by default. */
  readonly overwrite?: boolean | undefined
}

/**
 * Write one `<root>/<schema>/<table>.json` file per descriptor, keys sorted,
 * two-space indent. Returns the written paths in input order.
 *
 * Existing files are left untouched unless `overwrite` is set; every
 * collision is reported in one `RegistryError` after the remaining files
 * are written.
 */
export async function writeRegistryDirectory(
  root: string,
  descriptors: readonly DatasetDescriptorFile[],
  options: WriteRegistryOptions = {},
): Promise<string[]> {
  for (const d of descriptors) {
    for (const segment of [d.schema, d.table]) {
      if (!isSafeSegment(segment)) {
        throw new RegistryError('REGISTRY_INVALID', [
          {
            code: 'INVALID_FIELD',
            message: `${d.dataset_id}: '${segment}' cannot be used as a file name`,
            details: { datasetId: d.dataset_id, actual: segment },
          },
        ])
      }
    }
  }

  const flag = options.overwrite === true ? 'w' : 'wx'
  const written: string[] = []
  const collisions: RegistryErrorEntry[] = []
  for (const d of descriptors) {
    const dir = join(root, d.schema)
    await mkdir(dir, { recursive: true })
    const file = join(dir, `${d.table}.json`)
    try {
      await writeFile(file, `${JSON.stringify(sortKeys(d), null, 2)}\n`, { encoding: 'utf-8', flag })
    } catch (err) {
      if (!isFileExists(err)) throw err
      collisions.push({
        code: 'FILE_EXISTS',
        message: `${d.dataset_id}: ${file} already exists`,
        details: { datasetId: d.dataset_id, actual: file },
      })
      continue
    }
    written.push(file)
  }

  if (collisions.length > 0) {
    throw new RegistryError(
      'REGISTRY_INVALID',
      collisions,
      `Refusing to overwrite ${collisions.length} existing descriptor file${collisions.length === 1 ? '' : 's'}`,
    )
  }
  return written
}

function isFileExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST'
}

function isSafeSegment(segment: string): boolean {
  return segment.length > 0 && segment !== '.' && segment !== '..' && !/[/\\\0]/.test(segment)
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {}
    for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(inner)
    }
    return sorted
  }
  return value
}
