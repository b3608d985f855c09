import { readdir, readFile, stat } from 'node:fs/promises'
import { join, relative } from 'node:path'
import type { DescriptorSource, RegistryErrorEntry } from '@dataset-gateway/validation'
import { RegistryError } from '@dataset-gateway/validation'

const DESCRIPTOR_EXTENSION = '.json'

/**
 * Read every `*.json` descriptor under `root`, recursively, in sorted path
 * order. Only file access and JSON syntax are checked here; descriptor
 * contents are validated by the registry.
 */
export async function loadRegistryDirectory(root: string): Promise<DescriptorSource[]> {
  let isDirectory: boolean
  try {
    isDirectory = (await stat(root)).isDirectory()
  } catch (err) {
    throw new RegistryError(
      'REGISTRY_LOAD_FAILED',
      [],
      `Registry directory not found: ${root}`,
      err instanceof Error ? err : undefined,
    )
  }
  if (!isDirectory) {
    throw new RegistryError('REGISTRY_LOAD_FAILED', [], `Registry path is not a directory: ${root}`)
  }

  const files = (await collectFiles(root)).sort()
  const sources: DescriptorSource[] = []
  const errors: RegistryErrorEntry[] = []

  for (const file of files) {
    const source = relative(root, file)
    const text = await readFile(file, 'utf-8')
    try {
      sources.push({ source, raw: JSON.parse(text) as unknown })
    } catch (err) {
      errors.push({
        code: 'INVALID_FILE',
        message: `${source}: not valid JSON (${err instanceof Error ? err.message : String(err)})`,
        details: { source },
      })
    }
  }

  if (errors.length > 0) {
    throw new RegistryError('REGISTRY_INVALID', errors)
  }

  return sources
}

async function collectFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const files: string[] = []
  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(path)))
    } else if (entry.isFile() && entry.name.endsWith(DESCRIPTOR_EXTENSION)) {
      files.push(path)
    }
  }
  return files
}
