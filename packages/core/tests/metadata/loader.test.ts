import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pitchingOutingsFile, teamsFile } from '@dataset-gateway/testing'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DatasetRegistry, directoryDatasets, loadRegistryDirectory, RegistryError, writeRegistryDirectory } from '../../src/index.js'

let root: string

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'dataset-registry-'))
})

afterEach(async () => {
  await rm(root, { recursive: true, force: true })
})

async function put(relativePath: string, content: string): Promise<void> {
  const file = join(root, relativePath)
  await mkdir(join(file, '..'), { recursive: true })
  await writeFile(file, content, 'utf-8')
}

async function registryError(promise: Promise<unknown>): Promise<RegistryError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  )
  if (err instanceof RegistryError) return err
  throw new Error(`Expected RegistryError, got ${String(err)}`)
}

// ── loadRegistryDirectory ──────────────────────────────────────

describe('loadRegistryDirectory', () => {
  it('reads *.json files recursively in sorted path order', async () => {
    await put('baseball/teams.json', JSON.stringify(teamsFile))
    await put('baseball/pitching_outings.json', JSON.stringify(pitchingOutingsFile))
    await put('README.md', '# not a descriptor')

    const sources = await loadRegistryDirectory(root)
    expect(sources.map((s) => s.source)).toEqual(['baseball/pitching_outings.json', 'baseball/teams.json'])
    expect(sources[0]?.raw).toEqual(pitchingOutingsFile)
  })

  it('returns nothing for an empty directory', async () => {
    expect(await loadRegistryDirectory(root)).toEqual([])
  })

  it('fails when the directory does not exist', async () => {
    const missing = join(root, 'missing')
    const err = await registryError(loadRegistryDirectory(missing))
    expect(err.code).toBe('REGISTRY_LOAD_FAILED')
    expect(err.message).toBe(`Registry directory not found: ${missing}`)
  })

  it('fails when the path is a file', async () => {
    await put('file.json', '{}')
    const file = join(root, 'file.json')
    const err = await registryError(loadRegistryDirectory(file))
    expect(err.code).toBe('REGISTRY_LOAD_FAILED')
    expect(err.message).toBe(`Registry path is not a directory: ${file}`)
  })

  it('reports every file that is not valid JSON', async () => {
    await put('a.json', '{ broken')
    await put('b.json', JSON.stringify(teamsFile))
    await put('c.json', '')

    const err = await registryError(loadRegistryDirectory(root))
    expect(err.code).toBe('REGISTRY_INVALID')
    expect(err.errors.map((e) => e.details.source)).toEqual(['a.json', 'c.json'])
    expect(err.errors[0]?.message).toMatch(/^a\.json: not valid JSON \(/)
  })
})

// ── directoryDatasets + DatasetRegistry ────────────────────────

describe('directoryDatasets', () => {
  it('builds a registry from descriptor files', async () => {
    await put('baseball/pitching_outings.json', JSON.stringify(pitchingOutingsFile))
    await put('baseball/teams.json', JSON.stringify(teamsFile))

    const registry = await DatasetRegistry.create(directoryDatasets(root))
    expect(registry.datasets.map((d) => d.datasetId)).toEqual(['pitching_outings', 'teams'])
  })

  it('an empty directory prevents startup', async () => {
    const err = await registryError(DatasetRegistry.create(directoryDatasets(root)))
    expect(err.errors.map((e) => e.code)).toEqual(['EMPTY_CATALOG'])
  })

  it('a dataset with zero columns prevents startup', async () => {
    await put('baseball/pitching_outings.json', JSON.stringify(pitchingOutingsFile))
    await put('baseball/empty.json', JSON.stringify({ dataset_id: 'empty', schema: 'baseball', table: 'empty', columns: [] }))

    const err = await registryError(DatasetRegistry.create(directoryDatasets(root)))
    expect(err.errors).toHaveLength(1)
    expect(err.errors[0]?.code).toBe('NO_COLUMNS')
    expect(err.errors[0]?.details.source).toBe('baseball/empty.json')
  })

  it('duplicate dataset ids in two files prevent startup', async () => {
    await put('a/pitching_outings.json', JSON.stringify(pitchingOutingsFile))
    await put('b/pitching_outings.json', JSON.stringify(pitchingOutingsFile))

    const err = await registryError(DatasetRegistry.create(directoryDatasets(root)))
    expect(err.errors[0]?.message).toBe(
      "Duplicate dataset_id 'pitching_outings' (a/pitching_outings.json and b/pitching_outings.json)",
    )
  })
})

// ── writeRegistryDirectory ─────────────────────────────────────

describe('writeRegistryDirectory', () => {
  it('writes <schema>/<table>.json with sorted keys', async () => {
    const written = await writeRegistryDirectory(root, [pitchingOutingsFile, teamsFile])
    expect(written).toEqual([
      join(root, 'baseball', 'pitching_outings.json'),
      join(root, 'baseball', 'teams.json'),
    ])

    const text = await readFile(join(root, 'baseball', 'teams.json'), 'utf-8')
    expect(text).toBe(
      [
        '{',
        '  "columns": [',
        '    {',
        '      "dtype": "text",',
        '      "name": "team_code"',
        '    },',
        '    {',
        '      "dtype": "text",',
        '      "name": "team_name"',
        '    }',
        '  ],',
        '  "dataset_id": "teams",',
        '  "description": "",',
        '  "name": "Teams",',
        '  "primary_key": [],',
        '  "sample_size": null,',
        '  "schema": "baseball",',
        '  "table": "teams"',
        '}',
        '',
      ].join('\n'),
    )
  })

  it('written files load back into the same catalog', async () => {
    await writeRegistryDirectory(root, [teamsFile, pitchingOutingsFile])
    const registry = await DatasetRegistry.create(directoryDatasets(root))
    expect(registry.getDataset('pitching_outings')?.primaryKey).toEqual(['player_id', 'game_date'])
    expect(registry.getDataset('teams')?.columns.map((c) => c.name)).toEqual(['team_code', 'team_name'])
  })

  it('refuses names that would escape the directory', async () => {
    const err = await registryError(writeRegistryDirectory(root, [{ ...teamsFile, table: '../teams' }]))
    expect(err.errors[0]?.code).toBe('INVALID_FIELD')
    expect(await loadRegistryDirectory(root)).toEqual([])
  })

  it('keeps existing files and reports each collision', async () => {
    await put('baseball/teams.json', '{"curated": true}\n')
    const err = await registryError(writeRegistryDirectory(root, [pitchingOutingsFile, teamsFile]))
    const teams = join(root, 'baseball', 'teams.json')
    expect(err.message).toBe('Refusing to overwrite 1 existing descriptor file')
    expect(err.errors).toEqual([
      {
        code: 'FILE_EXISTS',
        message: `teams: ${teams} already exists`,
        details: { datasetId: 'teams', actual: teams },
      },
    ])
    expect(await readFile(teams, 'utf-8')).toBe('{"curated": true}\n')
    expect(JSON.parse(await readFile(join(root, 'baseball', 'pitching_outings.json'), 'utf-8'))).toMatchObject({
      dataset_id: 'pitching_outings',
    })
  })

  it('replaces existing files with overwrite', async () => {
    await put('baseball/teams.json', '{"curated": true}\n')
    await writeRegistryDirectory(root, [teamsFile], { overwrite: true })
    expect(JSON.parse(await readFile(join(root, 'baseball', 'teams.json'), 'utf-8'))).toMatchObject({ dataset_id: 'teams' })
  })
})
