import { describe, expect, it } from 'vitest'
import { friendlyName, parseDescriptors } from '../src/descriptorValidation.js'
import { RegistryError } from '../src/errors.js'
import { parseOne, pitchingOutingsFile } from './fixtures/descriptors.js'

function registryError(fn: () => unknown): RegistryError {
  try {
    fn()
  } catch (err) {
    if (err instanceof RegistryError) return err
    throw err
  }
  throw new Error('Expected RegistryError')
}

// ── Valid descriptors ──────────────────────────────────────────

describe('parseDescriptors — valid', () => {
  it('maps a registry file to a descriptor', () => {
    const d = parseOne(pitchingOutingsFile())
    expect(d.datasetId).toBe('pitching_outings')
    expect(d.schema).toBe('baseball')
    expect(d.table).toBe('pitching_outings')
    expect(d.name).toBe('Pitching Outings')
    expect(d.primaryKey).toEqual(['player_id', 'game_date'])
    expect(d.columns.map((c) => c.name)).toEqual([
      'player_id',
      'player_name',
      'game_date',
      'season',
      'earned_runs',
      'outs_recorded',
    ])
    expect(d.columnNames.has('season')).toBe(true)
    expect(d.sampleSize).toBe(4)
  })

  it('fills defaults for optional fields', () => {
    const d = parseOne({
      dataset_id: 'season_totals',
      schema: 'baseball',
      table: 'season_totals',
      columns: [{ name: 'season' }],
    })
    expect(d.name).toBe('Season Totals')
    expect(d.description).toBe('')
    expect(d.primaryKey).toEqual([])
    expect(d.sampleSize).toBeNull()
    expect(d.columns).toEqual([{ name: 'season', dtype: 'unknown' }])
  })

  it('ignores unknown column fields and drops wrongly typed optional ones', () => {
    const d = parseOne({
      dataset_id: 'd',
      schema: 's',
      table: 't',
      columns: [{ name: 'x', dtype: 5, units: 3, nullable: 'yes', description: 'kept', extra: true }],
    })
    expect(d.columns).toEqual([{ name: 'x', dtype: 'unknown', description: 'kept' }])
  })

  it('freezes descriptors', () => {
    const d = parseOne(pitchingOutingsFile())
    expect(Object.isFrozen(d)).toBe(true)
    expect(Object.isFrozen(d.columns)).toBe(true)
    expect(Object.isFrozen(d.primaryKey)).toBe(true)
  })

  it('keeps source order', () => {
    const first = { ...pitchingOutingsFile(), dataset_id: 'b_first' }
    const second = { ...pitchingOutingsFile(), dataset_id: 'a_second' }
    const result = parseDescriptors([
      { source: '1.json', raw: first },
      { source: '2.json', raw: second },
    ])
    expect(result.map((d) => d.datasetId)).toEqual(['b_first', 'a_second'])
  })
})

// ── Invalid descriptors ────────────────────────────────────────

describe('parseDescriptors — invalid', () => {
  it('rejects an empty catalog', () => {
    const err = registryError(() => parseDescriptors([]))
    expect(err.code).toBe('REGISTRY_INVALID')
    expect(err.errors.map((e) => e.code)).toEqual(['EMPTY_CATALOG'])
  })

  it('rejects a descriptor that is not an object', () => {
    const err = registryError(() => parseDescriptors([{ source: 'a.json', raw: [1, 2] }]))
    expect(err.errors[0]?.code).toBe('INVALID_FILE')
    expect(err.errors[0]?.message).toBe('a.json: descriptor must be a JSON object')
  })

  it('reports a missing dataset_id against the file', () => {
    const { dataset_id: _omitted, ...rest } = pitchingOutingsFile()
    const err = registryError(() => parseDescriptors([{ source: 'baseball/x.json', raw: rest }]))
    expect(err.errors).toHaveLength(1)
    expect(err.errors[0]?.code).toBe('MISSING_FIELD')
    expect(err.errors[0]?.message).toBe("baseball/x.json: missing required field 'dataset_id'")
  })

  it('reports missing schema and table together', () => {
    const err = registryError(() =>
      parseDescriptors([{ source: 'x.json', raw: { dataset_id: 'x', columns: [{ name: 'a' }] } }]),
    )
    expect(err.errors.map((e) => e.details.field)).toEqual(['schema', 'table'])
  })

  it('rejects a dataset with zero columns', () => {
    const err = registryError(() => parseOne({ dataset_id: 'x', schema: 's', table: 't', columns: [] }))
    expect(err.errors).toHaveLength(1)
    expect(err.errors[0]?.code).toBe('NO_COLUMNS')
    expect(err.errors[0]?.message).toBe('x: dataset must declare at least one column')
  })

  it('rejects duplicate column names', () => {
    const err = registryError(() =>
      parseOne({ dataset_id: 'x', schema: 's', table: 't', columns: [{ name: 'a' }, { name: 'a' }] }),
    )
    expect(err.errors[0]?.code).toBe('DUPLICATE_COLUMN')
    expect(err.errors[0]?.message).toBe("x: duplicate column 'a'")
  })

  it('rejects a primary key naming an undeclared column', () => {
    const err = registryError(() =>
      parseOne({ ...pitchingOutingsFile(), primary_key: ['player_id', 'inning'] }),
    )
    expect(err.errors).toHaveLength(1)
    expect(err.errors[0]?.code).toBe('INVALID_PRIMARY_KEY')
    expect(err.errors[0]?.message).toBe("pitching_outings: primary key column 'inning' is not a declared column")
  })

  it('rejects a primary key that is not a list of names', () => {
    const err = registryError(() => parseOne({ ...pitchingOutingsFile(), primary_key: 'player_id' }))
    expect(err.errors[0]?.code).toBe('INVALID_FIELD')
    expect(err.errors[0]?.details.field).toBe('primary_key')
  })

  it('rejects duplicate dataset ids across files', () => {
    const err = registryError(() =>
      parseDescriptors([
        { source: 'a.json', raw: pitchingOutingsFile() },
        { source: 'b.json', raw: pitchingOutingsFile() },
      ]),
    )
    expect(err.errors).toHaveLength(1)
    expect(err.errors[0]?.code).toBe('DUPLICATE_DATASET_ID')
    expect(err.errors[0]?.message).toBe("Duplicate dataset_id 'pitching_outings' (a.json and b.json)")
  })

  it('collects problems from every file before failing', () => {
    const err = registryError(() =>
      parseDescriptors([
        { source: 'good.json', raw: pitchingOutingsFile() },
        { source: 'empty.json', raw: { dataset_id: 'empty', schema: 's', table: 't', columns: [] } },
        { source: 'broken.json', raw: 'not an object' },
      ]),
    )
    expect(err.errors.map((e) => e.code)).toEqual(['NO_COLUMNS', 'INVALID_FILE'])
    expect(err.message).toBe('Registry invalid: 2 errors')
  })
})

describe('friendlyName', () => {
  it('title-cases underscore-separated words', () => {
    expect(friendlyName('pitching_outings')).toBe('Pitching Outings')
    expect(friendlyName('season__TOTALS_')).toBe('Season Totals')
  })
})
