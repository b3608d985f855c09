import type { DatasetDescriptorFile } from '@dataset-gateway/core'
import type { MemoryTable } from './memoryExecutor.js'

// ── pitching_outings: four outings, keyed by (player_id, game_date) ──

export const pitchingOutingsFile: DatasetDescriptorFile = {
  dataset_id: 'pitching_outings',
  name: 'Pitching Outings',
  description: 'One row per pitcher per game',
  schema: 'baseball',
  table: 'pitching_outings',
  primary_key: ['player_id', 'game_date'],
  columns: [
    { name: 'player_id', dtype: 'int4', description: 'Player identifier', nullable: false },
    { name: 'player_name', dtype: 'text', description: 'Player display name', nullable: false },
    { name: 'game_date', dtype: 'date', description: 'Date the outing started', nullable: false },
    { name: 'season', dtype: 'int4', nullable: false },
    { name: 'earned_runs', dtype: 'int4', units: 'runs', nullable: true },
    { name: 'outs_recorded', dtype: 'int4', units: 'outs', nullable: true },
  ],
  sample_size: 4,
}

export const pitchingOutingsRows: readonly Record<string, unknown>[] = [
  // Stored out of key order on purpose; ORDER BY must fix it.
  { player_id: 2, player_name: 'Casey Reed', game_date: '2022-04-07', season: 2022, earned_runs: 3, outs_recorded: 9 },
  { player_id: 1, player_name: 'Alex Moreno', game_date: '2021-04-04', season: 2021, earned_runs: 0, outs_recorded: 10 },
  { player_id: 2, player_name: 'Casey Reed', game_date: '2021-04-01', season: 2021, earned_runs: 2, outs_recorded: 15 },
  { player_id: 1, player_name: 'Alex Moreno', game_date: '2022-04-07', season: 2022, earned_runs: 1, outs_recorded: 12 },
]

// ── teams: no primary key ──

export const teamsFile: DatasetDescriptorFile = {
  dataset_id: 'teams',
  name: 'Teams',
  description: '',
  schema: 'baseball',
  table: 'teams',
  primary_key: [],
  columns: [
    { name: 'team_code', dtype: 'text' },
    { name: 'team_name', dtype: 'text' },
  ],
  sample_size: null,
}

export const teamsRows: readonly Record<string, unknown>[] = [
  { team_code: 'RVR', team_name: 'River Hawks' },
  { team_code: 'HLL', team_name: 'Hill Foxes' },
]

// ── Memory tables ──

export function fixtureTables(): MemoryTable[] {
  return [
    {
      schema: pitchingOutingsFile.schema,
      table: pitchingOutingsFile.table,
      columns: pitchingOutingsFile.columns.map((c) => c.name),
      rows: pitchingOutingsRows,
    },
    {
      schema: teamsFile.schema,
      table: teamsFile.table,
      columns: teamsFile.columns.map((c) => c.name),
      rows: teamsRows,
    },
  ]
}
