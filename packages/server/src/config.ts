import type { ConfigErrorEntry } from '@dataset-gateway/validation'
import { ConfigError } from '@dataset-gateway/validation'
import { z } from 'zod'

// ── Types ──────────────────────────────────────────────────────

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export interface GatewayConfig {
  readonly port: number
  readonly host: string
  readonly registryDir: string
  readonly databaseUrl: string
  readonly poolMax: number
  /** `undefined` leaves statements without a server-side timeout. */
  readonly statementTimeoutMs: number | undefined
  readonly consistentReads: boolean
  readonly logLevel: LogLevel
}

export type Env = Readonly<Record<string, string | undefined>>

// ── Schema ─────────────────────────────────────────────────────

/** Values are trimmed; blank ones count as unset. */
function blankAsUnset(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  return trimmed === '' ? undefined : trimmed
}

function integer(min: number, max: number, fallback: number) {
  const range = `must be an integer between ${min} and ${max}`
  return z.preprocess(
    blankAsUnset,
    z
      .string()
      .regex(/^\d+$/, range)
      .transform(Number)
      .pipe(z.number().int(range).min(min, range).max(max, range))
      .default(String(fallback)),
  )
}

function flag(fallback: boolean) {
  return z.preprocess(
    blankAsUnset,
    z
      .string()
      .toLowerCase()
      .pipe(z.enum(['true', '1', 'yes', 'false', '0', 'no'], { errorMap: () => ({ message: 'must be true or false' }) }))
      .transform((v) => v === 'true' || v === '1' || v === 'yes')
      .default(String(fallback)),
  )
}

function text(fallback: string) {
  return z.preprocess(blankAsUnset, z.string().default(fallback))
}

const envSchema = z.object({
  PORT: integer(0, 65535, 8080),
  HOST: text('0.0.0.0'),
  DATASET_REGISTRY_DIR: text('./registry'),
  DATABASE_URL: z.preprocess(
    blankAsUnset,
    z.string({ required_error: 'is required' }).regex(/^postgres(ql)?:\/\//, 'must be a postgres:// or postgresql:// URL'),
  ),
  PG_POOL_MAX: integer(1, 1000, 10),
  /** 0 disables the server-side timeout. */
  PG_STATEMENT_TIMEOUT_MS: integer(0, 86_400_000, 30_000),
  DATASET_CONSISTENT_READS: flag(true),
  LOG_LEVEL: z.preprocess(
    blankAsUnset,
    z
      .string()
      .toLowerCase()
      .pipe(z.enum(LOG_LEVELS, { errorMap: () => ({ message: `must be one of: ${LOG_LEVELS.join(', ')}` }) }))
      .default('info'),
  ),
})

// Never echoed back: the URL carries credentials.
const SECRET_VARIABLES = new Set(['DATABASE_URL'])

// ── loadConfig ─────────────────────────────────────────────────

/**
 * Read and check settings from environment variables. Every problem is
 * collected before throwing a single `ConfigError`.
 */
export function loadConfig(env: Env): GatewayConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => configEntry(env, issue)))
  }

  const vars = parsed.data
  return {
    port: vars.PORT,
    host: vars.HOST,
    registryDir: vars.DATASET_REGISTRY_DIR,
    databaseUrl: vars.DATABASE_URL,
    poolMax: vars.PG_POOL_MAX,
    statementTimeoutMs: vars.PG_STATEMENT_TIMEOUT_MS === 0 ? undefined : vars.PG_STATEMENT_TIMEOUT_MS,
    consistentReads: vars.DATASET_CONSISTENT_READS,
    logLevel: vars.LOG_LEVEL,
  }
}

function configEntry(env: Env, issue: z.ZodIssue): ConfigErrorEntry {
  const variable = String(issue.path[0] ?? '')
  const entry: ConfigErrorEntry = { variable, message: `${variable} ${issue.message}` }
  const actual = env[variable]?.trim()
  if (actual !== undefined && actual !== '' && !SECRET_VARIABLES.has(variable)) entry.actual = actual
  return entry
}
