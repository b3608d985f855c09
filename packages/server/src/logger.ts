import * as winston from 'winston'

export interface LoggerOptions {
  readonly level?: string | undefined
  /** `json` for log collectors, `pretty` for a terminal. Defaults by NODE_ENV. */
  readonly format?: 'json' | 'pretty' | undefined
  readonly silent?: boolean | undefined
}

export type Logger = winston.Logger

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
)

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr}`
  }),
)

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty')
  return winston.createLogger({
    level: options.level ?? 'info',
    format: format === 'json' ? jsonFormat : prettyFormat,
    defaultMeta: { service: 'dataset-gateway' },
    transports: [new winston.transports.Console()],
    silent: options.silent === true,
    exitOnError: false,
  })
}
