/** @file logger.ts */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_WEIGHT: Record<Exclude<LogLevel, 'silent'>, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export interface Logger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

function normalizeLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== 'string') return undefined
  const v = value.trim().toLowerCase()
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error' || v === 'silent') return v
  return undefined
}

/**
 *  Resolve the log level, `LOG_LEVEL` wins over the verbose flag.
 */
export function resolveLogLevel(props: { verbose?: boolean; env?: NodeJS.ProcessEnv } = {}): LogLevel {
  const envLevel = normalizeLevel((props.env ?? process.env).LOG_LEVEL)
  if (envLevel) return envLevel
  return props.verbose ? 'debug' : 'info'
}

/**
 *  Console logger which prefixes every line with a `[tag]`.
 */
export function createLogger(tag: string, level: LogLevel = resolveLogLevel()): Logger {
  const prefix = `[${tag}]`
  const enabled = (target: Exclude<LogLevel, 'silent'>) =>
    level !== 'silent' && LEVEL_WEIGHT[target] >= LEVEL_WEIGHT[level]

  return {
    debug: (...args) => {
      if (enabled('debug')) console.log(prefix, ...args)
    },
    info: (...args) => {
      if (enabled('info')) console.log(prefix, ...args)
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args)
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args)
    },
  }
}
