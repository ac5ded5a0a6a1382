/**
 * CLI Logger
 *
 * Diagnostics for the CLI. Everything goes to stderr so the cached command's
 * stdout stays byte-for-byte intact.
 */

export type LogLevel = 'debug' | 'info' | 'warn'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn']

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
}

/** Anything with a string `write`, e.g. process.stderr */
export interface LogStream {
  write(chunk: string): unknown
}

const PREFIX = '[runcached]'

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export function createLogger(level: LogLevel, stream: LogStream = process.stderr): Logger {
  const rank = LOG_LEVELS.indexOf(level)
  const enabled = (at: LogLevel): boolean => LOG_LEVELS.indexOf(at) >= rank
  const write = (msg: string): void => {
    stream.write(`${PREFIX} ${msg}\n`)
  }

  return {
    log: (msg: string) => {
      if (enabled('info')) write(msg)
    },
    verbose: (msg: string) => {
      if (enabled('debug')) write(`[debug] ${msg}`)
    },
    warn: (msg: string) => {
      if (enabled('warn')) write(`warning: ${msg}`)
    },
    error: (msg: string) => {
      write(`error: ${msg}`)
    }
  }
}
