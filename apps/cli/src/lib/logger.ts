/**
 * Structured CLI logging.
 *
 * Emits one JSON line per event: ts, level, msg, plus any fields.
 * debug/info go to stdout, warn/error to stderr.
 */

import type { LogLevel } from '@pano2points/config'

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

/** Anything with a `write(string)`, e.g. `process.stdout`. */
export interface LogSink {
  write(chunk: string): unknown
}

export interface LoggerOptions {
  level?: LogLevel
  stdout?: LogSink
  stderr?: LogSink
  clock?: () => Date
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

type EventLevel = Exclude<LogLevel, 'silent'>

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    stdout = process.stdout,
    stderr = process.stderr,
    clock = () => new Date(),
  } = options
  const threshold = SEVERITY[level]

  const emit = (eventLevel: EventLevel, msg: string, fields?: LogFields): void => {
    if (SEVERITY[eventLevel] < threshold) return
    const entry = { ts: clock().toISOString(), level: eventLevel, msg, ...fields }
    const sink = eventLevel === 'warn' || eventLevel === 'error' ? stderr : stdout
    sink.write(JSON.stringify(entry) + '\n')
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: 'silent' })
