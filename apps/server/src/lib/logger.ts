/**
 * JSON-line logger. info goes to stdout, warn and error to stderr.
 */

import type { SessionLogger } from '@lunchbox/gas-exchange'

type Level = 'info' | 'warn' | 'error'
type Fields = Record<string, unknown>

export interface LineSink {
  write(line: string): unknown
}

export interface LoggerSinks {
  out: LineSink
  err: LineSink
}

const processSinks: LoggerSinks = { out: process.stdout, err: process.stderr }

export function createLogger(base: Fields = {}, sinks: LoggerSinks = processSinks): SessionLogger {
  const emit = (level: Level, event: string, fields?: Fields) => {
    const entry = { ts: new Date().toISOString(), level, event, ...base, ...fields }
    const sink = level === 'info' ? sinks.out : sinks.err
    sink.write(JSON.stringify(entry) + '\n')
  }
  return {
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
  }
}
