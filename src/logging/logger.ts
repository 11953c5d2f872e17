/**
 * Structured logging for the access layer.
 *
 * Uses pino with JSON output on stderr, or pino-pretty when asked for.
 * Components take a logger explicitly; when none is given they fall back to
 * a lazily created process-wide default.
 */

import pino, { type Logger } from 'pino'
import { Value } from '@sinclair/typebox/value'
import { LogLevel } from '../types/common.js'

export interface LoggerOptions {
  name?: string
  /** Falls back to ROWKEEPER_LOG_LEVEL, then 'warn'. */
  level?: LogLevel
  pretty?: boolean
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.ROWKEEPER_LOG_LEVEL?.toLowerCase()
  return Value.Check(LogLevel, raw) ? raw : undefined
}

/**
 * Create a configured pino logger writing to stderr.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? levelFromEnv() ?? 'warn'

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'rowkeeper',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  }

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  }

  return pino(pinoOptions, pino.destination(2))
}

let defaultLogger: Logger | null = null

export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger()
  }
  return defaultLogger
}

/** Replace the process-wide default, e.g. with a silent logger in tests. */
export function setDefaultLogger(logger: Logger | null): void {
  defaultLogger = logger
}
