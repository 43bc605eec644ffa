import pino from 'pino'
import type { Logger } from 'pino'
import { LOG_REDACT_PATHS } from './redact'

/**
 * Observability - structured logging via Pino
 *
 * Logs go to stderr so stdout stays reserved for the module result.
 * Sensitive parameters are removed through pino's redact paths.
 */

export type { Logger } from 'pino'

export interface LoggerOptions {
  level?: string
  pretty?: boolean
  /** File descriptor to write to (defaults to stderr) */
  fd?: number
}

export function createLogger(options?: LoggerOptions): Logger {
  const fd = options?.fd ?? 2
  const base = {
    name: 'keyvault-secret',
    level: options?.level || 'info',
    redact: { paths: LOG_REDACT_PATHS, censor: '[Redacted]' },
  }

  if (options?.pretty) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          destination: fd,
        },
      },
    })
  }

  return pino(base, pino.destination(fd))
}

/**
 * Logger that drops everything (tests, library callers that don't care)
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

export * from './redact'
