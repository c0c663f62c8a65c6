// @hs-jwt/runtime — Logger factory (pino)

import { pino } from 'pino'

/** Fields never written to logs, wherever they appear at the top level */
const REDACT_PATHS = ['secret', 'token', 'authorization', 'headers.authorization']

export interface LoggerOptions {
  /** Minimum level to output (default: 'info') */
  readonly level?: pino.LevelWithSilent | undefined

  /** Logger name attached to every line (default: 'hs-jwt') */
  readonly name?: string | undefined

  /**
   * Custom destination. Lines are written synchronously as JSON;
   * tests pass an in-memory stream to capture them.
   */
  readonly destination?: pino.DestinationStream | undefined
}

/**
 * Creates a pino logger with ISO timestamps, string level labels and
 * redaction of secret-bearing fields.
 *
 * Logs go to stdout unless a destination is provided.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    name: options.name ?? 'hs-jwt',
    level: options.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  }

  if (options.destination !== undefined) {
    return pino(pinoOptions, options.destination)
  }
  return pino(pinoOptions)
}
