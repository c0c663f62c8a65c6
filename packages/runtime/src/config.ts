// @hs-jwt/runtime — Environment configuration (zod-validated)

import { ALGORITHMS, DEFAULT_ALGORITHM } from '@hs-jwt/core'
import type { Algorithm } from '@hs-jwt/core'
import type { pino } from 'pino'
import { z } from 'zod'
import { DEFAULT_MIN_SECRET_BYTES } from './types.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

/**
 * Environment variables read by `loadConfigFromEnv`.
 *
 * - `JWT_SECRET` (required)
 * - `JWT_ALGORITHM` (default: HS256)
 * - `JWT_MIN_SECRET_BYTES` (default: 32)
 * - `LOG_LEVEL` (default: info)
 */
const envSchema = z.object({
  JWT_SECRET: z.string().min(1, 'JWT_SECRET must not be empty'),
  JWT_ALGORITHM: z.enum(ALGORITHMS).default(DEFAULT_ALGORITHM),
  JWT_MIN_SECRET_BYTES: z.coerce.number().int().min(1).default(DEFAULT_MIN_SECRET_BYTES),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

/** Configuration resolved from the environment */
export interface EnvConfig {
  readonly secret: string
  readonly algorithm: Algorithm
  readonly minSecretBytes: number
  readonly logLevel: pino.LevelWithSilent
}

/**
 * Reads and validates JWT settings from environment variables.
 *
 * @param env - Variables to read (default: process.env)
 * @throws {Error} Listing every variable that is missing or invalid
 */
export function loadConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): EnvConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')} (${issue.message})`)
      .join(', ')
    throw new Error(`Invalid environment configuration: ${details}`)
  }

  return {
    secret: result.data.JWT_SECRET,
    algorithm: result.data.JWT_ALGORITHM,
    minSecretBytes: result.data.JWT_MIN_SECRET_BYTES,
    logLevel: result.data.LOG_LEVEL,
  }
}
