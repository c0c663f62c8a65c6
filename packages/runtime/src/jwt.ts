// @hs-jwt/runtime — JWT instance (orchestration layer over @hs-jwt/core)

import {
  DEFAULT_ALGORITHM,
  decode as coreDecode,
  defaultCryptoProvider,
  encode as coreEncode,
  isAlgorithm,
  secretToBytes,
} from '@hs-jwt/core'
import type { CryptoProvider, DecodeResult, EncodeResult, Part, Secret } from '@hs-jwt/core'
import { loadConfigFromEnv } from './config.js'
import { createLogger } from './logger.js'
import type { JwtConfig, JwtInstance, ResolvedJwtConfig } from './types.js'
import { DEFAULT_MIN_SECRET_BYTES } from './types.js'

// ============================================================
// Secret Normalization
// ============================================================

/**
 * Converts the configured secret to a private byte copy.
 *
 * Effective security is bounded by the secret's entropy, so short secrets are
 * refused outright.
 *
 * @throws {Error} If the secret is shorter than `minBytes`
 */
function normalizeSecret(secret: Secret, minBytes: number): Uint8Array {
  const bytes = secretToBytes(secret)
  if (bytes.byteLength < minBytes) {
    throw new Error(
      `Secret must be at least ${String(minBytes)} bytes` +
      (typeof secret === 'string' ? ' when UTF-8 encoded' : '') +
      `, got ${String(bytes.byteLength)} bytes. Use a cryptographically strong secret.`,
    )
  }
  // Copy so later mutation of the caller's buffer cannot change the key
  return bytes.slice()
}

// ============================================================
// Configuration Resolution
// ============================================================

/**
 * Resolves user config with defaults applied.
 *
 * @throws {Error} If the algorithm or minimum secret length is invalid
 */
function resolveConfig(config: JwtConfig): ResolvedJwtConfig {
  const algorithm = config.algorithm ?? DEFAULT_ALGORITHM
  if (!isAlgorithm(algorithm)) {
    throw new Error(`Unsupported algorithm: ${String(algorithm)}`)
  }

  const minSecretBytes = config.minSecretBytes ?? DEFAULT_MIN_SECRET_BYTES
  if (!Number.isInteger(minSecretBytes) || minSecretBytes < 1) {
    throw new Error(`minSecretBytes must be a positive integer, got ${String(minSecretBytes)}`)
  }

  return { algorithm, minSecretBytes }
}

// ============================================================
// JWT Instance Factory
// ============================================================

/**
 * Creates a JWT instance bound to one secret and algorithm.
 *
 * Failures are returned as results, exactly as the core returns them, and
 * logged at debug level with their kind only. Tokens and secrets never
 * reach the log.
 *
 * @param config - JWT configuration
 * @returns Initialized JwtInstance
 * @throws {Error} On invalid configuration (short secret, unknown algorithm)
 *
 * @example
 * ```typescript
 * const jwt = createJwt({ secret: process.env.JWT_SECRET })
 * const claims = jsonPart(z.object({ sub: z.string() }))
 *
 * const issued = jwt.encode({ sub: 'user-1' }, claims)
 * const result = jwt.decode(token, claims)
 * ```
 */
export function createJwt(config: JwtConfig): JwtInstance {
  const resolved = resolveConfig(config)
  const secret = normalizeSecret(config.secret, resolved.minSecretBytes)
  const cryptoProvider: CryptoProvider = config.cryptoProvider ?? defaultCryptoProvider
  const logger = (config.logger ?? createLogger()).child({ component: 'jwt' })

  logger.debug({ algorithm: resolved.algorithm }, 'JWT instance created')

  const instance: JwtInstance = {
    config: resolved,

    encode<T>(claims: T, part?: Part<T>): EncodeResult {
      const result = coreEncode(claims, secret, resolved.algorithm, part, cryptoProvider)
      if (!result.success) {
        logger.warn({ kind: result.error.kind, reason: result.error.message }, 'Token encoding failed')
      }
      return result
    },

    decode<T>(token: string, part: Part<T>): DecodeResult<T> {
      const result = coreDecode(token, secret, resolved.algorithm, part, cryptoProvider)
      if (!result.valid) {
        logger.debug({ kind: result.error.kind }, 'Token rejected')
      }
      return result
    },
  }

  return instance
}

/**
 * Creates a JWT instance from environment variables (see `loadConfigFromEnv`),
 * with a logger at the configured `LOG_LEVEL`.
 *
 * @throws {Error} On missing or invalid variables
 */
export function createJwtFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): JwtInstance {
  const envConfig = loadConfigFromEnv(env)
  return createJwt({
    secret: envConfig.secret,
    algorithm: envConfig.algorithm,
    minSecretBytes: envConfig.minSecretBytes,
    logger: createLogger({ level: envConfig.logLevel }),
  })
}
