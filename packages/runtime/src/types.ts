// @hs-jwt/runtime — Types and configuration interfaces

import type {
  Algorithm,
  CryptoProvider,
  DecodeResult,
  EncodeResult,
  Part,
  Secret,
} from '@hs-jwt/core'
import type { pino } from 'pino'

// ============================================================
// Configuration
// ============================================================

/**
 * Configuration of a JWT instance.
 *
 * One instance is bound to one secret and one algorithm; every token it
 * issues or accepts uses both.
 *
 * @example
 * ```typescript
 * const jwt = createJwt({
 *   secret: process.env.JWT_SECRET,
 *   algorithm: 'HS512',
 * })
 * ```
 */
export interface JwtConfig {
  /** Shared secret (minimum `minSecretBytes` bytes when UTF-8 encoded) */
  readonly secret: Secret

  /** Signing and verification algorithm (default: 'HS256') */
  readonly algorithm?: Algorithm | undefined

  /** Minimum accepted secret length in bytes (default: 32) */
  readonly minSecretBytes?: number | undefined

  /** Logger for rejected tokens and encoding failures (default: pino at 'info') */
  readonly logger?: pino.Logger | undefined

  /** Custom CryptoProvider implementation (default: NodeCryptoProvider) */
  readonly cryptoProvider?: CryptoProvider | undefined
}

/**
 * Fully resolved configuration with all defaults applied.
 * Exposed as `jwt.config`; the secret is deliberately absent.
 */
export interface ResolvedJwtConfig {
  readonly algorithm: Algorithm
  readonly minSecretBytes: number
}

// ============================================================
// JWT Instance
// ============================================================

/**
 * A configured encoder/decoder.
 *
 * Created by `createJwt(config)`. Stateless after construction: safe to share
 * across concurrent requests.
 */
export interface JwtInstance {
  /** Sign claims into a compact token (JSON codec when `part` is omitted) */
  encode<T>(claims: T, part?: Part<T>): EncodeResult

  /** Verify a token and decode its claims with `part` */
  decode<T>(token: string, part: Part<T>): DecodeResult<T>

  /** Resolved configuration (readonly) */
  readonly config: ResolvedJwtConfig
}

// ============================================================
// Middleware
// ============================================================

/** Options shared by the framework adapters */
export interface MiddlewareOptions {
  /** Paths that skip authentication (exact match after normalization) */
  readonly excludePaths?: readonly string[] | undefined

  /** Header carrying the bearer token (default: 'authorization') */
  readonly headerName?: string | undefined
}

/** Uniform error response body — NEVER says which check failed */
export interface ErrorResponseBody {
  readonly error: string
}

// ============================================================
// Default Constants
// ============================================================

/** Default minimum secret length in bytes */
export const DEFAULT_MIN_SECRET_BYTES = 32

/** Default header carrying the bearer token */
export const DEFAULT_AUTH_HEADER_NAME = 'authorization'

/** Key under which the Express adapter stores claims in `res.locals` */
export const CLAIMS_LOCALS_KEY = 'claims'
