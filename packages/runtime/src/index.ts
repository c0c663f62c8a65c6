// @hs-jwt/runtime — Public API surface
// Configured instances, logging, and framework adapters

// ============================================================
// Types
// ============================================================

export type {
  JwtConfig,
  ResolvedJwtConfig,
  JwtInstance,
  MiddlewareOptions,
  ErrorResponseBody,
} from './types.js'

export type { EnvConfig } from './config.js'

export type { LoggerOptions } from './logger.js'

// ============================================================
// Constants
// ============================================================

export {
  DEFAULT_MIN_SECRET_BYTES,
  DEFAULT_AUTH_HEADER_NAME,
  CLAIMS_LOCALS_KEY,
} from './types.js'

// ============================================================
// Core Orchestration
// ============================================================

export { createJwt, createJwtFromEnv } from './jwt.js'

export { loadConfigFromEnv } from './config.js'

export { createLogger } from './logger.js'

// ============================================================
// Error Responses
// ============================================================

export { createErrorResponse } from './error-response.js'
export type { ErrorResponse } from './error-response.js'

// ============================================================
// Token Extraction
// ============================================================

export {
  extractBearerToken,
  extractTokenFromRequest,
  normalizePath,
  normalizePathSet,
} from './extract-token.js'
export type { HeaderGetter } from './extract-token.js'
