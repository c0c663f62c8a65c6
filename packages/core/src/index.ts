// @hs-jwt/core — Public API surface
// Compact HMAC-signed tokens carrying application-defined claims

// ============================================================
// Types
// ============================================================

export type { CryptoProvider } from './crypto-provider.js'

export type { Algorithm, AlgorithmSpec, HashName } from './algorithm.js'

export type {
  TokenString,
  Secret,
  Header,
  JwtError,
  JwtErrorKind,
  PartResult,
  HeaderResult,
  EncodeResult,
  DecodeResult,
  JsonPrimitive,
  JsonValue,
} from './types.js'

export type { Part, ClaimsSchema } from './part.js'

export type { TokenSegments } from './token.js'

// ============================================================
// CryptoProvider
// ============================================================

export { NodeCryptoProvider, defaultCryptoProvider } from './node-crypto-provider.js'

// ============================================================
// Algorithm Registry
// ============================================================

export {
  ALGORITHMS,
  ALGORITHM_REGISTRY,
  DEFAULT_ALGORITHM,
  isAlgorithm,
  hashFor,
  digestSizeFor,
  encodedHeaderFor,
} from './algorithm.js'

// ============================================================
// Codecs
// ============================================================

export { createHeader, headerToBase64, headerFromBase64, headerPart } from './header.js'

export { jsonPart, jsonValue, encodeJsonPart, decodeJsonPart } from './part.js'

// ============================================================
// Token Operations
// ============================================================

export { encode, decode, splitToken } from './token.js'

export { sign, verify, constantTimeEqual } from './signature.js'

// ============================================================
// Errors
// ============================================================

export { jwtError, describeJwtError } from './errors.js'

export { JWT_ERROR_KINDS, TOKEN_SEGMENT_COUNT, SEGMENT_SEPARATOR } from './types.js'

// ============================================================
// Encoding Utilities
// ============================================================

export { toBase64Url, fromBase64Url, encodeUtf8, decodeUtf8, secretToBytes } from './encoding.js'
