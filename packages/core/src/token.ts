// @hs-jwt/core — Token assembly (encode) and strict parsing (decode)

import type { Algorithm } from './algorithm.js'
import type { CryptoProvider } from './crypto-provider.js'
import { defaultCryptoProvider } from './node-crypto-provider.js'
import { jwtError } from './errors.js'
import { createHeader, headerFromBase64, headerToBase64 } from './header.js'
import type { Part } from './part.js'
import { encodeJsonPart } from './part.js'
import { sign, verify } from './signature.js'
import type { DecodeResult, EncodeResult, Secret, TokenString } from './types.js'
import { SEGMENT_SEPARATOR, TOKEN_SEGMENT_COUNT } from './types.js'

/** Segments of a structurally valid token */
export interface TokenSegments {
  readonly header: string
  readonly claims: string
  readonly signature: string
}

/**
 * Encodes claims into a signed compact token.
 *
 * Steps:
 * 1. Header literal for `algorithm`
 * 2. Claims via `part` (JSON when omitted)
 * 3. Signing input: header | "." | claims
 * 4. Sign: HMAC(secret, signing input)
 * 5. Token: signing input | "." | signature
 *
 * The only failure is `json_encode_error` from the claims codec.
 *
 * @param claims - Application-defined claims record
 * @param secret - Shared secret (string is UTF-8 encoded)
 * @param algorithm - Signing algorithm, also written into the header
 * @param part - Claims codec (default: plain JSON)
 * @param cryptoProvider - HMAC implementation (default: node:crypto)
 */
export function encode<T>(
  claims: T,
  secret: Secret,
  algorithm: Algorithm,
  part?: Part<T>,
  cryptoProvider: CryptoProvider = defaultCryptoProvider,
): EncodeResult {
  const encodedHeader = headerToBase64(createHeader(algorithm))

  const encodedClaims = part !== undefined ? part.toBase64(claims) : encodeJsonPart(claims)
  if (!encodedClaims.success) {
    return { success: false, error: encodedClaims.error }
  }

  const signingInput = joinSegments(encodedHeader, encodedClaims.value)
  const signature = sign(signingInput, secret, algorithm, cryptoProvider)

  return { success: true, token: joinSegments(signingInput, signature) as TokenString }
}

/**
 * Decodes and verifies a compact token.
 *
 * Steps:
 * 1. Split into exactly three non-empty segments (else `invalid_token`)
 * 2. HMAC verify over header | "." | claims (constant-time), always runs
 * 3. Header lookup against the literal table
 * 4. Header names another known algorithm → `wrong_algorithm_header`
 *    Signature mismatch → `invalid_signature`
 *    Header not a known literal → `invalid_token`
 * 5. Claims decoded with `part`; codec errors propagate
 *
 * The algorithm is chosen by the caller, never by the token; the header only
 * has to agree with it.
 *
 * @param token - Compact token string
 * @param secret - Shared secret, identical to the one used to encode
 * @param algorithm - Algorithm the caller expects
 * @param part - Claims codec producing the caller's claims type
 * @param cryptoProvider - HMAC implementation (default: node:crypto)
 */
export function decode<T>(
  token: string,
  secret: Secret,
  algorithm: Algorithm,
  part: Part<T>,
  cryptoProvider: CryptoProvider = defaultCryptoProvider,
): DecodeResult<T> {
  // Step 1: Structure
  const segments = splitToken(token)
  if (segments === null) {
    return {
      valid: false,
      error: jwtError('invalid_token', `Token must have ${String(TOKEN_SEGMENT_COUNT)} non-empty segments`),
    }
  }

  // Step 2: Signature (before anything inside a segment is trusted)
  const signingInput = joinSegments(segments.header, segments.claims)
  const signatureOk = verify(segments.signature, signingInput, secret, algorithm, cryptoProvider)

  // Step 3: Header (exact literal lookup, no parsing)
  const header = headerFromBase64(segments.header)

  // Step 4: Outcome precedence
  if (header.success && header.header.alg !== algorithm) {
    return {
      valid: false,
      error: jwtError(
        'wrong_algorithm_header',
        `Token header names ${header.header.alg}, expected ${algorithm}`,
      ),
    }
  }
  if (!signatureOk) {
    return { valid: false, error: jwtError('invalid_signature') }
  }
  if (!header.success) {
    return { valid: false, error: header.error }
  }

  // Step 5: Claims
  const claims = part.fromBase64(segments.claims)
  if (!claims.success) {
    return { valid: false, error: claims.error }
  }
  return { valid: true, claims: claims.value }
}

/**
 * Splits a token into header, claims and signature segments.
 *
 * Delimiters are found in the base64url text, never in decoded content.
 *
 * @returns TokenSegments, or null unless there are exactly three non-empty segments
 */
export function splitToken(token: string): TokenSegments | null {
  const parts = token.split(SEGMENT_SEPARATOR)
  if (parts.length !== TOKEN_SEGMENT_COUNT) {
    return null
  }

  const [header, claims, signature] = parts
  if (
    header === undefined || header.length === 0 ||
    claims === undefined || claims.length === 0 ||
    signature === undefined || signature.length === 0
  ) {
    return null
  }

  return { header, claims, signature }
}

function joinSegments(left: string, right: string): string {
  return left + SEGMENT_SEPARATOR + right
}
