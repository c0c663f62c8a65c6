// @hs-jwt/core — HMAC signing, constant-time signature verification

import type { Algorithm } from './algorithm.js'
import { hashFor } from './algorithm.js'
import type { CryptoProvider } from './crypto-provider.js'
import { defaultCryptoProvider } from './node-crypto-provider.js'
import { encodeUtf8, secretToBytes, toBase64Url } from './encoding.js'
import type { Secret } from './types.js'

/**
 * Signs the signing input (`header.claims`) of a token.
 *
 * Steps:
 * 1. Resolve the hash bound to `algorithm`
 * 2. HMAC(secret, UTF-8 bytes of signingInput)
 * 3. Encode the full digest as base64url (no padding)
 *
 * Deterministic: the same input, secret and algorithm always give the same signature.
 */
export function sign(
  signingInput: string,
  secret: Secret,
  algorithm: Algorithm,
  cryptoProvider: CryptoProvider = defaultCryptoProvider,
): string {
  const mac = cryptoProvider.hmac(hashFor(algorithm), secretToBytes(secret), encodeUtf8(signingInput))
  return toBase64Url(mac)
}

/**
 * Recomputes the signature of `signingInput` and compares it to `signature`
 * in constant time.
 *
 * A mismatch is `false`, not an error; `decode` turns it into `invalid_signature`.
 */
export function verify(
  signature: string,
  signingInput: string,
  secret: Secret,
  algorithm: Algorithm,
  cryptoProvider: CryptoProvider = defaultCryptoProvider,
): boolean {
  const expected = sign(signingInput, secret, algorithm, cryptoProvider)
  return constantTimeEqual(encodeUtf8(signature), encodeUtf8(expected))
}

/**
 * Constant-time buffer comparison.
 *
 * Compares all bytes regardless of where a mismatch occurs.
 * Length difference is also detected without early return.
 *
 * @returns true if buffers are identical, false otherwise
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  const length = Math.max(a.length, b.length)
  let result = a.length ^ b.length // Non-zero if lengths differ
  for (let i = 0; i < length; i++) {
    result |= (a[i] ?? 0) ^ (b[i] ?? 0)
  }
  return result === 0
}
