// @hs-jwt/core — CryptoProvider abstraction

import type { HashName } from './algorithm.js'

/**
 * CryptoProvider abstraction for the keyed-hash primitive.
 *
 * Signing code never calls `node:crypto` directly; it goes through this
 * interface so the HMAC implementation can be swapped (KMS, HSM, test double).
 *
 * Default implementation: NodeCryptoProvider.
 */
export interface CryptoProvider {
  /**
   * Computes HMAC(key, data) with the named hash.
   * Returns the full digest (NO truncation). Synchronous and side-effect free.
   */
  hmac(hash: HashName, key: Uint8Array, data: Uint8Array): Uint8Array
}
