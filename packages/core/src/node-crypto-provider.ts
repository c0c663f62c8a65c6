// @hs-jwt/core — node:crypto-based CryptoProvider implementation

import { createHmac } from 'node:crypto'
import type { HashName } from './algorithm.js'
import type { CryptoProvider } from './crypto-provider.js'

/**
 * Default CryptoProvider implementation using `node:crypto`.
 *
 * HMAC-SHA256/384/512, full-length digests. Synchronous, holds no state, so a
 * single instance is shared by every call.
 */
export class NodeCryptoProvider implements CryptoProvider {
  hmac(hash: HashName, key: Uint8Array, data: Uint8Array): Uint8Array {
    const digest = createHmac(hash, key).update(data).digest()
    return new Uint8Array(digest.buffer, digest.byteOffset, digest.byteLength)
  }
}

/** Provider used when a caller does not pass one */
export const defaultCryptoProvider: CryptoProvider = new NodeCryptoProvider()
