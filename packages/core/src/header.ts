// @hs-jwt/core — Header codec (fixed literal table, no JSON round trip)

import type { Algorithm } from './algorithm.js'
import { ALGORITHMS, encodedHeaderFor } from './algorithm.js'
import { jwtError } from './errors.js'
import type { Part } from './part.js'
import type { Header, HeaderResult, PartResult } from './types.js'

/** Builds the header for an algorithm. `typ` is always `'JWT'`. */
export function createHeader(algorithm: Algorithm): Header {
  return { typ: 'JWT', alg: algorithm }
}

/** Returns the precomputed base64url literal for `header.alg` */
export function headerToBase64(header: Header): string {
  return encodedHeaderFor(header.alg)
}

/**
 * Decodes a header segment by exact match against the known literals.
 *
 * Anything else (different field order, extra fields, whitespace, an
 * algorithm outside the closed set such as `none`) is `invalid_token`.
 */
export function headerFromBase64(encoded: string): HeaderResult {
  for (const algorithm of ALGORITHMS) {
    if (encoded === encodedHeaderFor(algorithm)) {
      return { success: true, header: createHeader(algorithm) }
    }
  }
  return { success: false, error: jwtError('invalid_token', 'Unrecognized token header') }
}

/** The header codec seen through the generic Part interface */
export const headerPart: Part<Header> = {
  toBase64(value: Header): PartResult<string> {
    return { success: true, value: headerToBase64(value) }
  },

  fromBase64(encoded: string): PartResult<Header> {
    const result = headerFromBase64(encoded)
    return result.success
      ? { success: true, value: result.header }
      : { success: false, error: result.error }
  },
}
