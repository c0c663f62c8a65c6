// @hs-jwt/core — Algorithm registry (closed set of HMAC algorithms)

/** Supported signing algorithms */
export const ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const

export type Algorithm = (typeof ALGORITHMS)[number]

/** Hash function names as understood by the CryptoProvider */
export type HashName = 'sha256' | 'sha384' | 'sha512'

/** Everything the pipeline needs to know about one algorithm */
export interface AlgorithmSpec {
  /** Hash function used in the HMAC construction */
  readonly hash: HashName
  /** HMAC output size in bytes */
  readonly digestSize: number
  /** base64url of `{"typ":"JWT","alg":"<alg>"}`, byte-identical for every token */
  readonly encodedHeader: string
}

/**
 * Algorithm → hash binding and precomputed header literal.
 *
 * The header JSON for a given algorithm never varies, so its encoding is a
 * constant here rather than a run of the JSON codec.
 */
export const ALGORITHM_REGISTRY = {
  HS256: {
    hash: 'sha256',
    digestSize: 32,
    encodedHeader: 'eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzI1NiJ9',
  },
  HS384: {
    hash: 'sha384',
    digestSize: 48,
    encodedHeader: 'eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzM4NCJ9',
  },
  HS512: {
    hash: 'sha512',
    digestSize: 64,
    encodedHeader: 'eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzUxMiJ9',
  },
} as const satisfies Readonly<Record<Algorithm, AlgorithmSpec>>

/** Default algorithm when a caller does not name one */
export const DEFAULT_ALGORITHM: Algorithm = 'HS256'

/**
 * Narrows an untrusted value (config, env) to an Algorithm.
 * Case-sensitive: `'hs256'` is rejected.
 */
export function isAlgorithm(value: unknown): value is Algorithm {
  return typeof value === 'string' && ALGORITHMS.some((algorithm) => algorithm === value)
}

export function hashFor(algorithm: Algorithm): HashName {
  return ALGORITHM_REGISTRY[algorithm].hash
}

export function digestSizeFor(algorithm: Algorithm): number {
  return ALGORITHM_REGISTRY[algorithm].digestSize
}

export function encodedHeaderFor(algorithm: Algorithm): string {
  return ALGORITHM_REGISTRY[algorithm].encodedHeader
}
