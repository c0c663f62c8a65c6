// @hs-jwt/core — Types, error model, and branded types

import type { Algorithm } from './algorithm.js'

// ============================================================
// Branded Types
// ============================================================

declare const TOKEN_BRAND: unique symbol

/** Branded string type for compact tokens produced by `encode` */
export type TokenString = string & { readonly [TOKEN_BRAND]: 'HsJwtToken' }

/** Shared secret: raw bytes, or a string that is UTF-8 encoded before use */
export type Secret = string | Uint8Array

// ============================================================
// Header
// ============================================================

/** Token header. `typ` is fixed; only `createHeader` builds one. */
export interface Header {
  readonly typ: 'JWT'
  readonly alg: Algorithm
}

// ============================================================
// Errors
// ============================================================

/** Every failure the pipeline can report */
export const JWT_ERROR_KINDS = [
  'invalid_token',
  'invalid_signature',
  'wrong_algorithm_header',
  'base64_decode_error',
  'utf8_decode_error',
  'json_decode_error',
  'json_encode_error',
] as const

export type JwtErrorKind = (typeof JWT_ERROR_KINDS)[number]

/**
 * A failure returned by the codecs, `encode` or `decode`.
 *
 * `cause` carries the collaborator's own error (base64, UTF-8, JSON, schema)
 * where there is one.
 */
export interface JwtError {
  readonly kind: JwtErrorKind
  readonly message: string
  readonly cause?: unknown
}

// ============================================================
// Result Types (never throw for encode/decode)
// ============================================================

/** Result of a single codec step */
export type PartResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: JwtError }

/** Result of decoding a header segment */
export type HeaderResult =
  | { readonly success: true; readonly header: Header }
  | { readonly success: false; readonly error: JwtError }

/** Token encoding result */
export type EncodeResult =
  | { readonly success: true; readonly token: TokenString }
  | { readonly success: false; readonly error: JwtError }

/** Token decoding result */
export type DecodeResult<T> =
  | { readonly valid: true; readonly claims: T }
  | { readonly valid: false; readonly error: JwtError }

// ============================================================
// JSON
// ============================================================

export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/** Number of segments in a compact token */
export const TOKEN_SEGMENT_COUNT = 3

/** Segment separator of the compact serialization */
export const SEGMENT_SEPARATOR = '.'
