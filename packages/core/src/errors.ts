// @hs-jwt/core — Error constructors

import type { JwtError, JwtErrorKind } from './types.js'

const DEFAULT_MESSAGES: Readonly<Record<JwtErrorKind, string>> = {
  invalid_token: 'Token is malformed',
  invalid_signature: 'Token signature does not match',
  wrong_algorithm_header: 'Token header names a different algorithm',
  base64_decode_error: 'Segment is not valid base64url',
  utf8_decode_error: 'Segment is not valid UTF-8',
  json_decode_error: 'Segment is not valid JSON for the expected claims',
  json_encode_error: 'Claims cannot be serialized to JSON',
}

/**
 * Builds a JwtError of the given kind.
 * `cause` is only attached when present so errors compare cleanly with `toEqual`.
 */
export function jwtError(kind: JwtErrorKind, message?: string, cause?: unknown): JwtError {
  const error: JwtError = { kind, message: message ?? DEFAULT_MESSAGES[kind] }
  return cause === undefined ? error : { ...error, cause }
}

/** One-line rendering for internal logs: `kind: message` */
export function describeJwtError(error: JwtError): string {
  return `${error.kind}: ${error.message}`
}

/** Best-effort message of an unknown thrown value */
export function messageOf(thrown: unknown): string {
  if (thrown instanceof Error) return thrown.message
  return String(thrown)
}
