// @hs-jwt/core — Claims codec: any record ⇄ JSON ⇄ base64url

import { decodeUtf8, encodeUtf8, fromBase64Url, toBase64Url } from './encoding.js'
import { jwtError, messageOf } from './errors.js'
import type { JsonValue, PartResult } from './types.js'

// ============================================================
// Capabilities
// ============================================================

/**
 * A token segment that converts between a value and its base64url text.
 * Implemented by the header codec and by every claims codec.
 */
export interface Part<T> {
  toBase64(value: T): PartResult<string>
  fromBase64(encoded: string): PartResult<T>
}

/**
 * Turns parsed JSON into the caller's claims type, throwing on mismatch.
 *
 * Structurally satisfied by zod schemas (`z.object({...})`) and by any
 * hand-written validator with the same shape.
 */
export interface ClaimsSchema<T> {
  parse(value: unknown): T
}

// ============================================================
// JSON Part
// ============================================================

/**
 * Serializes a value to JSON and encodes it as base64url (no padding).
 *
 * Fails with `json_encode_error` on cycles, BigInt, or values JSON has no
 * text for (`undefined`, functions, symbols).
 */
export function encodeJsonPart(value: unknown): PartResult<string> {
  let json: string | undefined
  try {
    json = JSON.stringify(value)
  } catch (err) {
    return { success: false, error: jwtError('json_encode_error', messageOf(err), err) }
  }
  if (json === undefined) {
    return {
      success: false,
      error: jwtError('json_encode_error', `Cannot serialize a value of type ${typeof value}`),
    }
  }
  return { success: true, value: toBase64Url(encodeUtf8(json)) }
}

/**
 * Decodes a base64url JSON segment and parses it with `schema`.
 *
 * Each stage fails with its own kind:
 * base64url → `base64_decode_error`, UTF-8 → `utf8_decode_error`,
 * JSON syntax or schema mismatch → `json_decode_error`.
 */
export function decodeJsonPart<T>(encoded: string, schema: ClaimsSchema<T>): PartResult<T> {
  let bytes: Uint8Array
  try {
    bytes = fromBase64Url(encoded)
  } catch (err) {
    return { success: false, error: jwtError('base64_decode_error', messageOf(err), err) }
  }

  let text: string
  try {
    text = decodeUtf8(bytes)
  } catch (err) {
    return { success: false, error: jwtError('utf8_decode_error', messageOf(err), err) }
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    return { success: false, error: jwtError('json_decode_error', messageOf(err), err) }
  }

  try {
    return { success: true, value: schema.parse(parsed) }
  } catch (err) {
    return {
      success: false,
      error: jwtError('json_decode_error', `Claims do not match schema: ${messageOf(err)}`, err),
    }
  }
}

/**
 * Creates the JSON-backed Part for a claims type.
 *
 * @example
 * ```typescript
 * const claims = jsonPart(z.object({ sub: z.string(), company: z.string() }))
 * const result = decode(token, secret, 'HS256', claims)
 * ```
 */
export function jsonPart<T>(schema: ClaimsSchema<T>): Part<T> {
  return {
    toBase64: (value: T) => encodeJsonPart(value),
    fromBase64: (encoded: string) => decodeJsonPart(encoded, schema),
  }
}

// ============================================================
// Untyped JSON
// ============================================================

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue)
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

/** Accepts any JSON value; for callers that inspect claims themselves */
export const jsonValue: ClaimsSchema<JsonValue> = {
  parse(value: unknown): JsonValue {
    if (!isJsonValue(value)) {
      throw new TypeError('Value is not representable as JSON')
    }
    return value
  },
}
