// @hs-jwt/core — Encoding utilities (base64url, UTF-8, secrets)

import type { Secret } from './types.js'

/** base64url alphabet (RFC 4648 §5), no padding */
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/

const utf8Encoder = new TextEncoder()

/** Throws on malformed sequences instead of substituting U+FFFD */
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * Encodes a Uint8Array to base64url string (RFC 4648, no padding).
 * Pure function, zero dependencies.
 */
export function toBase64Url(buffer: Uint8Array): string {
  let binary = ''
  for (const byte of buffer) {
    binary += String.fromCharCode(byte)
  }
  const base64 = btoa(binary)
  return base64.replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '')
}

/**
 * Decodes a base64url string (RFC 4648, no padding) to Uint8Array.
 *
 * Rejects characters outside the url-safe alphabet, including `=` padding,
 * `+`, `/` and whitespace, and lengths no encoder can produce.
 *
 * @throws {Error} If the input is not valid base64url
 */
export function fromBase64Url(encoded: string): Uint8Array {
  if (!BASE64URL_PATTERN.test(encoded)) {
    throw new Error('Invalid base64url input: unexpected character')
  }
  if (encoded.length % 4 === 1) {
    throw new Error(`Invalid base64url input: impossible length ${String(encoded.length)}`)
  }

  // Restore standard base64 characters and padding
  let base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')
  base64 += '='.repeat((4 - (base64.length % 4)) % 4)

  const binary = atob(base64)
  const bytes = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i)
  }
  return bytes
}

export function encodeUtf8(text: string): Uint8Array {
  return utf8Encoder.encode(text)
}

/**
 * @throws {TypeError} If the bytes are not well-formed UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes)
}

/** Normalizes a Secret to the raw key bytes used for HMAC */
export function secretToBytes(secret: Secret): Uint8Array {
  return typeof secret === 'string' ? encodeUtf8(secret) : secret
}
