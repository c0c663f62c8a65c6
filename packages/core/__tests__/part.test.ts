import { describe, it, expect } from 'vitest'
import { jsonPart, jsonValue, encodeJsonPart, decodeJsonPart } from '../src/part.js'
import type { ClaimsSchema } from '../src/part.js'

interface Claims {
  sub: string
  company: string
}

const claimsSchema: ClaimsSchema<Claims> = {
  parse(value: unknown): Claims {
    if (
      typeof value === 'object' && value !== null &&
      'sub' in value && typeof value.sub === 'string' &&
      'company' in value && typeof value.company === 'string'
    ) {
      return { sub: value.sub, company: value.company }
    }
    throw new Error('expected { sub, company }')
  },
}

describe('part', () => {
  const claims = jsonPart(claimsSchema)
  const encodedClaims = 'eyJzdWIiOiJiQGIuY29tIiwiY29tcGFueSI6IkFDTUUifQ'

  describe('jsonPart.toBase64', () => {
    it('should encode claims as base64url JSON', () => {
      expect(claims.toBase64({ sub: 'b@b.com', company: 'ACME' })).toEqual({
        success: true,
        value: encodedClaims,
      })
    })
  })

  describe('jsonPart.fromBase64', () => {
    it('should decode claims', () => {
      expect(claims.fromBase64(encodedClaims)).toEqual({
        success: true,
        value: { sub: 'b@b.com', company: 'ACME' },
      })
    })

    it('should report base64_decode_error for characters outside the alphabet', () => {
      const result = claims.fromBase64('eyJ+fQ==')
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('base64_decode_error')
      }
    })

    it('should report utf8_decode_error for malformed UTF-8', () => {
      // bytes 7b ff 7d
      const result = claims.fromBase64('e_99')
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('utf8_decode_error')
      }
    })

    it('should report json_decode_error for malformed JSON', () => {
      // {"sub":
      const result = claims.fromBase64('eyJzdWIiOg')
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('json_decode_error')
      }
    })

    it('should report json_decode_error when the schema rejects the claims', () => {
      // {"sub":42}
      const result = claims.fromBase64('eyJzdWIiOjQyfQ')
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('json_decode_error')
        expect(result.error.message).toBe('Claims do not match schema: expected { sub, company }')
      }
    })

    it('should attach the collaborator error as cause', () => {
      const result = decodeJsonPart('eyJzdWIiOg', jsonValue)
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.cause).toBeInstanceOf(SyntaxError)
      }
    })
  })

  describe('encodeJsonPart', () => {
    it('should report json_encode_error for cyclic values', () => {
      const cyclic: Record<string, unknown> = {}
      cyclic['self'] = cyclic
      const result = encodeJsonPart(cyclic)
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('json_encode_error')
        expect(result.error.cause).toBeInstanceOf(TypeError)
      }
    })

    it('should report json_encode_error for BigInt', () => {
      const result = encodeJsonPart({ n: 1n })
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('json_encode_error')
      }
    })

    it('should report json_encode_error for undefined', () => {
      expect(encodeJsonPart(undefined)).toEqual({
        success: false,
        error: { kind: 'json_encode_error', message: 'Cannot serialize a value of type undefined' },
      })
    })

    it('should keep dots inside claim values out of the encoded text', () => {
      const result = encodeJsonPart({ sub: 'a.b.c', note: 'x.y' })
      expect(result).toEqual({ success: true, value: 'eyJzdWIiOiJhLmIuYyIsIm5vdGUiOiJ4LnkifQ' })
    })
  })

  describe('jsonValue', () => {
    const anyJson = jsonPart(jsonValue)

    it('should decode any JSON value', () => {
      expect(anyJson.fromBase64('Im9rIg')).toEqual({ success: true, value: 'ok' })
      expect(anyJson.fromBase64('bnVsbA')).toEqual({ success: true, value: null })
      expect(anyJson.fromBase64('eyJuIjoxfQ')).toEqual({ success: true, value: { n: 1 } })
    })

    it('should reject non-JSON values', () => {
      expect(() => jsonValue.parse(undefined)).toThrow('Value is not representable as JSON')
      expect(() => jsonValue.parse({ f: () => 1 })).toThrow(TypeError)
      expect(() => jsonValue.parse(Number.NaN)).toThrow(TypeError)
    })
  })
})
