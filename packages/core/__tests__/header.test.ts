import { describe, it, expect } from 'vitest'
import { createHeader, headerToBase64, headerFromBase64, headerPart } from '../src/header.js'
import { toBase64Url, encodeUtf8 } from '../src/encoding.js'

describe('header', () => {
  describe('createHeader', () => {
    it('should always set typ to JWT', () => {
      expect(createHeader('HS384')).toEqual({ typ: 'JWT', alg: 'HS384' })
    })
  })

  describe('headerToBase64', () => {
    it('should encode the HS256 header', () => {
      expect(headerToBase64(createHeader('HS256'))).toBe('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzI1NiJ9')
    })

    it('should encode the HS384 header', () => {
      expect(headerToBase64(createHeader('HS384'))).toBe('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzM4NCJ9')
    })

    it('should encode the HS512 header', () => {
      expect(headerToBase64(createHeader('HS512'))).toBe('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzUxMiJ9')
    })
  })

  describe('headerFromBase64', () => {
    it('should decode a known literal', () => {
      const result = headerFromBase64('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzI1NiJ9')
      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.header.typ).toBe('JWT')
        expect(result.header.alg).toBe('HS256')
      }
    })

    it('should round-trip every algorithm', () => {
      for (const alg of ['HS256', 'HS384', 'HS512'] as const) {
        const header = createHeader(alg)
        expect(headerFromBase64(headerToBase64(header))).toEqual({ success: true, header })
      }
    })

    it('should reject a header with reordered fields', () => {
      // {"alg":"HS256","typ":"JWT"}
      const result = headerFromBase64('eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9')
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('invalid_token')
      }
    })

    it('should reject the none algorithm', () => {
      const none = toBase64Url(encodeUtf8('{"typ":"JWT","alg":"none"}'))
      expect(headerFromBase64(none).success).toBe(false)
    })

    it('should reject garbage', () => {
      expect(headerFromBase64('not-a-header').success).toBe(false)
      expect(headerFromBase64('').success).toBe(false)
    })
  })

  describe('headerPart', () => {
    it('should encode through the Part interface', () => {
      expect(headerPart.toBase64(createHeader('HS256'))).toEqual({
        success: true,
        value: 'eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzI1NiJ9',
      })
    })

    it('should decode through the Part interface', () => {
      expect(headerPart.fromBase64('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzUxMiJ9')).toEqual({
        success: true,
        value: { typ: 'JWT', alg: 'HS512' },
      })
    })

    it('should surface invalid_token through the Part interface', () => {
      const result = headerPart.fromBase64('eyJ9')
      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error).toEqual({ kind: 'invalid_token', message: 'Unrecognized token header' })
      }
    })
  })
})
