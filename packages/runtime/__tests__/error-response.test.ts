import { describe, it, expect } from 'vitest'
import { createErrorResponse } from '../src/error-response.js'

describe('error-response', () => {
  describe('createErrorResponse', () => {
    it('should return 401 with uniform error message', () => {
      const response = createErrorResponse(true)

      expect(response.status).toBe(401)
      expect(response.body).toEqual({ error: 'Authentication required' })
    })

    it('should NEVER differentiate failures in body', () => {
      expect(createErrorResponse(true).body).toEqual(createErrorResponse(false).body)
    })

    it('should send the invalid_token challenge when a token was presented', () => {
      expect(createErrorResponse(true).headers).toEqual({
        'WWW-Authenticate': 'Bearer error="invalid_token"',
      })
    })

    it('should send the bare challenge when no token was presented', () => {
      expect(createErrorResponse(false).headers).toEqual({ 'WWW-Authenticate': 'Bearer' })
    })
  })
})
