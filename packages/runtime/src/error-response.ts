// @hs-jwt/runtime — Uniform error responses (RFC 6750)

import type { ErrorResponseBody } from './types.js'

/**
 * Uniform authentication failure message.
 *
 * **CRITICAL:** This is the ONLY error message sent to the client.
 * The failure kind goes to internal logs ONLY — never in the HTTP response body.
 */
const AUTH_FAILURE_MESSAGE = 'Authentication required'

/** Challenge header sent with every 401 */
const CHALLENGE_HEADER_NAME = 'WWW-Authenticate'

/**
 * Framework-agnostic error response structure.
 *
 * Used by all adapters to produce consistent 401 responses.
 */
export interface ErrorResponse {
  readonly status: number
  readonly body: ErrorResponseBody
  readonly headers: Readonly<Record<string, string>>
}

/**
 * Creates a uniform 401 error response.
 *
 * - Always returns `401 { error: "Authentication required" }`
 * - A request without a token gets the bare `Bearer` challenge
 * - A rejected token gets `Bearer error="invalid_token"`, whichever check failed
 *
 * @param tokenPresent - Whether the request carried a bearer token
 */
export function createErrorResponse(tokenPresent: boolean): ErrorResponse {
  return {
    status: 401,
    body: { error: AUTH_FAILURE_MESSAGE },
    headers: {
      [CHALLENGE_HEADER_NAME]: tokenPresent ? 'Bearer error="invalid_token"' : 'Bearer',
    },
  }
}
