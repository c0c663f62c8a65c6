// @hs-jwt/runtime — Native Fetch adapter (Node 18+ fetch servers, Edge runtimes)

import type { Part } from '@hs-jwt/core'
import type { JwtInstance, MiddlewareOptions } from '../types.js'
import { DEFAULT_AUTH_HEADER_NAME } from '../types.js'
import { extractTokenFromRequest, normalizePath, normalizePathSet } from '../extract-token.js'
import { createErrorResponse } from '../error-response.js'

// ============================================================
// Types
// ============================================================

/** A handler that processes a Request and returns a Response */
export type FetchHandler = (request: Request) => Promise<Response> | Response

/**
 * A handler that receives the decoded claims alongside the request.
 * `claims` is undefined only for excluded paths.
 */
export type AuthenticatedFetchHandler<T> = (
  request: Request,
  claims: T | undefined,
) => Promise<Response> | Response

/**
 * Extracts the pathname from a Request URL.
 */
function extractPathname(request: Request): string {
  try {
    return new URL(request.url).pathname
  } catch {
    // Fallback for relative URLs
    const qIndex = request.url.indexOf('?')
    return qIndex >= 0 ? request.url.slice(0, qIndex) : request.url
  }
}

// ============================================================
// Fetch Middleware Factory
// ============================================================

/**
 * Wraps a Fetch API handler with bearer-token authentication.
 *
 * @param jwt - Initialized JwtInstance
 * @param part - Claims codec for the application's claims type
 * @param handler - The underlying request handler to protect
 * @param options - Middleware configuration options
 * @returns A new FetchHandler that only reaches `handler` with valid claims
 *
 * @example
 * ```typescript
 * const handler = createFetchMiddleware(jwt, claims, (request, claims) =>
 *   Response.json({ hello: claims?.sub }),
 * )
 * ```
 */
export function createFetchMiddleware<T>(
  jwt: JwtInstance,
  part: Part<T>,
  handler: AuthenticatedFetchHandler<T>,
  options?: MiddlewareOptions,
): FetchHandler {
  const excludePaths = normalizePathSet(options?.excludePaths ?? [])
  const headerName = options?.headerName ?? DEFAULT_AUTH_HEADER_NAME

  return async (request: Request): Promise<Response> => {
    if (excludePaths.has(normalizePath(extractPathname(request)))) {
      return handler(request, undefined)
    }

    const token = extractTokenFromRequest((name) => request.headers.get(name), headerName)
    const result = token !== null ? jwt.decode(token, part) : null

    if (result === null || !result.valid) {
      const errorResponse = createErrorResponse(token !== null)
      return new Response(JSON.stringify(errorResponse.body), {
        status: errorResponse.status,
        headers: {
          'content-type': 'application/json',
          ...errorResponse.headers,
        },
      })
    }

    return handler(request, result.claims)
  }
}
