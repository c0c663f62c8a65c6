// @hs-jwt/runtime — Express middleware adapter

import type { Part } from '@hs-jwt/core'
import type { JwtInstance, MiddlewareOptions } from '../types.js'
import { CLAIMS_LOCALS_KEY, DEFAULT_AUTH_HEADER_NAME } from '../types.js'
import { extractTokenFromRequest, normalizePath, normalizePathSet } from '../extract-token.js'
import type { HeaderGetter } from '../extract-token.js'
import { createErrorResponse } from '../error-response.js'

// ============================================================
// Minimal Express-Compatible Types
// ============================================================

/**
 * Minimal Express-compatible request interface.
 * Structurally compatible with `express.Request`.
 */
export interface ExpressLikeRequest {
  readonly method: string
  readonly path: string
  readonly headers: Readonly<Record<string, string | string[] | undefined>>
}

/**
 * Minimal Express-compatible response interface.
 * Structurally compatible with `express.Response`.
 */
export interface ExpressLikeResponse {
  status(code: number): ExpressLikeResponse
  json(body: unknown): ExpressLikeResponse
  setHeader(name: string, value: string): ExpressLikeResponse
  readonly locals: Record<string, unknown>
}

/** Express-compatible next function */
export type ExpressNextFunction = (err?: unknown) => void

/** Express middleware signature */
export type ExpressMiddleware = (
  req: ExpressLikeRequest,
  res: ExpressLikeResponse,
  next: ExpressNextFunction,
) => void

// ============================================================
// Header Getter for Express
// ============================================================

function createExpressHeaderGetter(
  headers: Readonly<Record<string, string | string[] | undefined>>,
): HeaderGetter {
  return (name: string): string | null => {
    const value = headers[name.toLowerCase()]
    if (typeof value === 'string') return value
    if (Array.isArray(value)) return value[0] ?? null
    return null
  }
}

// ============================================================
// Express Middleware Factory
// ============================================================

/**
 * Creates Express middleware that authenticates requests with a bearer token.
 *
 * This middleware:
 * 1. Passes excluded paths through untouched
 * 2. Decodes the bearer token with the instance's secret and algorithm
 * 3. Stores the claims in `res.locals.claims` and calls `next()`
 * 4. Otherwise responds with a uniform 401
 *
 * @param jwt - Initialized JwtInstance
 * @param part - Claims codec for the application's claims type
 * @param options - Middleware configuration options
 *
 * @example
 * ```typescript
 * import express from 'express'
 * import { jsonPart } from '@hs-jwt/core'
 * import { createJwt } from '@hs-jwt/runtime'
 * import { createExpressMiddleware } from '@hs-jwt/runtime/express'
 *
 * const jwt = createJwt({ secret: process.env.JWT_SECRET })
 * const app = express()
 * app.use(createExpressMiddleware(jwt, jsonPart(claimsSchema), { excludePaths: ['/health'] }))
 * ```
 */
export function createExpressMiddleware<T>(
  jwt: JwtInstance,
  part: Part<T>,
  options?: MiddlewareOptions,
): ExpressMiddleware {
  const excludePaths = normalizePathSet(options?.excludePaths ?? [])
  const headerName = options?.headerName ?? DEFAULT_AUTH_HEADER_NAME

  return (req, res, next) => {
    if (excludePaths.has(normalizePath(req.path))) {
      next()
      return
    }

    const token = extractTokenFromRequest(createExpressHeaderGetter(req.headers), headerName)
    const result = token !== null ? jwt.decode(token, part) : null

    if (result === null || !result.valid) {
      const errorResponse = createErrorResponse(token !== null)
      for (const [key, value] of Object.entries(errorResponse.headers)) {
        res.setHeader(key, value)
      }
      res.status(errorResponse.status).json(errorResponse.body)
      return
    }

    res.locals[CLAIMS_LOCALS_KEY] = result.claims
    next()
  }
}
