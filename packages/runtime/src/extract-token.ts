// @hs-jwt/runtime — Bearer token extraction and path helpers

// ============================================================
// Path Normalization
// ============================================================

/**
 * Normalizes a URL path for consistent comparison.
 *
 * Strips trailing slashes so `/health/` and `/health` match the same
 * exclusion. Does NOT lowercase (paths are case-sensitive per RFC 3986).
 *
 * @returns Normalized path (no trailing slash, except for root "/")
 */
export function normalizePath(path: string): string {
  if (path.length === 0 || path === '/') return '/'

  let end = path.length
  while (end > 0 && path.charCodeAt(end - 1) === 47) end--

  if (end === path.length) return path
  if (end === 0) return '/'
  return path.slice(0, end)
}

/** Creates a normalized Set from an array of paths for consistent matching */
export function normalizePathSet(paths: readonly string[]): Set<string> {
  return new Set(paths.map(normalizePath))
}

// ============================================================
// Header Getter Abstraction
// ============================================================

/**
 * Generic header getter function.
 * Adapters implement this to bridge framework-specific header access.
 */
export type HeaderGetter = (name: string) => string | null

// ============================================================
// Bearer Token
// ============================================================

/**
 * `Bearer <token68>` (RFC 6750 §2.1). Scheme is case-insensitive;
 * exactly one credential, no embedded whitespace.
 */
const BEARER_PATTERN = /^Bearer +([A-Za-z0-9\-._~+/]+=*)$/i

/**
 * Extracts the credential from an Authorization header value.
 *
 * @returns The token, or null if the header is absent or not a bearer credential
 */
export function extractBearerToken(headerValue: string | null): string | null {
  if (headerValue === null) return null
  const match = BEARER_PATTERN.exec(headerValue.trim())
  return match?.[1] ?? null
}

/**
 * Reads the bearer token from the named header.
 *
 * @param getHeader - Framework-specific header getter
 * @param headerName - Header to read (case-insensitive)
 */
export function extractTokenFromRequest(getHeader: HeaderGetter, headerName: string): string | null {
  return extractBearerToken(getHeader(headerName.toLowerCase()))
}
