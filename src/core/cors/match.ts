/**
 * cors-gate — match.ts
 * Origin, method and request-header matching against a normalized policy.
 * Origins and methods compare byte for byte; header names compare case-insensitively.
 */

// Characters stripped from each requested header token
const HEADER_TRIM = /^[ \t\r\n]+|[ \t\r\n]+$/g

export function matchOrigin(origin: string, origins: ReadonlySet<string>): boolean {
  return origins.has(origin)
}

export function matchMethod(method: string, methods: readonly string[]): boolean {
  if (!method) return false
  return methods.includes(method)
}

/**
 * Split a raw Access-Control-Request-Headers value into lowercase header names.
 * Empty tokens are kept: an absent header or a trailing comma yields "", which
 * no configured header matches.
 */
export function parseHeaderList(raw: string): string[] {
  return raw
    .split(',')
    .map((h) => h.replace(HEADER_TRIM, '').toLowerCase())
}

/** Every requested header must be in `allowed`, which is already lowercase */
export function matchRequestHeaders(raw: string, allowed: readonly string[]): boolean {
  return parseHeaderList(raw).every((h) => allowed.includes(h))
}
