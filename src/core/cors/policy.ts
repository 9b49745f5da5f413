/**
 * cors-gate — policy.ts
 * Turns the raw CorsConfigInput into a frozen PolicyConfig, once, at startup.
 * Nothing on the request path re-parses configuration strings.
 */

import { LIST_SEPARATOR, WILDCARD_ORIGIN } from '../../lib/constants'
import { err, ok, type Result } from '../../types'
import type { CorsConfigInput, PolicyConfig } from './types'

export type CorsConfigErrorCode = 'EMPTY_ORIGINS' | 'INVALID_MAX_AGE'

export class CorsConfigError extends Error {
  readonly code: CorsConfigErrorCode

  constructor(code: CorsConfigErrorCode, message: string) {
    super(message)
    this.name = 'CorsConfigError'
    this.code = code
  }
}

/** Split a ", " delimited config value into trimmed, non-empty tokens */
export function splitList(value: string): string[] {
  return value
    .split(LIST_SEPARATOR)
    .map((s) => s.trim())
    .filter(Boolean)
}

function roundHalfEven(n: number): number {
  const r = Math.round(n)
  return Math.abs(n % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r
}

/** Whole seconds in plain digits: 60000 -> "60", 1500 -> "2", 2500 -> "2" */
export function formatMaxAge(maxAgeMs: number): string {
  // BigInt keeps large values out of exponent notation
  return BigInt(roundHalfEven(maxAgeMs / 1000)).toString()
}

export function buildPolicy(input: CorsConfigInput): Result<PolicyConfig, CorsConfigError> {
  if (input.origins.trim() === '') {
    return err(
      new CorsConfigError(
        'EMPTY_ORIGINS',
        'At least one origin is required. Remove the CORS middleware instead of configuring it with no origin.',
      ),
    )
  }

  if (!Number.isFinite(input.maxAgeMs) || input.maxAgeMs < 0) {
    return err(
      new CorsConfigError('INVALID_MAX_AGE', `maxAgeMs must be a non-negative number, got ${input.maxAgeMs}`),
    )
  }

  const allowAllOrigins = input.origins === WILDCARD_ORIGIN

  const policy: PolicyConfig = {
    allowAllOrigins,
    origins: new Set(allowAllOrigins ? [] : splitList(input.origins)),
    methods: Object.freeze(splitList(input.methods)),
    methodsHeader: input.methods,
    requestHeaders: Object.freeze(splitList(input.requestHeaders).map((h) => h.toLowerCase())),
    requestHeadersHeader: input.requestHeaders,
    exposedHeaders: input.exposedHeaders,
    maxAgeSeconds: formatMaxAge(input.maxAgeMs),
    credentialsEnabled: input.credentials,
    credentials: input.credentials ? 'true' : 'false',
    validateHeaders: input.validateHeaders,
  }

  return ok(Object.freeze(policy))
}

/** Fail-fast variant for hosts that prefer to abort startup on a bad config */
export function assertPolicy(input: CorsConfigInput): PolicyConfig {
  const res = buildPolicy(input)
  if (!res.ok) throw res.error
  return res.value
}
