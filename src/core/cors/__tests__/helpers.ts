import { DEFAULT_CORS_CONFIG } from '../../../lib/constants'
import { assertPolicy } from '../policy'
import type { CorsConfigInput, CorsDecision, PolicyConfig, RequestReader } from '../types'

export function policyFrom(overrides: Partial<CorsConfigInput> = {}): PolicyConfig {
  return assertPolicy({ ...DEFAULT_CORS_CONFIG, ...overrides })
}

/** Request reader over a plain header record, case-insensitive like Node's */
export function fakeRequest(method: string, headers: Record<string, string> = {}): RequestReader {
  const lower = new Map(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v]))
  return {
    method,
    header: (name) => lower.get(name.toLowerCase()),
  }
}

export function headerNames(decision: CorsDecision): string[] {
  return decision.headers.map((h) => h.name)
}

export function headerValue(decision: CorsDecision, name: string): string | undefined {
  return decision.headers.find((h) => h.name === name)?.value
}
