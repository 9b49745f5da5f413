/**
 * cors-gate — CORS engine types
 * Shared by the policy builder, the decision pipeline and the HTTP adapters.
 */

// ---------- Configuration

/** Raw configuration record handed over by the host at startup */
export interface CorsConfigInput {
  /** Compare requested method and headers against the allow-lists instead of trusting the browser */
  validateHeaders: boolean
  /** ", " delimited origins, or "*" for any origin */
  origins: string
  /** ", " delimited request headers the resource accepts */
  requestHeaders: string
  /** Rendered verbatim as Access-Control-Expose-Headers, empty to omit */
  exposedHeaders: string
  /** ", " delimited methods */
  methods: string
  /** Preflight cache lifetime in milliseconds */
  maxAgeMs: number
  credentials: boolean
}

export interface PolicyConfig {
  readonly allowAllOrigins: boolean
  readonly origins: ReadonlySet<string>
  readonly methods: readonly string[]
  readonly methodsHeader: string
  /** lowercase, matching only */
  readonly requestHeaders: readonly string[]
  /** original case, rendering only */
  readonly requestHeadersHeader: string
  readonly exposedHeaders: string
  readonly maxAgeSeconds: string
  readonly credentialsEnabled: boolean
  readonly credentials: 'true' | 'false'
  readonly validateHeaders: boolean
}

// ---------- Per request

/** Read side of the host request: method plus a case-insensitive header lookup */
export interface RequestReader {
  method: string
  header(name: string): string | undefined
}

export interface RequestFacts {
  origin: string
  method: string
  isPreflight: boolean
  requestedMethod: string
  requestedHeaders: string
}

export type HeaderMode = 'set' | 'append'

export interface HeaderEntry {
  name: string
  value: string
  mode: HeaderMode
}

export type CorsOutcome = 'continue' | 'terminate'

export type CorsVerdict =
  | 'not-cors'
  | 'allowed'
  | 'origin-rejected'
  | 'preflight-accepted'
  | 'preflight-method-rejected'
  | 'preflight-headers-rejected'

export interface CorsDecision {
  outcome: CorsOutcome
  verdict: CorsVerdict
  headers: HeaderEntry[]
}
