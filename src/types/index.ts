/**
 * cors-gate - Shared TypeScript types
 * Cross-cutting types used by the engine, config and server layers.
 */

// ---------- Results

export type Ok<T> = { ok: true; value: T }
export type Err<E> = { ok: false; error: E }

/** Outcome of an operation that can fail without throwing */
export type Result<T, E = Error> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

// ---------- Environment (server-side)

export type DeploymentEnv = 'development' | 'test' | 'production'

export interface Env {
  NODE_ENV: DeploymentEnv
  APP_VERSION: string
  PORT: number
  LOG_LEVEL: string
  SERVICE_NAME: string

  // CORS, comma-space delimited lists as in CorsConfigInput
  CORS_ORIGINS?: string
  CORS_METHODS?: string
  CORS_REQUEST_HEADERS?: string
  CORS_EXPOSED_HEADERS?: string
  CORS_MAX_AGE?: string
  CORS_CREDENTIALS?: string
  CORS_VALIDATE_HEADERS?: string
}
