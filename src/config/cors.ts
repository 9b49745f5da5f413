// src/config/cors.ts
/**
 * cors-gate - CORS config from the environment
 * Used by src/server/index.ts via: buildPolicy(corsConfig())
 */

import { CorsConfigError } from "../core/cors/policy";
import type { CorsConfigInput } from "../core/cors/types";
import { DEFAULT_CORS_CONFIG } from "../lib/constants";
import { parseDuration } from "../lib/duration";
import { serverEnv, toBool } from "./env";

function maxAgeFromEnv(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_CORS_CONFIG.maxAgeMs;
  const ms = parseDuration(raw);
  if (ms === null) {
    throw new CorsConfigError("INVALID_MAX_AGE", `CORS_MAX_AGE is not a duration: "${raw}"`);
  }
  return ms;
}

/** Build the raw CORS config record; overrides win over env and defaults */
export function corsConfig(overrides?: Partial<CorsConfigInput>): CorsConfigInput {
  const env = serverEnv();

  return {
    // An explicitly empty CORS_ORIGINS is kept so the policy builder can reject it
    origins: env.CORS_ORIGINS ?? DEFAULT_CORS_CONFIG.origins,
    methods: env.CORS_METHODS || DEFAULT_CORS_CONFIG.methods,
    requestHeaders: env.CORS_REQUEST_HEADERS || DEFAULT_CORS_CONFIG.requestHeaders,
    exposedHeaders: env.CORS_EXPOSED_HEADERS ?? DEFAULT_CORS_CONFIG.exposedHeaders,
    maxAgeMs: maxAgeFromEnv(env.CORS_MAX_AGE),
    credentials: toBool(env.CORS_CREDENTIALS, DEFAULT_CORS_CONFIG.credentials),
    validateHeaders: toBool(env.CORS_VALIDATE_HEADERS, DEFAULT_CORS_CONFIG.validateHeaders),
    ...overrides,
  };
}
