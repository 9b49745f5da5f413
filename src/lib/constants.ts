/**
 * cors-gate - shared constants
 * Header names used by the CORS engine and the default policy a host starts from.
 */

import type { CorsConfigInput } from "../core/cors/types";

// App metadata
export const APP = {
  NAME: "cors-gate",
  VERSION: process.env.npm_package_version ?? "0.1.0",
} as const;

// Request headers the engine reads
export const ORIGIN = "Origin";
export const REQUEST_METHOD = "Access-Control-Request-Method";
export const REQUEST_HEADERS = "Access-Control-Request-Headers";

// Response headers the engine writes
export const VARY = "Vary";
export const ALLOW_ORIGIN = "Access-Control-Allow-Origin";
export const ALLOW_CREDENTIALS = "Access-Control-Allow-Credentials";
export const ALLOW_HEADERS = "Access-Control-Allow-Headers";
export const ALLOW_METHODS = "Access-Control-Allow-Methods";
export const MAX_AGE = "Access-Control-Max-Age";
export const EXPOSE_HEADERS = "Access-Control-Expose-Headers";

export const OPTIONS_METHOD = "OPTIONS";
export const WILDCARD_ORIGIN = "*";

/** Separator between configured origins, methods and headers */
export const LIST_SEPARATOR = ", ";

export const DEFAULT_CORS_CONFIG: Readonly<CorsConfigInput> = Object.freeze({
  origins: WILDCARD_ORIGIN,
  methods: "GET, PUT, POST, DELETE",
  requestHeaders: "Origin, Authorization, Content-Type",
  exposedHeaders: "",
  maxAgeMs: 60_000, // 1 minute
  credentials: true,
  validateHeaders: false,
});
