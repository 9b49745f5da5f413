/**
 * cors-gate env - server settings
 * Process-level settings read once at import. CORS rules are read by ./cors.
 */

import dotenv from "dotenv";
import type { DeploymentEnv, Env } from "../types";

// Load local env when running in Node (dev) before anything else.
// Prefer .env.local if present, then fall back to .env.
dotenv.config({ path: ".env.local" });
dotenv.config();

function coerceDeploymentEnv(value?: string | null): DeploymentEnv {
  if (value === "development" || value === "test" || value === "production") {
    return value;
  }
  return "development";
}

export const NODE_ENV: DeploymentEnv = coerceDeploymentEnv(process.env.NODE_ENV);

export function toBool(v: string | undefined, def = false): boolean {
  if (v === undefined || v.trim() === "") return def;
  return /^(1|true|yes|on)$/i.test(v.trim());
}

/**
 * Safe integer parser for env values.
 */
export function toInt(v: unknown, fallback: number): number {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim() !== "") {
    const n = parseInt(v, 10);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}

export function serverEnv(): Env {
  return {
    NODE_ENV,
    APP_VERSION: process.env.npm_package_version || "0.1.0",
    PORT: toInt(process.env.PORT, 8787),
    LOG_LEVEL: process.env.LOG_LEVEL || "info",
    SERVICE_NAME: process.env.SERVICE_NAME || "cors-gate",

    CORS_ORIGINS: process.env.CORS_ORIGINS,
    CORS_METHODS: process.env.CORS_METHODS,
    CORS_REQUEST_HEADERS: process.env.CORS_REQUEST_HEADERS,
    CORS_EXPOSED_HEADERS: process.env.CORS_EXPOSED_HEADERS,
    CORS_MAX_AGE: process.env.CORS_MAX_AGE,
    CORS_CREDENTIALS: process.env.CORS_CREDENTIALS,
    CORS_VALIDATE_HEADERS: process.env.CORS_VALIDATE_HEADERS,
  };
}

/**
 * Single ENV object used by the server entry.
 */
export const ENV = serverEnv();
