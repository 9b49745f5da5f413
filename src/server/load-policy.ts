/**
 * cors-gate - policy loading for the server entry
 * Reads the CORS config from the environment and builds the policy, turning every
 * configuration error into a Result so the entry decides how to stop.
 */

import { corsConfig } from "../config/cors";
import { buildPolicy, CorsConfigError, type CorsConfigInput, type PolicyConfig } from "../core/cors";
import { err, type Result } from "../types";

export function loadPolicy(overrides?: Partial<CorsConfigInput>): Result<PolicyConfig, CorsConfigError> {
  try {
    return buildPolicy(corsConfig(overrides));
  } catch (e) {
    if (e instanceof CorsConfigError) return err(e);
    throw e;
  }
}
