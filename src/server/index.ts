/**
 * cors-gate - HTTP server entry
 *
 * Builds the CORS policy once from the environment and refuses to start when it is
 * misconfigured, then serves the app.
 */

import { ENV } from "../config/env";
import { log, safeError } from "../lib/logger";
import { createApp } from "./app";
import { loadPolicy } from "./load-policy";

const res = loadPolicy();
if (!res.ok) {
  log.fatal("invalid CORS configuration", { err: safeError(res.error) });
  process.exit(1);
}

const policy = res.value;
const app = createApp({ policy });

app.listen(ENV.PORT, () => {
  log.info(`cors-gate listening on http://localhost:${ENV.PORT}`, {
    origins: policy.allowAllOrigins ? "*" : Array.from(policy.origins),
    methods: policy.methods,
    credentials: policy.credentialsEnabled,
    validate_headers: policy.validateHeaders,
    max_age_s: policy.maxAgeSeconds,
  });
});
