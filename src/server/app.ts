/**
 * cors-gate - Express app
 *
 * Responsibilities
 *  - request context (correlation id) for logs
 *  - CORS policy enforcement ahead of every route
 *  - health and service info routes, JSON 404 and error handlers
 */

import express from "express";
import type { Express, Request, Response, NextFunction, RequestHandler } from "express";

import type { PolicyConfig } from "../core/cors/types";
import { APP } from "../lib/constants";
import { log as rootLog, safeError, type Logger } from "../lib/logger";
import { corsGuard } from "./middleware/cors";
import { requestContext } from "./middleware/request-context";

export interface AppOptions {
  policy: PolicyConfig;
  logger?: Logger;
}

export function createApp({ policy, logger = rootLog }: AppOptions): Express {
  const app = express();
  const guard: RequestHandler = corsGuard(policy, { logger: logger.child({ component: "cors" }) });

  app.disable("x-powered-by");
  app.use(requestContext());
  app.use(guard);

  // Health
  app.get("/health", (_req, res) => res.status(200).json({ ok: true }));

  // Root info route to avoid confusing 404s on /
  app.get("/", (_req, res) =>
    res.status(200).json({
      ok: true,
      service: APP.NAME,
      version: APP.VERSION,
    }),
  );

  app.use((req, res) => res.status(404).json({ error: "not_found", path: req.path }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("[server] error", { err: safeError(err) });
    res.status(500).json({ error: "internal_error" });
  });

  return app;
}
