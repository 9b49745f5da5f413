/**
 * cors-gate — structured logger
 * Lightweight, dependency-free JSON logger with redaction, request context,
 * and optional pretty output in development. Production prints newline-delimited JSON.
 *
 * Usage:
 *   import { log, createLogger, runWithRequestContext } from "../lib/logger";
 *   log.info("server started", { port: 8787 });
 *   runWithRequestContext({ headers: req.headers }, () => {
 *     log.debug("handling request", { path: req.url });
 *   });
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

// ----------------------------- Types ---------------------------------

export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

type LevelNum = 10 | 20 | 30 | 40 | 50 | 60;

type Bindings = Record<string, unknown>;

export interface Logger {
  level: LogLevelName;
  isLevelEnabled(level: LogLevelName): boolean;
  child(bindings?: Bindings): Logger;
  trace(msg: string, fields?: Bindings): void;
  debug(msg: string, fields?: Bindings): void;
  info(msg: string, fields?: Bindings): void;
  warn(msg: string, fields?: Bindings): void;
  error(msg: string, fields?: Bindings): void;
  fatal(msg: string, fields?: Bindings): void;
}

// --------------------------- Internals -------------------------------

const LEVELS: Record<LogLevelName, LevelNum> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export function isLogLevel(value: unknown): value is LogLevelName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

const ENV_LEVEL = process.env.LOG_LEVEL;
const DEFAULT_LEVEL: LogLevelName = isLogLevel(ENV_LEVEL) ? ENV_LEVEL : "info";
const SERVICE = process.env.SERVICE_NAME || "cors-gate";
const ENV = process.env.NODE_ENV || "development";

// Keys that will be redacted (case insensitive, deep)
const REDACT_KEYS = new Set([
  "password",
  "authorization",
  "cookie",
  "set-cookie",
  "apikey",
  "api_key",
  "secret",
  "token",
  "access_token",
  "refresh_token",
  "client_secret",
]);

const ctx = new AsyncLocalStorage<{
  correlation_id: string;
  bindings?: Bindings;
}>();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function redact(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(redact);
  if (value instanceof Error) return serializeError(value);
  if (!isRecord(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (REDACT_KEYS.has(k.toLowerCase())) {
      out[k] = "[redacted]";
    } else if (typeof v === "object" && v !== null) {
      out[k] = redact(v);
    } else {
      out[k] = v;
    }
  }
  return out;
}

function serializeError(err: unknown) {
  if (!(err instanceof Error)) return err;
  const stack = (err.stack || "").split("\n").slice(0, 10).join("\n");
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  return {
    name: err.name,
    message: err.message,
    code,
    stack,
    cause: typeof err.cause === "object" ? redact(err.cause) : err.cause,
  };
}

function isTTY() {
  return !!process?.stdout?.isTTY;
}

function color(level: LogLevelName) {
  const codes: Record<LogLevelName, string> = {
    trace: "\x1b[90m",
    debug: "\x1b[36m",
    info: "\x1b[32m",
    warn: "\x1b[33m",
    error: "\x1b[31m",
    fatal: "\x1b[41m\x1b[37m",
  };
  return codes[level];
}

const RESET = "\x1b[0m";

// ---------------------------- Factory --------------------------------

class GateLogger implements Logger {
  level: LogLevelName;
  private base: Bindings;

  constructor(level: LogLevelName, bindings?: Bindings) {
    this.level = level;
    this.base = { service: SERVICE, env: ENV, pid: process.pid, ...bindings };
  }

  isLevelEnabled(level: LogLevelName) {
    return LEVELS[level] >= LEVELS[this.level];
  }

  child(bindings?: Bindings): Logger {
    return new GateLogger(this.level, { ...this.base, ...bindings });
  }

  private write(level: LogLevelName, msg: string, fields?: Bindings) {
    if (!this.isLevelEnabled(level)) return;

    const store = ctx.getStore();
    const merged = redact({ ...(store?.bindings || {}), ...(fields || {}) });

    const ts = new Date().toISOString();
    const rec: Record<string, unknown> = {
      ts,
      level,
      lvl: LEVELS[level],
      msg,
      ...this.base,
      correlation_id: store?.correlation_id,
      ...(isRecord(merged) ? merged : {}),
    };

    if (ENV === "production" || !isTTY()) {
      process.stdout.write(JSON.stringify(rec) + "\n");
    } else {
      const head = `${color(level)}${level.toUpperCase()}${RESET}`;
      const { ts: _ts, level: _level, lvl: _lvl, msg: _msg, ...rest } = rec;
      const restStr = Object.keys(rest).length ? "\n  " + JSON.stringify(rest, null, 2) : "";
      process.stdout.write(`${ts} ${head} ${msg}${restStr}\n`);
    }
  }

  trace(msg: string, fields?: Bindings) { this.write("trace", msg, fields); }
  debug(msg: string, fields?: Bindings) { this.write("debug", msg, fields); }
  info(msg: string, fields?: Bindings)  { this.write("info", msg, fields); }
  warn(msg: string, fields?: Bindings)  { this.write("warn", msg, fields); }
  error(msg: string, fields?: Bindings) { this.write("error", msg, fields); }
  fatal(msg: string, fields?: Bindings) { this.write("fatal", msg, fields); }
}

// Singleton logger used across the service
export const log: Logger = new GateLogger(DEFAULT_LEVEL);

export function createLogger(opts?: { level?: LogLevelName; bindings?: Bindings }): Logger {
  return new GateLogger(opts?.level || DEFAULT_LEVEL, opts?.bindings);
}

// ------------------------ Request context -----------------------------

export interface ContextInit {
  correlation_id?: string;
  headers?: Record<string, unknown>;
  bindings?: Bindings;
}

function headerLookup(h: ContextInit["headers"], key: string): string | undefined {
  if (!h) return undefined;
  const value = h[key.toLowerCase()];
  if (typeof value === "string" && value) return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
}

export function runWithRequestContext<T>(init: ContextInit, fn: () => T): T {
  const cid =
    init.correlation_id ||
    headerLookup(init.headers, "x-correlation-id") ||
    headerLookup(init.headers, "x-request-id") ||
    randomUUID();

  return ctx.run({ correlation_id: cid, bindings: init.bindings }, fn);
}

export function getCorrelationId(): string | undefined {
  return ctx.getStore()?.correlation_id;
}

// Convenient helper for error serialization when logging
export function safeError(err: unknown) {
  return serializeError(err);
}
