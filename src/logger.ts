/**
 * logger.ts — Structured Logging for the ULS importer
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * Built on pino.
 *
 * Configuration:
 *   CALLBOOK_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   CALLBOOK_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   CALLBOOK_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.import.info({ phase: "merge" }, "merge complete");
 *   log.fetch.warn({ url }, "probe failed");
 *
 * Subsystem loggers:
 *   log.boot, log.import, log.fetch, log.db, log.provenance
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

type RunMode = "test" | "dev" | "prod";

function runMode(env: NodeJS.ProcessEnv): RunMode {
  if (env.NODE_ENV === "test" || env.VITEST === "true") return "test";
  return env.NODE_ENV === "production" ? "prod" : "dev";
}

/** Resolve log level from environment: explicit level, then debug flag, then run mode. */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.CALLBOOK_LOG_LEVEL) {
    return env.CALLBOOK_LOG_LEVEL;
  }
  const debugEnv = (env.CALLBOOK_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  const mode = runMode(env);
  if (mode === "test") return "silent";
  return mode === "dev" ? "debug" : "info";
}

/** pino-pretty for interactive runs; JSON lines for the scheduler. */
function resolveTransport(env: NodeJS.ProcessEnv): pino.TransportSingleOptions | undefined {
  const mode = runMode(env);
  if (mode === "test") return undefined;

  const pretty = env.CALLBOOK_LOG_PRETTY === "true" || (env.CALLBOOK_LOG_PRETTY !== "false" && mode === "dev");
  if (!pretty) return undefined;

  return {
    target: "pino-pretty",
    options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname,service" },
  };
}

/** Root logger options for a given environment. Output is plain pino JSON lines unless pretty-printed. */
export function loggerOptions(env: NodeJS.ProcessEnv = process.env): pino.LoggerOptions {
  const transport = resolveTransport(env);
  return {
    level: resolveLevel(env),
    ...(transport ? { transport } : {}),
    base: { service: "uls-callbook" },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Connection strings carry the database password.
    redact: {
      paths: [
        "password", "*.password",
        "databaseUrl", "*.databaseUrl",
        "connectionString", "*.connectionString",
      ],
      censor: "[REDACTED]",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

export const rootLogger: Logger = pino(loggerOptions());

// ─── Subsystem Child Loggers ────────────────────────────────────

export const log = {
  /** CLI startup and config resolution */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Run coordinator phases and outcomes */
  import: rootLogger.child({ subsystem: "import" }),
  /** Upstream probe, download and extraction */
  fetch: rootLogger.child({ subsystem: "fetch" }),
  /** Schema, staging loads, merges, diagnostics */
  db: rootLogger.child({ subsystem: "db" }),
  /** Provenance record reads and writes */
  provenance: rootLogger.child({ subsystem: "provenance" }),
  root: rootLogger,
};

export type { Logger };
