// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers and flush them on exit. Does not handle request-scoped logging.
 * Invariants: Always emits JSON to stdout; silenced under Vitest or NODE_ENV=test. Safe to call at module scope (no env validation).
 * Side-effects: none until a logger writes
 * Notes: Reads logging-specific env vars directly (NODE_ENV, LOG_LEVEL, SERVICE_NAME) so boot errors can be logged before env() validates.
 * Links: services/generation-worker/src/main.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

const created: Logger[] = [];

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "generation-worker";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";
  const sync = nodeEnv !== "production";

  const logger = pino(
    {
      level,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, app: "clipqueue", service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    // Sync in dev for immediate crash visibility, buffered in prod
    pino.destination(sync ? { dest: 1, sync } : { dest: 1, sync, minLength: 4096 })
  );
  created.push(logger);
  return logger;
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Flush buffered output of every logger made by makeLogger (call before process.exit). */
export function flushLogger(): void {
  for (const logger of created) {
    logger.flush();
  }
}
