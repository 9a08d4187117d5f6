// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction, no side-effects beyond process.env read.
 * Invariants:
 * - DATABASE_URL and PROVIDER_API_KEY required (treat both as secrets)
 * - Every numeric knob is a positive integer with a default
 * - STALE_RUNNING_SECONDS outlasts the longest an execution unit can stay running
 *   (create + MAX_POLL_SECONDS + one poll interval + the final poll), so the sweep never fails a live unit
 * - Fails fast with one line per invalid key
 * Side-effects: Reads process.env
 * Links: services/generation-worker/src/bootstrap/container.ts
 * @internal
 */

import { z } from "zod";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/** Longest an execution unit can hold a task in `running`, in seconds */
function maxUnitRunSeconds(env: {
  MAX_POLL_SECONDS: number;
  POLL_INTERVAL_SECONDS: number;
  PROVIDER_REQUEST_TIMEOUT_SECONDS: number;
}): number {
  return env.MAX_POLL_SECONDS + env.POLL_INTERVAL_SECONDS + 2 * env.PROVIDER_REQUEST_TIMEOUT_SECONDS;
}

export const EnvSchema = z
  .object({
    /** PostgreSQL connection string (required) */
    DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),

    /** Remote job provider base URL */
    PROVIDER_API_BASE: z
      .string()
      .url("PROVIDER_API_BASE must be a valid URL")
      .default("https://api.example.com/v1"),

    /** Provider bearer token (required, treat as secret - never log) */
    PROVIDER_API_KEY: z.string().min(1, "PROVIDER_API_KEY is required"),

    /** Per-request timeout for provider HTTP calls */
    PROVIDER_REQUEST_TIMEOUT_SECONDS: positiveInt(300),

    /** Max execution units in flight across all owners */
    GLOBAL_CONCURRENCY: positiveInt(10),

    /** Max execution units in flight for one owner */
    PER_USER_CONCURRENCY: positiveInt(10),

    MAX_TASKS_PER_BATCH: positiveInt(50),
    MAX_PROMPT_LENGTH: positiveInt(3000),

    /** Sliding 60s admission window */
    MAX_BATCHES_PER_USER_PER_MINUTE: positiveInt(10),

    /** Replay window for Idempotency-Key */
    IDEMPOTENCY_WINDOW_SECONDS: positiveInt(60),

    SCHEDULER_TICK_MS: positiveInt(100),
    POLL_INTERVAL_SECONDS: positiveInt(3),
    MAX_POLL_SECONDS: positiveInt(900),

    /** A running task untouched for this long is failed and refunded by the reconciler */
    STALE_RUNNING_SECONDS: positiveInt(1800),
    RECONCILE_INTERVAL_SECONDS: positiveInt(300),

    /** Log level (default: info) */
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .default("info"),

    /** Service name for logging (default: generation-worker) */
    SERVICE_NAME: z.string().default("generation-worker"),

    /** Health endpoint port (default: 9000) */
    HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  })
  .superRefine((value, ctx) => {
    const longestRun = maxUnitRunSeconds(value);
    if (value.STALE_RUNNING_SECONDS <= longestRun) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["STALE_RUNNING_SECONDS"],
        message: `must be greater than ${longestRun} (MAX_POLL_SECONDS + POLL_INTERVAL_SECONDS + 2 x PROVIDER_REQUEST_TIMEOUT_SECONDS)`,
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parses an env-like record. Exposed for tests; production code calls env().
 * @throws Error listing every invalid key
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
