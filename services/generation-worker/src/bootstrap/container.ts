// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/bootstrap/container`
 * Purpose: Composition root: wires concrete adapters to port interfaces.
 * Scope: All adapter construction lives here. Returns typed container against port interfaces.
 * Invariants:
 * - Only file that imports concrete adapter packages (@clipqueue/db-client) and the HTTP provider client
 * - admission/, executor/, reconcile/ and batches/ import ports only, never this module
 * Side-effects: Creates DB connection pool
 * Links: services/generation-worker/src/ports/index.ts
 * @internal
 */

import {
  closeDbClient,
  createDbClient,
  DrizzleCreditLedgerAdapter,
  DrizzleGenerationAdapter,
} from "@clipqueue/db-client";
import type { Logger } from "pino";

import { HttpRemoteJobClient } from "../adapters/remote/http-remote-job.client.js";
import { SystemClock, systemSleep } from "../adapters/time/system-clock.js";
import type {
  Clock,
  CreditLedgerStore,
  GenerationStore,
  RemoteJobClient,
  Sleep,
} from "../ports/index.js";
import type { Env } from "./env.js";

/** Env values converted to the units the components take */
export interface WorkerSettings {
  readonly globalConcurrency: number;
  readonly perUserConcurrency: number;
  readonly tickMs: number;
  readonly pollIntervalMs: number;
  readonly maxPollMs: number;
  readonly staleRunningMs: number;
  readonly reconcileIntervalMs: number;
  readonly maxTasksPerBatch: number;
  readonly maxPromptLength: number;
  readonly maxBatchesPerMinute: number;
  readonly idempotencyWindowMs: number;
}

/**
 * Service container: all deps typed against port interfaces.
 */
export interface ServiceContainer {
  store: GenerationStore;
  ledger: CreditLedgerStore;
  remote: RemoteJobClient;
  clock: Clock;
  sleep: Sleep;
  settings: WorkerSettings;
  logger: Logger;
  /** Release pooled resources (DB connections) */
  close: () => Promise<void>;
}

export function toWorkerSettings(config: Env): WorkerSettings {
  return {
    globalConcurrency: config.GLOBAL_CONCURRENCY,
    perUserConcurrency: config.PER_USER_CONCURRENCY,
    tickMs: config.SCHEDULER_TICK_MS,
    pollIntervalMs: config.POLL_INTERVAL_SECONDS * 1000,
    maxPollMs: config.MAX_POLL_SECONDS * 1000,
    staleRunningMs: config.STALE_RUNNING_SECONDS * 1000,
    reconcileIntervalMs: config.RECONCILE_INTERVAL_SECONDS * 1000,
    maxTasksPerBatch: config.MAX_TASKS_PER_BATCH,
    maxPromptLength: config.MAX_PROMPT_LENGTH,
    maxBatchesPerMinute: config.MAX_BATCHES_PER_USER_PER_MINUTE,
    idempotencyWindowMs: config.IDEMPOTENCY_WINDOW_SECONDS * 1000,
  };
}

/**
 * Build the service container from validated env and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(config: Env, logger: Logger): ServiceContainer {
  const db = createDbClient(config.DATABASE_URL, {
    globalConcurrency: config.GLOBAL_CONCURRENCY,
  });

  return {
    store: new DrizzleGenerationAdapter(
      db,
      logger.child({ component: "generation-store" })
    ),
    ledger: new DrizzleCreditLedgerAdapter(
      db,
      logger.child({ component: "credit-ledger" })
    ),
    remote: new HttpRemoteJobClient(
      {
        apiBase: config.PROVIDER_API_BASE,
        apiKey: config.PROVIDER_API_KEY,
        requestTimeoutMs: config.PROVIDER_REQUEST_TIMEOUT_SECONDS * 1000,
      },
      logger.child({ component: "remote-job-client" })
    ),
    clock: new SystemClock(),
    sleep: systemSleep,
    settings: toWorkerSettings(config),
    logger,
    close: () => closeDbClient(db),
  };
}
