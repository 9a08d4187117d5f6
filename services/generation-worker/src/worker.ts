// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/worker`
 * Purpose: Assembles admission, scheduler, executor, reconciler and batch operations into one worker.
 * Scope: Lifecycle (start: rebuild queue, start loops; shutdown: stop loops, drain units) and the public
 *   operation surface. Does not construct adapters (see bootstrap/container.ts).
 * Invariants:
 * - One Scheduler and one Reconciler per worker; no module-level singletons
 * - start() restores the queue from the store before the loop's first tick
 * - shutdown() stops intake first, then waits for every in-flight execution unit
 * Side-effects: timers (via Scheduler and Reconciler)
 * Links: services/generation-worker/src/main.ts
 * @public
 */

import { SlidingWindowRateLimiter } from "./admission/rate-limiter.js";
import { createSubmitBatch, type SubmitBatch } from "./admission/submit-batch.js";
import { BatchService } from "./batches/batch-service.js";
import type { ServiceContainer } from "./bootstrap/container.js";
import { createTaskRunner } from "./executor/execute-task.js";
import { Scheduler } from "./executor/scheduler.js";
import { Reconciler } from "./reconcile/reconciler.js";

export interface GenerationWorker {
  readonly submitBatch: SubmitBatch;
  readonly batches: BatchService;
  readonly scheduler: Scheduler;
  readonly reconciler: Reconciler;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export function createGenerationWorker(
  container: Omit<ServiceContainer, "close">
): GenerationWorker {
  const { store, ledger, remote, clock, sleep, settings, logger } = container;

  const reconciler = new Reconciler({
    store,
    ledger,
    clock,
    logger: logger.child({ component: "reconciler" }),
    config: {
      staleRunningMs: settings.staleRunningMs,
      intervalMs: settings.reconcileIntervalMs,
    },
  });

  const runTask = createTaskRunner({
    store,
    ledger,
    remote,
    clock,
    sleep,
    logger: logger.child({ component: "executor" }),
    counters: reconciler,
    config: {
      pollIntervalMs: settings.pollIntervalMs,
      maxPollMs: settings.maxPollMs,
    },
  });

  const scheduler = new Scheduler({
    store,
    runTask,
    logger: logger.child({ component: "scheduler" }),
    config: {
      globalConcurrency: settings.globalConcurrency,
      perUserConcurrency: settings.perUserConcurrency,
      tickMs: settings.tickMs,
    },
  });

  const enqueue = scheduler.enqueue.bind(scheduler);

  const submitBatch = createSubmitBatch({
    store,
    rateLimiter: new SlidingWindowRateLimiter({
      limit: settings.maxBatchesPerMinute,
      clock,
    }),
    clock,
    logger: logger.child({ component: "admission" }),
    counters: reconciler,
    enqueue,
    config: {
      maxPromptLength: settings.maxPromptLength,
      maxTasksPerBatch: settings.maxTasksPerBatch,
      idempotencyWindowMs: settings.idempotencyWindowMs,
    },
  });

  const batches = new BatchService({
    store,
    ledger,
    reconciler,
    enqueue,
    logger: logger.child({ component: "batches" }),
  });

  return {
    submitBatch,
    batches,
    scheduler,
    reconciler,

    async start() {
      await scheduler.restoreQueue();
      scheduler.start();
      reconciler.start();
    },

    async shutdown() {
      await scheduler.stop();
      await reconciler.stop();
      await scheduler.drain();
      logger.info({}, "Generation worker drained");
    },
  };
}
