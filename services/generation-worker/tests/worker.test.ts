// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/tests/worker`
 * Purpose: End-to-end flow through the assembled worker: submit → schedule → execute → settle.
 * Scope: createGenerationWorker over in-memory fakes. Ticks are driven by hand; loops are not started.
 * Side-effects: none
 * Links: src/worker.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import type { WorkerSettings } from "../src/bootstrap/container.js";
import { createGenerationWorker } from "../src/worker.js";
import { snapshot } from "./_fakes/fake-remote-job-client.js";
import { createHarness, createRequest, FIXED_IDS } from "./fixtures.js";

const SETTINGS: WorkerSettings = {
  globalConcurrency: 4,
  perUserConcurrency: 2,
  tickMs: 100,
  pollIntervalMs: 1_000,
  maxPollMs: 60_000,
  staleRunningMs: 1_800_000,
  reconcileIntervalMs: 300_000,
  maxTasksPerBatch: 10,
  maxPromptLength: 500,
  maxBatchesPerMinute: 5,
  idempotencyWindowMs: 60_000,
};

function setup() {
  const harness = createHarness();
  const worker = createGenerationWorker({
    store: harness.store,
    ledger: harness.store,
    remote: harness.remote,
    clock: harness.clock,
    sleep: harness.clock.sleep,
    settings: SETTINGS,
    logger: harness.logger,
  });
  return { ...harness, worker };
}

describe("createGenerationWorker", () => {
  it("runs a submitted batch to completion", async () => {
    const ctx = setup();
    ctx.store.grantCredits(FIXED_IDS.ownerA, 100);
    ctx.remote.scriptPolls(
      snapshot({ progress: "30%" }),
      snapshot({ status: "completed", resultLocator: "https://cdn.test/out.mp4" })
    );

    const { batchId, totalCost } = await ctx.worker.submitBatch(
      FIXED_IDS.ownerA,
      createRequest({ count: 2 })
    );
    expect(totalCost).toBe(30);
    expect(ctx.worker.scheduler.queueLength).toBe(2);

    expect(await ctx.worker.scheduler.tick()).toBe("dispatched");
    expect(await ctx.worker.scheduler.tick()).toBe("dispatched");
    await ctx.worker.scheduler.drain();

    const tasks = await ctx.worker.batches.listBatchTasks(FIXED_IDS.ownerA, batchId);
    expect(tasks.map((t) => t.status)).toEqual(["completed", "completed"]);
    expect((await ctx.worker.batches.getBatch(FIXED_IDS.ownerA, batchId)).counters).toEqual({
      total: 2,
      queued: 0,
      running: 0,
      completed: 2,
      failed: 0,
      cancelled: 0,
    });
    expect(await ctx.worker.batches.getBalance(FIXED_IDS.ownerA)).toBe(70);
  });

  it("re-runs a retried task through the same queue", async () => {
    const ctx = setup();
    ctx.store.grantCredits(FIXED_IDS.ownerA, 100);
    ctx.remote.scriptPolls(snapshot({ status: "failed", error: "overloaded" }));

    const { batchId } = await ctx.worker.submitBatch(FIXED_IDS.ownerA, createRequest());
    await ctx.worker.scheduler.tick();
    await ctx.worker.scheduler.drain();

    const [failedTask] = await ctx.worker.batches.listBatchTasks(FIXED_IDS.ownerA, batchId);
    if (!failedTask) throw new Error("task missing");
    expect(failedTask.status).toBe("failed");
    expect(await ctx.worker.batches.getBalance(FIXED_IDS.ownerA)).toBe(100);

    ctx.remote.scriptPolls(
      snapshot({ status: "completed", resultLocator: "https://cdn.test/retry.mp4" })
    );
    await ctx.worker.batches.retryTask(FIXED_IDS.ownerA, failedTask.id);
    expect(await ctx.worker.scheduler.tick()).toBe("dispatched");
    await ctx.worker.scheduler.drain();

    expect(await ctx.store.getTask(failedTask.id)).toMatchObject({
      status: "completed",
      retries: 1,
      resultLocator: "https://cdn.test/retry.mp4",
    });
    expect(ctx.remote.created.map((p) => p.idempotencyKey)).toEqual([
      `task-${failedTask.id}-0`,
      `task-${failedTask.id}-1`,
    ]);
  });

  it("restores the queue on start and drains on shutdown", async () => {
    const ctx = setup();
    ctx.store.grantCredits(FIXED_IDS.ownerA, 100);
    const { batchId } = await ctx.worker.submitBatch(
      FIXED_IDS.ownerA,
      createRequest({ count: 2 })
    );

    // A fresh worker over the same store sees the tasks again
    const restarted = createGenerationWorker({
      store: ctx.store,
      ledger: ctx.store,
      remote: ctx.remote,
      clock: ctx.clock,
      sleep: ctx.clock.sleep,
      settings: SETTINGS,
      logger: ctx.logger,
    });
    await restarted.start();
    expect(restarted.scheduler.queueLength).toBe(2);
    await restarted.shutdown();

    const batch = await restarted.batches.getBatch(FIXED_IDS.ownerA, batchId);
    expect(batch.counters.total).toBe(2);
  });
});
