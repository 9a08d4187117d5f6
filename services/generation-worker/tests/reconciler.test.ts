// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/tests/reconciler`
 * Purpose: Unit tests for drift healing (locator → completed, stale running → failed + refund) and counters.
 * Scope: Reconciler over the in-memory store under a FakeClock.
 * Side-effects: none
 * Links: src/reconcile/reconciler.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import {
  createHarness,
  DEFAULT_UNIT_COST,
  FIXED_IDS,
  seedBatch,
  STALE_RUNNING_MS,
  taskIds,
} from "./fixtures.js";

const LOCATOR = "https://cdn.test/recovered.mp4";

describe("Reconciler", () => {
  describe("stale running tasks", () => {
    it("fails and refunds a task with no update past the threshold", async () => {
      const harness = createHarness();
      const [id] = (await seedBatch(harness, { taskIds: taskIds(1, 1) })).taskIds;
      if (!id) throw new Error("seed failed");
      await harness.store.claimTask(id);
      harness.clock.advance(STALE_RUNNING_MS + 1);

      const report = await harness.reconciler.reconcileBatch(FIXED_IDS.batch1);

      expect(report).toEqual({ inspected: 1, completed: 0, failed: 1, refunded: 1, errors: 0 });
      expect(await harness.store.getTask(id)).toMatchObject({
        status: "failed",
        errorSummary: "Timed out: no provider update for 1800s while running",
      });
      expect(await harness.store.getBalance(FIXED_IDS.ownerA)).toBe(DEFAULT_UNIT_COST);
      expect((await harness.store.getBatch(FIXED_IDS.batch1))?.counters).toEqual({
        total: 1,
        queued: 0,
        running: 0,
        completed: 0,
        failed: 1,
        cancelled: 0,
      });
    });

    it("leaves a task updated exactly at the threshold alone", async () => {
      const harness = createHarness();
      const [id] = (await seedBatch(harness, { taskIds: taskIds(1, 1) })).taskIds;
      if (!id) throw new Error("seed failed");
      await harness.store.claimTask(id);
      harness.clock.advance(STALE_RUNNING_MS);

      const report = await harness.reconciler.reconcileBatch(FIXED_IDS.batch1);

      expect(report.failed).toBe(0);
      expect((await harness.store.getTask(id))?.status).toBe("running");
    });

    it("refunds once across repeated passes", async () => {
      const harness = createHarness();
      const [id] = (await seedBatch(harness, { taskIds: taskIds(1, 1) })).taskIds;
      if (!id) throw new Error("seed failed");
      await harness.store.claimTask(id);
      harness.clock.advance(STALE_RUNNING_MS + 1);

      await harness.reconciler.reconcileBatch(FIXED_IDS.batch1);
      const second = await harness.reconciler.reconcileBatch(FIXED_IDS.batch1);
      await harness.reconciler.sweep();

      expect(second).toEqual({ inspected: 1, completed: 0, failed: 0, refunded: 0, errors: 0 });
      expect(harness.store.refundsFor(id)).toHaveLength(1);
    });

    it("does not touch queued tasks however old", async () => {
      const harness = createHarness();
      const [id] = (await seedBatch(harness, { taskIds: taskIds(1, 1) })).taskIds;
      if (!id) throw new Error("seed failed");
      harness.clock.advance(STALE_RUNNING_MS * 10);

      await harness.reconciler.reconcileBatch(FIXED_IDS.batch1);

      expect((await harness.store.getTask(id))?.status).toBe("queued");
    });
  });

  describe("result locator healing", () => {
    it("completes a failed task that carries a result locator", async () => {
      const harness = createHarness();
      const [id] = (await seedBatch(harness, { taskIds: taskIds(1, 1) })).taskIds;
      if (!id) throw new Error("seed failed");
      harness.store.patchTask(id, {
        status: "failed",
        errorSummary: "lost connection",
        resultLocator: LOCATOR,
      });

      const report = await harness.reconciler.reconcileBatch(FIXED_IDS.batch1);

      expect(report).toMatchObject({ completed: 1, failed: 0 });
      expect(await harness.store.getTask(id)).toMatchObject({
        status: "completed",
        resultLocator: LOCATOR,
        errorSummary: null,
      });
      expect((await harness.store.getBatch(FIXED_IDS.batch1))?.counters.completed).toBe(1);
    });

    it("prefers the locator over staleness and does not refund", async () => {
      const harness = createHarness();
      const [id] = (await seedBatch(harness, { taskIds: taskIds(1, 1) })).taskIds;
      if (!id) throw new Error("seed failed");
      await harness.store.claimTask(id);
      harness.store.patchTask(id, { resultLocator: LOCATOR });
      harness.clock.advance(STALE_RUNNING_MS + 1);

      const report = await harness.reconciler.reconcileBatch(FIXED_IDS.batch1);

      expect(report).toEqual({ inspected: 1, completed: 1, failed: 0, refunded: 0, errors: 0 });
      expect(harness.store.refundsFor(id)).toHaveLength(0);
    });
  });

  describe("sweep", () => {
    it("heals drifted tasks across batches and recomputes each batch", async () => {
      const harness = createHarness();
      const [a] = (await seedBatch(harness, { taskIds: taskIds(1, 2) })).taskIds;
      const [b] = (
        await seedBatch(harness, {
          ownerId: FIXED_IDS.ownerB,
          batchId: FIXED_IDS.batch2,
          taskIds: taskIds(2, 1),
        })
      ).taskIds;
      if (!a || !b) throw new Error("seed failed");
      await harness.store.claimTask(a);
      harness.store.patchTask(b, { status: "cancelled", resultLocator: LOCATOR });
      harness.clock.advance(STALE_RUNNING_MS + 1);

      const report = await harness.reconciler.sweep();

      expect(report).toEqual({ inspected: 2, completed: 1, failed: 1, refunded: 1, errors: 0 });
      expect((await harness.store.getBatch(FIXED_IDS.batch1))?.counters).toMatchObject({
        total: 2,
        queued: 1,
        failed: 1,
      });
      expect((await harness.store.getBatch(FIXED_IDS.batch2))?.counters).toMatchObject({
        total: 1,
        completed: 1,
        cancelled: 0,
      });
    });

    it("counts a failing correction as an error and keeps going", async () => {
      const harness = createHarness();
      const [first, second] = (await seedBatch(harness, { taskIds: taskIds(1, 2) })).taskIds;
      if (!first || !second) throw new Error("seed failed");
      await harness.store.claimTask(first);
      await harness.store.claimTask(second);
      harness.clock.advance(STALE_RUNNING_MS + 1);
      vi.spyOn(harness.store, "failStaleTask").mockRejectedValueOnce(new Error("deadlock"));

      const report = await harness.reconciler.sweep();

      expect(report).toEqual({ inspected: 2, completed: 0, failed: 1, refunded: 1, errors: 1 });
      expect((await harness.store.getTask(first))?.status).toBe("running");
      expect((await harness.store.getTask(second))?.status).toBe("failed");
    });

    it("ignores soft-deleted tasks", async () => {
      const harness = createHarness();
      const [id] = (await seedBatch(harness, { taskIds: taskIds(1, 1) })).taskIds;
      if (!id) throw new Error("seed failed");
      await harness.store.claimTask(id);
      await harness.store.softDeleteTask(id);
      harness.clock.advance(STALE_RUNNING_MS + 1);

      const report = await harness.reconciler.sweep();

      expect(report.inspected).toBe(0);
    });
  });

  describe("recomputeBatch", () => {
    it("excludes deleted tasks and folds pending into queued", async () => {
      const harness = createHarness();
      const [a, b, c] = (await seedBatch(harness, { taskIds: taskIds(1, 3) })).taskIds;
      if (!a || !b || !c) throw new Error("seed failed");
      harness.store.patchTask(a, { status: "pending" });
      await harness.store.softDeleteTask(c);

      const counters = await harness.reconciler.recomputeBatch(FIXED_IDS.batch1);

      expect(counters).toEqual({
        total: 2,
        queued: 2,
        running: 0,
        completed: 0,
        failed: 0,
        cancelled: 0,
      });
    });

    it("returns null instead of throwing when the store fails", async () => {
      const harness = createHarness();
      vi.spyOn(harness.store, "countTasksByStatus").mockRejectedValueOnce(new Error("timeout"));

      expect(await harness.reconciler.recomputeBatch(FIXED_IDS.batch1)).toBeNull();
    });
  });
});
