// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/reconcile/reconciler`
 * Purpose: Heals drift between task rows and what the executor managed to persist, and owns batch counters.
 * Scope: Two per-task corrective rules plus counter recompute, on read and on a background interval.
 * Invariants:
 * - Rule 1: result locator present and status != completed → completed
 * - Rule 2: running and not updated within the staleness threshold → failed (timeout reason) + idempotent refund
 * - recomputeBatch is the only writer of batch counters
 * - Corrections are per task: a failing write is logged and retried on the next sweep; nothing is thrown to readers
 * Side-effects: IO (store reads/writes, ledger writes, interval timer)
 * Links: packages/scheduler-core/src/counters.ts
 * @internal
 */

import type { BatchId } from "@clipqueue/ids";
import {
  type BatchCounters,
  deriveBatchCounters,
  type Task,
} from "@clipqueue/scheduler-core";
import type { Logger } from "pino";

import { refundFailedTask } from "../credits/refund.js";
import type {
  Clock,
  CreditLedgerStore,
  GenerationStore,
} from "../ports/index.js";

export type Correction = "completed_from_locator" | "failed_stale";

export interface ReconcileReport {
  readonly inspected: number;
  readonly completed: number;
  readonly failed: number;
  readonly refunded: number;
  readonly errors: number;
}

export interface ReconcilerConfig {
  readonly staleRunningMs: number;
  readonly intervalMs: number;
}

export interface ReconcilerDeps {
  readonly store: GenerationStore;
  readonly ledger: CreditLedgerStore;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly config: ReconcilerConfig;
}

interface MutableReport {
  inspected: number;
  completed: number;
  failed: number;
  refunded: number;
  errors: number;
}

function emptyReport(): MutableReport {
  return { inspected: 0, completed: 0, failed: 0, refunded: 0, errors: 0 };
}

export class Reconciler {
  private timer: NodeJS.Timeout | null = null;
  private sweeping: Promise<ReconcileReport> | null = null;

  constructor(private readonly deps: ReconcilerDeps) {}

  get staleReason(): string {
    const seconds = Math.round(this.deps.config.staleRunningMs / 1000);
    return `Timed out: no provider update for ${seconds}s while running`;
  }

  /**
   * Recount non-deleted tasks by status and persist the counters.
   * Returns null (and logs) when the store fails.
   */
  async recomputeBatch(batchId: BatchId): Promise<BatchCounters | null> {
    try {
      const counts = await this.deps.store.countTasksByStatus(batchId);
      const counters = deriveBatchCounters(counts);
      await this.deps.store.writeBatchCounters(batchId, counters);
      return counters;
    } catch (err) {
      this.deps.logger.error({ err, batchId }, "Failed to recompute batch counters");
      return null;
    }
  }

  /** Read-path reconciliation for one batch. */
  async reconcileBatch(batchId: BatchId): Promise<ReconcileReport> {
    const report = emptyReport();
    let tasks: Task[];
    try {
      tasks = await this.deps.store.listBatchTasks(batchId);
    } catch (err) {
      this.deps.logger.error({ err, batchId }, "Failed to load batch tasks for reconciliation");
      report.errors += 1;
      return report;
    }

    const changed = await this.healAll(tasks, this.staleBefore(), report);
    if (changed) {
      await this.recomputeBatch(batchId);
    }
    return report;
  }

  /** Background pass over every drifted task in the store. */
  async sweep(): Promise<ReconcileReport> {
    if (this.sweeping) return this.sweeping;
    this.sweeping = this.runSweep().finally(() => {
      this.sweeping = null;
    });
    return this.sweeping;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        this.deps.logger.error({ err }, "Reconciliation sweep failed");
      });
    }, this.deps.config.intervalMs);
    this.timer.unref();
    this.deps.logger.info(
      { intervalMs: this.deps.config.intervalMs },
      "Reconciler started"
    );
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.sweeping) {
      await this.sweeping;
    }
  }

  private staleBefore(): Date {
    return new Date(
      this.deps.clock.now().getTime() - this.deps.config.staleRunningMs
    );
  }

  private async runSweep(): Promise<ReconcileReport> {
    const report = emptyReport();
    const staleBefore = this.staleBefore();

    let drifted: Task[];
    try {
      drifted = await this.deps.store.listDriftedTasks(staleBefore);
    } catch (err) {
      this.deps.logger.error({ err }, "Failed to list drifted tasks");
      report.errors += 1;
      return report;
    }

    const byBatch = new Map<BatchId, Task[]>();
    for (const task of drifted) {
      const group = byBatch.get(task.batchId) ?? [];
      group.push(task);
      byBatch.set(task.batchId, group);
    }

    for (const [batchId, tasks] of byBatch) {
      const changed = await this.healAll(tasks, staleBefore, report);
      if (changed) {
        await this.recomputeBatch(batchId);
      }
    }

    if (report.completed + report.failed + report.errors > 0) {
      this.deps.logger.info({ ...report }, "Reconciliation sweep finished");
    }
    return report;
  }

  private async healAll(
    tasks: readonly Task[],
    staleBefore: Date,
    report: MutableReport
  ): Promise<boolean> {
    let changed = false;
    for (const task of tasks) {
      report.inspected += 1;
      try {
        const correction = await this.healTask(task, staleBefore, report);
        if (correction) changed = true;
      } catch (err) {
        report.errors += 1;
        this.deps.logger.error(
          { err, taskId: task.id, batchId: task.batchId },
          "Task correction failed; will retry on next sweep"
        );
      }
    }
    return changed;
  }

  private async healTask(
    task: Task,
    staleBefore: Date,
    report: MutableReport
  ): Promise<Correction | null> {
    const { store, logger } = this.deps;

    if (task.resultLocator !== null && task.status !== "completed") {
      if (await store.markCompletedFromLocator(task.id)) {
        report.completed += 1;
        logger.warn(
          { taskId: task.id, batchId: task.batchId, previousStatus: task.status },
          "Healed task with result locator to completed"
        );
        return "completed_from_locator";
      }
      return null;
    }

    if (task.status === "running" && task.updatedAt < staleBefore) {
      if (await store.failStaleTask(task.id, staleBefore, this.staleReason)) {
        report.failed += 1;
        logger.warn(
          { taskId: task.id, batchId: task.batchId, ownerId: task.ownerId },
          "Failed stale running task"
        );
        const refund = await refundFailedTask(this.deps, task);
        if (refund) report.refunded += 1;
        return "failed_stale";
      }
    }
    return null;
  }
}
