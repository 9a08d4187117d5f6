// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/batches/batch-service`
 * Purpose: Owner-scoped reads and explicit task/batch operations (retry, cancel, delete) plus credit queries.
 * Scope: Application service over the store ports. Does not schedule or poll.
 * Invariants:
 * - Every operation checks ownership; foreign and missing records both surface as not-found
 * - Reading a batch's tasks runs the reconciler for that batch first
 * - retry: failed → queued only, no new debit; the task re-enters the queue like a fresh submission
 * - cancel: pending|queued|running → cancelled, no refund
 * - Counters are recomputed after each operation that changes a task
 * Side-effects: IO (store, ledger), in-memory queue
 * Links: services/generation-worker/src/reconcile/reconciler.ts
 * @internal
 */

import type { BatchId, TaskId, UserId } from "@clipqueue/ids";
import {
  buildManualAdjustment,
  type CreditTransaction,
} from "@clipqueue/ledger-core";
import {
  assertTransition,
  type Batch,
  BatchNotFoundError,
  InvalidTaskTransitionError,
  type Task,
  TaskNotFoundError,
} from "@clipqueue/scheduler-core";
import type { Logger } from "pino";

import type { CreditLedgerStore, GenerationStore } from "../ports/index.js";
import type { Reconciler } from "../reconcile/reconciler.js";

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 50;

export interface BatchListPage {
  readonly items: Batch[];
  readonly page: number;
  readonly pageSize: number;
  readonly total: number;
  readonly totalPages: number;
}

export interface BatchServiceDeps {
  readonly store: GenerationStore;
  readonly ledger: CreditLedgerStore;
  readonly reconciler: Pick<Reconciler, "reconcileBatch" | "recomputeBatch">;
  readonly enqueue: (...taskIds: TaskId[]) => void;
  readonly logger: Logger;
}

export class BatchService {
  constructor(private readonly deps: BatchServiceDeps) {}

  async listBatches(
    ownerId: UserId,
    page = 1,
    pageSize = DEFAULT_PAGE_SIZE
  ): Promise<BatchListPage> {
    const safePage = Math.max(1, Math.floor(page));
    const safeSize = Math.max(1, Math.min(MAX_PAGE_SIZE, Math.floor(pageSize)));
    const { items, total } = await this.deps.store.listBatches(ownerId, {
      limit: safeSize,
      offset: (safePage - 1) * safeSize,
    });
    return {
      items,
      page: safePage,
      pageSize: safeSize,
      total,
      totalPages: Math.ceil(total / safeSize),
    };
  }

  async getBatch(ownerId: UserId, batchId: BatchId): Promise<Batch> {
    return this.ownedBatch(ownerId, batchId);
  }

  /** Reconciles the batch, then returns its non-deleted tasks oldest first. */
  async listBatchTasks(ownerId: UserId, batchId: BatchId): Promise<Task[]> {
    await this.ownedBatch(ownerId, batchId);
    await this.deps.reconciler.reconcileBatch(batchId);
    return this.deps.store.listBatchTasks(batchId);
  }

  async retryTask(ownerId: UserId, taskId: TaskId): Promise<Task> {
    const task = await this.ownedTask(ownerId, taskId);
    // Only failed → queued is user-requestable
    if (task.status !== "failed") {
      throw new InvalidTaskTransitionError(task.id, task.status, "queued");
    }

    if (!(await this.deps.store.requeueFailedTask(task.id))) {
      const latest = await this.ownedTask(ownerId, taskId);
      throw new InvalidTaskTransitionError(task.id, latest.status, "queued");
    }

    this.deps.enqueue(task.id);
    await this.deps.reconciler.recomputeBatch(task.batchId);
    this.deps.logger.info(
      { taskId: task.id, batchId: task.batchId, ownerId, retries: task.retries + 1 },
      "Task re-queued for retry"
    );
    return this.ownedTask(ownerId, taskId);
  }

  async cancelTask(ownerId: UserId, taskId: TaskId): Promise<Task> {
    const task = await this.ownedTask(ownerId, taskId);
    assertTransition(task.id, task.status, "cancelled");

    if (!(await this.deps.store.cancelTask(task.id))) {
      const latest = await this.ownedTask(ownerId, taskId);
      throw new InvalidTaskTransitionError(task.id, latest.status, "cancelled");
    }

    await this.deps.reconciler.recomputeBatch(task.batchId);
    this.deps.logger.info(
      { taskId: task.id, batchId: task.batchId, ownerId, previousStatus: task.status },
      "Task cancelled"
    );
    return this.ownedTask(ownerId, taskId);
  }

  async deleteTask(ownerId: UserId, taskId: TaskId): Promise<void> {
    const task = await this.ownedTask(ownerId, taskId);
    if (!(await this.deps.store.softDeleteTask(task.id))) {
      throw new TaskNotFoundError(taskId);
    }
    await this.deps.reconciler.recomputeBatch(task.batchId);
    this.deps.logger.info({ taskId: task.id, batchId: task.batchId, ownerId }, "Task deleted");
  }

  async deleteBatch(ownerId: UserId, batchId: BatchId): Promise<void> {
    await this.ownedBatch(ownerId, batchId);
    if (!(await this.deps.store.softDeleteBatch(batchId))) {
      throw new BatchNotFoundError(batchId);
    }
    await this.deps.reconciler.recomputeBatch(batchId);
    this.deps.logger.info({ batchId, ownerId }, "Batch deleted");
  }

  async getBalance(ownerId: UserId): Promise<number> {
    return this.deps.ledger.getBalance(ownerId);
  }

  async listTransactions(ownerId: UserId): Promise<CreditTransaction[]> {
    return this.deps.ledger.listTransactions(ownerId);
  }

  /**
   * Manual credit/debit by an operator.
   * @throws InvalidCreditAdjustmentError for a zero/fractional delta or a bad reason
   */
  async adjustCredits(
    ownerId: UserId,
    delta: number,
    reason: string
  ): Promise<{ transaction: CreditTransaction; balance: number }> {
    const entry = buildManualAdjustment({ ownerId, delta, reason });
    const transaction = await this.deps.ledger.appendTransaction(entry);
    const balance = await this.deps.ledger.getBalance(ownerId);
    this.deps.logger.info(
      { ownerId, delta, reason: entry.reason, balance },
      "Credits adjusted"
    );
    return { transaction, balance };
  }

  private async ownedBatch(ownerId: UserId, batchId: BatchId): Promise<Batch> {
    const batch = await this.deps.store.getBatch(batchId);
    if (!batch || batch.ownerId !== ownerId) {
      throw new BatchNotFoundError(batchId);
    }
    return batch;
  }

  private async ownedTask(ownerId: UserId, taskId: TaskId): Promise<Task> {
    const task = await this.deps.store.getTask(taskId);
    if (!task || task.ownerId !== ownerId) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }
}
