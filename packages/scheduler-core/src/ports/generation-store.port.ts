// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/generation-store`
 * Purpose: Batch/task repository port used by admission, the executor and the reconciler.
 * Scope: Defines contract for batch and task persistence. Does not contain implementations.
 * Invariants:
 * - Every status write is a single conditional UPDATE guarded on the current status;
 *   methods returning boolean report whether a row matched the guard
 * - claimTask: pending|queued → running, at most one caller ever observes true
 * - Executor writes (progress, complete, fail) only apply while status = running
 * - Soft-deleted rows are invisible to every read and excluded from counts and the queue rebuild
 * - writeBatchCounters is called only by the reconciler's recompute step
 * - admitBatch is one transaction: owner lock, idempotency re-check, balance check, batch,
 *   debit, tasks, idempotency key
 * - A key still inside its replay window is never repointed at another batch
 * Side-effects: none (interface definition only)
 * Links: packages/db-client/src/adapters/drizzle-generation.adapter.ts
 * @public
 */

import type { BatchId, TaskId, UserId } from "@clipqueue/ids";

import type {
  Batch,
  BatchCounters,
  GenerationParams,
  Task,
  TaskStatusCounts,
} from "../types";

export interface AdmitBatchInput {
  readonly batchId: BatchId;
  readonly ownerId: UserId;
  readonly params: GenerationParams;
  /** One id per requested unit; tasks are created in `queued` */
  readonly taskIds: readonly TaskId[];
  /** Positive; written as a single negative `batch_debit` transaction */
  readonly totalCost: number;
  readonly idempotencyKey: string | null;
  /** A stored key created at or after this instant is still replayable */
  readonly replayableSince: Date;
}

export type AdmitBatchResult =
  | { readonly kind: "admitted"; readonly batch: Batch }
  /** The key was claimed by a submission inside the window; nothing was written */
  | { readonly kind: "replayed"; readonly batchId: BatchId | null };

export interface IdempotencyRecord {
  readonly batchId: BatchId | null;
  readonly createdAt: Date;
}

export interface ProgressUpdate {
  readonly progress: string | null;
  readonly remoteStartedAt: Date | null;
  readonly remoteFinishedAt: Date | null;
}

export interface BatchPage {
  readonly items: Batch[];
  readonly total: number;
}

/**
 * Function properties (not methods) for contravariant param checking on branded types.
 */
export interface GenerationStore {
  /**
   * Admits a batch atomically, or reports the replayable batch already
   * holding `idempotencyKey` once the owner lock is held.
   * @throws InsufficientCreditsError when Σ delta < totalCost; nothing is written
   */
  admitBatch: (input: AdmitBatchInput) => Promise<AdmitBatchResult>;

  findIdempotencyKey: (
    ownerId: UserId,
    key: string
  ) => Promise<IdempotencyRecord | null>;

  getBatch: (batchId: BatchId) => Promise<Batch | null>;

  /** Newest first */
  listBatches: (
    ownerId: UserId,
    page: { limit: number; offset: number }
  ) => Promise<BatchPage>;

  getTask: (taskId: TaskId) => Promise<Task | null>;

  /** Oldest first */
  listBatchTasks: (batchId: BatchId) => Promise<Task[]>;

  /** pending|queued tasks in creation order, for the queue rebuild */
  listQueueableTaskIds: () => Promise<TaskId[]>;

  /**
   * Tasks the reconciler should look at: running and not updated since
   * `staleBefore`, or carrying a result locator while not completed.
   */
  listDriftedTasks: (staleBefore: Date) => Promise<Task[]>;

  claimTask: (taskId: TaskId) => Promise<boolean>;

  recordRemoteJob: (taskId: TaskId, remoteJobId: string) => Promise<void>;

  recordProgress: (taskId: TaskId, update: ProgressUpdate) => Promise<void>;

  /** Locator and status are written together */
  completeTask: (
    taskId: TaskId,
    resultLocator: string,
    remoteFinishedAt: Date | null
  ) => Promise<boolean>;

  failTask: (taskId: TaskId, errorSummary: string) => Promise<boolean>;

  /** Reconciler rule 1: locator present, status not completed → completed */
  markCompletedFromLocator: (taskId: TaskId) => Promise<boolean>;

  /** Reconciler rule 2: running and updatedAt < staleBefore → failed */
  failStaleTask: (
    taskId: TaskId,
    staleBefore: Date,
    errorSummary: string
  ) => Promise<boolean>;

  /** failed → queued; clears error, progress, locator and remote job; retries + 1 */
  requeueFailedTask: (taskId: TaskId) => Promise<boolean>;

  /** pending|queued|running → cancelled */
  cancelTask: (taskId: TaskId) => Promise<boolean>;

  softDeleteTask: (taskId: TaskId) => Promise<boolean>;

  /** Cancels non-terminal tasks, then soft-deletes the batch and all its tasks */
  softDeleteBatch: (batchId: BatchId) => Promise<boolean>;

  /** Non-deleted tasks grouped by status */
  countTasksByStatus: (batchId: BatchId) => Promise<TaskStatusCounts>;

  writeBatchCounters: (
    batchId: BatchId,
    counters: BatchCounters
  ) => Promise<void>;
}
