// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-client/adapters/drizzle-generation`
 * Purpose: DrizzleGenerationAdapter for batch and task persistence.
 * Scope: Implements GenerationStore with Drizzle ORM. Does not schedule, poll or decide refunds.
 * Invariants:
 * - Every status write is `UPDATE ... WHERE id = $1 AND status IN (...)`; the returned row count
 *   is the only signal of whether the transition happened
 * - claimTask is the single path into `running`
 * - admitBatch locks the owner row FOR UPDATE so concurrent admissions for one owner
 *   see each other's debits and idempotency keys before writing
 * - An idempotency key is only overwritten once it is older than `replayableSince`
 * - Soft-deleted rows (deleted_at IS NOT NULL) are filtered from every read
 * Side-effects: IO (database operations)
 * Links: packages/scheduler-core/src/ports/generation-store.port.ts
 * @public
 */

import {
  batches,
  creditTransactions,
  idempotencyKeys,
  tasks,
  users,
} from "@clipqueue/db-schema";
import {
  type BatchId,
  type TaskId,
  toBatchId,
  toTaskId,
  toUserId,
  type UserId,
} from "@clipqueue/ids";
import { buildBatchDebit, InsufficientCreditsError } from "@clipqueue/ledger-core";
import {
  type AdmitBatchInput,
  type AdmitBatchResult,
  type Batch,
  type BatchCounters,
  type BatchPage,
  CANCELLABLE_STATUSES,
  CLAIMABLE_STATUSES,
  type GenerationStore,
  type IdempotencyRecord,
  type ProgressUpdate,
  type Task,
  type TaskStatusCounts,
} from "@clipqueue/scheduler-core";
import {
  and,
  asc,
  count,
  desc,
  eq,
  inArray,
  isNotNull,
  isNull,
  lt,
  ne,
  or,
  sql,
} from "drizzle-orm";

import type { Database, LoggerLike } from "../client";
import { NOOP_LOGGER } from "../client";
import { selectBalance } from "./drizzle-credit-ledger.adapter";

type TaskRow = typeof tasks.$inferSelect;
type BatchRow = typeof batches.$inferSelect;

export class DrizzleGenerationAdapter implements GenerationStore {
  private readonly logger: LoggerLike;

  constructor(
    private readonly db: Database,
    logger?: LoggerLike
  ) {
    this.logger = logger ?? NOOP_LOGGER;
  }

  async admitBatch(input: AdmitBatchInput): Promise<AdmitBatchResult> {
    const { params } = input;
    const debit = buildBatchDebit({
      ownerId: input.ownerId,
      batchId: input.batchId,
      totalCost: input.totalCost,
    });

    const result = await this.db.transaction(async (tx): Promise<AdmitBatchResult> => {
      // Users are provisioned elsewhere; make sure the lock target exists
      await tx.insert(users).values({ id: input.ownerId }).onConflictDoNothing();
      await tx
        .select({ id: users.id })
        .from(users)
        .where(eq(users.id, input.ownerId))
        .for("update");

      if (input.idempotencyKey !== null) {
        const [existing] = await tx
          .select()
          .from(idempotencyKeys)
          .where(
            and(
              eq(idempotencyKeys.ownerId, input.ownerId),
              eq(idempotencyKeys.key, input.idempotencyKey)
            )
          )
          .limit(1);
        if (existing && existing.createdAt >= input.replayableSince) {
          return {
            kind: "replayed",
            batchId: existing.batchId ? toBatchId(existing.batchId) : null,
          };
        }
      }

      const balance = await selectBalance(tx, input.ownerId);
      if (balance < input.totalCost) {
        throw new InsufficientCreditsError(
          input.ownerId,
          input.totalCost,
          balance
        );
      }

      const now = new Date();
      const [batchRow] = await tx
        .insert(batches)
        .values({
          id: input.batchId,
          ownerId: input.ownerId,
          prompt: params.prompt,
          model: params.model,
          orientation: params.orientation,
          size: params.size,
          duration: params.duration,
          requestedCount: input.taskIds.length,
          mediaRef: params.mediaRef,
          createdAt: now,
          updatedAt: now,
        })
        .returning();

      if (!batchRow) {
        throw new Error("Failed to insert batch");
      }

      await tx.insert(creditTransactions).values({
        ownerId: debit.ownerId,
        delta: debit.delta,
        reason: debit.reason,
        batchRef: debit.batchRef ?? null,
        taskRef: null,
      });

      await tx.insert(tasks).values(
        input.taskIds.map((id) => ({
          id,
          batchId: input.batchId,
          ownerId: input.ownerId,
          prompt: params.prompt,
          model: params.model,
          orientation: params.orientation,
          size: params.size,
          duration: params.duration,
          mediaRef: params.mediaRef,
          status: "queued" as const,
          createdAt: now,
          updatedAt: now,
        }))
      );

      if (input.idempotencyKey !== null) {
        await tx
          .insert(idempotencyKeys)
          .values({
            ownerId: input.ownerId,
            key: input.idempotencyKey,
            batchId: input.batchId,
            createdAt: now,
          })
          .onConflictDoUpdate({
            target: [idempotencyKeys.ownerId, idempotencyKeys.key],
            set: { batchId: input.batchId, createdAt: now },
          });
      }

      return { kind: "admitted", batch: this.toBatch(batchRow) };
    });

    if (result.kind === "replayed") {
      this.logger.info(
        { ownerId: input.ownerId, batchId: result.batchId },
        "Idempotency key already held; batch not admitted"
      );
      return result;
    }

    this.logger.info(
      {
        batchId: input.batchId,
        ownerId: input.ownerId,
        taskCount: input.taskIds.length,
        totalCost: input.totalCost,
      },
      "Admitted batch"
    );
    return result;
  }

  async findIdempotencyKey(
    ownerId: UserId,
    key: string
  ): Promise<IdempotencyRecord | null> {
    const [row] = await this.db
      .select()
      .from(idempotencyKeys)
      .where(and(eq(idempotencyKeys.ownerId, ownerId), eq(idempotencyKeys.key, key)))
      .limit(1);
    if (!row) return null;
    return {
      batchId: row.batchId ? toBatchId(row.batchId) : null,
      createdAt: row.createdAt,
    };
  }

  async getBatch(batchId: BatchId): Promise<Batch | null> {
    const [row] = await this.db
      .select()
      .from(batches)
      .where(and(eq(batches.id, batchId), isNull(batches.deletedAt)))
      .limit(1);
    return row ? this.toBatch(row) : null;
  }

  async listBatches(
    ownerId: UserId,
    page: { limit: number; offset: number }
  ): Promise<BatchPage> {
    const visible = and(eq(batches.ownerId, ownerId), isNull(batches.deletedAt));

    const [rows, totals] = await Promise.all([
      this.db
        .select()
        .from(batches)
        .where(visible)
        .orderBy(desc(batches.createdAt), desc(batches.id))
        .limit(page.limit)
        .offset(page.offset),
      this.db.select({ value: count() }).from(batches).where(visible),
    ]);

    return {
      items: rows.map((row) => this.toBatch(row)),
      total: totals[0]?.value ?? 0,
    };
  }

  async getTask(taskId: TaskId): Promise<Task | null> {
    const [row] = await this.db
      .select()
      .from(tasks)
      .where(and(eq(tasks.id, taskId), isNull(tasks.deletedAt)))
      .limit(1);
    return row ? this.toTask(row) : null;
  }

  async listBatchTasks(batchId: BatchId): Promise<Task[]> {
    const rows = await this.db
      .select()
      .from(tasks)
      .where(and(eq(tasks.batchId, batchId), isNull(tasks.deletedAt)))
      .orderBy(asc(tasks.createdAt), asc(tasks.id));
    return rows.map((row) => this.toTask(row));
  }

  async listQueueableTaskIds(): Promise<TaskId[]> {
    const rows = await this.db
      .select({ id: tasks.id })
      .from(tasks)
      .where(
        and(inArray(tasks.status, [...CLAIMABLE_STATUSES]), isNull(tasks.deletedAt))
      )
      .orderBy(asc(tasks.createdAt), asc(tasks.id));
    return rows.map((row) => toTaskId(row.id));
  }

  async listDriftedTasks(staleBefore: Date): Promise<Task[]> {
    const rows = await this.db
      .select()
      .from(tasks)
      .where(
        and(
          isNull(tasks.deletedAt),
          or(
            and(eq(tasks.status, "running"), lt(tasks.updatedAt, staleBefore)),
            and(isNotNull(tasks.resultLocator), ne(tasks.status, "completed"))
          )
        )
      )
      .orderBy(asc(tasks.batchId), asc(tasks.createdAt));
    return rows.map((row) => this.toTask(row));
  }

  async claimTask(taskId: TaskId): Promise<boolean> {
    const rows = await this.db
      .update(tasks)
      .set({ status: "running", updatedAt: new Date() })
      .where(
        and(
          eq(tasks.id, taskId),
          inArray(tasks.status, [...CLAIMABLE_STATUSES]),
          isNull(tasks.deletedAt)
        )
      )
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async recordRemoteJob(
    taskId: TaskId,
    remoteJobId: string
  ): Promise<void> {
    await this.db
      .update(tasks)
      .set({ remoteJobId, updatedAt: new Date() })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "running")));
  }

  async recordProgress(
    taskId: TaskId,
    update: ProgressUpdate
  ): Promise<void> {
    await this.db
      .update(tasks)
      .set({
        progress: update.progress,
        remoteStartedAt: update.remoteStartedAt,
        remoteFinishedAt: update.remoteFinishedAt,
        updatedAt: new Date(),
      })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "running")));
  }

  async completeTask(
    taskId: TaskId,
    resultLocator: string,
    remoteFinishedAt: Date | null
  ): Promise<boolean> {
    const rows = await this.db
      .update(tasks)
      .set({
        status: "completed",
        resultLocator,
        errorSummary: null,
        remoteFinishedAt: remoteFinishedAt ?? sql`${tasks.remoteFinishedAt}`,
        updatedAt: new Date(),
      })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "running")))
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async failTask(taskId: TaskId, errorSummary: string): Promise<boolean> {
    const rows = await this.db
      .update(tasks)
      .set({ status: "failed", errorSummary, updatedAt: new Date() })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "running")))
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async markCompletedFromLocator(taskId: TaskId): Promise<boolean> {
    const rows = await this.db
      .update(tasks)
      .set({ status: "completed", errorSummary: null, updatedAt: new Date() })
      .where(
        and(
          eq(tasks.id, taskId),
          isNotNull(tasks.resultLocator),
          ne(tasks.status, "completed"),
          isNull(tasks.deletedAt)
        )
      )
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async failStaleTask(
    taskId: TaskId,
    staleBefore: Date,
    errorSummary: string
  ): Promise<boolean> {
    const rows = await this.db
      .update(tasks)
      .set({ status: "failed", errorSummary, updatedAt: new Date() })
      .where(
        and(
          eq(tasks.id, taskId),
          eq(tasks.status, "running"),
          lt(tasks.updatedAt, staleBefore),
          isNull(tasks.deletedAt)
        )
      )
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async requeueFailedTask(taskId: TaskId): Promise<boolean> {
    const rows = await this.db
      .update(tasks)
      .set({
        status: "queued",
        errorSummary: null,
        progress: null,
        resultLocator: null,
        remoteJobId: null,
        remoteStartedAt: null,
        remoteFinishedAt: null,
        retries: sql`${tasks.retries} + 1`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(tasks.id, taskId),
          eq(tasks.status, "failed"),
          isNull(tasks.deletedAt)
        )
      )
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async cancelTask(taskId: TaskId): Promise<boolean> {
    const rows = await this.db
      .update(tasks)
      .set({ status: "cancelled", updatedAt: new Date() })
      .where(
        and(
          eq(tasks.id, taskId),
          inArray(tasks.status, [...CANCELLABLE_STATUSES]),
          isNull(tasks.deletedAt)
        )
      )
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async softDeleteTask(taskId: TaskId): Promise<boolean> {
    const now = new Date();
    const rows = await this.db
      .update(tasks)
      .set({ deletedAt: now, updatedAt: now })
      .where(and(eq(tasks.id, taskId), isNull(tasks.deletedAt)))
      .returning({ id: tasks.id });
    return rows.length === 1;
  }

  async softDeleteBatch(batchId: BatchId): Promise<boolean> {
    const deleted = await this.db.transaction(async (tx) => {
      const now = new Date();
      await tx
        .update(tasks)
        .set({ status: "cancelled", updatedAt: now })
        .where(
          and(
            eq(tasks.batchId, batchId),
            inArray(tasks.status, [...CANCELLABLE_STATUSES]),
            isNull(tasks.deletedAt)
          )
        );
      await tx
        .update(tasks)
        .set({ deletedAt: now })
        .where(and(eq(tasks.batchId, batchId), isNull(tasks.deletedAt)));
      const rows = await tx
        .update(batches)
        .set({ deletedAt: now, updatedAt: now })
        .where(and(eq(batches.id, batchId), isNull(batches.deletedAt)))
        .returning({ id: batches.id });
      return rows.length === 1;
    });

    if (deleted) {
      this.logger.info({ batchId }, "Soft-deleted batch");
    }
    return deleted;
  }

  async countTasksByStatus(batchId: BatchId): Promise<TaskStatusCounts> {
    const rows = await this.db
      .select({ status: tasks.status, value: count() })
      .from(tasks)
      .where(and(eq(tasks.batchId, batchId), isNull(tasks.deletedAt)))
      .groupBy(tasks.status);

    const counts: TaskStatusCounts = {};
    for (const row of rows) {
      counts[row.status] = row.value;
    }
    return counts;
  }

  async writeBatchCounters(
    batchId: BatchId,
    counters: BatchCounters
  ): Promise<void> {
    await this.db
      .update(batches)
      .set({
        totalCount: counters.total,
        queuedCount: counters.queued,
        runningCount: counters.running,
        completedCount: counters.completed,
        failedCount: counters.failed,
        cancelledCount: counters.cancelled,
        updatedAt: new Date(),
      })
      .where(eq(batches.id, batchId));
  }

  private toTask(row: TaskRow): Task {
    return {
      id: toTaskId(row.id),
      batchId: toBatchId(row.batchId),
      ownerId: toUserId(row.ownerId),
      prompt: row.prompt,
      model: row.model,
      orientation: row.orientation,
      size: row.size,
      duration: row.duration,
      mediaRef: row.mediaRef,
      status: row.status,
      errorSummary: row.errorSummary,
      progress: row.progress,
      remoteJobId: row.remoteJobId,
      resultLocator: row.resultLocator,
      retries: row.retries,
      remoteStartedAt: row.remoteStartedAt,
      remoteFinishedAt: row.remoteFinishedAt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
      deletedAt: row.deletedAt,
    };
  }

  private toBatch(row: BatchRow): Batch {
    return {
      id: toBatchId(row.id),
      ownerId: toUserId(row.ownerId),
      prompt: row.prompt,
      model: row.model,
      orientation: row.orientation,
      size: row.size,
      duration: row.duration,
      mediaRef: row.mediaRef,
      requestedCount: row.requestedCount,
      counters: {
        total: row.totalCount,
        queued: row.queuedCount,
        running: row.runningCount,
        completed: row.completedCount,
        failed: row.failedCount,
        cancelled: row.cancelledCount,
      },
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
      deletedAt: row.deletedAt,
    };
  }
}
