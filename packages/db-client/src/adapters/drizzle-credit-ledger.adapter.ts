// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-client/adapters/drizzle-credit-ledger`
 * Purpose: DrizzleCreditLedgerAdapter for the append-only credit ledger.
 * Scope: Implements CreditLedgerStore with Drizzle ORM. Does not decide when to refund.
 * Invariants:
 * - Only INSERT and SELECT against credit_transactions; never UPDATE or DELETE
 * - Balance is SUM(delta), computed on every read
 * - refundTaskOnce checks for a positive row referencing the task inside the same transaction
 *   as the insert; without a unique index this is race-free only under one claimant per task
 * Side-effects: IO (database operations)
 * Links: packages/ledger-core/src/store.ts
 * @public
 */

import { creditTransactions } from "@clipqueue/db-schema";
import { toBatchId, toTaskId, toUserId, type UserId } from "@clipqueue/ids";
import {
  type AppendTransactionParams,
  buildTaskRefund,
  type CreditLedgerStore,
  type CreditTransaction,
  type TaskRefundParams,
} from "@clipqueue/ledger-core";
import { and, asc, eq, gt, sql } from "drizzle-orm";

import type { Database, Executor, LoggerLike } from "../client";
import { NOOP_LOGGER } from "../client";

/**
 * Σ delta for one owner. Shared with admission, which runs it under the owner row lock.
 */
export async function selectBalance(
  executor: Executor,
  ownerId: UserId
): Promise<number> {
  const [row] = await executor
    .select({
      balance: sql<number>`coalesce(sum(${creditTransactions.delta}), 0)`.mapWith(
        Number
      ),
    })
    .from(creditTransactions)
    .where(eq(creditTransactions.ownerId, ownerId));
  return row?.balance ?? 0;
}

export function toCreditTransaction(
  row: typeof creditTransactions.$inferSelect
): CreditTransaction {
  return {
    id: row.id,
    ownerId: toUserId(row.ownerId),
    delta: row.delta,
    reason: row.reason,
    batchRef: row.batchRef ? toBatchId(row.batchRef) : null,
    taskRef: row.taskRef ? toTaskId(row.taskRef) : null,
    createdAt: row.createdAt,
  };
}

export class DrizzleCreditLedgerAdapter implements CreditLedgerStore {
  private readonly logger: LoggerLike;

  constructor(
    private readonly db: Database,
    logger?: LoggerLike
  ) {
    this.logger = logger ?? NOOP_LOGGER;
  }

  async getBalance(ownerId: UserId): Promise<number> {
    return selectBalance(this.db, ownerId);
  }

  async listTransactions(ownerId: UserId): Promise<CreditTransaction[]> {
    const rows = await this.db
      .select()
      .from(creditTransactions)
      .where(eq(creditTransactions.ownerId, ownerId))
      .orderBy(asc(creditTransactions.id));
    return rows.map(toCreditTransaction);
  }

  async appendTransaction(
    params: AppendTransactionParams
  ): Promise<CreditTransaction> {
    const [row] = await this.db
      .insert(creditTransactions)
      .values({
        ownerId: params.ownerId,
        delta: params.delta,
        reason: params.reason,
        batchRef: params.batchRef ?? null,
        taskRef: params.taskRef ?? null,
      })
      .returning();

    if (!row) {
      throw new Error("Failed to insert credit transaction");
    }

    this.logger.info(
      { ownerId: params.ownerId, delta: params.delta, reason: params.reason },
      "Appended credit transaction"
    );
    return toCreditTransaction(row);
  }

  async refundTaskOnce(
    params: TaskRefundParams
  ): Promise<CreditTransaction | null> {
    const entry = buildTaskRefund(params);

    return this.db.transaction(async (tx) => {
      const [existing] = await tx
        .select({ id: creditTransactions.id })
        .from(creditTransactions)
        .where(
          and(
            eq(creditTransactions.taskRef, params.taskId),
            gt(creditTransactions.delta, 0)
          )
        )
        .limit(1);

      if (existing) {
        this.logger.debug(
          { taskId: params.taskId, existingTransactionId: existing.id },
          "Refund already recorded, skipping"
        );
        return null;
      }

      const [row] = await tx
        .insert(creditTransactions)
        .values({
          ownerId: entry.ownerId,
          delta: entry.delta,
          reason: entry.reason,
          batchRef: entry.batchRef ?? null,
          taskRef: entry.taskRef ?? null,
        })
        .returning();

      if (!row) {
        throw new Error("Failed to insert refund transaction");
      }

      this.logger.info(
        {
          taskId: params.taskId,
          batchId: params.batchId,
          ownerId: params.ownerId,
          amount: params.amount,
        },
        "Refunded task"
      );
      return toCreditTransaction(row);
    });
  }
}
