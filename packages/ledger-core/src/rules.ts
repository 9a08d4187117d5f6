// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core/rules`
 * Purpose: Balance derivation and ledger entry construction.
 * Scope: Pure functions. Does not perform I/O or mutate external state.
 * Invariants:
 * - balance = Σ delta, always; nothing in the system stores a balance
 * - A task is refunded at most once: any transaction with delta > 0 referencing it counts as its refund
 * - Debits are negative, refunds positive, adjustments non-zero
 * Side-effects: none
 * Links: packages/ledger-core/src/store.ts
 * @public
 */

import type { BatchId, TaskId, UserId } from "@clipqueue/ids";

import { InvalidCreditAdjustmentError } from "./errors";
import type {
  AppendTransactionParams,
  CreditTransaction,
  TaskRefundParams,
} from "./model";

export const MAX_ADJUSTMENT_REASON_LENGTH = 64;

/**
 * Sum of signed deltas. The only way a balance is ever produced.
 */
export function computeBalance(
  transactions: readonly Pick<CreditTransaction, "delta">[]
): number {
  let balance = 0;
  for (const tx of transactions) {
    balance += tx.delta;
  }
  return balance;
}

/**
 * True when `tx` is a refund for `taskId` (dedup key: task reference + positive sign).
 */
export function isRefundFor(
  tx: Pick<CreditTransaction, "taskRef" | "delta">,
  taskId: TaskId
): boolean {
  return tx.taskRef === taskId && tx.delta > 0;
}

export function hasRefundFor(
  transactions: readonly Pick<CreditTransaction, "taskRef" | "delta">[],
  taskId: TaskId
): boolean {
  return transactions.some((tx) => isRefundFor(tx, taskId));
}

export function buildBatchDebit(params: {
  ownerId: UserId;
  batchId: BatchId;
  totalCost: number;
}): AppendTransactionParams {
  if (!Number.isInteger(params.totalCost) || params.totalCost <= 0) {
    throw new RangeError(
      `Batch debit must be a positive integer, got ${params.totalCost}`
    );
  }
  return {
    ownerId: params.ownerId,
    delta: -params.totalCost,
    reason: "batch_debit",
    batchRef: params.batchId,
    taskRef: null,
  };
}

export function buildTaskRefund(
  params: TaskRefundParams
): AppendTransactionParams {
  if (!Number.isInteger(params.amount) || params.amount <= 0) {
    throw new RangeError(
      `Task refund must be a positive integer, got ${params.amount}`
    );
  }
  return {
    ownerId: params.ownerId,
    delta: params.amount,
    reason: "task_refund",
    batchRef: params.batchId,
    taskRef: params.taskId,
  };
}

/**
 * Validates and builds a manual adjustment entry.
 * @throws {@link InvalidCreditAdjustmentError} on zero/non-integer delta or bad reason
 */
export function buildManualAdjustment(params: {
  ownerId: UserId;
  delta: number;
  reason: string;
}): AppendTransactionParams {
  const reason = params.reason.trim();
  if (!Number.isInteger(params.delta) || params.delta === 0) {
    throw new InvalidCreditAdjustmentError(
      "delta must be a non-zero integer"
    );
  }
  if (reason.length === 0 || reason.length > MAX_ADJUSTMENT_REASON_LENGTH) {
    throw new InvalidCreditAdjustmentError(
      `reason must be 1-${MAX_ADJUSTMENT_REASON_LENGTH} characters`
    );
  }
  return {
    ownerId: params.ownerId,
    delta: params.delta,
    reason: `manual_adjustment:${reason}`,
    batchRef: null,
    taskRef: null,
  };
}
