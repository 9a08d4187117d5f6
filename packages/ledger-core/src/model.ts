// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core/model`
 * Purpose: Domain types and enums for the append-only credit ledger.
 * Scope: Pure types and constants. Does not contain business logic or perform I/O.
 * Invariants: delta is a signed integer; transactions are never updated or deleted.
 * Side-effects: none
 * Links: packages/db-schema/src/credits.ts
 * @public
 */

import type { BatchId, TaskId, UserId } from "@clipqueue/ids";

/** Reason tags written by this service */
export const CREDIT_REASONS = [
  "batch_debit",
  "task_refund",
  "manual_adjustment",
] as const;
export type CreditReason = (typeof CREDIT_REASONS)[number];

export interface CreditTransaction {
  readonly id: number;
  readonly ownerId: UserId;
  /** Negative = debit, positive = credit/refund */
  readonly delta: number;
  /** Reason tag, optionally suffixed with ":<detail>" (e.g. "manual_adjustment:promo") */
  readonly reason: string;
  readonly batchRef: BatchId | null;
  readonly taskRef: TaskId | null;
  readonly createdAt: Date;
}

export interface AppendTransactionParams {
  readonly ownerId: UserId;
  readonly delta: number;
  readonly reason: string;
  readonly batchRef?: BatchId | null;
  readonly taskRef?: TaskId | null;
}

/** Refund of one task's unit cost back to its owner */
export interface TaskRefundParams {
  readonly ownerId: UserId;
  readonly taskId: TaskId;
  readonly batchId: BatchId;
  readonly amount: number;
}
