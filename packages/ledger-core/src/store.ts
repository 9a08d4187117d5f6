// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core/store`
 * Purpose: Port interface for the credit ledger store. Shared by admission, executor and reconciler.
 * Scope: Type definitions only. Does not contain implementations or I/O.
 * Invariants:
 * - CREDIT_APPEND_ONLY: no method updates or deletes a transaction
 * - BALANCE_IS_SUM: getBalance returns Σ delta over the owner's transactions
 * - REFUND_ONCE: refundTaskOnce writes nothing when a delta > 0 row already references the task.
 *   Check-then-insert without a unique constraint: race-free only under the single-process claim model.
 * Side-effects: none
 * Links: packages/db-client/src/adapters/drizzle-credit-ledger.adapter.ts
 * @public
 */

import type { UserId } from "@clipqueue/ids";

import type {
  AppendTransactionParams,
  CreditTransaction,
  TaskRefundParams,
} from "./model";

export interface CreditLedgerStore {
  getBalance(ownerId: UserId): Promise<number>;
  /** Oldest first */
  listTransactions(ownerId: UserId): Promise<CreditTransaction[]>;
  appendTransaction(params: AppendTransactionParams): Promise<CreditTransaction>;
  /**
   * Idempotent refund. Returns the inserted transaction, or null when the task
   * already has a refund.
   */
  refundTaskOnce(params: TaskRefundParams): Promise<CreditTransaction | null>;
}
