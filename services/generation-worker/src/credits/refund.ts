// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/credits/refund`
 * Purpose: Refund a failed task's unit cost back to its owner, at most once.
 * Scope: Shared by the executor (provider error, timeout) and the reconciler (stale running).
 * Invariants:
 * - Amount = unitCost of the task's own (model, duration, size)
 * - Dedup is delegated to CreditLedgerStore.refundTaskOnce
 * Side-effects: IO (ledger write)
 * Links: packages/ledger-core/src/store.ts
 * @internal
 */

import { type CreditTransaction, unitCost } from "@clipqueue/ledger-core";
import type { Task } from "@clipqueue/scheduler-core";
import type { Logger } from "pino";

import type { CreditLedgerStore } from "../ports/index.js";

export async function refundFailedTask(
  deps: { ledger: CreditLedgerStore; logger: Logger },
  task: Pick<Task, "id" | "batchId" | "ownerId" | "model" | "duration" | "size">
): Promise<CreditTransaction | null> {
  const amount = unitCost(task.model, task.duration, task.size);
  const refund = await deps.ledger.refundTaskOnce({
    ownerId: task.ownerId,
    taskId: task.id,
    batchId: task.batchId,
    amount,
  });

  if (refund) {
    deps.logger.info(
      { taskId: task.id, batchId: task.batchId, ownerId: task.ownerId, amount },
      "Refunded failed task"
    );
  } else {
    deps.logger.debug(
      { taskId: task.id, batchId: task.batchId },
      "Task already refunded"
    );
  }
  return refund;
}
