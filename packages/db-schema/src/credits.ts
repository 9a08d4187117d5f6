// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-schema/credits`
 * Purpose: Append-only credit ledger and submission idempotency tables.
 * Scope: Defines credit_transactions and idempotency_keys. Does not contain queries or logic.
 * Invariants:
 * - credit_transactions is append-only: rows are never updated or deleted
 * - balance(owner) = SUM(delta) over the owner's rows; no cached balance exists anywhere
 * - Refund dedup is check-then-insert on (task_ref, delta > 0); there is deliberately no
 *   unique index yet (single-process claim model), see credit_tx_task_refund_idx
 * - idempotency_keys are scoped per owner
 * Side-effects: none (schema definitions only)
 * Links: packages/ledger-core/src/store.ts
 * @public
 */

import {
  bigint,
  bigserial,
  index,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

import { batches, tasks } from "./generation";
import { users } from "./refs";

export const creditTransactions = pgTable(
  "credit_transactions",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    ownerId: text("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    /** Signed: negative = debit, positive = credit/refund */
    delta: bigint("delta", { mode: "number" }).notNull(),
    reason: text("reason").notNull(),
    batchRef: uuid("batch_ref").references(() => batches.id, {
      onDelete: "set null",
    }),
    taskRef: uuid("task_ref").references(() => tasks.id, {
      onDelete: "set null",
    }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    ownerIdx: index("credit_tx_owner_idx").on(table.ownerId),
    /** Refund lookup; not unique (see module invariants) */
    taskRefundIdx: index("credit_tx_task_refund_idx").on(
      table.taskRef,
      table.delta
    ),
    batchRefIdx: index("credit_tx_batch_ref_idx").on(table.batchRef),
  })
);

/**
 * Client-supplied Idempotency-Key → batch mapping.
 * Re-recorded (created_at refreshed) when a key is reused outside the replay window.
 */
export const idempotencyKeys = pgTable(
  "idempotency_keys",
  {
    ownerId: text("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    key: text("key").notNull(),
    batchId: uuid("batch_id").references(() => batches.id, {
      onDelete: "set null",
    }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.ownerId, table.key] }),
  })
);
