// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-schema/refs`
 * Purpose: FK target tables - canonical home for tables referenced across domain slices.
 * Scope: Defines the users table only. Does not contain domain-specific tables.
 * Invariants:
 * - This is the ROOT of the schema DAG - imports nothing from other slices
 * - All cross-slice FK references point to tables defined here
 * - No balance column: a user's balance is always derived from credit_transactions
 * Side-effects: none (schema definitions only)
 * Links: packages/db-schema/src/credits.ts
 * @public
 */

import { pgTable, text, timestamp } from "drizzle-orm/pg-core";

/**
 * Users table - owner of batches, tasks and credit transactions.
 * Identity and sessions are managed outside this service; rows are referenced only.
 * Admission locks the owner's row (SELECT ... FOR UPDATE) to serialise debits.
 */
export const users = pgTable("users", {
  id: text("id").primaryKey(),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
