// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-client`
 * Purpose: DB client factory and Drizzle adapters for the generation and credit stores.
 * Scope: Client factory, adapters, schema. Does not read from environment.
 * Invariants:
 * - FORBIDDEN: process.env, services/ imports
 * - Re-exports full schema (all domain slices)
 * Side-effects: IO (database operations)
 * Links: packages/scheduler-core/src/ports/generation-store.port.ts, packages/ledger-core/src/store.ts
 * @public
 */

// Re-export full schema (consumers get all tables transitively through db-client)
export * from "@clipqueue/db-schema";
// Branded ID types live in @clipqueue/ids; import directly, not through this barrel.
export {
  DrizzleCreditLedgerAdapter,
  selectBalance,
} from "./adapters/drizzle-credit-ledger.adapter";
export { DrizzleGenerationAdapter } from "./adapters/drizzle-generation.adapter";
export {
  closeDbClient,
  createDbClient,
  type Database,
  type Executor,
  type LoggerLike,
  NOOP_LOGGER,
  poolSizeFor,
} from "./client";
