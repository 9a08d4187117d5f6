// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-client/client`
 * Purpose: Database client factory with injected connection string, plus shared adapter types.
 * Scope: Creates and closes Drizzle database instances. Does not read from environment.
 * Invariants:
 * - Connection string injected, never from process.env
 * - Executor accepts both the root client and a transaction handle
 * Side-effects: IO (database connections)
 * Links: services/generation-worker/src/bootstrap/container.ts
 * @public
 */

import type { PgDatabase } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";

import { buildClient, type Database, type FullSchema } from "./build-client";

export type { Database } from "./build-client";

/**
 * Simple logger interface for optional logging in adapters.
 * Consumers can inject their own logger (e.g., pino).
 */
export interface LoggerLike {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
  debug: (obj: Record<string, unknown>, msg: string) => void;
}

/** Root client or a transaction: anything that can run a query. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, FullSchema>;

export const NOOP_LOGGER: LoggerLike = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/** Connections kept beside the execution units: one for admission transactions, one for the sweep. */
const RESERVED_CONNECTIONS = 2;

/**
 * Pool size for a worker running at most `globalConcurrency` execution units.
 */
export function poolSizeFor(globalConcurrency: number): number {
  return Math.max(1, Math.floor(globalConcurrency)) + RESERVED_CONNECTIONS;
}

/**
 * Creates a Drizzle database client for the generation worker.
 */
export function createDbClient(
  connectionString: string,
  options: { applicationName?: string; globalConcurrency: number }
): Database {
  return buildClient(connectionString, {
    applicationName: options.applicationName ?? "clipqueue_generation_worker",
    maxConnections: poolSizeFor(options.globalConcurrency),
  });
}

/** Drains and closes the underlying postgres.js pool. */
export async function closeDbClient(db: Database): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
