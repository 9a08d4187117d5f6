// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-client/build-client`
 * Purpose: Drizzle client over one postgres.js pool shared by admission, execution units and the reconciler.
 * Scope: Internal; re-exported through client.ts. Does not handle env resolution.
 * Invariants:
 *   - Connection string injected, never from process.env
 *   - Pool size comes from the caller (see poolSizeFor in client.ts); each in-flight unit
 *     holds a connection only for the duration of one guarded UPDATE
 *   - Idle connections are closed after 20s so a quiet worker releases its slots
 *   - Database type preserves drizzle's `$client` accessor so shutdown can `end()` the pool
 * Side-effects: IO (database connections)
 * Links: packages/db-client/src/client.ts
 * @internal
 */

import * as fullSchema from "@clipqueue/db-schema";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export interface PoolOptions {
  /** Reported as `application_name` in pg_stat_activity */
  readonly applicationName: string;
  readonly maxConnections: number;
}

export function buildClient(connectionString: string, options: PoolOptions) {
  const client = postgres(connectionString, {
    max: options.maxConnections,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: options.applicationName,
    },
  });

  return drizzle(client, { schema: fullSchema });
}

export type Database = ReturnType<typeof buildClient>;

export type FullSchema = typeof fullSchema;
