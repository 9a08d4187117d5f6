// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `drizzle.config`
 * Purpose: Drizzle ORM configuration for database migrations and schema generation via drizzle-kit.
 * Scope: Database migration configuration and schema paths. Does not handle runtime database connections.
 * Invariants: Schema path matches the db-schema package barrel; migrations land beside it
 * Side-effects: IO (file system operations during migration generation)
 * Links: Used by npm run db:generate and npm run db:migrate
 * @public
 */

import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: "./packages/db-schema/src/index.ts",
  out: "./packages/db-schema/migrations",
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "postgres://localhost:5432/clipqueue",
  },
  verbose: true,
  strict: true,
});
