// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-schema`
 * Purpose: Root barrel re-exporting all schema slices for consumers that need the full schema.
 * Scope: Re-exports only. Does not define any tables.
 * Invariants: Must re-export every slice so drizzle-kit and the db client see one schema namespace.
 * Side-effects: none
 * Links: drizzle.config.ts
 * @public
 */

export * from "./credits";
export * from "./generation";
export * from "./refs";
