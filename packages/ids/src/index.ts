// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ids`
 * Purpose: Branded ID types for users, batches and tasks across the monorepo.
 * Scope: Type definitions and boundary constructors only. Does not generate IDs.
 * Invariants:
 * - toUserId/toBatchId/toTaskId are the single entry points for branding a raw string
 * - All three IDs are UUIDs (validated at the boundary, never re-parsed downstream)
 * - Only edge code (service facade, adapters mapping rows, test fixtures) should call the constructors
 * - No `as UserId` / `as BatchId` / `as TaskId` casts outside this module
 * Side-effects: none
 * Links: packages/db-schema/src/generation.ts
 * @public
 */

import type { Tagged } from "type-fest";

/** UUID format regex: single source of truth for ID validation. */
export const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Owner of batches, tasks and credit transactions. */
export type UserId = Tagged<string, "UserId">;

export type BatchId = Tagged<string, "BatchId">;

export type TaskId = Tagged<string, "TaskId">;

function assertUuid(kind: string, raw: string): void {
  if (!UUID_RE.test(raw)) {
    throw new Error(`Invalid ${kind} (expected UUID): ${raw}`);
  }
}

/** Validate and brand a raw string as UserId. Boundary constructor; call at edges only. */
export function toUserId(raw: string): UserId {
  assertUuid("UserId", raw);
  return raw as UserId;
}

export function toBatchId(raw: string): BatchId {
  assertUuid("BatchId", raw);
  return raw as BatchId;
}

export function toTaskId(raw: string): TaskId {
  assertUuid("TaskId", raw);
  return raw as TaskId;
}

/** Non-throwing check for callers that translate bad input into a not-found. */
export function isUuid(raw: string): boolean {
  return UUID_RE.test(raw);
}
