// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/transitions`
 * Purpose: Task status state machine.
 * Scope: Edge table and predicates. Does not perform I/O; adapters enforce edges with conditional UPDATEs.
 * Invariants:
 * - pending → queued | running | cancelled
 * - queued → running | cancelled
 * - running → completed | failed | cancelled
 * - failed → queued (explicit retry only)
 * - completed and cancelled are terminal
 * Side-effects: none
 * Links: packages/db-client/src/adapters/drizzle-generation.adapter.ts
 * @public
 */

import { InvalidTaskTransitionError } from "./errors";
import type { TaskStatus } from "./types";

export const TASK_TRANSITIONS: Readonly<
  Record<TaskStatus, readonly TaskStatus[]>
> = {
  pending: ["queued", "running", "cancelled"],
  queued: ["running", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: ["queued"],
  cancelled: [],
};

/** Statuses a claim may start from */
export const CLAIMABLE_STATUSES = [
  "pending",
  "queued",
] as const satisfies readonly TaskStatus[];

/** Statuses an explicit cancel may start from */
export const CANCELLABLE_STATUSES = [
  "pending",
  "queued",
  "running",
] as const satisfies readonly TaskStatus[];

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

/**
 * @throws {@link InvalidTaskTransitionError} when `from → to` is not an edge
 */
export function assertTransition(
  taskId: string,
  from: TaskStatus,
  to: TaskStatus
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTaskTransitionError(taskId, from, to);
  }
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TASK_TRANSITIONS[status].length === 0;
}
