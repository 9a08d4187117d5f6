// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/types`
 * Purpose: Shared generation-scheduling type definitions and constants (logic-free).
 * Scope: Defines Task, Batch, BatchCounters and generation parameter types. Does not contain logic.
 * Invariants:
 * - ONLY exports: enums (as const arrays), literal union types, and interfaces
 * - FORBIDDEN: functions, computations, validation logic, or business rules
 * - Batch counters are derived from task rows, never the source of truth
 * Side-effects: none (constants and types only)
 * Links: packages/db-schema/src/generation.ts
 * @public
 */

import type { BatchId, TaskId, UserId } from "@clipqueue/ids";

// Import from db-schema (source of truth for DB enums)
import {
  ORIENTATIONS as _ORIENTATIONS,
  TASK_STATUSES as _TASK_STATUSES,
  type Orientation as _Orientation,
  type TaskStatus as _TaskStatus,
} from "@clipqueue/db-schema/generation";

// Re-export
export const TASK_STATUSES = _TASK_STATUSES;
export type TaskStatus = _TaskStatus;
export const ORIENTATIONS = _ORIENTATIONS;
export type Orientation = _Orientation;

/**
 * Parameters shared by a batch and each of its tasks.
 */
export interface GenerationParams {
  readonly prompt: string;
  readonly model: string;
  readonly orientation: Orientation;
  readonly size: string;
  /** Seconds */
  readonly duration: number;
  readonly mediaRef: string | null;
}

export interface Task extends GenerationParams {
  readonly id: TaskId;
  readonly batchId: BatchId;
  readonly ownerId: UserId;
  readonly status: TaskStatus;
  readonly errorSummary: string | null;
  readonly progress: string | null;
  readonly remoteJobId: string | null;
  readonly resultLocator: string | null;
  readonly retries: number;
  readonly remoteStartedAt: Date | null;
  readonly remoteFinishedAt: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly deletedAt: Date | null;
}

/**
 * Aggregate view of a batch's non-deleted tasks.
 * queued = pending + queued.
 */
export interface BatchCounters {
  readonly total: number;
  readonly queued: number;
  readonly running: number;
  readonly completed: number;
  readonly failed: number;
  readonly cancelled: number;
}

export interface Batch extends GenerationParams {
  readonly id: BatchId;
  readonly ownerId: UserId;
  readonly requestedCount: number;
  readonly counters: BatchCounters;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly deletedAt: Date | null;
}

/** Raw per-status task counts, as returned by a GROUP BY */
export type TaskStatusCounts = Partial<Record<TaskStatus, number>>;
