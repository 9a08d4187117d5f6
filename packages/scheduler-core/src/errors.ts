// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/errors`
 * Purpose: Domain errors for batch/task operations and the remote job client.
 * Scope: Error classes and type guards. Does not perform I/O.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: packages/scheduler-core/src/transitions.ts
 * @public
 */

import type { TaskStatus } from "./types";

export class BatchNotFoundError extends Error {
  public readonly code = "BATCH_NOT_FOUND" as const;

  constructor(public readonly batchId: string) {
    super(`Batch not found: ${batchId}`);
    this.name = "BatchNotFoundError";
  }
}

export class TaskNotFoundError extends Error {
  public readonly code = "TASK_NOT_FOUND" as const;

  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

/**
 * Thrown when an explicit operation (retry, cancel) is requested from a status
 * that has no edge to the target.
 */
export class InvalidTaskTransitionError extends Error {
  public readonly code = "INVALID_TASK_TRANSITION" as const;

  constructor(
    public readonly taskId: string,
    public readonly from: TaskStatus,
    public readonly to: TaskStatus
  ) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTaskTransitionError";
  }
}

/**
 * Provider HTTP or protocol failure. Terminal for the current execution attempt.
 */
export class RemoteJobError extends Error {
  public readonly code = "REMOTE_JOB_ERROR" as const;

  constructor(
    message: string,
    public readonly httpStatus?: number
  ) {
    super(message);
    this.name = "RemoteJobError";
  }
}

// Type guards

export function isBatchNotFoundError(
  error: unknown
): error is BatchNotFoundError {
  return error instanceof Error && error.name === "BatchNotFoundError";
}

export function isTaskNotFoundError(error: unknown): error is TaskNotFoundError {
  return error instanceof Error && error.name === "TaskNotFoundError";
}

export function isInvalidTaskTransitionError(
  error: unknown
): error is InvalidTaskTransitionError {
  return error instanceof Error && error.name === "InvalidTaskTransitionError";
}

export function isRemoteJobError(error: unknown): error is RemoteJobError {
  return error instanceof Error && error.name === "RemoteJobError";
}
