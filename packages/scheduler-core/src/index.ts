// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core`
 * Purpose: Generation scheduling core: types, state machine, provider status mapping, outcomes and ports.
 * Scope: Pure types, tables and functions. Does not contain implementations or I/O.
 * Invariants:
 * - FORBIDDEN: services/, drizzle-orm queries, any I/O
 * - ALLOWED: Pure TypeScript types, constants and functions
 * Side-effects: none
 * Links: packages/scheduler-core/src/ports/generation-store.port.ts
 * @public
 */

// Counters
export { deriveBatchCounters, EMPTY_COUNTERS } from "./counters";
// Errors
export {
  BatchNotFoundError,
  InvalidTaskTransitionError,
  isBatchNotFoundError,
  isInvalidTaskTransitionError,
  isRemoteJobError,
  isTaskNotFoundError,
  RemoteJobError,
  TaskNotFoundError,
} from "./errors";
// Outcome
export {
  type ExecutionOutcome,
  type FailureKind,
  failed,
  isRefundableFailure,
  MAX_ERROR_SUMMARY_LENGTH,
  succeeded,
  truncateErrorSummary,
} from "./outcome";
// Ports
export type {
  AdmitBatchInput,
  AdmitBatchResult,
  BatchPage,
  CreateRemoteJobParams,
  GenerationStore,
  IdempotencyRecord,
  ProgressUpdate,
  RemoteJobClient,
  RemoteJobHandle,
  RemoteJobSnapshot,
} from "./ports";
// Remote status
export {
  isTerminalRemoteStatus,
  mapProviderStatus,
  PROVIDER_STATUS_MAP,
  type RemoteJobStatus,
  UNRECOGNIZED_REMOTE_STATUS,
} from "./remote-status";
// Transitions
export {
  assertTransition,
  CANCELLABLE_STATUSES,
  CLAIMABLE_STATUSES,
  canTransition,
  isTerminalStatus,
  TASK_TRANSITIONS,
} from "./transitions";
// Types
export {
  type Batch,
  type BatchCounters,
  type GenerationParams,
  ORIENTATIONS,
  type Orientation,
  TASK_STATUSES,
  type Task,
  type TaskStatus,
  type TaskStatusCounts,
} from "./types";
