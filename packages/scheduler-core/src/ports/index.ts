// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/ports`
 * Purpose: Barrel export for scheduler ports.
 * Scope: Re-exports port interfaces. Does not contain implementations.
 * Side-effects: none
 * @public
 */

export type {
  AdmitBatchInput,
  AdmitBatchResult,
  BatchPage,
  GenerationStore,
  IdempotencyRecord,
  ProgressUpdate,
} from "./generation-store.port";
export type {
  CreateRemoteJobParams,
  RemoteJobClient,
  RemoteJobHandle,
  RemoteJobSnapshot,
} from "./remote-job.port";
