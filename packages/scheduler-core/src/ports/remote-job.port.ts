// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/remote-job`
 * Purpose: Contract for the external generation provider.
 * Scope: Types only. Does not contain implementations.
 * Invariants:
 * - create is at-least-once; idempotencyKey is a best-effort provider-side dedup hint
 * - poll never returns a raw provider string: status is already mapped (unknown → in-progress)
 * - Both methods throw on transport/protocol failure (RemoteJobError)
 * Side-effects: none (interface definition only)
 * Links: services/generation-worker/src/adapters/remote/http-remote-job.client.ts
 * @public
 */

import type { RemoteJobStatus } from "../remote-status";
import type { Orientation } from "../types";

export interface CreateRemoteJobParams {
  readonly prompt: string;
  readonly mediaRef: string | null;
  readonly model: string;
  readonly orientation: Orientation;
  readonly size: string;
  readonly duration: number;
  readonly idempotencyKey?: string;
}

export interface RemoteJobHandle {
  readonly id: string;
}

export interface RemoteJobSnapshot {
  readonly status: RemoteJobStatus;
  readonly resultLocator: string | null;
  readonly error: string | null;
  readonly progress: string | null;
  readonly remoteStartedAt: Date | null;
  readonly remoteFinishedAt: Date | null;
}

export interface RemoteJobClient {
  create(params: CreateRemoteJobParams): Promise<RemoteJobHandle>;
  poll(handle: RemoteJobHandle): Promise<RemoteJobSnapshot>;
}
