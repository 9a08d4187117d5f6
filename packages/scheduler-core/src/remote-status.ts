// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/remote-status`
 * Purpose: Typed provider job status and the string → status mapping table.
 * Scope: Normalisation of loosely-typed provider strings. Does not perform I/O.
 * Invariants:
 * - Unrecognised or missing strings map to "in-progress", never to a terminal status
 * - Lookup is case-insensitive; spaces and underscores are treated as "-"
 * Side-effects: none
 * Links: services/generation-worker/src/adapters/remote/http-remote-job.client.ts
 * @public
 */

const REMOTE_JOB_STATUSES = [
  "pending",
  "queued",
  "in-progress",
  "completed",
  "failed",
  "cancelled",
] as const;

export type RemoteJobStatus = (typeof REMOTE_JOB_STATUSES)[number];

export const UNRECOGNIZED_REMOTE_STATUS: RemoteJobStatus = "in-progress";

/** Normalised provider string → status */
export const PROVIDER_STATUS_MAP: Readonly<Record<string, RemoteJobStatus>> = {
  pending: "pending",
  queued: "queued",
  "in-progress": "in-progress",
  processing: "in-progress",
  running: "in-progress",
  completed: "completed",
  success: "completed",
  succeeded: "completed",
  failed: "failed",
  failure: "failed",
  error: "failed",
  cancelled: "cancelled",
  canceled: "cancelled",
};

function normalizeKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

export function mapProviderStatus(raw: string | null | undefined): RemoteJobStatus {
  if (raw == null) {
    return UNRECOGNIZED_REMOTE_STATUS;
  }
  const key = normalizeKey(raw);
  return Object.hasOwn(PROVIDER_STATUS_MAP, key)
    ? (PROVIDER_STATUS_MAP[key] ?? UNRECOGNIZED_REMOTE_STATUS)
    : UNRECOGNIZED_REMOTE_STATUS;
}

export function isTerminalRemoteStatus(status: RemoteJobStatus): boolean {
  switch (status) {
    case "completed":
    case "failed":
    case "cancelled":
      return true;
    case "pending":
    case "queued":
    case "in-progress":
      return false;
  }
}
