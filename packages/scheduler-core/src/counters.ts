// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/counters`
 * Purpose: Derive batch aggregate counters from a per-status count of its tasks.
 * Scope: Pure function. The reconciler is its only caller that persists the result.
 * Invariants: total = sum of all statuses; input must already exclude soft-deleted tasks.
 * Side-effects: none
 * Links: services/generation-worker/src/reconcile/reconciler.ts
 * @public
 */

import type { BatchCounters, TaskStatusCounts } from "./types";

export const EMPTY_COUNTERS: BatchCounters = {
  total: 0,
  queued: 0,
  running: 0,
  completed: 0,
  failed: 0,
  cancelled: 0,
};

export function deriveBatchCounters(counts: TaskStatusCounts): BatchCounters {
  const pending = counts.pending ?? 0;
  const queued = counts.queued ?? 0;
  const running = counts.running ?? 0;
  const completed = counts.completed ?? 0;
  const failed = counts.failed ?? 0;
  const cancelled = counts.cancelled ?? 0;
  return {
    total: pending + queued + running + completed + failed + cancelled,
    queued: pending + queued,
    running,
    completed,
    failed,
    cancelled,
  };
}
