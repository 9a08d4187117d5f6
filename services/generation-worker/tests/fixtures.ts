// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/tests/fixtures`
 * Purpose: Reusable ids, requests and a wired-up harness for generation-worker unit tests.
 * Scope: Builds components from src/ on top of the in-memory fakes. No database or network.
 * Invariants: All ids are valid UUIDs.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import {
  type BatchId,
  type TaskId,
  toBatchId,
  toTaskId,
  toUserId,
  type UserId,
} from "@clipqueue/ids";
import { unitCost } from "@clipqueue/ledger-core";
import type { GenerationParams } from "@clipqueue/scheduler-core";

import type { SubmitBatchRequest } from "../src/admission/schemas.js";
import { makeNoopLogger } from "../src/observability/logger.js";
import { Reconciler } from "../src/reconcile/reconciler.js";
import { FakeClock } from "./_fakes/fake-clock.js";
import { FakeRemoteJobClient } from "./_fakes/fake-remote-job-client.js";
import { InMemoryGenerationStore } from "./_fakes/in-memory-generation-store.js";

/**
 * Fixed UUIDs for deterministic tests.
 */
export const FIXED_IDS = {
  ownerA: toUserId("00000000-0000-0000-0000-0000000000a1"),
  ownerB: toUserId("00000000-0000-0000-0000-0000000000b1"),
  batch1: toBatchId("00000000-0000-0000-0000-000000000101"),
  batch2: toBatchId("00000000-0000-0000-0000-000000000102"),
  batch3: toBatchId("00000000-0000-0000-0000-000000000103"),
} as const;

/** Deterministic task ids: taskIds(1, 3) → three ids whose last digits encode batch and index */
export function taskIds(batch: number, count: number): TaskId[] {
  return Array.from({ length: count }, (_, i) =>
    toTaskId(
      `00000000-0000-0000-0000-${String(batch * 1000 + i + 1).padStart(12, "0")}`
    )
  );
}

export const DEFAULT_PARAMS: GenerationParams = {
  prompt: "a lighthouse at dusk, slow dolly in",
  model: "sora-2",
  orientation: "landscape",
  size: "small",
  duration: 10,
  mediaRef: null,
};

/** sora-2 / 10s / small */
export const DEFAULT_UNIT_COST = 15;

export function createRequest(
  overrides: Partial<SubmitBatchRequest> = {}
): SubmitBatchRequest {
  return {
    prompt: DEFAULT_PARAMS.prompt,
    model: DEFAULT_PARAMS.model,
    orientation: DEFAULT_PARAMS.orientation,
    size: "small",
    duration: DEFAULT_PARAMS.duration,
    count: 1,
    ...overrides,
  };
}

export const STALE_RUNNING_MS = 1_800_000;

export function createHarness() {
  const clock = new FakeClock();
  const store = new InMemoryGenerationStore(clock);
  const remote = new FakeRemoteJobClient();
  const logger = makeNoopLogger();
  const reconciler = new Reconciler({
    store,
    ledger: store,
    clock,
    logger,
    config: { staleRunningMs: STALE_RUNNING_MS, intervalMs: 300_000 },
  });
  return { clock, store, remote, logger, reconciler };
}

export type Harness = ReturnType<typeof createHarness>;

/**
 * Admits a batch straight through the store, granting exactly its cost first
 * plus `extraCredits`.
 */
export async function seedBatch(
  harness: Harness,
  options: {
    ownerId?: UserId;
    batchId?: BatchId;
    taskIds: TaskId[];
    params?: Partial<GenerationParams>;
    extraCredits?: number;
  }
): Promise<{ batchId: BatchId; taskIds: TaskId[]; totalCost: number }> {
  const ownerId = options.ownerId ?? FIXED_IDS.ownerA;
  const batchId = options.batchId ?? FIXED_IDS.batch1;
  const params = { ...DEFAULT_PARAMS, ...options.params };
  const totalCost =
    unitCost(params.model, params.duration, params.size) * options.taskIds.length;

  harness.store.grantCredits(ownerId, totalCost + (options.extraCredits ?? 0));
  await harness.store.admitBatch({
    batchId,
    ownerId,
    params,
    taskIds: options.taskIds,
    totalCost,
    idempotencyKey: null,
    replayableSince: harness.clock.now(),
  });
  await harness.reconciler.recomputeBatch(batchId);
  return { batchId, taskIds: options.taskIds, totalCost };
}
