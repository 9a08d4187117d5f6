// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/admission/submit-batch`
 * Purpose: Admission controller: validate, dedupe, rate-limit, debit, persist and enqueue a batch.
 * Scope: The synchronous half of batch creation. Execution outcomes are never reported here.
 * Invariants:
 * - Order: validation → idempotency lookup → rate limit → transactional admit → counters → enqueue
 * - Every rejection happens before any mutation
 * - A replay within the window returns the original batch id: no debit, no tasks, no rate-limit slot
 * - The key is checked again under the owner lock; concurrent submissions with one key admit one batch
 * - A submission refused for insufficient credits gives its rate-limit slot back
 * - The debit is committed before any task id reaches the scheduler
 * Side-effects: IO (store, ledger via store transaction), in-memory queue
 * Links: packages/scheduler-core/src/ports/generation-store.port.ts
 * @internal
 */

import { randomUUID } from "node:crypto";

import {
  type BatchId,
  type TaskId,
  toBatchId,
  toTaskId,
  type UserId,
} from "@clipqueue/ids";
import { batchCost, isInsufficientCreditsError } from "@clipqueue/ledger-core";
import type { AdmitBatchResult } from "@clipqueue/scheduler-core";
import type { Logger } from "pino";

import type { Clock, GenerationStore } from "../ports/index.js";
import {
  BatchValidationError,
  DuplicateSubmissionError,
  RateLimitedError,
} from "./errors.js";
import type { SlidingWindowRateLimiter } from "./rate-limiter.js";
import {
  createSubmitBatchSchema,
  type SubmissionLimits,
  type SubmitBatchRequest,
} from "./schemas.js";

export interface AdmissionConfig extends SubmissionLimits {
  readonly idempotencyWindowMs: number;
}

export interface AdmissionDeps {
  readonly store: GenerationStore;
  readonly rateLimiter: SlidingWindowRateLimiter;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly counters: { recomputeBatch(batchId: BatchId): Promise<unknown> };
  readonly enqueue: (...taskIds: TaskId[]) => void;
  readonly config: AdmissionConfig;
}

export interface SubmitBatchResult {
  readonly batchId: BatchId;
  /** True when an idempotency replay returned an existing batch */
  readonly replayed: boolean;
  readonly totalCost: number;
}

export type SubmitBatch = (
  ownerId: UserId,
  request: SubmitBatchRequest
) => Promise<SubmitBatchResult>;

export function createSubmitBatch(deps: AdmissionDeps): SubmitBatch {
  const schema = createSubmitBatchSchema(deps.config);

  return async function submitBatch(ownerId, request) {
    const { store, logger } = deps;

    const parsed = schema.safeParse(request);
    if (!parsed.success) {
      throw new BatchValidationError(
        parsed.error.errors.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        }))
      );
    }
    const input = parsed.data;

    const now = deps.clock.now();
    const replayableSince = new Date(now.getTime() - deps.config.idempotencyWindowMs);

    if (input.idempotencyKey !== null) {
      const record = await store.findIdempotencyKey(ownerId, input.idempotencyKey);
      if (record && record.createdAt >= replayableSince) {
        return replay(ownerId, input.idempotencyKey, record.batchId);
      }
    }

    const decision = deps.rateLimiter.tryAcquire(ownerId);
    if (!decision.allowed) {
      logger.warn({ ownerId, retryAfterMs: decision.retryAfterMs }, "Batch submission rate limited");
      throw new RateLimitedError(ownerId, decision.retryAfterMs);
    }

    const totalCost = batchCost(input.model, input.duration, input.size, input.count);
    const batchId = toBatchId(randomUUID());
    const taskIds = Array.from({ length: input.count }, () => toTaskId(randomUUID()));

    let admitted: AdmitBatchResult;
    try {
      admitted = await store.admitBatch({
        batchId,
        ownerId,
        params: {
          prompt: input.prompt,
          model: input.model,
          orientation: input.orientation,
          size: input.size,
          duration: input.duration,
          mediaRef: input.mediaRef,
        },
        taskIds,
        totalCost,
        idempotencyKey: input.idempotencyKey,
        replayableSince,
      });
    } catch (err) {
      if (isInsufficientCreditsError(err)) {
        deps.rateLimiter.release(ownerId);
        logger.info(
          { ownerId, required: err.requiredCost, available: err.availableBalance },
          "Batch rejected: insufficient credits"
        );
      }
      throw err;
    }

    // Another submission with the same key won the owner lock
    if (admitted.kind === "replayed" && input.idempotencyKey !== null) {
      deps.rateLimiter.release(ownerId);
      return replay(ownerId, input.idempotencyKey, admitted.batchId);
    }

    await deps.counters.recomputeBatch(batchId);
    deps.enqueue(...taskIds);

    logger.info(
      { ownerId, batchId, count: input.count, totalCost },
      "Batch admitted"
    );
    return { batchId, replayed: false, totalCost };
  };

  async function replay(
    ownerId: UserId,
    idempotencyKey: string,
    batchId: BatchId | null
  ): Promise<SubmitBatchResult> {
    const existing = batchId ? await deps.store.getBatch(batchId) : null;
    if (!existing) {
      throw new DuplicateSubmissionError(idempotencyKey);
    }
    deps.logger.info(
      { ownerId, batchId: existing.id, idempotencyKey },
      "Idempotent replay; returning existing batch"
    );
    return { batchId: existing.id, replayed: true, totalCost: 0 };
  }
}
