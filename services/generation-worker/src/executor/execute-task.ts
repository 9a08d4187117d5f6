// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/executor/execute-task`
 * Purpose: One execution unit: drive a claimed task through the remote provider and settle its outcome.
 * Scope: Runs after the scheduler's claim succeeded. Does not touch queue or concurrency counters.
 * Invariants:
 * - Cancellation is checked exactly once, after the claim and before the remote call
 * - Provider failures never throw: they become an ExecutionOutcome (provider_error | timeout)
 * - Terminal writes are guarded on status = running; a lost guard means someone else settled the task,
 *   so the unit reports claim_lost and does not refund
 * - Refund only after this unit itself moved the task to failed
 * - Store faults propagate to the scheduler, which logs them; the stale sweep settles the task later
 * Side-effects: IO (provider HTTP via port, store writes, ledger writes)
 * Links: services/generation-worker/src/executor/scheduler.ts
 * @internal
 */

import {
  type ExecutionOutcome,
  failed,
  isRefundableFailure,
  type RemoteJobHandle,
  type RemoteJobSnapshot,
  succeeded,
  type Task,
  truncateErrorSummary,
} from "@clipqueue/scheduler-core";
import type { Logger } from "pino";

import { refundFailedTask } from "../credits/refund.js";
import type {
  Clock,
  CreditLedgerStore,
  GenerationStore,
  RemoteJobClient,
  Sleep,
} from "../ports/index.js";

export interface TaskRunnerConfig {
  readonly pollIntervalMs: number;
  readonly maxPollMs: number;
}

export interface TaskRunnerDeps {
  readonly store: GenerationStore;
  readonly ledger: CreditLedgerStore;
  readonly remote: RemoteJobClient;
  readonly clock: Clock;
  readonly sleep: Sleep;
  readonly logger: Logger;
  /** Counter owner (the reconciler) */
  readonly counters: { recomputeBatch(batchId: Task["batchId"]): Promise<unknown> };
  readonly config: TaskRunnerConfig;
}

export type TaskRunner = (task: Task) => Promise<ExecutionOutcome>;

/** Provider-side dedup hint; changes with every explicit retry */
export function providerIdempotencyKey(task: Pick<Task, "id" | "retries">): string {
  return `task-${task.id}-${task.retries}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sameInstant(a: Date | null, b: Date | null): boolean {
  return (a?.getTime() ?? null) === (b?.getTime() ?? null);
}

export function createTaskRunner(deps: TaskRunnerDeps): TaskRunner {
  return async function runClaimedTask(task: Task): Promise<ExecutionOutcome> {
    const log = deps.logger.child({
      taskId: task.id,
      batchId: task.batchId,
      ownerId: task.ownerId,
    });

    // The claim moved the task to running
    await deps.counters.recomputeBatch(task.batchId);

    const current = await deps.store.getTask(task.id);
    if (!current || current.status === "cancelled") {
      log.info({}, "Task cancelled before remote call, skipping");
      return failed("cancelled", "Cancelled before the remote job was created");
    }

    const outcome = await driveRemoteJob(deps, current, log);
    return settle(deps, current, outcome, log);
  };
}

async function driveRemoteJob(
  deps: TaskRunnerDeps,
  task: Task,
  log: Logger
): Promise<ExecutionOutcome> {
  const { remote, store, clock, sleep, config } = deps;

  let handle: RemoteJobHandle;
  try {
    handle = await remote.create({
      prompt: task.prompt,
      mediaRef: task.mediaRef,
      model: task.model,
      orientation: task.orientation,
      size: task.size,
      duration: task.duration,
      idempotencyKey: providerIdempotencyKey(task),
    });
  } catch (err) {
    log.warn({ err }, "Remote job creation failed");
    return failed("provider_error", errorMessage(err));
  }

  await store.recordRemoteJob(task.id, handle.id);
  log.info({ remoteJobId: handle.id }, "Remote job created");

  const deadline = clock.now().getTime() + config.maxPollMs;
  let last = {
    progress: task.progress,
    remoteStartedAt: task.remoteStartedAt,
    remoteFinishedAt: task.remoteFinishedAt,
  };

  for (;;) {
    let snapshot: RemoteJobSnapshot;
    try {
      snapshot = await remote.poll(handle);
    } catch (err) {
      log.warn({ err, remoteJobId: handle.id }, "Remote job poll failed");
      return failed("provider_error", errorMessage(err));
    }

    if (snapshot.status === "completed" && snapshot.resultLocator) {
      return succeeded(
        snapshot.resultLocator,
        snapshot.remoteFinishedAt ?? last.remoteFinishedAt
      );
    }
    if (snapshot.status === "failed" || snapshot.status === "cancelled") {
      return failed(
        "provider_error",
        snapshot.error ?? `Remote job ${snapshot.status}`
      );
    }

    const next = {
      progress: snapshot.progress ?? last.progress,
      remoteStartedAt: snapshot.remoteStartedAt ?? last.remoteStartedAt,
      remoteFinishedAt: snapshot.remoteFinishedAt ?? last.remoteFinishedAt,
    };
    if (
      next.progress !== last.progress ||
      !sameInstant(next.remoteStartedAt, last.remoteStartedAt) ||
      !sameInstant(next.remoteFinishedAt, last.remoteFinishedAt)
    ) {
      await store.recordProgress(task.id, next);
      last = next;
    }

    if (clock.now().getTime() >= deadline) {
      return failed(
        "timeout",
        `Timed out after ${Math.round(config.maxPollMs / 1000)}s waiting for the remote job`
      );
    }
    await sleep(config.pollIntervalMs);
  }
}

async function settle(
  deps: TaskRunnerDeps,
  task: Task,
  outcome: ExecutionOutcome,
  log: Logger
): Promise<ExecutionOutcome> {
  const { store } = deps;

  if (outcome.ok) {
    const done = await store.completeTask(
      task.id,
      outcome.resultLocator,
      outcome.remoteFinishedAt
    );
    await deps.counters.recomputeBatch(task.batchId);
    if (!done) {
      log.warn({}, "Task left running before completion could be recorded");
      return failed("claim_lost", "Task was no longer running at completion");
    }
    log.info({ resultLocator: outcome.resultLocator }, "Task completed");
    return outcome;
  }

  if (!isRefundableFailure(outcome.kind)) {
    return outcome;
  }

  const marked = await store.failTask(task.id, truncateErrorSummary(outcome.message));
  if (!marked) {
    await deps.counters.recomputeBatch(task.batchId);
    log.warn({ kind: outcome.kind }, "Task left running before failure could be recorded");
    return failed("claim_lost", "Task was no longer running at failure");
  }

  log.warn({ kind: outcome.kind, error: outcome.message }, "Task failed");
  await refundFailedTask({ ledger: deps.ledger, logger: log }, task);
  await deps.counters.recomputeBatch(task.batchId);
  return outcome;
}
