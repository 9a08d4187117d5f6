// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/executor/scheduler`
 * Purpose: Volatile FIFO of task ids, concurrency gates and the claim-then-dispatch loop.
 * Scope: One instance per process. Does not talk to the provider (see execute-task.ts).
 * Invariants:
 * - The store is the source of truth; the queue holds ids only and is rebuilt by restoreQueue()
 * - Each tick inspects only the head. If the head's owner or the process is at its cap the loop
 *   defers without looking further (head-of-line blocking)
 * - A head that is missing, soft-deleted or no longer claimable is dropped
 * - claimTask is the only way into running; a lost claim drops the id with no side effects
 * - In-flight counters are incremented at dispatch and decremented when the unit settles
 * - Execution units never block the loop and never throw into it
 * Side-effects: IO (store reads/claims), timers
 * Links: packages/scheduler-core/src/ports/generation-store.port.ts
 * @internal
 */

import type { TaskId, UserId } from "@clipqueue/ids";
import {
  CLAIMABLE_STATUSES,
  type ExecutionOutcome,
  type Task,
} from "@clipqueue/scheduler-core";
import type { Logger } from "pino";

import type { GenerationStore } from "../ports/index.js";
import type { TaskRunner } from "./execute-task.js";

export interface SchedulerConfig {
  readonly globalConcurrency: number;
  readonly perUserConcurrency: number;
  readonly tickMs: number;
}

export interface SchedulerDeps {
  readonly store: GenerationStore;
  readonly runTask: TaskRunner;
  readonly logger: Logger;
  readonly config: SchedulerConfig;
}

export type TickResult =
  | "idle"
  | "dropped"
  | "deferred"
  | "claim_conflict"
  | "dispatched"
  | "error";

function isClaimable(task: Task): boolean {
  return CLAIMABLE_STATUSES.some((status) => status === task.status);
}

export class Scheduler {
  private readonly queue: TaskId[] = [];
  private readonly perOwner = new Map<UserId, number>();
  private readonly units = new Set<Promise<void>>();
  private inFlight = 0;
  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private ticking: Promise<TickResult> | null = null;

  constructor(private readonly deps: SchedulerDeps) {}

  get queueLength(): number {
    return this.queue.length;
  }

  get inFlightCount(): number {
    return this.inFlight;
  }

  inFlightFor(ownerId: UserId): number {
    return this.perOwner.get(ownerId) ?? 0;
  }

  /** Snapshot of queued ids, head first */
  queuedIds(): readonly TaskId[] {
    return [...this.queue];
  }

  enqueue(...taskIds: TaskId[]): void {
    this.queue.push(...taskIds);
  }

  /**
   * Re-enqueue every pending/queued task from the store, in creation order.
   * Ids already in the queue are not added twice.
   */
  async restoreQueue(): Promise<number> {
    const ids = await this.deps.store.listQueueableTaskIds();
    const present = new Set(this.queue);
    const missing = ids.filter((id) => !present.has(id));
    this.queue.push(...missing);
    this.deps.logger.info({ restored: missing.length }, "Restored task queue from store");
    return missing.length;
  }

  /**
   * One scheduling step. Serialised: a tick requested while one is running
   * returns the running tick's result.
   */
  async tick(): Promise<TickResult> {
    if (this.ticking) return this.ticking;
    this.ticking = this.step().finally(() => {
      this.ticking = null;
    });
    return this.ticking;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.scheduleNext();
    this.deps.logger.info({ ...this.deps.config }, "Scheduler loop started");
  }

  /** Stops the loop. In-flight units keep running; see drain(). */
  async stop(): Promise<void> {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.ticking) {
      await this.ticking;
    }
  }

  /** Resolves once every dispatched unit has settled, including ones dispatched meanwhile. */
  async drain(): Promise<void> {
    while (this.units.size > 0) {
      await Promise.allSettled([...this.units]);
    }
  }

  private scheduleNext(): void {
    if (!this.started) return;
    this.timer = setTimeout(() => {
      this.tick()
        .catch((err: unknown) => {
          this.deps.logger.error({ err }, "Scheduler tick failed");
        })
        .finally(() => {
          this.scheduleNext();
        });
    }, this.deps.config.tickMs);
  }

  private async step(): Promise<TickResult> {
    const { store, logger, config } = this.deps;
    const head = this.queue[0];
    if (head === undefined) return "idle";

    let task: Task | null;
    try {
      task = await store.getTask(head);
    } catch (err) {
      logger.error({ err, taskId: head }, "Failed to load queue head; will retry");
      return "error";
    }

    if (!task || !isClaimable(task)) {
      this.queue.shift();
      logger.debug(
        { taskId: head, status: task?.status ?? null },
        "Dropped queue head that is no longer claimable"
      );
      return "dropped";
    }

    const ownerInFlight = this.inFlightFor(task.ownerId);
    if (
      this.inFlight >= config.globalConcurrency ||
      ownerInFlight >= config.perUserConcurrency
    ) {
      logger.debug(
        {
          taskId: task.id,
          ownerId: task.ownerId,
          inFlight: this.inFlight,
          ownerInFlight,
        },
        "Concurrency cap reached; deferring queue head"
      );
      return "deferred";
    }

    let claimed: boolean;
    try {
      claimed = await store.claimTask(task.id);
    } catch (err) {
      logger.error({ err, taskId: task.id }, "Claim failed; will retry");
      return "error";
    }

    this.queue.shift();
    if (!claimed) {
      logger.info(
        { taskId: task.id, batchId: task.batchId },
        "Claim conflict; task already taken"
      );
      return "claim_conflict";
    }

    this.dispatch(task);
    return "dispatched";
  }

  private dispatch(task: Task): void {
    const { logger } = this.deps;
    this.inFlight += 1;
    this.perOwner.set(task.ownerId, this.inFlightFor(task.ownerId) + 1);
    logger.info(
      {
        taskId: task.id,
        batchId: task.batchId,
        ownerId: task.ownerId,
        inFlight: this.inFlight,
      },
      "Dispatched task"
    );

    const unit: Promise<void> = this.deps
      .runTask(task)
      .then(
        (outcome: ExecutionOutcome) => {
          logger.info(
            {
              taskId: task.id,
              batchId: task.batchId,
              outcome: outcome.ok ? "completed" : outcome.kind,
            },
            "Execution unit settled"
          );
        },
        (err: unknown) => {
          logger.error(
            { err, taskId: task.id, batchId: task.batchId },
            "Execution unit faulted; task left for the reconciler"
          );
        }
      )
      .finally(() => {
        this.release(task.ownerId);
        this.units.delete(unit);
      });
    this.units.add(unit);
  }

  private release(ownerId: UserId): void {
    this.inFlight -= 1;
    const remaining = this.inFlightFor(ownerId) - 1;
    if (remaining > 0) {
      this.perOwner.set(ownerId, remaining);
    } else {
      this.perOwner.delete(ownerId);
    }
  }
}
