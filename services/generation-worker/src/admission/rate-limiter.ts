// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/admission/rate-limiter`
 * Purpose: Per-owner sliding-window limiter for batch submissions.
 * Scope: In-process, volatile. Does not persist or share state across processes.
 * Invariants:
 * - A submission is accepted only if fewer than `limit` accepted submissions fall inside the trailing window
 * - Only accepted submissions are recorded; per-owner history never exceeds `limit` entries
 * - A released slot no longer counts; owners with nothing left in the window are forgotten
 * Side-effects: none (in-memory state only)
 * Links: services/generation-worker/src/admission/submit-batch.ts
 * @internal
 */

import type { Clock } from "../ports/index.js";

export const RATE_LIMIT_WINDOW_MS = 60_000;

export type RateLimitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterMs: number };

export class SlidingWindowRateLimiter {
  private readonly history = new Map<string, number[]>();
  private lastPruneAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly options: {
      limit: number;
      clock: Clock;
      windowMs?: number;
    }
  ) {}

  private get windowMs(): number {
    return this.options.windowMs ?? RATE_LIMIT_WINDOW_MS;
  }

  tryAcquire(ownerId: string): RateLimitDecision {
    const now = this.options.clock.now().getTime();
    this.pruneIdleOwners(now);
    const recent = this.recent(ownerId, now);

    const oldest = recent[0];
    if (oldest !== undefined && recent.length >= this.options.limit) {
      this.history.set(ownerId, recent);
      return { allowed: false, retryAfterMs: oldest + this.windowMs - now + 1 };
    }

    recent.push(now);
    this.history.set(ownerId, recent);
    return { allowed: true };
  }

  /** Gives back the owner's most recent slot, for a submission that was not admitted after all. */
  release(ownerId: string): void {
    const entries = this.history.get(ownerId);
    if (!entries) return;
    entries.pop();
    if (entries.length === 0) {
      this.history.delete(ownerId);
    }
  }

  /** Submissions currently counted against the owner */
  used(ownerId: string): number {
    return this.recent(ownerId, this.options.clock.now().getTime()).length;
  }

  /** Owners with history held in memory */
  get trackedOwners(): number {
    return this.history.size;
  }

  private recent(ownerId: string, now: number): number[] {
    return (this.history.get(ownerId) ?? []).filter((at) => now - at <= this.windowMs);
  }

  // At most once per window. Entries are pushed in time order, so the last one is the newest.
  private pruneIdleOwners(now: number): void {
    if (now - this.lastPruneAt < this.windowMs) return;
    this.lastPruneAt = now;
    for (const [ownerId, entries] of this.history) {
      const newest = entries[entries.length - 1];
      if (newest === undefined || now - newest > this.windowMs) {
        this.history.delete(ownerId);
      }
    }
  }
}
