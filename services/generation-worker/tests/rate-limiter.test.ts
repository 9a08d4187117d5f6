// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/tests/rate-limiter`
 * Purpose: Unit tests for the per-owner sliding-window limiter.
 * Scope: Pure in-memory behavior under a FakeClock.
 * Side-effects: none
 * Links: src/admission/rate-limiter.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  RATE_LIMIT_WINDOW_MS,
  SlidingWindowRateLimiter,
} from "../src/admission/rate-limiter.js";
import { FakeClock } from "./_fakes/fake-clock.js";

describe("SlidingWindowRateLimiter", () => {
  it("allows up to the limit inside one window", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 3, clock });

    expect(limiter.tryAcquire("owner")).toEqual({ allowed: true });
    expect(limiter.tryAcquire("owner")).toEqual({ allowed: true });
    expect(limiter.tryAcquire("owner")).toEqual({ allowed: true });
    expect(limiter.used("owner")).toBe(3);
  });

  it("reports how long until the oldest entry leaves the window", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 2, clock });

    limiter.tryAcquire("owner");
    clock.advance(10_000);
    limiter.tryAcquire("owner");
    clock.advance(5_000);

    expect(limiter.tryAcquire("owner")).toEqual({
      allowed: false,
      retryAfterMs: 45_001,
    });
  });

  it("does not record rejected attempts", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 1, clock });

    limiter.tryAcquire("owner");
    limiter.tryAcquire("owner");
    limiter.tryAcquire("owner");

    expect(limiter.used("owner")).toBe(1);
  });

  it("counts an entry exactly one window old as still inside", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 1, clock });

    limiter.tryAcquire("owner");
    clock.advance(RATE_LIMIT_WINDOW_MS);

    expect(limiter.tryAcquire("owner")).toEqual({ allowed: false, retryAfterMs: 1 });
    clock.advance(1);
    expect(limiter.tryAcquire("owner")).toEqual({ allowed: true });
  });

  it("keeps owners independent", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 1, clock });

    limiter.tryAcquire("a");

    expect(limiter.tryAcquire("b")).toEqual({ allowed: true });
    expect(limiter.used("a")).toBe(1);
    expect(limiter.used("b")).toBe(1);
  });

  it("frees a released slot", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 1, clock });

    limiter.tryAcquire("owner");
    limiter.release("owner");

    expect(limiter.trackedOwners).toBe(0);
    expect(limiter.tryAcquire("owner")).toEqual({ allowed: true });
    expect(limiter.used("owner")).toBe(1);
  });

  it("ignores a release for an owner with no history", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 1, clock });

    limiter.release("nobody");

    expect(limiter.trackedOwners).toBe(0);
  });

  it("forgets owners whose window has emptied", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 1, clock });

    limiter.tryAcquire("a");
    limiter.tryAcquire("b");
    expect(limiter.trackedOwners).toBe(2);

    clock.advance(RATE_LIMIT_WINDOW_MS + 1);
    limiter.tryAcquire("c");

    expect(limiter.trackedOwners).toBe(1);
    expect(limiter.used("a")).toBe(0);
  });

  it("honours a custom window", () => {
    const clock = new FakeClock();
    const limiter = new SlidingWindowRateLimiter({ limit: 1, clock, windowMs: 1_000 });

    limiter.tryAcquire("owner");
    clock.advance(1_001);

    expect(limiter.tryAcquire("owner")).toEqual({ allowed: true });
  });
});
