// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/ports/clock`
 * Purpose: Time abstraction for deterministic testing.
 * Scope: Provides current time. Does not handle timezone conversion.
 * Invariants: Every time-window decision in this service (rate limit, replay window,
 *   poll deadline, staleness) reads time through this port
 * Side-effects: none (interface only)
 * @public
 */

export interface Clock {
  now(): Date;
}

/** Suspends an execution unit between polls. Injected so tests can advance a fake clock instead. */
export type Sleep = (ms: number) => Promise<void>;
