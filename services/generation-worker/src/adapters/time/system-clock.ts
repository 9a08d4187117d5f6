// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/adapters/time/system-clock`
 * Purpose: System clock and timer-based sleep for production use.
 * Scope: Reads wall-clock time; schedules timers.
 * Side-effects: IO (reads system time, timers)
 * Links: Implements Clock port
 * @internal
 */

import { setTimeout as delay } from "node:timers/promises";

import type { Clock, Sleep } from "../../ports/index.js";

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

export const systemSleep: Sleep = async (ms) => {
  await delay(ms);
};
