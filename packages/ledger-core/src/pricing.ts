// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core/pricing`
 * Purpose: Credit pricing table for generation jobs.
 * Scope: Pure lookup (model, duration, size) → unit cost. Does not validate the combination.
 * Invariants:
 * - Always returns a positive integer
 * - Unknown combinations fall back to DEFAULT_UNIT_COST instead of throwing
 * - A size-specific entry ("<duration>:<size>") wins over the duration-only entry
 * Side-effects: none
 * Notes: Admission rejects combinations outside the model catalog before pricing runs,
 *        so the fallback only covers gaps between catalog and table.
 * Links: packages/scheduler-core/src/catalog.ts
 * @public
 */

export const DEFAULT_UNIT_COST = 15;

/** model → "<duration>" | "<duration>:<size>" → credits per generated unit */
export const UNIT_COSTS: Readonly<
  Record<string, Readonly<Record<string, number>>>
> = {
  "sora-2": {
    "5": 8,
    "10": 15,
    "15": 23,
  },
  "sora-2-pro": {
    "15": 23,
    "25": 38,
    "25:large": 45,
  },
};

export function unitCost(model: string, duration: number, size: string): number {
  if (!Object.hasOwn(UNIT_COSTS, model)) {
    return DEFAULT_UNIT_COST;
  }
  const table = UNIT_COSTS[model];
  for (const key of [`${duration}:${size}`, String(duration)]) {
    if (table && Object.hasOwn(table, key)) {
      return table[key] ?? DEFAULT_UNIT_COST;
    }
  }
  return DEFAULT_UNIT_COST;
}

/** Total debit for a batch, computed once at admission. */
export function batchCost(
  model: string,
  duration: number,
  size: string,
  count: number
): number {
  return unitCost(model, duration, size) * count;
}
