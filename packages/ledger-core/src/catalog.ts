// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core/catalog`
 * Purpose: Per-model allow-lists of durations and sizes accepted at admission.
 * Scope: Constants and lookups only. Does not price anything (see pricing.ts).
 * Invariants: A (model, duration, size) combination outside this catalog is rejected before any mutation.
 * Side-effects: none
 * Links: services/generation-worker/src/admission/schemas.ts
 * @public
 */

export const VIDEO_SIZES = ["small", "medium", "large"] as const;
export type VideoSize = (typeof VIDEO_SIZES)[number];

export interface ModelSpec {
  /** Seconds */
  readonly durations: readonly number[];
  readonly sizes: readonly VideoSize[];
}

export const MODEL_CATALOG: Readonly<Record<string, ModelSpec>> = {
  "sora-2": { durations: [5, 10, 15], sizes: VIDEO_SIZES },
  "sora-2-pro": { durations: [15, 25], sizes: VIDEO_SIZES },
};

export const MODEL_IDS: readonly string[] = Object.keys(MODEL_CATALOG);

export function getModelSpec(model: string): ModelSpec | undefined {
  return Object.hasOwn(MODEL_CATALOG, model) ? MODEL_CATALOG[model] : undefined;
}

export function isAllowedCombination(
  model: string,
  duration: number,
  size: string
): boolean {
  const entry = getModelSpec(model);
  if (!entry) return false;
  return (
    entry.durations.includes(duration) &&
    entry.sizes.some((allowed) => allowed === size)
  );
}
