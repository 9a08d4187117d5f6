// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/ports`
 * Purpose: Port barrel - canonical import surface for all port interfaces used by this service.
 * Scope: Re-exports only. No implementations, no runtime objects.
 * Invariants: Named exports only, no concrete adapter types
 * Side-effects: none
 * Links: Consumed by admission/, executor/, reconcile/, batches/ and bootstrap/
 * @public
 */

export type { CreditLedgerStore } from "@clipqueue/ledger-core";
export type {
  GenerationStore,
  RemoteJobClient,
} from "@clipqueue/scheduler-core";
export type { Clock, Sleep } from "./clock.port.js";
