// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/outcome`
 * Purpose: Result type returned by an execution unit in place of thrown failures.
 * Scope: Types and small constructors. Does not perform I/O.
 * Invariants:
 * - Only provider_error and timeout are refundable
 * - claim_lost and cancelled leave the ledger untouched
 * Side-effects: none
 * Links: services/generation-worker/src/executor/execute-task.ts
 * @public
 */

const FAILURE_KINDS = [
  "provider_error",
  "timeout",
  "claim_lost",
  "cancelled",
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export type ExecutionOutcome =
  | {
      readonly ok: true;
      readonly resultLocator: string;
      readonly remoteFinishedAt: Date | null;
    }
  | {
      readonly ok: false;
      readonly kind: FailureKind;
      readonly message: string;
    };

export const MAX_ERROR_SUMMARY_LENGTH = 500;

export function succeeded(
  resultLocator: string,
  remoteFinishedAt: Date | null = null
): ExecutionOutcome {
  return { ok: true, resultLocator, remoteFinishedAt };
}

export function failed(kind: FailureKind, message: string): ExecutionOutcome {
  return { ok: false, kind, message };
}

export function isRefundableFailure(kind: FailureKind): boolean {
  return kind === "provider_error" || kind === "timeout";
}

export function truncateErrorSummary(message: string): string {
  return message.length > MAX_ERROR_SUMMARY_LENGTH
    ? message.slice(0, MAX_ERROR_SUMMARY_LENGTH)
    : message;
}
