// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core/errors`
 * Purpose: Domain error classes for credit ledger operations.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: packages/ledger-core/src/rules.ts
 * @public
 */

/**
 * Thrown when an owner's derived balance cannot cover a batch's total cost.
 * Raised before any mutation; no partial debit is ever written.
 */
export class InsufficientCreditsError extends Error {
  public readonly code = "INSUFFICIENT_CREDITS" as const;

  constructor(
    public readonly ownerId: string,
    public readonly requiredCost: number,
    public readonly availableBalance: number
  ) {
    super(
      `Owner ${ownerId} has insufficient credits: need ${requiredCost}, have ${availableBalance}`
    );
    this.name = "InsufficientCreditsError";
  }

  get shortfall(): number {
    return Math.max(0, this.requiredCost - this.availableBalance);
  }
}

export class InvalidCreditAdjustmentError extends Error {
  public readonly code = "INVALID_CREDIT_ADJUSTMENT" as const;

  constructor(public readonly detail: string) {
    super(`Invalid credit adjustment: ${detail}`);
    this.name = "InvalidCreditAdjustmentError";
  }
}

// Type guards

export function isInsufficientCreditsError(
  error: unknown
): error is InsufficientCreditsError {
  return error instanceof Error && error.name === "InsufficientCreditsError";
}

export function isInvalidCreditAdjustmentError(
  error: unknown
): error is InvalidCreditAdjustmentError {
  return (
    error instanceof Error && error.name === "InvalidCreditAdjustmentError"
  );
}
