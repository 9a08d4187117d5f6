// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/admission/errors`
 * Purpose: Structured rejections returned synchronously from batch submission.
 * Scope: Error classes and type guards. Does not perform I/O.
 * Invariants:
 * - All errors have a readonly `code` discriminant
 * - Every one of these is raised before any mutation
 * - InsufficientCreditsError lives in @clipqueue/ledger-core (raised inside the admission transaction)
 * Side-effects: none
 * Links: services/generation-worker/src/admission/submit-batch.ts
 * @public
 */

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class BatchValidationError extends Error {
  public readonly code = "BATCH_VALIDATION" as const;

  constructor(public readonly issues: readonly ValidationIssue[]) {
    super(
      `Invalid batch request: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`
    );
    this.name = "BatchValidationError";
  }
}

export class RateLimitedError extends Error {
  public readonly code = "RATE_LIMITED" as const;

  constructor(
    public readonly ownerId: string,
    public readonly retryAfterMs: number
  ) {
    super(`Too many batch submissions; retry in ${Math.ceil(retryAfterMs / 1000)}s`);
    this.name = "RateLimitedError";
  }
}

/**
 * Idempotency key reused inside the replay window, but the batch it points at is gone.
 */
export class DuplicateSubmissionError extends Error {
  public readonly code = "DUPLICATE_SUBMISSION" as const;

  constructor(public readonly idempotencyKey: string) {
    super(`Duplicate submission for idempotency key ${idempotencyKey}`);
    this.name = "DuplicateSubmissionError";
  }
}

// Type guards

export function isBatchValidationError(
  error: unknown
): error is BatchValidationError {
  return error instanceof Error && error.name === "BatchValidationError";
}

export function isRateLimitedError(error: unknown): error is RateLimitedError {
  return error instanceof Error && error.name === "RateLimitedError";
}

export function isDuplicateSubmissionError(
  error: unknown
): error is DuplicateSubmissionError {
  return error instanceof Error && error.name === "DuplicateSubmissionError";
}
