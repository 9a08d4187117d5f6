// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker`
 * Purpose: Public surface for embedding the worker (e.g. behind an HTTP layer).
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  BatchValidationError,
  DuplicateSubmissionError,
  isBatchValidationError,
  isDuplicateSubmissionError,
  isRateLimitedError,
  RateLimitedError,
  type ValidationIssue,
} from "./admission/errors.js";
export type { SubmitBatchRequest } from "./admission/schemas.js";
export type { SubmitBatch, SubmitBatchResult } from "./admission/submit-batch.js";
export type { BatchListPage, BatchService } from "./batches/batch-service.js";
export {
  createContainer,
  type ServiceContainer,
  toWorkerSettings,
  type WorkerSettings,
} from "./bootstrap/container.js";
export { type Env, env, parseEnv } from "./bootstrap/env.js";
export { createGenerationWorker, type GenerationWorker } from "./worker.js";
