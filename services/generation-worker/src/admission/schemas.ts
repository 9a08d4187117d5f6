// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/admission/schemas`
 * Purpose: Zod schema for batch submission requests.
 * Scope: Shape and allow-list validation. Does not touch the store or the ledger.
 * Invariants:
 * - prompt is trimmed before the length bound applies
 * - (model, duration, size) must be in the per-model catalog
 * - count is bounded by maxTasksPerBatch
 * Side-effects: none
 * Links: packages/ledger-core/src/catalog.ts
 * @public
 */

import {
  getModelSpec,
  isAllowedCombination,
  MODEL_IDS,
  VIDEO_SIZES,
} from "@clipqueue/ledger-core";
import { ORIENTATIONS } from "@clipqueue/scheduler-core";
import { z } from "zod";

export interface SubmissionLimits {
  readonly maxPromptLength: number;
  readonly maxTasksPerBatch: number;
}

export function createSubmitBatchSchema(limits: SubmissionLimits) {
  return z
    .object({
      prompt: z
        .string()
        .trim()
        .min(1, "prompt is required")
        .max(
          limits.maxPromptLength,
          `prompt must be at most ${limits.maxPromptLength} characters`
        ),
      model: z.string().refine((model) => getModelSpec(model) !== undefined, {
        message: `model must be one of: ${MODEL_IDS.join(", ")}`,
      }),
      orientation: z.enum(ORIENTATIONS),
      size: z.enum(VIDEO_SIZES),
      /** Seconds */
      duration: z.number().int("duration must be an integer"),
      count: z
        .number()
        .int("count must be an integer")
        .min(1, "count must be at least 1")
        .max(
          limits.maxTasksPerBatch,
          `count must be at most ${limits.maxTasksPerBatch}`
        ),
      mediaRef: z
        .string()
        .min(1)
        .nullish()
        .transform((value) => value ?? null),
      idempotencyKey: z
        .string()
        .trim()
        .min(1)
        .max(128)
        .nullish()
        .transform((value) => value ?? null),
    })
    .superRefine((request, ctx) => {
      if (getModelSpec(request.model) === undefined) return;
      if (!isAllowedCombination(request.model, request.duration, request.size)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["duration"],
          message: `${request.model} does not support ${request.duration}s at size ${request.size}`,
        });
      }
    });
}

export type SubmitBatchSchema = ReturnType<typeof createSubmitBatchSchema>;
/** What callers send */
export type SubmitBatchRequest = z.input<SubmitBatchSchema>;
