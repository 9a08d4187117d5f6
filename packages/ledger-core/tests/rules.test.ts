// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core/tests/rules`
 * Purpose: Unit tests for balance derivation and ledger entry builders.
 * Scope: Pure function tests. Does not require database or network.
 * Invariants: balance = Σ delta; a task has at most one positive-delta reference.
 * Side-effects: none
 * Links: src/rules.ts
 * @internal
 */

import { toBatchId, toTaskId, toUserId } from "@clipqueue/ids";
import { describe, expect, it } from "vitest";

import {
  buildBatchDebit,
  buildManualAdjustment,
  buildTaskRefund,
  computeBalance,
  hasRefundFor,
  InvalidCreditAdjustmentError,
  isInvalidCreditAdjustmentError,
} from "../src";

const OWNER = toUserId("00000000-0000-0000-0000-000000000001");
const BATCH = toBatchId("00000000-0000-0000-0000-000000000002");
const TASK_A = toTaskId("00000000-0000-0000-0000-000000000003");
const TASK_B = toTaskId("00000000-0000-0000-0000-000000000004");

describe("computeBalance", () => {
  it("is zero for an empty ledger", () => {
    expect(computeBalance([])).toBe(0);
  });

  it("sums signed deltas", () => {
    expect(computeBalance([{ delta: 100 }, { delta: -30 }, { delta: 15 }])).toBe(
      85
    );
  });
});

describe("hasRefundFor", () => {
  const ledger = [
    { taskRef: null, delta: -30 },
    { taskRef: TASK_A, delta: 15 },
  ];

  it("finds a positive transaction referencing the task", () => {
    expect(hasRefundFor(ledger, TASK_A)).toBe(true);
  });

  it("ignores other tasks and negative deltas", () => {
    expect(hasRefundFor(ledger, TASK_B)).toBe(false);
    expect(hasRefundFor([{ taskRef: TASK_B, delta: -15 }], TASK_B)).toBe(false);
  });
});

describe("entry builders", () => {
  it("builds a negative batch debit", () => {
    expect(
      buildBatchDebit({ ownerId: OWNER, batchId: BATCH, totalCost: 30 })
    ).toEqual({
      ownerId: OWNER,
      delta: -30,
      reason: "batch_debit",
      batchRef: BATCH,
      taskRef: null,
    });
  });

  it("builds a positive task refund", () => {
    expect(
      buildTaskRefund({
        ownerId: OWNER,
        batchId: BATCH,
        taskId: TASK_A,
        amount: 15,
      })
    ).toEqual({
      ownerId: OWNER,
      delta: 15,
      reason: "task_refund",
      batchRef: BATCH,
      taskRef: TASK_A,
    });
  });

  it("rejects a non-positive refund", () => {
    expect(() =>
      buildTaskRefund({ ownerId: OWNER, batchId: BATCH, taskId: TASK_A, amount: 0 })
    ).toThrow(RangeError);
  });

  it("tags manual adjustments with the trimmed reason", () => {
    expect(
      buildManualAdjustment({ ownerId: OWNER, delta: -5, reason: " promo " })
    ).toEqual({
      ownerId: OWNER,
      delta: -5,
      reason: "manual_adjustment:promo",
      batchRef: null,
      taskRef: null,
    });
  });

  it("rejects zero, fractional and unreasoned adjustments", () => {
    expect(() =>
      buildManualAdjustment({ ownerId: OWNER, delta: 0, reason: "x" })
    ).toThrow(InvalidCreditAdjustmentError);
    expect(() =>
      buildManualAdjustment({ ownerId: OWNER, delta: 1.5, reason: "x" })
    ).toThrow(InvalidCreditAdjustmentError);

    let caught: unknown;
    try {
      buildManualAdjustment({ ownerId: OWNER, delta: 10, reason: "   " });
    } catch (error) {
      caught = error;
    }
    expect(isInvalidCreditAdjustmentError(caught)).toBe(true);
  });
});
