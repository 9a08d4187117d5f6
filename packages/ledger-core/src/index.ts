// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/ledger-core`
 * Purpose: Pure domain logic for the credit ledger, shared between db-client and the worker service.
 * Scope: Re-exports model types, catalog, pricing, balance/refund rules, errors and the store port. Does not contain I/O.
 * Invariants: No imports from services/. Pure domain logic only.
 * Side-effects: none
 * Links: packages/ledger-core/src/store.ts
 * @public
 */

// Catalog
export {
  getModelSpec,
  isAllowedCombination,
  MODEL_CATALOG,
  MODEL_IDS,
  type ModelSpec,
  VIDEO_SIZES,
  type VideoSize,
} from "./catalog";
// Errors
export {
  InsufficientCreditsError,
  InvalidCreditAdjustmentError,
  isInsufficientCreditsError,
  isInvalidCreditAdjustmentError,
} from "./errors";
// Model
export {
  type AppendTransactionParams,
  CREDIT_REASONS,
  type CreditReason,
  type CreditTransaction,
  type TaskRefundParams,
} from "./model";
// Pricing
export { batchCost, DEFAULT_UNIT_COST, UNIT_COSTS, unitCost } from "./pricing";
// Rules
export {
  buildBatchDebit,
  buildManualAdjustment,
  buildTaskRefund,
  computeBalance,
  hasRefundFor,
  isRefundFor,
  MAX_ADJUSTMENT_REASON_LENGTH,
} from "./rules";
// Store port
export type { CreditLedgerStore } from "./store";
