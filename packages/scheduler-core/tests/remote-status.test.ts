// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/scheduler-core/tests/remote-status`
 * Purpose: Unit tests for provider status normalisation.
 * Scope: Pure function tests. Does not require database or network.
 * Invariants: Unknown strings never map to a terminal status.
 * Side-effects: none
 * Links: src/remote-status.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { isTerminalRemoteStatus, mapProviderStatus } from "../src";

describe("mapProviderStatus", () => {
  it("maps provider synonyms", () => {
    expect(mapProviderStatus("success")).toBe("completed");
    expect(mapProviderStatus("error")).toBe("failed");
    expect(mapProviderStatus("processing")).toBe("in-progress");
    expect(mapProviderStatus("canceled")).toBe("cancelled");
  });

  it("normalises case, spaces and underscores", () => {
    expect(mapProviderStatus("IN_PROGRESS")).toBe("in-progress");
    expect(mapProviderStatus(" In Progress ")).toBe("in-progress");
    expect(mapProviderStatus("Completed")).toBe("completed");
  });

  it("falls back to in-progress for unknown or missing values", () => {
    expect(mapProviderStatus("rendering-v2")).toBe("in-progress");
    expect(mapProviderStatus("constructor")).toBe("in-progress");
    expect(mapProviderStatus(undefined)).toBe("in-progress");
    expect(mapProviderStatus(null)).toBe("in-progress");
    expect(isTerminalRemoteStatus(mapProviderStatus("???"))).toBe(false);
  });
});
