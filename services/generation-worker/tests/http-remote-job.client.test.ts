// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/tests/http-remote-job.client`
 * Purpose: Unit tests for the provider HTTP client: request shape, response mapping and error wrapping.
 * Scope: Injected fetch stub; no network.
 * Side-effects: none
 * Links: src/adapters/remote/http-remote-job.client.ts
 * @internal
 */

import { RemoteJobError } from "@clipqueue/scheduler-core";
import { describe, expect, it } from "vitest";

import {
  HttpRemoteJobClient,
  QueryResponseSchema,
  toSnapshot,
} from "../src/adapters/remote/http-remote-job.client.js";
import { makeNoopLogger } from "../src/observability/logger.js";

interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

function stubFetch(respond: () => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: typeof input === "string" ? input : input.toString(), init });
    return respond();
  };
  return { calls, fetchImpl };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function makeClient(fetchImpl: typeof fetch): HttpRemoteJobClient {
  return new HttpRemoteJobClient(
    {
      apiBase: "https://provider.test/v1/",
      apiKey: "test-secret",
      requestTimeoutMs: 5_000,
    },
    makeNoopLogger(),
    fetchImpl
  );
}

const CREATE_PARAMS = {
  prompt: "a paper boat in the rain",
  mediaRef: null,
  model: "sora-2",
  orientation: "portrait",
  size: "small",
  duration: 10,
  idempotencyKey: "task-abc-0",
} as const;

describe("HttpRemoteJobClient", () => {
  describe("create", () => {
    it("posts the job with auth and idempotency headers", async () => {
      const { calls, fetchImpl } = stubFetch(() => json({ id: "job-42" }));

      const handle = await makeClient(fetchImpl).create(CREATE_PARAMS);

      expect(handle).toEqual({ id: "job-42" });
      expect(calls).toHaveLength(1);
      const [call] = calls;
      expect(call?.url).toBe("https://provider.test/v1/video/create");
      expect(call?.init?.method).toBe("POST");
      const headers = new Headers(call?.init?.headers);
      expect(headers.get("Authorization")).toBe("Bearer test-secret");
      expect(headers.get("Idempotency-Key")).toBe("task-abc-0");
      expect(JSON.parse(String(call?.init?.body))).toEqual({
        model: "sora-2",
        prompt: "a paper boat in the rain",
        orientation: "portrait",
        size: "small",
        duration: 10,
        watermark: false,
      });
    });

    it("attaches the reference image when present", async () => {
      const { calls, fetchImpl } = stubFetch(() => json({ task_id: "job-7" }));

      const handle = await makeClient(fetchImpl).create({
        ...CREATE_PARAMS,
        mediaRef: "https://media.test/ref.png",
      });

      expect(handle.id).toBe("job-7");
      expect(JSON.parse(String(calls[0]?.init?.body))).toMatchObject({
        images: ["https://media.test/ref.png"],
      });
    });

    it("rejects a response without a job id", async () => {
      const { fetchImpl } = stubFetch(() => json({ ok: true }));

      await expect(makeClient(fetchImpl).create(CREATE_PARAMS)).rejects.toThrow(
        "Provider did not return a job id"
      );
    });

    it("wraps non-2xx responses with the status", async () => {
      const { fetchImpl } = stubFetch(
        () => new Response("bad gateway", { status: 502 })
      );

      const err = await makeClient(fetchImpl)
        .create(CREATE_PARAMS)
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RemoteJobError);
      expect(err).toMatchObject({
        message: "Provider returned 502: bad gateway",
        httpStatus: 502,
      });
    });

    it("wraps transport failures", async () => {
      const { fetchImpl } = stubFetch(() => {
        throw new TypeError("socket hang up");
      });

      await expect(makeClient(fetchImpl).create(CREATE_PARAMS)).rejects.toThrow(
        "Provider request failed: socket hang up"
      );
    });

    it("wraps a body that is not JSON", async () => {
      const { fetchImpl } = stubFetch(() => new Response("<html>", { status: 200 }));

      await expect(makeClient(fetchImpl).create(CREATE_PARAMS)).rejects.toBeInstanceOf(
        RemoteJobError
      );
    });
  });

  describe("poll", () => {
    it("queries by job id and maps nested data", async () => {
      const { calls, fetchImpl } = stubFetch(() =>
        json({
          data: {
            status: "SUCCESS",
            video_url: "https://cdn.test/job-42.mp4",
            progress: 100,
            finished_at: 1736935200,
          },
        })
      );

      const snapshot = await makeClient(fetchImpl).poll({ id: "job 42" });

      expect(calls[0]?.url).toBe("https://provider.test/v1/video/query?id=job%2042");
      expect(snapshot).toEqual({
        status: "completed",
        resultLocator: "https://cdn.test/job-42.mp4",
        error: null,
        progress: "100%",
        remoteStartedAt: null,
        remoteFinishedAt: new Date(1736935200 * 1000),
      });
    });

    it("surfaces provider failure reasons", async () => {
      const { fetchImpl } = stubFetch(() =>
        json({ status: "failed", fail_reason: "prompt rejected" })
      );

      const snapshot = await makeClient(fetchImpl).poll({ id: "job-1" });

      expect(snapshot).toMatchObject({ status: "failed", error: "prompt rejected" });
    });
  });
});

describe("toSnapshot", () => {
  it("treats unknown statuses as still in progress", () => {
    const body = QueryResponseSchema.parse({ status: "warming_up" });

    expect(toSnapshot(body).status).toBe("in-progress");
  });

  it("prefers nested data over top-level fields", () => {
    const body = QueryResponseSchema.parse({
      status: "processing",
      video_url: "https://cdn.test/outer.mp4",
      data: { status: "completed", video_url: "https://cdn.test/inner.mp4" },
    });

    expect(toSnapshot(body)).toMatchObject({
      status: "completed",
      resultLocator: "https://cdn.test/inner.mp4",
    });
  });

  it("falls back to result_url and parses ISO timestamps", () => {
    const body = QueryResponseSchema.parse({
      status: "completed",
      result_url: "https://cdn.test/result.mp4",
      started_at: "2025-01-15T10:00:00.000Z",
      progress: "done",
    });

    expect(toSnapshot(body)).toMatchObject({
      resultLocator: "https://cdn.test/result.mp4",
      remoteStartedAt: new Date("2025-01-15T10:00:00.000Z"),
      progress: "done",
    });
  });

  it("ignores fields of the wrong type", () => {
    const body = QueryResponseSchema.parse({
      status: 7,
      video_url: { nested: true },
      finished_at: "not a date",
    });

    expect(toSnapshot(body)).toEqual({
      status: "in-progress",
      resultLocator: null,
      error: null,
      progress: null,
      remoteStartedAt: null,
      remoteFinishedAt: null,
    });
  });
});
