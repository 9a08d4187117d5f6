// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/adapters/remote/http-remote-job`
 * Purpose: RemoteJobClient over the provider's HTTP API.
 * Scope: POST {base}/video/create and GET {base}/video/query?id=. Does not retry; the executor decides.
 * Invariants:
 * - Bearer auth on every request; Idempotency-Key header on create when supplied
 * - Every response body is parsed with zod; unknown fields are ignored, wrong types degrade to null
 * - Status strings go through mapProviderStatus (unknown → in-progress)
 * - Transport, HTTP and protocol failures throw RemoteJobError
 * - The API key is never logged
 * Side-effects: IO (HTTP)
 * Links: packages/scheduler-core/src/ports/remote-job.port.ts
 * @internal
 */

import {
  type CreateRemoteJobParams,
  mapProviderStatus,
  type RemoteJobClient,
  RemoteJobError,
  type RemoteJobHandle,
  type RemoteJobSnapshot,
} from "@clipqueue/scheduler-core";
import type { Logger } from "pino";
import { z } from "zod";

export interface HttpRemoteJobClientConfig {
  /** e.g. https://api.example.com/v1 (trailing slash tolerated) */
  readonly apiBase: string;
  readonly apiKey: string;
  readonly requestTimeoutMs: number;
}

const optionalString = z.string().nullish().catch(null);

/** Unix seconds, unix millis or an ISO string */
const optionalTimestamp = z
  .union([z.number(), z.string()])
  .nullish()
  .catch(null)
  .transform((value): Date | null => {
    if (value === null || value === undefined || value === "") return null;
    const date =
      typeof value === "number"
        ? new Date(value < 1e12 ? value * 1000 : value)
        : new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  });

const optionalProgress = z
  .union([z.string(), z.number()])
  .nullish()
  .catch(null)
  .transform((value): string | null => {
    if (value === null || value === undefined || value === "") return null;
    return typeof value === "number" ? `${value}%` : value;
  });

const JobFieldsSchema = z.object({
  status: optionalString,
  video_url: optionalString,
  progress: optionalProgress,
  started_at: optionalTimestamp,
  finished_at: optionalTimestamp,
});

export const CreateResponseSchema = z.object({
  id: optionalString,
  task_id: optionalString,
});

export const QueryResponseSchema = JobFieldsSchema.extend({
  result_url: optionalString,
  error: optionalString,
  message: optionalString,
  fail_reason: optionalString,
  data: JobFieldsSchema.partial().nullish().catch(null),
});

export type QueryResponse = z.infer<typeof QueryResponseSchema>;
type JobFields = z.infer<typeof JobFieldsSchema>;

/** Pure mapping from a parsed query body to the port snapshot. */
export function toSnapshot(body: QueryResponse): RemoteJobSnapshot {
  const inner: Partial<JobFields> = body.data ?? {};
  return {
    status: mapProviderStatus(inner.status || body.status),
    resultLocator: inner.video_url || body.video_url || body.result_url || null,
    error: body.error || body.message || body.fail_reason || null,
    progress: inner.progress ?? body.progress ?? null,
    remoteStartedAt: inner.started_at ?? body.started_at ?? null,
    remoteFinishedAt: inner.finished_at ?? body.finished_at ?? null,
  };
}

function parseBody<T extends z.ZodTypeAny>(schema: T, json: unknown): z.output<T> {
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new RemoteJobError(
      `Provider returned an unexpected body: ${result.error.errors[0]?.message ?? "invalid"}`
    );
  }
  return result.data;
}

export class HttpRemoteJobClient implements RemoteJobClient {
  private readonly apiBase: string;

  constructor(
    private readonly config: HttpRemoteJobClientConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.apiBase = config.apiBase.replace(/\/+$/, "");
  }

  async create(params: CreateRemoteJobParams): Promise<RemoteJobHandle> {
    const url = `${this.apiBase}/video/create`;
    const headers: Record<string, string> = {
      ...this.baseHeaders(),
      "Content-Type": "application/json",
    };
    if (params.idempotencyKey) {
      headers["Idempotency-Key"] = params.idempotencyKey;
    }

    const payload: Record<string, unknown> = {
      model: params.model,
      prompt: params.prompt,
      orientation: params.orientation,
      size: params.size,
      duration: params.duration,
      watermark: false,
    };
    if (params.mediaRef) {
      payload.images = [params.mediaRef];
    }

    this.logger.debug(
      {
        url,
        model: params.model,
        duration: params.duration,
        promptLength: params.prompt.length,
        idempotencyKey: params.idempotencyKey,
      },
      "Creating remote job"
    );

    const json = await this.request(url, {
      method: "POST",
      headers,
      body: JSON.stringify(payload),
    });
    const body = parseBody(CreateResponseSchema, json);
    const id = body.id || body.task_id;
    if (!id) {
      throw new RemoteJobError("Provider did not return a job id");
    }
    return { id };
  }

  async poll(handle: RemoteJobHandle): Promise<RemoteJobSnapshot> {
    const url = `${this.apiBase}/video/query?id=${encodeURIComponent(handle.id)}`;
    const json = await this.request(url, {
      method: "GET",
      headers: this.baseHeaders(),
    });
    const snapshot = toSnapshot(parseBody(QueryResponseSchema, json));
    this.logger.debug(
      { remoteJobId: handle.id, status: snapshot.status, progress: snapshot.progress },
      "Polled remote job"
    );
    return snapshot;
  }

  private baseHeaders(): Record<string, string> {
    return {
      Accept: "application/json",
      Authorization: `Bearer ${this.config.apiKey}`,
    };
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RemoteJobError(`Provider request failed: ${reason}`);
    }

    if (!response.ok) {
      const errorText = await response.text();
      this.logger.warn(
        { status: response.status, url, errorText: errorText.slice(0, 200) },
        "Provider returned error"
      );
      throw new RemoteJobError(
        `Provider returned ${response.status}: ${errorText.slice(0, 200)}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RemoteJobError(`Provider returned invalid JSON: ${reason}`);
    }
  }
}
