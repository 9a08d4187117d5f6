// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/db-schema/generation`
 * Purpose: Batch and task tables for externally executed generation jobs.
 * Scope: Defines batches and tasks tables plus the task status enum. Does not contain queries or logic.
 * Invariants:
 * - tasks.status is the source of truth; the in-process queue is rebuilt from it at startup
 * - batches.*_count columns are derived (written only by the reconciler's recompute step)
 * - deleted_at marks soft deletion; soft-deleted rows are excluded from counters and the queue
 * Side-effects: none (schema definitions only)
 * Links: packages/scheduler-core/src/transitions.ts
 * @public
 */

import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

import { users } from "./refs";

/**
 * Task status values (source of truth for DB enum).
 * - pending: Created, not yet queued
 * - queued: Waiting in the in-process queue
 * - running: Claimed by an execution unit
 * - completed: Provider returned a result locator
 * - failed: Provider error or timeout (retryable)
 * - cancelled: Cancelled by the owner or by batch deletion
 */
export const TASK_STATUSES = [
  "pending",
  "queued",
  "running",
  "completed",
  "failed",
  "cancelled",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const ORIENTATIONS = ["portrait", "landscape"] as const;

export type Orientation = (typeof ORIENTATIONS)[number];

export const batches = pgTable(
  "batches",
  {
    id: uuid("id").primaryKey(),
    ownerId: text("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    prompt: text("prompt").notNull(),
    model: text("model").notNull(),
    orientation: text("orientation", { enum: ORIENTATIONS }).notNull(),
    size: text("size").notNull(),
    /** Seconds */
    duration: integer("duration").notNull(),
    requestedCount: integer("requested_count").notNull(),
    /** Optional reference image handed to the provider */
    mediaRef: text("media_ref"),
    totalCount: integer("total_count").notNull().default(0),
    queuedCount: integer("queued_count").notNull().default(0),
    runningCount: integer("running_count").notNull().default(0),
    completedCount: integer("completed_count").notNull().default(0),
    failedCount: integer("failed_count").notNull().default(0),
    cancelledCount: integer("cancelled_count").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    deletedAt: timestamp("deleted_at", { withTimezone: true }),
  },
  (table) => ({
    /** Owner listing, newest first */
    ownerCreatedIdx: index("batches_owner_created_idx").on(
      table.ownerId,
      table.createdAt
    ),
  })
);

export const tasks = pgTable(
  "tasks",
  {
    id: uuid("id").primaryKey(),
    batchId: uuid("batch_id")
      .notNull()
      .references(() => batches.id, { onDelete: "cascade" }),
    ownerId: text("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    prompt: text("prompt").notNull(),
    model: text("model").notNull(),
    orientation: text("orientation", { enum: ORIENTATIONS }).notNull(),
    size: text("size").notNull(),
    duration: integer("duration").notNull(),
    mediaRef: text("media_ref"),
    status: text("status", { enum: TASK_STATUSES })
      .notNull()
      .default("pending"),
    /** Truncated human-readable failure reason */
    errorSummary: text("error_summary"),
    /** Provider-reported progress, e.g. "42%" */
    progress: text("progress"),
    /** Provider job handle returned on create */
    remoteJobId: text("remote_job_id"),
    resultLocator: text("result_locator"),
    retries: integer("retries").notNull().default(0),
    remoteStartedAt: timestamp("remote_started_at", { withTimezone: true }),
    remoteFinishedAt: timestamp("remote_finished_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    deletedAt: timestamp("deleted_at", { withTimezone: true }),
  },
  (table) => ({
    batchIdx: index("tasks_batch_idx").on(table.batchId, table.createdAt),
    /** For queue rebuild and the stale-running sweep */
    statusUpdatedIdx: index("tasks_status_updated_idx").on(
      table.status,
      table.updatedAt
    ),
  })
);
