// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@clipqueue/generation-worker/main`
 * Purpose: Service entry point with graceful shutdown.
 * Scope: Entry point that calls env(), builds the container and starts the worker. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 *   - ready=false stops being advertised before intake stops
 *   - Queue restored and loops started before ready=true
 * Side-effects: IO (database, HTTP, process signals)
 * Links: services/generation-worker/src/worker.ts
 * @public
 */

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { type HealthState, startHealthServer } from "./health.js";
import { flushLogger, makeLogger } from "./observability/logger.js";
import { createGenerationWorker } from "./worker.js";

async function main(): Promise<void> {
  // Load and validate env
  const config = env();

  // Create logger (composition root owns logger creation)
  const logger = makeLogger();

  logger.info({ logLevel: config.LOG_LEVEL }, "Starting generation worker");

  // Health state for readiness probes
  const healthState: HealthState = { ready: false };
  const healthServer = startHealthServer(
    healthState,
    config.HEALTH_PORT,
    config.SERVICE_NAME
  );
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  const container = createContainer(config, logger);
  const worker = createGenerationWorker(container);
  await worker.start();

  healthState.ready = true;
  logger.info(
    {
      queued: worker.scheduler.queueLength,
      globalConcurrency: config.GLOBAL_CONCURRENCY,
      perUserConcurrency: config.PER_USER_CONCURRENCY,
    },
    "Generation worker started, ready for traffic"
  );

  // Graceful shutdown
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false;
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await worker.shutdown();
      await container.close();
      healthServer.close();
      logger.info({}, "Shutdown complete");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
