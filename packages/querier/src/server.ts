import "dotenv/config";
import { createLogger } from "@logquery/shared/utils";

import { buildApp } from "./app.js";
import { loadQuerierConfig } from "./config.js";
import { InMemoryLogStore } from "./services/memory-store.js";
import { NANOS_PER_HOUR } from "./time.js";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

const logger = createLogger("querier");

// ---------------------------------------------------------------------------
// Main startup
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadQuerierConfig();

  // -------------------------------------------------------------------------
  // Initialize the log store
  // -------------------------------------------------------------------------
  const store = new InMemoryLogStore({ retention: BigInt(config.retentionHours) * NANOS_PER_HOUR });
  store.start();

  // -------------------------------------------------------------------------
  // Build and start the server
  // -------------------------------------------------------------------------
  const fastify = await buildApp(
    { engine: store, labels: store, tailer: store, pusher: store },
    { queryTimeoutMs: config.queryTimeoutMs, tailPingIntervalMs: config.tailPingIntervalMs },
  );

  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, "Querier server started");

  // -------------------------------------------------------------------------
  // Graceful shutdown
  // -------------------------------------------------------------------------
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down querier...");

    // Stop the store first so open tail sessions close with a reason
    await store.stop();

    try {
      await fastify.close();
      logger.info("Fastify server closed");
    } catch (err) {
      logger.error({ err }, "Error closing Fastify");
    }

    logger.info("Querier shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ err }, "Querier failed to start");
  process.exit(1);
});
