/**
 * @exposure/node — Entry point.
 *
 * Loads config, starts the HTTP server and the reconciliation schedule,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { createNodeService } from "./bootstrap.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const service = createNodeService(config, logger);
  const { app } = createApp({ service, logger });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, apiBaseUrl: config.API_BASE_URL },
    "Exposure node started",
  );

  const runScheduled = async (): Promise<void> => {
    try {
      await service.reconcile();
    } catch (error) {
      logger.error({ err: error }, "Scheduled reconciliation threw");
    }
  };

  let timer: NodeJS.Timeout | undefined;
  if (config.RECONCILE_INTERVAL_MS > 0) {
    timer = setInterval(() => void runScheduled(), config.RECONCILE_INTERVAL_MS);
    logger.info({ intervalMs: config.RECONCILE_INTERVAL_MS }, "Reconciliation scheduled");
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    clearInterval(timer);
    server.close();
    await service.drain();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
