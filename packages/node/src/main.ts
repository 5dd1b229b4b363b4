/**
 * @kakeibo/node — Entry point.
 *
 * Loads config, opens the ledger, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { createGateway, loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { LedgerService } from "./services/ledger-service.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const ledger = LedgerService.open({
    gateway: createGateway(config),
    logger: logger.child({ component: "ledger" }),
  });

  if (config.STORAGE === "memory") {
    logger.warn("Using in-memory storage; data is lost on exit");
  }

  const { app } = createApp({
    ledger,
    logger,
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, storage: config.STORAGE, dataDir: config.DATA_DIR },
    "Kakeibo ledger started",
  );

  // Graceful shutdown. Every save is synchronous, so nothing is in flight.
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
