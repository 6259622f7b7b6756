/**
 * @stockbook/node — Entry point.
 *
 * Loads config, builds the pino logger and the Hono app, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      defaultCurrency: config.DEFAULT_CURRENCY,
      defaultDecimals: config.DEFAULT_DECIMALS,
      matchThreshold: config.MATCH_THRESHOLD,
      minConfidence: config.MIN_CONFIDENCE,
      dataFile: config.DATA_FILE,
      catalogSeedFile: config.CATALOG_SEED_FILE,
      logger: logger.child({ component: "stockbook" }),
    },
    logFn: (entry) => {
      const level = entry.status >= 500 ? "error" : "info";
      logger[level](entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const verification = service.verify();
  if (!verification.valid) {
    logger.warn(
      { discrepancies: verification.discrepancies },
      "Stock levels do not match their movements",
    );
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      storage: config.DATA_FILE ?? "memory",
      products: service.catalog.products.length,
    },
    "Stockbook node started",
  );

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
