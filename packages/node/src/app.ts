/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { StockbookService } from "./services/stockbook-service.js";
import type { StockbookServiceConfig } from "./services/stockbook-service.js";
import { AuditLog } from "./services/audit-log.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogFn } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createConversationRoutes } from "./routes/conversations.js";
import { createStockRoutes } from "./routes/stock.js";
import { createCatalogRoutes } from "./routes/catalog.js";
import { createAuditRoutes } from "./routes/audit.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: StockbookServiceConfig;
  /** Request log sink. No request logging when absent. */
  readonly logFn?: RequestLogFn | undefined;
  /** Sees every error that becomes a 500 */
  readonly onUnexpectedError?: ((err: Error, c: Context) => void) | undefined;
  /** Default: a fresh AuditLog */
  readonly auditLog?: AuditLog | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StockbookService;
  readonly auditLog: AuditLog;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new StockbookService(options.serviceConfig);
  const auditLog = options.auditLog ?? new AuditLog({ clock: options.serviceConfig.clock });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/conversations", createConversationRoutes({ service, auditLog }));
  app.route("/api/v1/stock", createStockRoutes(service));
  app.route("/api/v1/catalog", createCatalogRoutes(service));
  app.route("/api/v1/audit", createAuditRoutes(auditLog));

  return { app, service, auditLog };
}
