/**
 * @stockbook/node — HTTP node for the Stockbook stack.
 *
 * Exposes the conversation engine, stock levels and the catalog over
 * a Hono app. `main.ts` is the runnable entry point.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { StockbookService } from "./services/stockbook-service.js";
export type {
  StockbookServiceConfig,
  ServiceLogger,
  StockView,
  ResolvedEntry,
} from "./services/stockbook-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery, AuditLogOptions } from "./services/audit-log.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
