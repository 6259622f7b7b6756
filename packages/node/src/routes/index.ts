/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createConversationRoutes } from "./conversations.js";
export type { ConversationRouteDeps } from "./conversations.js";
export { createStockRoutes } from "./stock.js";
export { createCatalogRoutes } from "./catalog.js";
export { createAuditRoutes } from "./audit.js";
