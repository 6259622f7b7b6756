/**
 * Catalog routes.
 *
 * GET /api/v1/catalog/:entityClass              — List entries
 * GET /api/v1/catalog/:entityClass/resolve?name= — Fuzzy-resolve a name
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { EntityClassSchema, ResolveQuerySchema } from "../types/dto.js";
import { validateValue } from "../middleware/validate.js";
import type { StockbookService } from "../services/stockbook-service.js";

export function createCatalogRoutes(service: StockbookService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:entityClass", (c) => {
    const entityClass = validateValue(c, EntityClassSchema, c.req.param("entityClass"), "Unknown entity class");
    if (!entityClass.ok) {
      return entityClass.response;
    }
    return c.json({ data: service.listEntries(entityClass.data) });
  });

  routes.get("/:entityClass/resolve", (c) => {
    const entityClass = validateValue(c, EntityClassSchema, c.req.param("entityClass"), "Unknown entity class");
    if (!entityClass.ok) {
      return entityClass.response;
    }
    const query = validateValue(c, ResolveQuerySchema, c.req.query(), "Invalid query parameters");
    if (!query.ok) {
      return query.response;
    }
    return c.json({ data: service.resolve(entityClass.data, query.data.name) });
  });

  return routes;
}
