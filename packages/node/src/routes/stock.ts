/**
 * Stock routes.
 *
 * GET /api/v1/stock                      — All stock levels
 * GET /api/v1/stock/:productId           — One level (ETag, 304 on If-None-Match)
 * GET /api/v1/stock/:productId/movements — The product's movement trail
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ProductIdSchema } from "../types/dto.js";
import { validateValue } from "../middleware/validate.js";
import { setETag } from "../middleware/etag.js";
import type { StockbookService } from "../services/stockbook-service.js";

export function createStockRoutes(service: StockbookService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const stock = service.listStock();
    if (setETag(c, stock)) {
      return c.body(null, 304);
    }
    return c.json({ data: stock });
  });

  routes.get("/:productId", (c) => {
    const productId = validateValue(c, ProductIdSchema, c.req.param("productId"), "Invalid product id");
    if (!productId.ok) {
      return productId.response;
    }

    const view = service.getStock(productId.data);
    if (setETag(c, view)) {
      return c.body(null, 304);
    }
    return c.json({ data: view });
  });

  routes.get("/:productId/movements", (c) => {
    const productId = validateValue(c, ProductIdSchema, c.req.param("productId"), "Invalid product id");
    if (!productId.ok) {
      return productId.response;
    }

    // Same 404 as the level itself for products never stocked
    service.getStock(productId.data);
    return c.json({ data: service.movements(productId.data) });
  });

  return routes;
}
