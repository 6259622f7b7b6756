/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (every stock level matches its movements)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { StockbookService } from "../services/stockbook-service.js";

export function createHealthRoutes(service: StockbookService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const verification = service.verify();
    const body = {
      status: verification.valid ? "ready" : "not_ready",
      checkedProducts: verification.checkedProducts,
      discrepancies: verification.discrepancies,
      timestamp: new Date().toISOString(),
    };

    return verification.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
