/**
 * Audit routes.
 *
 * GET /api/v1/audit?actor=&action=&limit= — Recent messages, newest first
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditQuerySchema } from "../types/dto.js";
import { validateValue } from "../middleware/validate.js";
import type { AuditLog } from "../services/audit-log.js";

export function createAuditRoutes(auditLog: AuditLog): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = validateValue(c, AuditQuerySchema, c.req.query(), "Invalid query parameters");
    if (!query.ok) {
      return query.response;
    }
    return c.json({ data: auditLog.query(query.data), total: auditLog.size });
  });

  return routes;
}
