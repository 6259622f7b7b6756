/**
 * Conversation routes.
 *
 * POST /api/v1/conversations/:userId/messages — Handle one action parse
 *
 * Messages of the same user are handled one at a time. The reply carries
 * the state blob to send back with the next message; without one, the
 * node's stored state for the user is used.
 */

import { Hono } from "hono";
import type { Reply } from "@stockbook/conversation";
import type { AppEnv } from "../types/api-contract.js";
import { SendMessageSchema, UserIdSchema } from "../types/dto.js";
import { validateBody, validateValue } from "../middleware/validate.js";
import type { StockbookService } from "../services/stockbook-service.js";
import type { AuditLog } from "../services/audit-log.js";

export interface ConversationRouteDeps {
  readonly service: StockbookService;
  readonly auditLog?: AuditLog | undefined;
}

export function createConversationRoutes(deps: ConversationRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { service, auditLog } = deps;

  routes.post("/:userId/messages", async (c) => {
    const userId = validateValue(c, UserIdSchema, c.req.param("userId"), "Invalid user id");
    if (!userId.ok) {
      return userId.response;
    }

    const body = await validateBody(c, SendMessageSchema);
    if (!body.ok) {
      return body.response;
    }

    const { parse, state } = body.data;
    const result = await service.handleMessage(userId.data, parse, state);

    auditLog?.append({
      requestId: c.get("requestId"),
      actor: userId.data,
      action: parse.actionKind,
      outcome: result.reply.type,
      recordId: recordIdOf(result.reply),
      detail: result.reply.type === "failure" ? result.reply.errorKind : undefined,
    });

    return c.json({ data: { reply: result.reply, state: result.state } });
  });

  return routes;
}

function recordIdOf(reply: Reply): string | undefined {
  return reply.type === "confirmation" ? reply.recordId : undefined;
}
