/**
 * Request logging middleware.
 *
 * Emits one structured entry per request once the response is known.
 * The sink is injected (a pino logger in main.ts, a spy in tests).
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export type RequestLogFn = (entry: RequestLogEntry) => void;

export function loggerMiddleware(log: RequestLogFn): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
    });
  };
}
