/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id header for request tracing, or
 * generates a new UUID when it is absent or unusable.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

/** Longest caller-supplied id that is echoed back. */
const MAX_REQUEST_ID_LENGTH = 128;

const SAFE_REQUEST_ID = /^[A-Za-z0-9._:-]+$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined &&
      incoming.length <= MAX_REQUEST_ID_LENGTH &&
      SAFE_REQUEST_ID.test(incoming)
        ? incoming
        : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
