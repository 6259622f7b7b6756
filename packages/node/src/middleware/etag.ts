/**
 * ETag utilities for conditional reads of stock levels.
 */

import { createHash } from "node:crypto";
import type { Context } from "hono";

/**
 * Compute an ETag for a JSON-serializable object.
 */
export function computeETag(obj: unknown): string {
  const json = JSON.stringify(obj);
  const hash = createHash("sha256").update(json).digest("hex").slice(0, 16);
  return `"${hash}"`;
}

/**
 * Set the ETag header and report whether the client copy is current
 * (If-None-Match lists the same tag, or "*").
 */
export function setETag(c: Context, entity: unknown): boolean {
  const etag = computeETag(entity);
  c.header("ETag", etag);

  const ifNoneMatch = c.req.header("If-None-Match");
  if (ifNoneMatch === undefined) {
    return false;
  }
  return ifNoneMatch
    .split(",")
    .map((tag) => tag.trim())
    .some((tag) => tag === "*" || tag === etag);
}
