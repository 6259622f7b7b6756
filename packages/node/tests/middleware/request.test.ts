/**
 * Tests for the request-id and request logging middleware.
 */

import { describe, it, expect, vi } from "vitest";
import { createTestApp } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("request id", () => {
  it("generates an id when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");
    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });

  it("echoes a caller-supplied id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", { headers: { "X-Request-Id": "trace-42" } });
    expect(res.headers.get("X-Request-Id")).toBe("trace-42");
  });

  it("replaces an id with unsafe characters", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", { headers: { "X-Request-Id": "a b<c>" } });
    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });
});

describe("request logging", () => {
  it("logs one entry per request", async () => {
    const logFn = vi.fn<(entry: RequestLogEntry) => void>();
    const { app } = createTestApp({}, { logFn });

    await app.request("/api/v1/stock/1", { headers: { "X-Request-Id": "trace-7" } });

    expect(logFn).toHaveBeenCalledTimes(1);
    expect(logFn.mock.calls[0]?.[0]).toMatchObject({
      method: "GET",
      path: "/api/v1/stock/1",
      status: 404,
      requestId: "trace-7",
    });
  });
});
