/**
 * Tests for stock routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, sendMessage, FULL_PURCHASE, TEST_TIME } from "../setup.js";
import type { AppInstance } from "../../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

describe("GET /api/v1/stock", () => {
  it("returns an empty list before any purchase", async () => {
    const res = await instance.app.request("/api/v1/stock");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [] });
  });

  it("lists levels with their product details", async () => {
    await sendMessage(instance, "u1", FULL_PURCHASE);
    await sendMessage(instance, "u1", {
      actionKind: "register_usage",
      fields: { product: "harina", quantity: 45 },
    });

    const res = await instance.app.request("/api/v1/stock");
    const body = (await res.json()) as { data: { productId: number; quantity: string; belowMinimum: boolean }[] };
    expect(body.data).toHaveLength(1);
    expect(body.data[0]).toMatchObject({ productId: 1, quantity: "5", belowMinimum: true });
  });
});

describe("GET /api/v1/stock/:productId", () => {
  it("returns 404 UNKNOWN_PRODUCT for a product never stocked", async () => {
    const res = await instance.app.request("/api/v1/stock/1");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "UNKNOWN_PRODUCT", message: "No stock level for product 1" },
    });
  });

  it("returns 400 for a non-numeric id", async () => {
    const res = await instance.app.request("/api/v1/stock/harina");
    expect(res.status).toBe(400);
  });

  it("sets an ETag and answers 304 when it still matches", async () => {
    await sendMessage(instance, "u1", FULL_PURCHASE);

    const first = await instance.app.request("/api/v1/stock/1");
    const etag = first.headers.get("ETag");
    expect(etag).toMatch(/^"[0-9a-f]{16}"$/);

    const second = await instance.app.request("/api/v1/stock/1", {
      headers: { "If-None-Match": etag ?? "" },
    });
    expect(second.status).toBe(304);
  });

  it("answers 200 again once the level changes", async () => {
    await sendMessage(instance, "u1", FULL_PURCHASE);
    const first = await instance.app.request("/api/v1/stock/1");
    const etag = first.headers.get("ETag") ?? "";

    await sendMessage(instance, "u1", FULL_PURCHASE);
    const second = await instance.app.request("/api/v1/stock/1", {
      headers: { "If-None-Match": etag },
    });

    expect(second.status).toBe(200);
    const body = (await second.json()) as { data: { quantity: string } };
    expect(body.data.quantity).toBe("100");
  });
});

describe("GET /api/v1/stock/:productId/movements", () => {
  it("returns the movement trail", async () => {
    await sendMessage(instance, "u1", FULL_PURCHASE);

    const res = await instance.app.request("/api/v1/stock/1/movements");
    const body = (await res.json()) as { data: unknown[] };
    expect(body.data).toHaveLength(1);
    expect(body.data[0]).toMatchObject({
      productId: 1,
      direction: "inbound",
      quantity: "50",
      sourceId: instance.service.recorder.listExpenses()[0]?.id,
      timestamp: TEST_TIME,
    });
  });

  it("returns 404 for a product never stocked", async () => {
    const res = await instance.app.request("/api/v1/stock/2/movements");
    expect(res.status).toBe(404);
  });
});
