/**
 * Runtime type guard tests for @stockbook/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isMoney,
  isExpense,
  isUsageEvent,
  isReferenceEntry,
  isProduct,
  isStockLevel,
  isMovementDirection,
  isStockMovement,
  isActionKind,
  isParseKind,
  isActionParse,
} from "../src/guards.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isMoney", () => {
  it("accepts valid Money", () => {
    expect(isMoney({ amount: "45000", currency: "CLP", decimals: 0 })).toBe(true);
  });

  it("accepts fractional amounts", () => {
    expect(isMoney({ amount: "19.90", currency: "USD", decimals: 2 })).toBe(true);
  });

  it("rejects null and non-objects", () => {
    expect(isMoney(null)).toBe(false);
    expect(isMoney("100")).toBe(false);
    expect(isMoney(undefined)).toBe(false);
  });

  it("rejects numeric amount (must be string)", () => {
    expect(isMoney({ amount: 100, currency: "CLP", decimals: 0 })).toBe(false);
  });

  it("rejects malformed amount strings", () => {
    expect(isMoney({ amount: "12,5", currency: "CLP", decimals: 0 })).toBe(false);
    expect(isMoney({ amount: "", currency: "CLP", decimals: 0 })).toBe(false);
  });

  it("rejects negative decimals and empty currency", () => {
    expect(isMoney({ amount: "1", currency: "CLP", decimals: -1 })).toBe(false);
    expect(isMoney({ amount: "1", currency: "", decimals: 0 })).toBe(false);
  });
});

describe("isExpense", () => {
  const base = {
    id: "e-1",
    purchasedAt: "2025-12-15T10:00:00.000Z",
    amount: { amount: "45000", currency: "CLP", decimals: 0 },
    paymentMethodId: 2,
    supplierId: 1,
    expenseTypeId: 2,
    categoryId: 1,
  };

  it("accepts an expense without product", () => {
    expect(isExpense(base)).toBe(true);
  });

  it("accepts a purchase with product and quantity", () => {
    expect(isExpense({ ...base, productId: 1, purchasedQuantity: "50" })).toBe(true);
  });

  it("rejects zero or fractional reference ids", () => {
    expect(isExpense({ ...base, supplierId: 0 })).toBe(false);
    expect(isExpense({ ...base, categoryId: 1.5 })).toBe(false);
  });

  it("rejects a numeric purchased quantity", () => {
    expect(isExpense({ ...base, productId: 1, purchasedQuantity: 50 })).toBe(false);
  });
});

describe("isUsageEvent", () => {
  it("accepts a usage event with reason", () => {
    expect(
      isUsageEvent({
        id: "u-1",
        occurredAt: "2025-12-16T08:00:00.000Z",
        productId: 3,
        quantity: "0.5",
        reason: "Uso",
      }),
    ).toBe(true);
  });

  it("rejects missing product", () => {
    expect(
      isUsageEvent({ id: "u-1", occurredAt: "2025-12-16T08:00:00.000Z", quantity: "1" }),
    ).toBe(false);
  });
});

// =============================================================================
// Inventory guards
// =============================================================================

describe("isReferenceEntry", () => {
  it("accepts id + name", () => {
    expect(isReferenceEntry({ id: 1, name: "Lider" })).toBe(true);
  });

  it("rejects blank names", () => {
    expect(isReferenceEntry({ id: 1, name: "   " })).toBe(false);
  });
});

describe("isProduct", () => {
  it("accepts a valid product", () => {
    expect(
      isProduct({ id: 1, name: "Harina", unit: "kg", minStock: "10", categoryId: 1 }),
    ).toBe(true);
  });

  it("rejects numeric minStock", () => {
    expect(
      isProduct({ id: 1, name: "Harina", unit: "kg", minStock: 10, categoryId: 1 }),
    ).toBe(false);
  });
});

describe("isStockLevel", () => {
  it("accepts negative quantities", () => {
    expect(
      isStockLevel({ productId: 1, quantity: "-2.5", updatedAt: "2025-01-01T00:00:00Z" }),
    ).toBe(true);
  });

  it("rejects missing timestamp", () => {
    expect(isStockLevel({ productId: 1, quantity: "2" })).toBe(false);
  });
});

describe("isStockMovement", () => {
  it("accepts inbound and outbound directions", () => {
    expect(isMovementDirection("inbound")).toBe(true);
    expect(isMovementDirection("outbound")).toBe(true);
    expect(isMovementDirection("sideways")).toBe(false);
  });

  it("accepts a movement without source", () => {
    expect(
      isStockMovement({
        id: "m-1",
        productId: 1,
        direction: "inbound",
        quantity: "10",
        timestamp: "2025-01-01T00:00:00Z",
      }),
    ).toBe(true);
  });
});

// =============================================================================
// Action guards
// =============================================================================

describe("action guards", () => {
  it("recognizes action kinds", () => {
    expect(isActionKind("register_purchase")).toBe(true);
    expect(isActionKind("supplement")).toBe(false);
  });

  it("recognizes parse kinds", () => {
    expect(isParseKind("supplement")).toBe(true);
    expect(isParseKind("cancel")).toBe(true);
    expect(isParseKind("delete_everything")).toBe(false);
  });

  it("accepts a partial parse", () => {
    expect(
      isActionParse({
        actionKind: "register_purchase",
        fields: { product: "harina", quantity: 50, provider: null },
        originalText: "compré 50 kg de harina",
      }),
    ).toBe(true);
  });

  it("rejects object-valued fields", () => {
    expect(
      isActionParse({
        actionKind: "register_purchase",
        fields: { product: { name: "harina" } },
        originalText: "x",
      }),
    ).toBe(false);
  });

  it("rejects a non-numeric confidence", () => {
    expect(
      isActionParse({
        actionKind: "unknown",
        fields: {},
        originalText: "x",
        confidence: "high",
      }),
    ).toBe(false);
  });
});
