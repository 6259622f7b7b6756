/**
 * Tests for the action model.
 *
 * Covers:
 * - Field coercion (numbers, comma decimals, blanks, unknown keys)
 * - Validation order and the zero-cost rule
 * - First-write-wins merging and reopening fields
 * - Complete actions and currency scaling
 */

import { describe, it, expect } from "vitest";
import {
  coerceFields,
  coerceValue,
  conflictingFields,
  createPending,
  mergeSupplement,
  parseNumericText,
  reopenFields,
  toCompleteAction,
  toCurrencyAmount,
  validate,
} from "../src/action-model.js";
import { ConversationError } from "../src/types.js";

const TS = "2024-01-15T10:00:00.000Z";

describe("parseNumericText", () => {
  it("reads plain, prefixed and comma-separated numbers", () => {
    expect(parseNumericText("45000")).toBe("45000");
    expect(parseNumericText("$ 45000")).toBe("45000");
    expect(parseNumericText("2,5")).toBe("2.5");
    expect(parseNumericText(" 1.250 ")).toBe("1.25");
  });

  it("rounds beyond three decimals", () => {
    expect(parseNumericText("1.23456")).toBe("1.235");
    expect(parseNumericText("99999999999999999999999.5555")).toBe("99999999999999999999999.556");
  });

  it("reads dot-grouped thousands only when asked", () => {
    expect(parseNumericText("45.000", { thousands: true })).toBe("45000");
    expect(parseNumericText("$1.234.567", { thousands: true })).toBe("1234567");
    expect(parseNumericText("1.234,5", { thousands: true })).toBe("1234.5");
    expect(parseNumericText("1.5", { thousands: true })).toBe("1.5");
    expect(parseNumericText("45.000")).toBe("45");
  });

  it("rejects exponent notation", () => {
    expect(parseNumericText("1e+21")).toBeUndefined();
  });

  it("rejects words", () => {
    expect(parseNumericText("cincuenta")).toBeUndefined();
    expect(parseNumericText("")).toBeUndefined();
  });
});

describe("coerceValue", () => {
  it("turns numbers into decimal strings for numeric fields", () => {
    expect(coerceValue("quantity", 50)).toBe("50");
    expect(coerceValue("cost", 1990.5)).toBe("1990.5");
    expect(coerceValue("quantity", Number.NaN)).toBeUndefined();
  });

  it("treats numbers only written in exponent form as absent", () => {
    expect(coerceValue("quantity", 1e21)).toBeUndefined();
    expect(coerceValue("cost", 1e-7)).toBeUndefined();
  });

  it("reads thousands in typed prices but not in quantities", () => {
    expect(coerceValue("cost", "45.000")).toBe("45000");
    expect(coerceValue("quantity", "32.000")).toBe("32");
    expect(coerceValue("cost", 1.234)).toBe("1.234");
  });

  it("trims text and collapses whitespace", () => {
    expect(coerceValue("provider", "  Santa   Isabel ")).toBe("Santa Isabel");
    expect(coerceValue("unit", 12)).toBe("12");
  });

  it("treats null and blanks as absent", () => {
    expect(coerceValue("product", null)).toBeUndefined();
    expect(coerceValue("product", "   ")).toBeUndefined();
  });
});

describe("coerceFields", () => {
  it("keeps only the fields of the kind", () => {
    const values = coerceFields("register_usage", {
      product: "harina",
      quantity: "2,5",
      provider: "Lider",
      color: "azul",
    });
    expect(values).toEqual({ product: "harina", quantity: "2.5" });
  });
});

describe("validate", () => {
  it("lists missing required fields in declared order", () => {
    expect(validate("register_purchase", { cost: "45000", product: "harina" })).toEqual([
      "quantity",
      "unit",
      "provider",
      "paymentMethod",
    ]);
  });

  it("treats a zero cost as missing", () => {
    expect(
      validate("register_expense", {
        expenseCategory: "Arriendo",
        cost: "0",
        provider: "VTR",
        paymentMethod: "Efectivo",
      }),
    ).toEqual(["cost"]);
  });

  it("does not require optional fields", () => {
    expect(validate("register_usage", { product: "leche", quantity: "1" })).toEqual([]);
  });
});

describe("mergeSupplement", () => {
  const pending = createPending(
    "register_purchase",
    { product: "harina", quantity: "50", unit: "kg", cost: "45000" },
    "compré 50 kg de harina",
    TS,
  );

  it("fills missing fields and removes them from missing", () => {
    const merged = mergeSupplement(pending, { provider: "Lider" });
    expect(merged.values.provider).toBe("Lider");
    expect(merged.missing).toEqual(["paymentMethod"]);
  });

  it("never overwrites filled fields", () => {
    const merged = mergeSupplement(pending, { product: "azucar", paymentMethod: "Efectivo" });
    expect(merged.values.product).toBe("harina");
    expect(merged.values.paymentMethod).toBe("Efectivo");
    expect(merged.missing).toEqual(["provider"]);
  });

  it("leaves the original untouched", () => {
    mergeSupplement(pending, { provider: "Lider" });
    expect(pending.missing).toEqual(["provider", "paymentMethod"]);
    expect(pending.values.provider).toBeUndefined();
  });

  it("fills an empty optional field", () => {
    const usage = createPending("register_usage", { product: "harina" }, "usé harina", TS);
    const merged = mergeSupplement(usage, { quantity: "2", reason: "Pan" });
    expect(merged.values).toEqual({ product: "harina", quantity: "2", reason: "Pan" });
    expect(merged.missing).toEqual([]);
  });
});

describe("conflictingFields", () => {
  const pending = createPending(
    "register_purchase",
    { product: "harina", quantity: "50", unit: "kg", cost: "45000" },
    "compré 50 kg de harina",
    TS,
  );

  it("lists filled fields given a different value", () => {
    expect(conflictingFields(pending, { product: "azucar", quantity: "2", provider: "Jumbo" })).toEqual([
      "product",
      "quantity",
    ]);
  });

  it("compares names after normalization", () => {
    expect(conflictingFields(pending, { product: "HARINA", unit: "KG" })).toEqual([]);
  });

  it("ignores fields the pending action does not hold yet", () => {
    expect(conflictingFields(pending, { provider: "Lider", paymentMethod: "Efectivo" })).toEqual([]);
  });
});

describe("reopenFields", () => {
  it("clears fields and puts them back in declared order", () => {
    const complete = createPending(
      "register_purchase",
      {
        product: "harina",
        quantity: "50",
        unit: "kg",
        cost: "45000",
        provider: "Falabella",
        paymentMethod: "Efectivo",
      },
      "",
      TS,
    );
    const reopened = reopenFields(complete, ["paymentMethod", "product"]);
    expect(reopened.missing).toEqual(["product", "paymentMethod"]);
    expect(reopened.values.product).toBeUndefined();
    expect(reopened.values.provider).toBe("Falabella");
  });
});

describe("toCompleteAction", () => {
  it("builds the variant for the kind", () => {
    expect(toCompleteAction("register_usage", { product: "harina", quantity: "2", reason: "Pan" })).toEqual({
      kind: "register_usage",
      product: "harina",
      quantity: "2",
      unit: undefined,
      reason: "Pan",
    });
    expect(toCompleteAction("query_stock", { product: "todo" })).toEqual({ kind: "query_stock", product: "todo" });
  });

  it("throws when a required field is missing", () => {
    expect(() => toCompleteAction("query_stock", {})).toThrow(ConversationError);
    expect(() => toCompleteAction("query_stock", {})).toThrow(/missing: product/);
  });
});

describe("toCurrencyAmount", () => {
  it("scales to the currency's decimals", () => {
    expect(toCurrencyAmount("45000", 0)).toBe("45000");
    expect(toCurrencyAmount("19.9", 2)).toBe("19.90");
  });

  it("rounds half up", () => {
    expect(toCurrencyAmount("1990.5", 0)).toBe("1991");
    expect(toCurrencyAmount("1990.49", 0)).toBe("1990");
    expect(toCurrencyAmount("0.004", 2)).toBe("0.00");
  });
});
