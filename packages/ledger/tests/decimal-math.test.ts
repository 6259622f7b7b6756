/**
 * Tests for the deterministic decimal arithmetic.
 *
 * Covers:
 * - parseDecimal / formatDecimal scaling
 * - Quantity canonical form and arithmetic
 * - Validation and error cases
 * - Money positivity
 */

import { describe, it, expect } from "vitest";
import {
  parseDecimal,
  formatDecimal,
  formatQuantity,
  normalizeQuantity,
  roundQuantity,
  addQuantity,
  subtractQuantity,
  compareQuantity,
  isPositiveQuantity,
  isPositiveMoney,
} from "../src/decimal-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseDecimal ────────────────────────────────────────────────────────

describe("parseDecimal", () => {
  it("scales whole and fractional values", () => {
    expect(parseDecimal("100.50", 2)).toBe(10050n);
    expect(parseDecimal("0.5", 3)).toBe(500n);
    expect(parseDecimal("45000", 0)).toBe(45000n);
  });

  it("keeps the sign", () => {
    expect(parseDecimal("-2.25", 3)).toBe(-2250n);
  });

  it("rejects too many decimal places", () => {
    expect(() => parseDecimal("1.2345", 3)).toThrow(LedgerError);
    expect(() => parseDecimal("1.2345", 3)).toThrow(/decimal places/);
  });

  it("rejects malformed strings", () => {
    expect(() => parseDecimal("", 3)).toThrow(LedgerError);
    expect(() => parseDecimal("abc", 3)).toThrow(/Invalid decimal format/);
    expect(() => parseDecimal("1e3", 3)).toThrow(LedgerError);
    expect(() => parseDecimal("1,5", 3)).toThrow(LedgerError);
  });
});

// ─── formatDecimal ───────────────────────────────────────────────────────

describe("formatDecimal", () => {
  it("formats with fixed decimals", () => {
    expect(formatDecimal(10050n, 2)).toBe("100.50");
    expect(formatDecimal(5n, 2)).toBe("0.05");
    expect(formatDecimal(-5025n, 2)).toBe("-50.25");
  });

  it("formats integers when decimals is 0", () => {
    expect(formatDecimal(42n, 0)).toBe("42");
  });
});

// ─── Quantities ──────────────────────────────────────────────────────────

describe("formatQuantity", () => {
  it("drops trailing zeros", () => {
    expect(formatQuantity(30000n)).toBe("30");
    expect(formatQuantity(500n)).toBe("0.5");
    expect(formatQuantity(100000n)).toBe("100");
    expect(formatQuantity(-2250n)).toBe("-2.25");
  });

  it("formats zero as 0", () => {
    expect(formatQuantity(0n)).toBe("0");
  });
});

describe("normalizeQuantity", () => {
  it("returns the canonical form", () => {
    expect(normalizeQuantity("050.500")).toBe("50.5");
    expect(normalizeQuantity(" 7 ")).toBe("7");
  });
});

describe("roundQuantity", () => {
  it("rounds half away from zero to three decimals", () => {
    expect(roundQuantity("1.23456")).toBe("1.235");
    expect(roundQuantity("1.2344")).toBe("1.234");
    expect(roundQuantity("-0.0005")).toBe("-0.001");
    expect(roundQuantity("2.5000")).toBe("2.5");
  });

  it("keeps integers beyond the float range exact", () => {
    expect(roundQuantity("99999999999999999999999.5555")).toBe("99999999999999999999999.556");
    expect(roundQuantity("1000000000000000000000")).toBe("1000000000000000000000");
  });

  it("rejects anything but plain decimal notation", () => {
    expect(() => roundQuantity("1e21")).toThrow(LedgerError);
    expect(() => roundQuantity("")).toThrow(/Invalid decimal/);
  });
});

describe("quantity arithmetic", () => {
  it("adds", () => {
    expect(addQuantity("10", "20")).toBe("30");
    expect(addQuantity("0.25", "0.75")).toBe("1");
  });

  it("subtracts below zero", () => {
    expect(subtractQuantity("5", "7.5")).toBe("-2.5");
  });

  it("compares", () => {
    expect(compareQuantity("2", "10")).toBe(-1);
    expect(compareQuantity("10.0", "10")).toBe(0);
    expect(compareQuantity("10.001", "10")).toBe(1);
  });

  it("checks positivity", () => {
    expect(isPositiveQuantity("0.001")).toBe(true);
    expect(isPositiveQuantity("0")).toBe(false);
    expect(isPositiveQuantity("-1")).toBe(false);
  });
});

// ─── Money ───────────────────────────────────────────────────────────────

describe("money helpers", () => {
  it("checks positivity", () => {
    expect(isPositiveMoney({ amount: "1", currency: "CLP", decimals: 0 })).toBe(true);
    expect(isPositiveMoney({ amount: "0.00", currency: "USD", decimals: 2 })).toBe(false);
  });
});
