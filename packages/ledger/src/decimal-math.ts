/**
 * @stockbook/ledger — Deterministic decimal arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations on stored values
 * - Quantities carry at most QUANTITY_DECIMALS fractional digits
 * - Money keeps the decimals of its currency
 */

import type { Money } from "@stockbook/types";
import { LedgerError } from "./types.js";

/** Fractional digits kept for stock quantities (grams of a kilo). */
export const QUANTITY_DECIMALS = 3;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "0.5" with decimals=3 → 500n
 * "-2.25" with decimals=3 → -2250n
 */
export function parseDecimal(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_QUANTITY", `Invalid decimal: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_QUANTITY", `Invalid decimal format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_QUANTITY",
      `Decimal "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a fixed decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatDecimal(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

// ─── Quantities ──────────────────────────────────────────────────────────

/**
 * Parse a quantity string into thousandths.
 */
export function parseQuantity(quantity: string): bigint {
  return parseDecimal(quantity, QUANTITY_DECIMALS);
}

/**
 * Format thousandths as the shortest decimal string.
 *
 * 30000n → "30", 500n → "0.5", -2250n → "-2.25"
 */
export function formatQuantity(scaled: bigint): string {
  const fixed = formatDecimal(scaled, QUANTITY_DECIMALS);
  return fixed.replace(/\.?0+$/, "") || "0";
}

/**
 * Canonical form of a quantity string ("050.500" → "50.5").
 */
export function normalizeQuantity(quantity: string): string {
  return formatQuantity(parseQuantity(quantity));
}

/**
 * Round a decimal string to QUANTITY_DECIMALS places, half away from zero,
 * and return its canonical form.
 *
 * "1.23456" → "1.235", "-0.0005" → "-0.001", "2.5000" → "2.5"
 */
export function roundQuantity(quantity: string): string {
  const trimmed = quantity.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_QUANTITY", `Invalid decimal format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  let scaled = BigInt(intPart + fracPart.slice(0, QUANTITY_DECIMALS).padEnd(QUANTITY_DECIMALS, "0"));
  const next = fracPart.charAt(QUANTITY_DECIMALS);
  if (next !== "" && next >= "5") {
    scaled += 1n;
  }

  return formatQuantity(negative ? -scaled : scaled);
}

export function addQuantity(a: string, b: string): string {
  return formatQuantity(parseQuantity(a) + parseQuantity(b));
}

export function subtractQuantity(a: string, b: string): string {
  return formatQuantity(parseQuantity(a) - parseQuantity(b));
}

export function compareQuantity(a: string, b: string): -1 | 0 | 1 {
  const va = parseQuantity(a);
  const vb = parseQuantity(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function isPositiveQuantity(quantity: string): boolean {
  return parseQuantity(quantity) > 0n;
}

// ─── Money ───────────────────────────────────────────────────────────────

/**
 * Check if a Money amount is positive (> 0). Throws on malformed amounts.
 */
export function isPositiveMoney(money: Money): boolean {
  return parseDecimal(money.amount, money.decimals) > 0n;
}
