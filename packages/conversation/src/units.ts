/**
 * Unit normalization for quantities typed in chat.
 *
 * Weights convert to kg, volumes to liters, counts to pcs.
 * Units outside these tables pass through lower-cased.
 */

import { formatQuantity, parseQuantity } from "@stockbook/ledger";

const GRAMS = ["g", "gr", "gram", "grams", "gramo", "gramos"];
const KILOGRAMS = ["kg", "kgs", "kilogram", "kilograms", "kilo", "kilos", "kilogramo", "kilogramos"];
const MILLILITERS = ["ml", "milliliter", "milliliters", "mililitro", "mililitros"];
const LITERS = ["l", "lt", "liter", "liters", "litre", "litres", "litro", "litros"];
const PIECES = ["pcs", "pieces", "piece", "pc", "units", "unit", "pieza", "piezas", "unidad", "unidades"];

export interface NormalizedQuantity {
  readonly quantity: string;
  readonly unit: string;
}

/** Divide a quantity by 1000, rounding half up at the third decimal. */
function thousandth(quantity: string): string {
  const scaled = parseQuantity(quantity);
  const sign = scaled < 0n ? -1n : 1n;
  return formatQuantity(sign * ((sign * scaled + 500n) / 1000n));
}

/**
 * Normalize a (quantity, unit) pair.
 *
 * ("500", "gramos") → ("0.5", "kg"), ("2", "Litros") → ("2", "liters")
 */
export function normalizeUnit(quantity: string, unit: string): NormalizedQuantity {
  const key = unit.trim().toLowerCase();

  if (key === "") return { quantity, unit: "pcs" };
  if (GRAMS.includes(key)) return { quantity: thousandth(quantity), unit: "kg" };
  if (KILOGRAMS.includes(key)) return { quantity, unit: "kg" };
  if (MILLILITERS.includes(key)) return { quantity: thousandth(quantity), unit: "liters" };
  if (LITERS.includes(key)) return { quantity, unit: "liters" };
  if (PIECES.includes(key)) return { quantity, unit: "pcs" };

  return { quantity, unit: key };
}
