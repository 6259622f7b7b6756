/**
 * User-facing wording of prompts, confirmations and failures (Spanish).
 */

import type { FieldName } from "@stockbook/types";
import type { FailureKind } from "./types.js";

export const FIELD_LABELS: Readonly<Record<FieldName, string>> = {
  product: "nombre del producto",
  quantity: "cantidad",
  unit: "unidad de medida",
  cost: "precio",
  provider: "proveedor",
  paymentMethod: "medio de pago",
  expenseCategory: "categoría del gasto",
  item: "descripción",
  reason: "motivo",
};

export function labelsFor(fields: readonly FieldName[]): readonly string[] {
  return fields.map((f) => FIELD_LABELS[f]);
}

/**
 * "a" / "a y b" / "a, b y c"
 */
export function joinLabels(labels: readonly string[]): string {
  if (labels.length <= 1) {
    return labels[0] ?? "";
  }
  return `${labels.slice(0, -1).join(", ")} y ${labels[labels.length - 1] ?? ""}`;
}

export function formatMissingPrompt(fields: readonly FieldName[]): string {
  return `Por favor indícame: ${joinLabels(labelsFor(fields))}`;
}

export function formatUnresolvedPrompt(names: readonly string[], fields: readonly FieldName[]): string {
  const quoted = names.map((n) => `"${n}"`);
  return `No pude identificar ${joinLabels(quoted)}. ${formatMissingPrompt(fields)}`;
}

export const CANCELLED_MESSAGE = "Operación cancelada.";

export const FAILURE_MESSAGES: Readonly<Record<FailureKind, string>> = {
  NOT_UNDERSTOOD: "No estoy seguro de lo que quisiste decir. Intenta ser más específico.",
  NOT_FOUND: "No encontré lo que buscabas.",
  INVALID_REFERENCE: "Uno de los datos no corresponde a un registro conocido.",
  UNKNOWN_PRODUCT: "Ese producto aún no tiene stock registrado.",
  VALIDATION_FAILED: "Los datos ingresados no son válidos.",
  RECORDING_FAILED: "No pude guardar el registro. Intenta nuevamente.",
};

/** Words that ask for the whole inventory in a stock query. */
export const WHOLE_INVENTORY = ["todo", "inventario"];
