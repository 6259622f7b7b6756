/**
 * Action Model — Field schemas, coercion and validation per action kind.
 *
 * Every function here is pure: same input, same output, no I/O.
 */

import { normalizeName } from "@stockbook/catalog";
import { roundQuantity } from "@stockbook/ledger";
import type { ActionKind, FieldName, RawFieldValue } from "@stockbook/types";
import type {
  ActionSchema,
  CompleteAction,
  FieldSpec,
  FieldValues,
  PendingAction,
} from "./types.js";
import { ConversationError } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

export const ACTION_SCHEMAS = {
  register_purchase: {
    required: ["product", "quantity", "unit", "cost", "provider", "paymentMethod"],
    optional: [],
  },
  register_expense: {
    required: ["expenseCategory", "cost", "provider", "paymentMethod"],
    optional: ["item"],
  },
  register_usage: {
    required: ["product", "quantity"],
    optional: ["unit", "reason"],
  },
  query_stock: {
    required: ["product"],
    optional: [],
  },
} as const satisfies Readonly<Record<ActionKind, ActionSchema>>;

export const FIELD_SPECS: Readonly<Record<FieldName, FieldSpec>> = {
  product: { type: "reference", entityClass: "product" },
  quantity: { type: "numeric" },
  unit: { type: "text" },
  cost: { type: "numeric" },
  provider: { type: "reference", entityClass: "supplier" },
  paymentMethod: { type: "reference", entityClass: "paymentMethod" },
  expenseCategory: { type: "reference", entityClass: "category" },
  item: { type: "text" },
  reason: { type: "text" },
};

/**
 * Required then optional fields of a kind, in declared order.
 */
export function fieldsOf(kind: ActionKind): readonly FieldName[] {
  const schema: ActionSchema = ACTION_SCHEMAS[kind];
  return [...schema.required, ...schema.optional];
}

export function requiredFieldsOf(kind: ActionKind): readonly FieldName[] {
  const schema: ActionSchema = ACTION_SCHEMAS[kind];
  return schema.required;
}

// =============================================================================
// Coercion
// =============================================================================

const DECIMAL = /^-?\d+(\.\d+)?$/;

/** "45.000", "1.234.567", "1.234,5": dots group thousands. */
const GROUPED_THOUSANDS = /^\d{1,3}(\.\d{3})+(,\d+)?$/;

export interface NumericTextOptions {
  /** Read dot-grouped digits as thousands (prices typed as "45.000"). */
  readonly thousands?: boolean;
}

/**
 * Read a number typed in chat: "45000", "$45000", "2,5", " 1.25 ".
 * More than three decimals are rounded; exponent notation is rejected.
 */
export function parseNumericText(text: string, options?: NumericTextOptions): string | undefined {
  let cleaned = text.trim().replace(/^\$\s*/, "");
  if (options?.thousands === true && GROUPED_THOUSANDS.test(cleaned)) {
    cleaned = cleaned.replace(/\./g, "");
  }
  cleaned = cleaned.replace(",", ".");
  return DECIMAL.test(cleaned) ? roundQuantity(cleaned) : undefined;
}

/**
 * Coerce one raw value to its slot form, or undefined when it is absent,
 * blank or not coercible.
 */
export function coerceValue(field: FieldName, raw: RawFieldValue | undefined): string | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }

  if (FIELD_SPECS[field].type === "numeric") {
    if (typeof raw === "number") {
      // String(1e21) is "1e+21", which parseNumericText rejects
      return Number.isFinite(raw) ? parseNumericText(String(raw)) : undefined;
    }
    return parseNumericText(raw, { thousands: field === "cost" });
  }

  const text = String(raw).trim().replace(/\s+/g, " ");
  return text.length > 0 ? text : undefined;
}

/**
 * Turn a raw fieldName → value map into typed slots for a kind.
 * Fields the kind does not know are dropped.
 */
export function coerceFields(
  kind: ActionKind,
  raw: Readonly<Record<string, RawFieldValue | undefined>>,
): FieldValues {
  const values: Partial<Record<FieldName, string>> = {};
  for (const field of fieldsOf(kind)) {
    const value = coerceValue(field, raw[field]);
    if (value !== undefined) {
      values[field] = value;
    }
  }
  return values;
}

// =============================================================================
// Validation
// =============================================================================

function isMissing(field: FieldName, value: string | undefined): boolean {
  if (value === undefined || value.trim() === "") {
    return true;
  }
  if (FIELD_SPECS[field].type === "numeric" && !DECIMAL.test(value)) {
    return true;
  }
  // A cost of zero means the price was not given
  return field === "cost" && Number(value) === 0;
}

/**
 * Missing required fields of a kind, in declared order.
 */
export function validate(kind: ActionKind, values: FieldValues): readonly FieldName[] {
  return requiredFieldsOf(kind).filter((field) => isMissing(field, values[field]));
}

// =============================================================================
// Pending actions
// =============================================================================

export function createPending(
  kind: ActionKind,
  values: FieldValues,
  originalText: string,
  createdAt: string,
): PendingAction {
  return { kind, values, missing: validate(kind, values), originalText, createdAt };
}

/**
 * Merge supplement values into a pending action, first write wins:
 * - a missing field present in the supplement is filled and leaves `missing`
 * - an optional field still empty is filled
 * - filled fields are never overwritten
 */
export function mergeSupplement(pending: PendingAction, supplement: FieldValues): PendingAction {
  const values: Partial<Record<FieldName, string>> = { ...pending.values };
  const missing = new Set<FieldName>(pending.missing);

  for (const field of fieldsOf(pending.kind)) {
    const value = supplement[field];
    if (value === undefined) continue;

    if (missing.has(field)) {
      values[field] = value;
      missing.delete(field);
    } else if (values[field] === undefined) {
      values[field] = value;
    }
  }

  return {
    ...pending,
    values,
    missing: requiredFieldsOf(pending.kind).filter((f) => missing.has(f)),
  };
}

/**
 * Fields filled in both the pending action and the incoming values with
 * different contents. Names compare after normalization, numbers by their
 * canonical form.
 */
export function conflictingFields(pending: PendingAction, incoming: FieldValues): readonly FieldName[] {
  return fieldsOf(pending.kind).filter((field) => {
    const current = pending.values[field];
    const value = incoming[field];
    if (current === undefined || value === undefined) {
      return false;
    }
    return FIELD_SPECS[field].type === "numeric"
      ? current !== value
      : normalizeName(current) !== normalizeName(value);
  });
}

/**
 * Clear fields and put them back into `missing` (declared order kept).
 */
export function reopenFields(pending: PendingAction, fields: readonly FieldName[]): PendingAction {
  const reopened = new Set(fields);
  const values: Partial<Record<FieldName, string>> = {};
  for (const field of fieldsOf(pending.kind)) {
    const value = pending.values[field];
    if (value !== undefined && !reopened.has(field)) {
      values[field] = value;
    }
  }
  const missing = new Set([...pending.missing, ...fields]);
  return {
    ...pending,
    values,
    missing: requiredFieldsOf(pending.kind).filter((f) => missing.has(f)),
  };
}

/**
 * Build the executable form of a pending action with nothing missing.
 */
export function toCompleteAction(kind: ActionKind, values: FieldValues): CompleteAction {
  const missing = validate(kind, values);
  if (missing.length > 0) {
    throw new ConversationError(
      "INVALID_FIELD",
      `Action ${kind} is missing: ${missing.join(", ")}`,
    );
  }

  const need = (field: FieldName): string => {
    const value = values[field];
    if (value === undefined) {
      throw new ConversationError("INVALID_FIELD", `Action ${kind} is missing: ${field}`);
    }
    return value;
  };

  switch (kind) {
    case "register_purchase":
      return {
        kind,
        product: need("product"),
        quantity: need("quantity"),
        unit: need("unit"),
        cost: need("cost"),
        provider: need("provider"),
        paymentMethod: need("paymentMethod"),
      };
    case "register_expense":
      return {
        kind,
        expenseCategory: need("expenseCategory"),
        cost: need("cost"),
        provider: need("provider"),
        paymentMethod: need("paymentMethod"),
        item: values.item,
      };
    case "register_usage":
      return {
        kind,
        product: need("product"),
        quantity: need("quantity"),
        unit: values.unit,
        reason: values.reason,
      };
    case "query_stock":
      return { kind, product: need("product") };
  }
}

/**
 * Scale a decimal string to a currency's decimals, rounding half up.
 *
 * ("1990.5", 0) → "1991", ("45000", 0) → "45000", ("19.9", 2) → "19.90"
 */
export function toCurrencyAmount(value: string, decimals: number): string {
  const negative = value.startsWith("-");
  const abs = negative ? value.slice(1) : value;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  let scaled = BigInt(intPart + fracPart.slice(0, decimals).padEnd(decimals, "0"));
  const next = fracPart.charAt(decimals);
  if (next !== "" && Number(next) >= 5) {
    scaled += 1n;
  }

  const digits = scaled.toString().padStart(decimals + 1, "0");
  const body =
    decimals === 0 ? digits : `${digits.slice(0, digits.length - decimals)}.${digits.slice(digits.length - decimals)}`;
  return negative && scaled !== 0n ? `-${body}` : body;
}
