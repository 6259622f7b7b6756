/**
 * @stockbook/conversation — Types for action completion.
 *
 * Rules:
 * - All types are readonly
 * - A PendingAction never outlives the state blob that carries it
 * - Replies are plain data; rendering is the transport's job
 */

import type { ActionKind, FieldName } from "@stockbook/types";
import type { EntityClass } from "@stockbook/catalog";

// =============================================================================
// Action model
// =============================================================================

/**
 * How a raw field value is interpreted:
 * - text: trimmed string
 * - numeric: decimal string ("," accepted as decimal separator)
 * - reference: a name, resolved against the catalog at execution time
 */
export type FieldType = "text" | "numeric" | "reference";

export interface FieldSpec {
  readonly type: FieldType;
  /** Catalog table a reference field resolves against. */
  readonly entityClass?: EntityClass | undefined;
}

export interface ActionSchema {
  /** Required fields, in the order they are asked for. */
  readonly required: readonly FieldName[];
  readonly optional: readonly FieldName[];
}

/**
 * Coerced slot values. Numeric slots hold canonical decimal strings.
 */
export type FieldValues = Readonly<Partial<Record<FieldName, string>>>;

/**
 * An action waiting for the user to supply missing fields.
 */
export interface PendingAction {
  readonly kind: ActionKind;
  readonly values: FieldValues;
  /** Still-missing required fields, in declared order. */
  readonly missing: readonly FieldName[];
  readonly originalText: string;
  readonly createdAt: string;
}

/**
 * A fully specified action, one variant per kind.
 */
export type CompleteAction =
  | {
      readonly kind: "register_purchase";
      readonly product: string;
      readonly quantity: string;
      readonly unit: string;
      readonly cost: string;
      readonly provider: string;
      readonly paymentMethod: string;
    }
  | {
      readonly kind: "register_expense";
      readonly expenseCategory: string;
      readonly cost: string;
      readonly provider: string;
      readonly paymentMethod: string;
      readonly item?: string | undefined;
    }
  | {
      readonly kind: "register_usage";
      readonly product: string;
      readonly quantity: string;
      readonly unit?: string | undefined;
      readonly reason?: string | undefined;
    }
  | {
      readonly kind: "query_stock";
      readonly product: string;
    };

// =============================================================================
// Conversation state
// =============================================================================

/**
 * Idle when pending is null, AwaitingFields otherwise.
 */
export interface ConversationState {
  readonly pending: PendingAction | null;
}

/** Wire form of a ConversationState. */
export interface StateEnvelope {
  readonly version: 1;
  readonly pending: PendingAction | null;
  /** SHA-256 (hex) of the canonical JSON of pending */
  readonly digest: string;
}

// =============================================================================
// Replies
// =============================================================================

export type FailureKind =
  | "NOT_UNDERSTOOD"
  | "NOT_FOUND"
  | "INVALID_REFERENCE"
  | "UNKNOWN_PRODUCT"
  | "VALIDATION_FAILED"
  | "RECORDING_FAILED";

export interface LowStockAlert {
  readonly productId: number;
  readonly productName: string;
  readonly quantity: string;
  readonly minStock: string;
}

export interface StockLine {
  readonly productId: number;
  readonly productName: string;
  readonly quantity: string;
  readonly unit: string;
}

export interface PromptReply {
  readonly type: "prompt";
  readonly missingFields: readonly FieldName[];
  readonly labels: readonly string[];
  /** Names the catalog could not identify */
  readonly unresolved: readonly string[];
  readonly message: string;
}

export interface ConfirmationReply {
  readonly type: "confirmation";
  readonly actionKind: ActionKind;
  readonly summary: string;
  readonly recordId?: string | undefined;
  readonly lowStock?: LowStockAlert | undefined;
  readonly stock?: readonly StockLine[] | undefined;
}

export interface FailureReply {
  readonly type: "failure";
  readonly errorKind: FailureKind;
  readonly message: string;
}

export interface CancelledReply {
  readonly type: "cancelled";
  readonly message: string;
}

export type Reply = PromptReply | ConfirmationReply | FailureReply | CancelledReply;

export interface HandleResult {
  /** Encoded state blob to hand back on the next message */
  readonly state: string;
  readonly reply: Reply;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Structured log sink (pino-compatible subset).
 */
export interface EngineLogger {
  debug(obj: object, msg: string): void;
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
}

// =============================================================================
// Errors
// =============================================================================

export type ConversationErrorCode = "INVALID_FIELD";

export class ConversationError extends Error {
  public readonly code: ConversationErrorCode;

  constructor(code: ConversationErrorCode, message: string) {
    super(message);
    this.name = "ConversationError";
    this.code = code;
  }
}
