/**
 * Action Types
 *
 * The structured form of a user's chat message, as produced by the
 * external language-understanding collaborator.
 *
 * An action parse may carry zero, some, or all of the fields its kind
 * requires. Completion of missing fields is the conversation engine's job.
 */

/**
 * Operations a user can request.
 */
export type ActionKind =
  | "register_purchase"
  | "register_expense"
  | "register_usage"
  | "query_stock";

/**
 * Kinds a parse may carry besides a full action:
 * - "supplement": only field values, answering a previous prompt
 * - "cancel": drop whatever is pending
 * - "unknown": the collaborator could not classify the message
 */
export type ParseKind = ActionKind | "supplement" | "cancel" | "unknown";

/**
 * Every field name any action kind knows about.
 */
export type FieldName =
  | "product"
  | "quantity"
  | "unit"
  | "cost"
  | "provider"
  | "paymentMethod"
  | "expenseCategory"
  | "item"
  | "reason";

/**
 * A raw value as extracted from free text. Numbers may arrive as strings.
 */
export type RawFieldValue = string | number | null;

/**
 * Result of parsing one chat message.
 */
export interface ActionParse {
  readonly actionKind: ParseKind;

  /** Extracted fields; unknown keys are ignored by the engine */
  readonly fields: Readonly<Record<string, RawFieldValue | undefined>>;

  /** The message exactly as the user typed it */
  readonly originalText: string;

  /** Classifier confidence in [0, 1]; absent means fully confident */
  readonly confidence?: number | undefined;
}
