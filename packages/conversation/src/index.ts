/**
 * @stockbook/conversation — Multi-message action completion.
 *
 * Accumulates the fields of a chat action across messages, asks for
 * what is missing, and commits the action once it is complete.
 *
 * Design rules:
 * - The conversation state is an explicit, integrity-checked value
 * - One pending action per user at most
 * - Every error becomes a reply; nothing is swallowed
 */

// Engine
export {
  CompletionEngine,
  failureKindOf,
  PURCHASE_EXPENSE_TYPE,
  GENERIC_EXPENSE_TYPE,
  DEFAULT_MIN_CONFIDENCE,
} from "./engine.js";
export type { CompletionEngineOptions, StepResult } from "./engine.js";

// Sessions and ordering
export { ConversationSessions } from "./sessions.js";
export { UserSerializer } from "./user-serializer.js";

// Action model
export {
  ACTION_SCHEMAS,
  FIELD_SPECS,
  fieldsOf,
  requiredFieldsOf,
  parseNumericText,
  coerceValue,
  coerceFields,
  validate,
  createPending,
  mergeSupplement,
  conflictingFields,
  reopenFields,
  toCompleteAction,
  toCurrencyAmount,
} from "./action-model.js";

// Wording and units
export {
  FIELD_LABELS,
  labelsFor,
  joinLabels,
  formatMissingPrompt,
  formatUnresolvedPrompt,
} from "./prompts.js";
export { normalizeUnit } from "./units.js";
export type { NormalizedQuantity } from "./units.js";

// State blob
export {
  STATE_VERSION,
  IDLE,
  encodeState,
  decodeState,
  digestPending,
  isPendingAction,
} from "./state-codec.js";
export type { DecodeResult } from "./state-codec.js";

// Types
export type {
  FieldType,
  FieldSpec,
  ActionSchema,
  FieldValues,
  PendingAction,
  CompleteAction,
  ConversationState,
  StateEnvelope,
  FailureKind,
  LowStockAlert,
  StockLine,
  PromptReply,
  ConfirmationReply,
  FailureReply,
  CancelledReply,
  Reply,
  HandleResult,
  EngineLogger,
  ConversationErrorCode,
} from "./types.js";

export { ConversationError } from "./types.js";
