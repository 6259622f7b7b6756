/**
 * Conversation Completion Engine — Turns a stream of action parses into
 * committed records.
 *
 * States:
 * - Idle: nothing pending
 * - AwaitingFields: one PendingAction waiting for missing fields
 *
 * Transitions (per message):
 * - cancel → Idle, "cancelled"
 * - unknown / low confidence → state unchanged, NOT_UNDERSTOOD
 * - supplement, or the pending kind while not complete on its own → merge
 * - any other action → replaces the pending one, processed from Idle
 * - nothing missing → execute → Idle, confirmation or failure
 * - a name the catalog cannot identify → that field is asked again
 */

import { CatalogError, normalizeName } from "@stockbook/catalog";
import type { Catalog } from "@stockbook/catalog";
import { LedgerError, isBelowMinimum } from "@stockbook/ledger";
import type { StockLedger } from "@stockbook/ledger";
import { RecorderError } from "@stockbook/recorder";
import type { TransactionRecorder } from "@stockbook/recorder";
import type { ActionParse, FieldName, Money, StockLevel } from "@stockbook/types";
import {
  FIELD_SPECS,
  coerceFields,
  conflictingFields,
  createPending,
  fieldsOf,
  mergeSupplement,
  reopenFields,
  toCompleteAction,
  toCurrencyAmount,
  validate,
} from "./action-model.js";
import {
  CANCELLED_MESSAGE,
  FAILURE_MESSAGES,
  WHOLE_INVENTORY,
  formatMissingPrompt,
  formatUnresolvedPrompt,
  labelsFor,
} from "./prompts.js";
import { IDLE, decodeState, encodeState } from "./state-codec.js";
import { normalizeUnit } from "./units.js";
import type {
  CompleteAction,
  ConfirmationReply,
  ConversationState,
  EngineLogger,
  FailureKind,
  FailureReply,
  HandleResult,
  PendingAction,
  PromptReply,
  Reply,
  StockLine,
} from "./types.js";
import { ConversationError } from "./types.js";

/** Expense type given to purchases of catalog products. */
export const PURCHASE_EXPENSE_TYPE = "Variable";

/** Expense type given to generic expenses. */
export const GENERIC_EXPENSE_TYPE = "Fijo";

export const DEFAULT_MIN_CONFIDENCE = 0.6;

export interface CompletionEngineOptions {
  readonly catalog: Catalog;
  readonly ledger: StockLedger;
  readonly recorder: TransactionRecorder;
  /** Default: "CLP" */
  readonly currency?: string | undefined;
  /** Default: 0 */
  readonly decimals?: number | undefined;
  /** Parses below this confidence are not acted on. Default: 0.6 */
  readonly minConfidence?: number | undefined;
  readonly clock?: (() => string) | undefined;
  readonly logger?: EngineLogger | undefined;
}

/**
 * Result of one transition, before the state is encoded.
 */
export interface StepResult {
  readonly state: ConversationState;
  readonly reply: Reply;
}

// =============================================================================
// Engine
// =============================================================================

export class CompletionEngine {
  private readonly catalog: Catalog;
  private readonly ledger: StockLedger;
  private readonly recorder: TransactionRecorder;
  private readonly currency: string;
  private readonly decimals: number;
  private readonly minConfidence: number;
  private readonly clock: () => string;
  private readonly logger: EngineLogger | undefined;

  constructor(options: CompletionEngineOptions) {
    this.catalog = options.catalog;
    this.ledger = options.ledger;
    this.recorder = options.recorder;
    this.currency = options.currency ?? "CLP";
    this.decimals = options.decimals ?? 0;
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this.clock = options.clock ?? (() => new Date().toISOString());
    this.logger = options.logger;
  }

  /**
   * Handle one message: decode state, step, encode state.
   */
  async handle(stateBlob: string | undefined, parse: ActionParse): Promise<HandleResult> {
    const decoded = decodeState(stateBlob);
    if (!decoded.ok) {
      this.logger?.warn({ reason: decoded.reason }, "Discarded invalid conversation state");
    }

    let result: StepResult;
    try {
      result = await this.step(decoded.state.pending, parse);
    } catch (err: unknown) {
      const failure = this.toFailure(err);
      this.logger?.warn(
        { actionKind: parse.actionKind, errorKind: failure.errorKind, err: err instanceof Error ? err.message : String(err) },
        "Conversation step failed",
      );
      result = { state: IDLE, reply: failure };
    }
    const { state, reply } = result;

    this.logger?.debug(
      {
        actionKind: parse.actionKind,
        pending: state.pending?.kind ?? null,
        missing: state.pending?.missing ?? [],
        reply: reply.type,
      },
      "Conversation step",
    );

    return { state: encodeState(state), reply };
  }

  /**
   * The state machine proper.
   */
  async step(pending: PendingAction | null, parse: ActionParse): Promise<StepResult> {
    const kind = parse.actionKind;

    if (kind === "cancel") {
      return { state: IDLE, reply: { type: "cancelled", message: CANCELLED_MESSAGE } };
    }

    if (kind === "unknown" || (parse.confidence !== undefined && parse.confidence < this.minConfidence)) {
      return { state: { pending }, reply: failureReply("NOT_UNDERSTOOD") };
    }

    let next: PendingAction;

    if (kind === "supplement") {
      if (pending === null) {
        return { state: IDLE, reply: failureReply("NOT_UNDERSTOOD") };
      }
      next = mergeSupplement(pending, coerceFields(pending.kind, parse.fields));
    } else {
      const incoming = coerceFields(kind, parse.fields);
      const completeOnItsOwn = validate(kind, incoming).length === 0;

      if (
        pending !== null &&
        pending.kind === kind &&
        !completeOnItsOwn &&
        conflictingFields(pending, incoming).length === 0
      ) {
        next = mergeSupplement(pending, incoming);
      } else {
        if (pending !== null) {
          this.logger?.info({ discarded: pending.kind, actionKind: kind }, "Pending action superseded");
        }
        next = createPending(kind, incoming, parse.originalText, this.clock());
      }
    }

    return this.advance(next);
  }

  // ─── Execution ───────────────────────────────────────────────────────

  private async advance(pending: PendingAction): Promise<StepResult> {
    if (pending.missing.length > 0) {
      return { state: { pending }, reply: promptReply(pending.missing, []) };
    }

    const unresolved = this.unresolvedFields(pending);
    if (unresolved.length > 0) {
      const names = unresolved.map((f) => pending.values[f] ?? "");
      const reopened = reopenFields(pending, unresolved);
      this.logger?.info({ actionKind: pending.kind, unresolved: names }, "Names not found in catalog");
      return { state: { pending: reopened }, reply: promptReply(reopened.missing, names) };
    }

    try {
      const reply = await this.execute(toCompleteAction(pending.kind, pending.values));
      this.logger?.info({ actionKind: pending.kind, recordId: reply.recordId }, "Action executed");
      return { state: IDLE, reply };
    } catch (err: unknown) {
      const reply = this.toFailure(err);
      this.logger?.warn(
        { actionKind: pending.kind, errorKind: reply.errorKind, err: err instanceof Error ? err.message : String(err) },
        "Action failed",
      );
      return { state: IDLE, reply };
    }
  }

  /**
   * Reference fields whose names the catalog cannot identify.
   */
  private unresolvedFields(pending: PendingAction): readonly FieldName[] {
    return fieldsOf(pending.kind).filter((field) => {
      const entityClass = FIELD_SPECS[field].entityClass;
      const value = pending.values[field];
      if (entityClass === undefined || value === undefined) {
        return false;
      }
      if (pending.kind === "query_stock" && WHOLE_INVENTORY.includes(normalizeName(value))) {
        return false;
      }
      return this.catalog.match(entityClass, value) === undefined;
    });
  }

  private async execute(action: CompleteAction): Promise<ConfirmationReply> {
    switch (action.kind) {
      case "register_purchase": {
        const product = this.catalog.resolveProduct(action.product);
        const supplierId = this.catalog.resolve("supplier", action.provider);
        const normalized = normalizeUnit(action.quantity, action.unit);
        const amount = this.money(action.cost);

        const { record } = await this.recorder.recordExpense({
          amount,
          paymentMethodId: this.catalog.resolve("paymentMethod", action.paymentMethod),
          supplierId,
          expenseTypeId: this.catalog.resolve("expenseType", PURCHASE_EXPENSE_TYPE),
          categoryId: product.categoryId,
          productId: product.id,
          purchasedQuantity: normalized.quantity,
        });

        const supplier = this.catalog.get("supplier", supplierId).name;
        return {
          type: "confirmation",
          actionKind: action.kind,
          summary: `Compra registrada: ${normalized.quantity} ${normalized.unit} de ${product.name} por $${amount.amount} (${supplier})`,
          recordId: record.id,
        };
      }

      case "register_expense": {
        const categoryId = this.catalog.resolve("category", action.expenseCategory);
        const amount = this.money(action.cost);

        const { record } = await this.recorder.recordExpense({
          amount,
          paymentMethodId: this.catalog.resolve("paymentMethod", action.paymentMethod),
          supplierId: this.catalog.resolve("supplier", action.provider),
          expenseTypeId: this.catalog.resolve("expenseType", GENERIC_EXPENSE_TYPE),
          categoryId,
          itemDescription: action.item,
        });

        const category = this.catalog.get("category", categoryId).name;
        return {
          type: "confirmation",
          actionKind: action.kind,
          summary: `Gasto registrado: $${amount.amount} en ${category}`,
          recordId: record.id,
        };
      }

      case "register_usage": {
        const product = this.catalog.resolveProduct(action.product);
        const normalized =
          action.unit !== undefined
            ? normalizeUnit(action.quantity, action.unit)
            : { quantity: action.quantity, unit: product.unit };

        const { record, level } = await this.recorder.recordUsage({
          productId: product.id,
          quantity: normalized.quantity,
          reason: action.reason,
        });

        let summary =
          `Uso registrado: ${normalized.quantity} ${normalized.unit} de ${product.name}. ` +
          `Stock restante: ${level.quantity} ${product.unit}`;

        if (!isBelowMinimum(level, product)) {
          return { type: "confirmation", actionKind: action.kind, summary, recordId: record.id };
        }

        summary += `\nAlerta: ${product.name} está bajo el stock mínimo (${product.minStock} ${product.unit})`;
        return {
          type: "confirmation",
          actionKind: action.kind,
          summary,
          recordId: record.id,
          lowStock: {
            productId: product.id,
            productName: product.name,
            quantity: level.quantity,
            minStock: product.minStock,
          },
        };
      }

      case "query_stock":
        return this.queryStock(action.product);
    }
  }

  private queryStock(productText: string): ConfirmationReply {
    if (WHOLE_INVENTORY.includes(normalizeName(productText))) {
      const stock = this.ledger.listLevels().map((level) => this.stockLine(level));
      const summary =
        stock.length === 0
          ? "Inventario vacío."
          : ["Inventario:", ...stock.map((s) => `• ${s.productName}: ${s.quantity} ${s.unit}`)].join("\n");
      return { type: "confirmation", actionKind: "query_stock", summary, stock };
    }

    const product = this.catalog.resolveProduct(productText);
    const level = this.ledger.getLevel(product.id);
    if (level === undefined) {
      return {
        type: "confirmation",
        actionKind: "query_stock",
        summary: `${product.name}: sin stock registrado`,
        stock: [],
      };
    }

    const line = this.stockLine(level);
    return {
      type: "confirmation",
      actionKind: "query_stock",
      summary: `${line.productName}: ${line.quantity} ${line.unit}`,
      stock: [line],
    };
  }

  private stockLine(level: StockLevel): StockLine {
    const product = this.catalog.has("product", level.productId)
      ? this.catalog.productById(level.productId)
      : undefined;
    return {
      productId: level.productId,
      productName: product?.name ?? `#${String(level.productId)}`,
      quantity: level.quantity,
      unit: product?.unit ?? "",
    };
  }

  private money(cost: string): Money {
    return {
      amount: toCurrencyAmount(cost, this.decimals),
      currency: this.currency,
      decimals: this.decimals,
    };
  }

  private toFailure(err: unknown): FailureReply {
    return failureReply(failureKindOf(err));
  }
}

// =============================================================================
// Replies
// =============================================================================

function promptReply(missing: readonly FieldName[], unresolved: readonly string[]): PromptReply {
  return {
    type: "prompt",
    missingFields: missing,
    labels: labelsFor(missing),
    unresolved,
    message:
      unresolved.length > 0 ? formatUnresolvedPrompt(unresolved, missing) : formatMissingPrompt(missing),
  };
}

function failureReply(errorKind: FailureKind): FailureReply {
  return { type: "failure", errorKind, message: FAILURE_MESSAGES[errorKind] };
}

/**
 * Classify an execution error into the failure kind shown to the user.
 */
export function failureKindOf(err: unknown): FailureKind {
  if (err instanceof RecorderError) {
    return err.code;
  }
  if (err instanceof CatalogError) {
    return err.code === "NOT_FOUND" ? "NOT_FOUND" : "INVALID_REFERENCE";
  }
  if (err instanceof LedgerError) {
    switch (err.code) {
      case "UNKNOWN_PRODUCT":
      case "INVALID_REFERENCE":
        return err.code;
      case "INVALID_QUANTITY":
        return "VALIDATION_FAILED";
      case "STORE_FAILURE":
        return "RECORDING_FAILED";
    }
  }
  if (err instanceof ConversationError) {
    return "VALIDATION_FAILED";
  }
  return "RECORDING_FAILED";
}
