/**
 * StockbookService — Composition root for the HTTP node.
 *
 * Wires the catalog, book store, ledger, recorder and completion engine
 * into one object and exposes the operations the routes need.
 */

import { Catalog } from "@stockbook/catalog";
import type { EntityClass } from "@stockbook/catalog";
import {
  CompletionEngine,
  ConversationSessions,
} from "@stockbook/conversation";
import type { EngineLogger, HandleResult } from "@stockbook/conversation";
import {
  InMemoryBookStore,
  JsonlBookStore,
  LedgerError,
  StockLedger,
  isBelowMinimum,
} from "@stockbook/ledger";
import type { BookStore, LevelVerification } from "@stockbook/ledger";
import { TransactionRecorder } from "@stockbook/recorder";
import type { RecorderLogger } from "@stockbook/recorder";
import type {
  ActionParse,
  ReferenceEntry,
  StockLevel,
  StockMovement,
} from "@stockbook/types";

// =============================================================================
// Config
// =============================================================================

/** Logger sink shared by the recorder and the engine (pino-compatible). */
export type ServiceLogger = EngineLogger & RecorderLogger;

export interface StockbookServiceConfig {
  readonly defaultCurrency: string;
  readonly defaultDecimals: number;
  readonly matchThreshold?: number | undefined;
  readonly minConfidence?: number | undefined;
  /** JSONL book file; in-memory when absent */
  readonly dataFile?: string | undefined;
  /** Reference data seed; the bundled seed when absent */
  readonly catalogSeedFile?: string | undefined;
  readonly logger?: ServiceLogger | undefined;
  readonly clock?: (() => string) | undefined;
}

export interface StockView {
  readonly productId: number;
  readonly productName?: string | undefined;
  readonly unit?: string | undefined;
  readonly quantity: string;
  readonly minStock?: string | undefined;
  readonly belowMinimum: boolean;
  readonly updatedAt: string;
}

export interface ResolvedEntry {
  readonly entityClass: EntityClass;
  readonly query: string;
  readonly entry: ReferenceEntry;
  readonly score: number;
}

// =============================================================================
// Service
// =============================================================================

export class StockbookService {
  readonly catalog: Catalog;
  readonly store: BookStore;
  readonly ledger: StockLedger;
  readonly recorder: TransactionRecorder;
  readonly engine: CompletionEngine;
  readonly sessions: ConversationSessions;

  constructor(config: StockbookServiceConfig) {
    const catalogOptions = { threshold: config.matchThreshold };
    this.catalog =
      config.catalogSeedFile !== undefined
        ? Catalog.loadSeedFile(config.catalogSeedFile, catalogOptions)
        : Catalog.loadDefaultSeed(catalogOptions);

    this.store =
      config.dataFile !== undefined
        ? new JsonlBookStore({ filePath: config.dataFile })
        : new InMemoryBookStore();

    const catalog = this.catalog;
    this.ledger = new StockLedger({
      store: this.store,
      isKnownProduct: (id) => catalog.has("product", id),
      clock: config.clock,
    });

    this.recorder = new TransactionRecorder({
      ledger: this.ledger,
      references: this.catalog,
      clock: config.clock,
      logger: config.logger,
    });

    this.engine = new CompletionEngine({
      catalog: this.catalog,
      ledger: this.ledger,
      recorder: this.recorder,
      currency: config.defaultCurrency,
      decimals: config.defaultDecimals,
      minConfidence: config.minConfidence,
      clock: config.clock,
      logger: config.logger,
    });

    this.sessions = new ConversationSessions(this.engine);
  }

  // ─── Conversation ─────────────────────────────────────────────────────

  handleMessage(userId: string, parse: ActionParse, state?: string): Promise<HandleResult> {
    return this.sessions.handleMessage(userId, parse, state);
  }

  // ─── Stock ────────────────────────────────────────────────────────────

  listStock(): readonly StockView[] {
    return this.ledger.listLevels().map((level) => this.view(level));
  }

  /**
   * Throws UNKNOWN_PRODUCT when the product has no level.
   */
  getStock(productId: number): StockView {
    const level = this.ledger.getLevel(productId);
    if (level === undefined) {
      throw new LedgerError("UNKNOWN_PRODUCT", `No stock level for product ${String(productId)}`);
    }
    return this.view(level);
  }

  movements(productId: number): readonly StockMovement[] {
    return this.ledger.movements(productId);
  }

  // ─── Catalog ──────────────────────────────────────────────────────────

  /**
   * Throws NOT_FOUND when no entry clears the threshold.
   */
  resolve(entityClass: EntityClass, name: string): ResolvedEntry {
    const id = this.catalog.resolve(entityClass, name);
    const entry = this.catalog.get(entityClass, id);
    const score = this.catalog.match(entityClass, name)?.score ?? 1;
    return { entityClass, query: name, entry, score };
  }

  listEntries(entityClass: EntityClass): readonly ReferenceEntry[] {
    return this.catalog.list(entityClass);
  }

  // ─── Health ───────────────────────────────────────────────────────────

  verify(): LevelVerification {
    return this.ledger.verifyLevels();
  }

  private view(level: StockLevel): StockView {
    if (!this.catalog.has("product", level.productId)) {
      return { ...level, belowMinimum: false };
    }
    const product = this.catalog.productById(level.productId);
    return {
      productId: level.productId,
      productName: product.name,
      unit: product.unit,
      quantity: level.quantity,
      minStock: product.minStock,
      belowMinimum: isBelowMinimum(level, product),
      updatedAt: level.updatedAt,
    };
  }
}
