/**
 * Append-only audit log of conversation messages and their outcome.
 *
 * In-memory only — survives as long as the process. Bounded: once
 * `capacity` entries exist, the oldest are dropped.
 */

// =============================================================================
// Types
// =============================================================================

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly requestId: string;
  /** User the message came from */
  readonly actor: string;
  /** Parse kind of the message */
  readonly action: string;
  /** Reply type: prompt | confirmation | failure | cancelled */
  readonly outcome: string;
  /** Record created by the message, when one was */
  readonly recordId?: string | undefined;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly actor?: string | undefined;
  readonly action?: string | undefined;
  readonly limit?: number | undefined;
}

export interface AuditLogOptions {
  /** Default: 10 000 */
  readonly capacity?: number | undefined;
  readonly clock?: (() => string) | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _capacity: number;
  private readonly _clock: () => string;

  constructor(options?: AuditLogOptions) {
    this._capacity = options?.capacity ?? 10_000;
    this._clock = options?.clock ?? (() => new Date().toISOString());
  }

  append(entry: Omit<AuditLogEntry, "timestamp">): void {
    this._entries.push({ ...entry, timestamp: this._clock() });
    if (this._entries.length > this._capacity) {
      this._entries.splice(0, this._entries.length - this._capacity);
    }
  }

  /**
   * Query entries with optional filters, newest first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results = this._entries.filter(
      (e) =>
        (filter?.actor === undefined || e.actor === filter.actor) &&
        (filter?.action === undefined || e.action === filter.action),
    );

    results.reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
