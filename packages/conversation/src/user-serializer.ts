/**
 * Per-user message ordering.
 *
 * Messages of one user are handled strictly in arrival order; different
 * users proceed concurrently.
 */

import { KeyedMutex } from "@stockbook/ledger";

export class UserSerializer {
  private readonly _mutex = new KeyedMutex<string>();

  run<T>(userId: string, fn: () => Promise<T> | T): Promise<T> {
    return this._mutex.runExclusive(userId, fn);
  }

  /** Whether a message of this user is in flight or queued. */
  isBusy(userId: string): boolean {
    return this._mutex.isLocked(userId);
  }
}
