/**
 * @stockbook/ledger — Per-key mutual exclusion.
 *
 * Holders of the same key run one at a time, in the order they asked.
 * Different keys never wait on each other. Idle keys are forgotten.
 */

/** Call to give the key to the next waiter. Idempotent. */
export type Release = () => void;

export class KeyedMutex<K = string> {
  /** Tail of the wait chain per key. */
  private readonly _tails = new Map<K, Promise<void>>();

  /**
   * Wait for the key. Resolves with a release function.
   */
  async acquire(key: K): Promise<Release> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    };
  }

  /**
   * Run fn while holding the key.
   */
  async runExclusive<T>(key: K, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Whether anyone holds or waits for the key. */
  isLocked(key: K): boolean {
    return this._tails.has(key);
  }

  /** Number of keys currently held. */
  get size(): number {
    return this._tails.size;
  }
}
