/**
 * @presign/authorization — Keyed async mutex.
 *
 * Serializes work per key (one signer address) while letting different
 * keys proceed concurrently. Waiters run in arrival order.
 */

export class KeyedLock {
  /** Tail of the wait queue per key */
  private readonly _tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this._tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /**
   * Whether any holder or waiter exists for `key`.
   */
  isLocked(key: string): boolean {
    return this._tails.has(key);
  }

  /** Number of keys with a holder or waiters */
  get size(): number {
    return this._tails.size;
  }
}
