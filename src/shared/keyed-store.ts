/**
 * Keyed mutable state shared by the ledger, health tracker and usage recorder.
 *
 * Every mutation is a synchronous read-modify-write on a single key, so it
 * completes within one turn of the event loop and can never interleave with
 * another request's update. Contention is per key: an update to one backend
 * never touches another backend's entry.
 */

export class KeyedStore<T extends object> {
  private readonly entries = new Map<string, T>();

  /** @param initial - Factory for the entry of a key seen for the first time. */
  constructor(private readonly initial: (key: string) => T) {}

  /** Current entry for a key, or a fresh initial entry (not stored). */
  get(key: string): Readonly<T> {
    return this.entries.get(key) ?? this.initial(key);
  }

  /**
   * Atomically replace the entry for a key.
   * The updater receives the current entry and returns the next one; it must
   * not await anything.
   * @returns The stored entry.
   */
  update(key: string, updater: (current: Readonly<T>) => T): Readonly<T> {
    const next = updater(this.get(key));
    this.entries.set(key, next);
    return next;
  }

  /**
   * Point-in-time copy of every listed key, mapped through `view`.
   * The returned map and its values are frozen copies, never live entries.
   */
  snapshot<V extends object>(
    keys: Iterable<string>,
    view: (key: string, entry: Readonly<T>) => V,
  ): ReadonlyMap<string, Readonly<V>> {
    const copy = new Map<string, Readonly<V>>();
    for (const key of keys) {
      copy.set(key, Object.freeze({ ...view(key, this.get(key)) }));
    }
    return copy;
  }
}
