/**
 * Keyed container with a single-writer / multi-reader contract.
 *
 * The writer replaces whole values; every stored value is frozen, so a reader
 * holding a value never sees it change underneath. `view()` hands out a copy
 * of the key set as it stood at the call.
 */
export class KeyedStore<K, V extends object> {
  private entries = new Map<K, Readonly<V>>();

  get size(): number {
    return this.entries.size;
  }

  get(key: K): Readonly<V> | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): Readonly<V> {
    const frozen = Object.freeze({ ...value });
    this.entries.set(key, frozen);
    return frozen;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  view(): ReadonlyMap<K, Readonly<V>> {
    return new Map(this.entries);
  }

  clear(): void {
    this.entries = new Map<K, Readonly<V>>();
  }
}
