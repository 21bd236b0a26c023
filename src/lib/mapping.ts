/**
 * Storage capability the ledger persists through.
 *
 * An absent key and a stored zero are distinguishable here; the ledger
 * treats both as zero.
 */
export interface MappingStore<K, V> {
  get(key: K): V | undefined;
  insert(key: K, value: V): void;
  entries(): Array<[K, V]>;
}

/**
 * In-memory mapping. Keys are reduced to strings through `keyOf` so
 * composite keys (tuples) compare by value.
 */
export class MemoryMapping<K, V> implements MappingStore<K, V> {
  private items = new Map<string, [K, V]>();

  constructor(private readonly keyOf: (key: K) => string) {}

  static byString<V>(): MemoryMapping<string, V> {
    return new MemoryMapping<string, V>((key) => key);
  }

  static byPair<V>(): MemoryMapping<[string, string], V> {
    return new MemoryMapping<[string, string], V>(
      ([first, second]) => `${first}|${second}`
    );
  }

  get(key: K): V | undefined {
    return this.items.get(this.keyOf(key))?.[1];
  }

  insert(key: K, value: V): void {
    this.items.set(this.keyOf(key), [key, value]);
  }

  entries(): Array<[K, V]> {
    return Array.from(this.items.values()).map(([key, value]) => [key, value]);
  }

  get size(): number {
    return this.items.size;
  }
}
