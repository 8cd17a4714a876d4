export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

export type ConstMap<K, V> = Pick<
  HashMap<K, V>,
  'size' | 'has' | 'get' | 'keys' | 'values' | 'entries'
> &
  Iterable<[K, V]>;

/**
 * A map whose keys are compared by the string the hasher produces
 * for them, rather than by identity. Iteration follows insertion order.
 */
export class HashMap<K, V> implements Iterable<[K, V]> {
  private hasher: (item: K) => string;
  private data: Map<string, [K, V]> = new Map();
  constructor(hasher: (item: K) => string, pairs: Iterable<[K, V]> = []) {
    this.hasher = hasher;
    for (const [key, value] of pairs) {
      this.set(key, value);
    }
  }
  delete(key: K): boolean {
    return this.data.delete(this.hasher(key));
  }
  get(key: K): V | undefined {
    return this.data.get(this.hasher(key))?.[1];
  }
  has(key: K): boolean {
    return this.data.has(this.hasher(key));
  }
  set(key: K, value: V): this {
    this.data.set(this.hasher(key), [key, value]);
    return this;
  }
  get size(): number {
    return this.data.size;
  }
  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.data.values()) {
      yield [key, value];
    }
  }
  *keys(): IterableIterator<K> {
    for (const [key] of this.data.values()) {
      yield key;
    }
  }
  *values(): IterableIterator<V> {
    for (const [, value] of this.data.values()) {
      yield value;
    }
  }
  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
  get [Symbol.toStringTag](): string {
    return 'HashMap';
  }
}
