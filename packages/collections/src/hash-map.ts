/**
 * HashMap<K, V>: A map backed by hash bucketing using Eq<K> + Hash<K>.
 *
 * API mirrors native Map<K, V>, including insertion-ordered iteration, so
 * keys that are records or tuples can be used where a native Map would
 * compare them by reference.
 */

import type { Eq, Hash } from "@graphfold/std";

interface Entry<K, V> {
  readonly key: K;
  readonly hash: number;
  value: V;
}

export class HashMap<K, V> {
  private readonly _eq: Eq<K>;
  private readonly _hash: Hash<K>;
  private readonly _buckets = new Map<number, Entry<K, V>[]>();
  // insertion order
  private _order: Entry<K, V>[] = [];

  constructor(eq: Eq<K>, hash: Hash<K>) {
    this._eq = eq;
    this._hash = hash;
  }

  get size(): number {
    return this._order.length;
  }

  private _find(k: K, h: number): Entry<K, V> | undefined {
    const bucket = this._buckets.get(h);
    if (!bucket) return undefined;
    for (const entry of bucket) {
      if (this._eq.equals(k, entry.key)) return entry;
    }
    return undefined;
  }

  private _insert(k: K, h: number, v: V): Entry<K, V> {
    const entry: Entry<K, V> = { key: k, hash: h, value: v };
    const bucket = this._buckets.get(h);
    if (bucket) {
      bucket.push(entry);
    } else {
      this._buckets.set(h, [entry]);
    }
    this._order.push(entry);
    return entry;
  }

  get(k: K): V | undefined {
    return this._find(k, this._hash.hash(k))?.value;
  }

  has(k: K): boolean {
    return this._find(k, this._hash.hash(k)) !== undefined;
  }

  set(k: K, v: V): this {
    const h = this._hash.hash(k);
    const entry = this._find(k, h);
    if (entry) {
      entry.value = v;
    } else {
      this._insert(k, h, v);
    }
    return this;
  }

  /**
   * Return the value stored under `k`, inserting `create()` first when the
   * key is absent. Hashes the key once.
   */
  getOrInsertWith(k: K, create: () => V): V {
    const h = this._hash.hash(k);
    const entry = this._find(k, h) ?? this._insert(k, h, create());
    return entry.value;
  }

  delete(k: K): boolean {
    const h = this._hash.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) return false;
    const i = bucket.findIndex((entry) => this._eq.equals(k, entry.key));
    if (i < 0) return false;
    const [removed] = bucket.splice(i, 1);
    if (bucket.length === 0) this._buckets.delete(h);
    this._order = this._order.filter((entry) => entry !== removed);
    return true;
  }

  clear(): void {
    this._buckets.clear();
    this._order = [];
  }

  *entries(): IterableIterator<[K, V]> {
    for (const { key, value } of this._order) yield [key, value];
  }

  *keys(): IterableIterator<K> {
    for (const { key } of this._order) yield key;
  }

  *values(): IterableIterator<V> {
    for (const { value } of this._order) yield value;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  forEach(fn: (value: V, key: K) => void): void {
    for (const [k, v] of this) fn(v, k);
  }
}
