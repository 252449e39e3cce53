/**
 * Vertex Store
 *
 * Vertices live in a dense, append-only array; a HashMap built from the key
 * instances maps each key to its slot. Slots never move and are never reused,
 * so a vertex keeps its slot (and an empty edge list) after it loses every
 * edge.
 */

import { HashMap } from "@graphfold/collections";
import { invariant } from "@graphfold/core";
import { EdgeList } from "./edge-list.js";
import type { KeyInstances } from "./types.js";

export interface VertexRecord<T> {
  readonly key: T;
  visited: boolean;
  readonly edges: EdgeList<T>;
}

export class VertexStore<T> {
  private readonly records: VertexRecord<T>[] = [];
  private readonly index: HashMap<T, number>;

  constructor(private readonly keys: KeyInstances<T>) {
    this.index = new HashMap(keys.ord, keys.hash);
  }

  get size(): number {
    return this.records.length;
  }

  /** Slot of `key`, or undefined when the vertex does not exist. */
  lookup(key: T): number | undefined {
    return this.index.get(key);
  }

  /** Slot of `key`, creating an unvisited vertex with no edges if needed. */
  ensure(key: T): number {
    return this.index.getOrInsertWith(key, () => {
      this.records.push({ key, visited: false, edges: new EdgeList(this.keys.ord) });
      return this.records.length - 1;
    });
  }

  at(slot: number): VertexRecord<T> {
    invariant(Number.isInteger(slot) && slot >= 0 && slot < this.records.length, `No vertex in slot ${slot}`);
    return this.records[slot];
  }

  find(key: T): VertexRecord<T> | undefined {
    const slot = this.index.get(key);
    return slot === undefined ? undefined : this.records[slot];
  }

  /** Record for `key`, created on first use. */
  vertex(key: T): VertexRecord<T> {
    return this.at(this.ensure(key));
  }

  resetVisited(): void {
    for (const record of this.records) record.visited = false;
  }

  keyList(): T[] {
    return this.records.map((record) => record.key);
  }

  [Symbol.iterator](): IterableIterator<VertexRecord<T>> {
    return this.records[Symbol.iterator]();
  }
}
