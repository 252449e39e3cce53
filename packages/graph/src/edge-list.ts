/**
 * Edge List Engine
 *
 * Each vertex owns one EdgeList: its outgoing edges, strictly ascending by
 * head key, at most one record per head. Parallel edges are folded into the
 * existing record by adding weights.
 *
 * One linear scan serves both purposes of an insertion: it finds an existing
 * record for the head, or the position where a new record keeps the order.
 */

import type { Ord } from "@graphfold/std";
import { unreachable, type DistancePolicy } from "@graphfold/core";

export interface EdgeRecord<T> {
  readonly head: T;
  weight: number;
  distance: number;
}

/**
 * Combine the distance of an existing edge with the distance of a parallel
 * edge being merged into it.
 */
export function mergeDistance(
  policy: DistancePolicy,
  existing: { readonly weight: number; readonly distance: number },
  incoming: { readonly weight: number; readonly distance: number }
): number {
  switch (policy) {
    case "first":
      return existing.distance;
    case "min":
      return Math.min(existing.distance, incoming.distance);
    case "mean":
      return (
        (existing.distance * existing.weight + incoming.distance * incoming.weight) /
        (existing.weight + incoming.weight)
      );
    default:
      return unreachable(policy);
  }
}

export class EdgeList<T> {
  private records: EdgeRecord<T>[] = [];

  constructor(private readonly ord: Ord<T>) {}

  get length(): number {
    return this.records.length;
  }

  /**
   * Insert an edge to `head`, or add `weight` to the edge already there.
   * Returns the record now holding the edge.
   */
  insertOrMerge(
    head: T,
    weight: number,
    distance: number,
    policy: DistancePolicy = "first"
  ): EdgeRecord<T> {
    let i = 0;
    for (; i < this.records.length; i++) {
      const record = this.records[i];
      const c = this.ord.compare(record.head, head);
      if (c === 0) {
        record.distance = mergeDistance(policy, record, { weight, distance });
        record.weight += weight;
        return record;
      }
      if (c > 0) break;
    }
    const inserted: EdgeRecord<T> = { head, weight, distance };
    this.records.splice(i, 0, inserted);
    return inserted;
  }

  find(head: T): EdgeRecord<T> | undefined {
    for (const record of this.records) {
      const c = this.ord.compare(record.head, head);
      if (c === 0) return record;
      if (c > 0) return undefined;
    }
    return undefined;
  }

  /** Unlink the edge to `head` and return it; undefined when there is none. */
  take(head: T): EdgeRecord<T> | undefined {
    for (let i = 0; i < this.records.length; i++) {
      const c = this.ord.compare(this.records[i].head, head);
      if (c === 0) return this.records.splice(i, 1)[0];
      if (c > 0) return undefined;
    }
    return undefined;
  }

  /** Unlink the edge to `head`; returns its weight, or 0 if there was none. */
  remove(head: T): number {
    return this.take(head)?.weight ?? 0;
  }

  clear(): void {
    this.records = [];
  }

  totalWeight(): number {
    let total = 0;
    for (const record of this.records) total += record.weight;
    return total;
  }

  /** Snapshot of the records, in head order. */
  toArray(): EdgeRecord<T>[] {
    return [...this.records];
  }

  [Symbol.iterator](): IterableIterator<EdgeRecord<T>> {
    return this.records[Symbol.iterator]();
  }
}
