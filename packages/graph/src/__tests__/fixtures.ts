import { AdjacencyGraph } from "../graph.js";
import { numberKeys } from "../keys.js";
import type { GraphKind, GraphOptions } from "../types.js";

/** Lets tests break invariants the public operations always maintain. */
export class CorruptibleGraph<T> extends AdjacencyGraph<T> {
  dropHalf(tail: T, head: T): void {
    this.store.find(tail)?.edges.remove(head);
  }

  setHalfWeight(tail: T, head: T, weight: number): void {
    const record = this.store.find(tail)?.edges.find(head);
    if (record) record.weight = weight;
  }

  /** Insert a single half without creating `head` as a vertex. */
  insertHalf(tail: T, head: T): void {
    this.store.vertex(tail).edges.insertOrMerge(head, 1, 1);
  }
}

export function corruptible(
  kind: GraphKind,
  edges: ReadonlyArray<readonly [number, number]>,
  options: GraphOptions = {}
): CorruptibleGraph<number> {
  const g = new CorruptibleGraph(kind, numberKeys, options);
  for (const [a, b] of edges) g.addEdge(a, b);
  return g;
}

/** Deterministic uniform source in [0, 1). */
export function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}
