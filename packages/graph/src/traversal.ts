/**
 * Traversal Engine
 *
 * Both searches mark vertices through the `visited` flag of their records and
 * clear every flag before returning, so a traversal leaves the graph exactly
 * as it found it. Neighbours are always taken in ascending key order.
 */

import { invariant } from "@graphfold/core";
import type { EdgeRecord } from "./edge-list.js";
import type { VertexRecord, VertexStore } from "./vertex-store.js";

function headRecord<T>(store: VertexStore<T>, edge: EdgeRecord<T>): VertexRecord<T> {
  const record = store.find(edge.head);
  invariant(record !== undefined, "Edge points at a vertex missing from the store");
  return record;
}

/** Breadth-first search from `start`, returning keys in discovery order. */
export function breadthFirst<T>(store: VertexStore<T>, start: T): T[] {
  const root = store.find(start);
  if (!root) return [];

  const order: T[] = [];
  try {
    root.visited = true;
    const queue: VertexRecord<T>[] = [root];
    for (let i = 0; i < queue.length; i++) {
      const vertex = queue[i];
      order.push(vertex.key);
      for (const edge of vertex.edges) {
        const next = headRecord(store, edge);
        if (!next.visited) {
          next.visited = true;
          queue.push(next);
        }
      }
    }
  } finally {
    store.resetVisited();
  }
  return order;
}

interface Frame<T> {
  readonly vertex: VertexRecord<T>;
  readonly pending: Iterator<EdgeRecord<T>>;
}

/**
 * Depth-first search from each root in turn, sharing visited flags across
 * roots. Roots already reached, and roots that are not vertices, start no
 * tree. Each tree lists its keys in finishing order: a vertex is appended
 * once none of its neighbours is left unvisited.
 */
export function depthFirstForest<T>(store: VertexStore<T>, roots: Iterable<T>): T[][] {
  const forest: T[][] = [];
  try {
    for (const key of roots) {
      const root = store.find(key);
      if (!root || root.visited) continue;

      const finished: T[] = [];
      root.visited = true;
      const stack: Frame<T>[] = [{ vertex: root, pending: root.edges[Symbol.iterator]() }];

      while (stack.length > 0) {
        const top = stack[stack.length - 1];
        let next: VertexRecord<T> | undefined;
        for (let step = top.pending.next(); !step.done; step = top.pending.next()) {
          const candidate = headRecord(store, step.value);
          if (!candidate.visited) {
            next = candidate;
            break;
          }
        }

        if (next) {
          next.visited = true;
          stack.push({ vertex: next, pending: next.edges[Symbol.iterator]() });
        } else {
          finished.push(top.vertex.key);
          stack.pop();
        }
      }
      forest.push(finished);
    }
  } finally {
    store.resetVisited();
  }
  return forest;
}

/** Depth-first search from `start`, returning keys in finishing order. */
export function depthFirst<T>(store: VertexStore<T>, start: T): T[] {
  return depthFirstForest(store, [start])[0] ?? [];
}
