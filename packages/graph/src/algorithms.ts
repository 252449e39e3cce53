import { HashMap } from "@graphfold/collections";
import { createLogger, invariant } from "@graphfold/core";
import { PreconditionError } from "./errors.js";
import type { AdjacencyGraph } from "./graph.js";

const log = createLogger("algorithms");

/**
 * Strongly connected components (Kosaraju).
 *
 * A depth-first forest over every vertex yields a finishing order; a second
 * forest over the reversed graph, rooted in reverse finishing order, has one
 * tree per component. Components are listed in the order the second pass
 * finds them, each in its own finishing order.
 *
 * On an undirected graph this yields the connected components.
 */
export function stronglyConnectedComponents<T>(graph: AdjacencyGraph<T>): T[][] {
  const finished = graph.depthFirstForest(graph.vertices()).flat();
  return graph.reverse().depthFirstForest(finished.reverse());
}

export interface MinCutOptions {
  /** Contraction runs to try; defaults to the square of the vertex count. */
  readonly trials?: number;
  /** Uniform source in [0, 1); defaults to Math.random. */
  readonly random?: () => number;
}

export interface MinCut<T> {
  /** Total weight of the edges crossing the cut. */
  readonly weight: number;
  /** The two vertex sets, each sorted, ordered by their smallest key. */
  readonly sides: readonly [T[], T[]];
}

/**
 * Randomised global minimum cut (Karger) of an undirected graph.
 *
 * Each trial contracts a clone, choosing edges with probability proportional
 * to their weight, until two groups remain; the lightest cut over all trials
 * wins. The input graph is never modified.
 *
 * @throws PreconditionError for a directed graph, fewer than two vertices, or
 *   a trial count that is not a positive integer
 */
export function minCut<T>(graph: AdjacencyGraph<T>, options: MinCutOptions = {}): MinCut<T> {
  if (graph.directed) {
    throw new PreconditionError("Minimum cut needs an undirected graph");
  }
  const vertices = graph.vertices();
  if (vertices.length < 2) {
    throw new PreconditionError(`Minimum cut needs at least 2 vertices, got ${vertices.length}`);
  }
  const trials = options.trials ?? vertices.length * vertices.length;
  if (!Number.isInteger(trials) || trials < 1) {
    throw new PreconditionError(`Trial count must be a positive integer, got ${trials}`);
  }
  const random = options.random ?? Math.random;

  const reached = graph.breadthFirstSearch(vertices[0]);
  if (reached.length < vertices.length) {
    const inside = new HashMap<T, true>(graph.keys.ord, graph.keys.hash);
    for (const key of reached) inside.set(key, true);
    return normalise(graph, 0, reached, vertices.filter((key) => !inside.has(key)));
  }

  let best: MinCut<T> | undefined;
  for (let trial = 0; trial < trials; trial++) {
    const cut = contract(graph, random);
    if (!best || cut.weight < best.weight) {
      log.debug("lighter cut", { trial, weight: cut.weight });
      best = cut;
    }
  }
  invariant(best !== undefined, "At least one trial runs");
  return best;
}

function contract<T>(graph: AdjacencyGraph<T>, random: () => number): MinCut<T> {
  const work = graph.clone();
  const members = new HashMap<T, T[]>(graph.keys.ord, graph.keys.hash);
  for (const key of work.vertices()) members.set(key, [key]);

  let live = work.nonEmptyVertices();
  while (live.length > 2) {
    const [tail, head] = pickEdge(work, live, random);
    work.collapse(head, tail);
    members.getOrInsertWith(tail, () => []).push(...(members.get(head) ?? []));
    members.delete(head);
    live = work.nonEmptyVertices();
  }

  invariant(live.length === 2, "A connected graph contracts to two groups");
  const [left, right] = live;
  return normalise(graph, work.totalWeight(), members.get(left) ?? [], members.get(right) ?? []);
}

/** Choose an edge with probability proportional to its weight. */
function pickEdge<T>(graph: AdjacencyGraph<T>, live: readonly T[], random: () => number): [T, T] {
  let total = 0;
  for (const key of live) {
    for (const edge of graph.edges(key)) total += edge.weight;
  }

  let remaining = Math.floor(random() * total);
  for (const key of live) {
    for (const edge of graph.edges(key)) {
      if (remaining < edge.weight) return [edge.tail, edge.head];
      remaining -= edge.weight;
    }
  }
  throw new PreconditionError("Random source returned a value outside [0, 1)");
}

function normalise<T>(graph: AdjacencyGraph<T>, weight: number, a: T[], b: T[]): MinCut<T> {
  const { ord } = graph.keys;
  const left = [...a].sort((x, y) => ord.compare(x, y));
  const right = [...b].sort((x, y) => ord.compare(x, y));
  const sides: [T[], T[]] = ord.lessThan(left[0], right[0]) ? [left, right] : [right, left];
  return { weight, sides };
}
