/**
 * @graphfold/graph
 *
 * Weighted adjacency-list graphs with vertex contraction.
 *
 * @example
 * ```typescript
 * import { createGraph, numberKeys, minCut } from "@graphfold/graph";
 *
 * const g = createGraph(numberKeys, [[1, 2], [2, 3], [3, 1], [3, 4]]);
 * g.breadthFirstSearch(1); // [1, 2, 3, 4]
 * minCut(g).weight;        // 1
 * ```
 */

export type {
  GraphKind,
  KeyInstances,
  Edge,
  EdgeTuple,
  ConnectionStatus,
  GraphOptions,
  IntegrityViolation,
  IntegrityReport,
} from "./types.js";

export { AdjacencyGraph, createDigraph, createGraph, verifyIntegrity } from "./graph.js";

export { numberKeys, stringKeys, bigintKeys, keysBy } from "./keys.js";

export {
  GraphError,
  PreconditionError,
  SelfLoopError,
  InvalidEdgeError,
  PartialConnectionError,
  WeightMismatchError,
  IntegrityError,
  type GraphErrorKind,
} from "./errors.js";

export {
  stronglyConnectedComponents,
  minCut,
  type MinCut,
  type MinCutOptions,
} from "./algorithms.js";

export { EdgeList, mergeDistance, type EdgeRecord } from "./edge-list.js";
export { VertexStore, type VertexRecord } from "./vertex-store.js";
