import { config, createLogger, type DistancePolicy, type Logger } from "@graphfold/core";
import type { EdgeRecord } from "./edge-list.js";
import {
  IntegrityError,
  InvalidEdgeError,
  PartialConnectionError,
  PreconditionError,
  SelfLoopError,
  WeightMismatchError,
} from "./errors.js";
import { renderDump } from "./dump.js";
import { inspectStore } from "./integrity.js";
import { breadthFirst, depthFirst, depthFirstForest } from "./traversal.js";
import type {
  ConnectionStatus,
  Edge,
  EdgeTuple,
  GraphKind,
  GraphOptions,
  IntegrityReport,
  KeyInstances,
} from "./types.js";
import { VertexStore } from "./vertex-store.js";

const defaultLogger = createLogger("graph");

/**
 * A weighted multigraph over keys of type `T`, stored as sorted adjacency
 * lists, that supports merging one vertex into another.
 *
 * Undirected graphs keep every edge as two directed halves, one in each
 * endpoint's list, always with equal weights. Vertices appear the first time
 * they are an endpoint and are never removed.
 *
 * @example
 * ```ts
 * const g = createGraph(numberKeys, [[1, 2], [2, 3], [1, 3]]);
 * g.collapse(1, 2);
 * g.edge(2, 3)?.weight; // 2
 * ```
 */
export class AdjacencyGraph<T> {
  protected readonly store: VertexStore<T>;
  private readonly distancePolicy: DistancePolicy;
  private readonly verifyMutations: boolean;
  private readonly log: Logger;

  constructor(
    readonly kind: GraphKind,
    readonly keys: KeyInstances<T>,
    private readonly options: GraphOptions = {}
  ) {
    this.store = new VertexStore(keys);
    this.distancePolicy = options.distancePolicy ?? config.distancePolicy();
    this.verifyMutations = options.verifyMutations ?? config.has("graph.verifyMutations");
    this.log = options.logger ?? defaultLogger;
  }

  get directed(): boolean {
    return this.kind === "directed";
  }

  /** Number of vertices, including ones left without edges. */
  get size(): number {
    return this.store.size;
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  hasVertex(key: T): boolean {
    return this.store.lookup(key) !== undefined;
  }

  /** All vertex keys, in the order the vertices were created. */
  vertices(): T[] {
    return this.store.keyList();
  }

  /** Keys of the vertices that still have at least one outgoing edge. */
  nonEmptyVertices(): T[] {
    const keys: T[] = [];
    for (const vertex of this.store) {
      if (vertex.edges.length > 0) keys.push(vertex.key);
    }
    return keys;
  }

  /** Outgoing edges of `key` in ascending head order; [] for an unknown key. */
  edges(key: T): Edge<T>[] {
    const vertex = this.store.find(key);
    if (!vertex) return [];
    return vertex.edges.toArray().map((record) => this.toEdge(key, record));
  }

  edge(tail: T, head: T): Edge<T> | undefined {
    const record = this.store.find(tail)?.edges.find(head);
    return record ? this.toEdge(tail, record) : undefined;
  }

  /** Number of distinct adjacencies; an undirected pair counts once. */
  countEdge(): number {
    let count = 0;
    for (const vertex of this.store) count += vertex.edges.length;
    return this.directed ? count : count / 2;
  }

  /** Sum of edge weights; an undirected pair counts once. */
  totalWeight(): number {
    let total = 0;
    for (const vertex of this.store) total += vertex.edges.totalWeight();
    return this.directed ? total : total / 2;
  }

  // --------------------------------------------------------------------------
  // Connectivity
  // --------------------------------------------------------------------------

  /**
   * Non-throwing connectivity check. A key is always connected to itself;
   * unknown keys are disconnected from everything else.
   */
  connectionStatus(a: T, b: T): ConnectionStatus {
    if (this.keys.ord.equals(a, b)) return "connected";
    const forward = this.hasHalf(a, b);
    if (this.directed) return forward ? "connected" : "disconnected";
    const backward = this.hasHalf(b, a);
    if (forward && backward) return "connected";
    return forward || backward ? "partial" : "disconnected";
  }

  /**
   * @throws PartialConnectionError if only one half of an undirected edge exists
   */
  isConnected(a: T, b: T): boolean {
    const status = this.connectionStatus(a, b);
    if (status === "partial") {
      throw new PartialConnectionError(a, b, this.renderPair(a, b));
    }
    return status === "connected";
  }

  /**
   * Connect two distinct vertices, creating them if needed.
   *
   * @returns false, leaving the graph untouched, if they were already connected
   */
  connect(a: T, b: T, weight = 1, distance = 1): boolean {
    this.checkEdge(a, b, weight, distance);
    if (this.isConnected(a, b)) return false;
    this.insertHalves(a, b, weight, distance);
    this.log.debug("connect", { tail: this.render(a), head: this.render(b), weight, distance });
    this.afterMutation("connect");
    return true;
  }

  /**
   * Add a parallel edge: merges into an existing edge by adding `weight`, or
   * creates the edge.
   *
   * @returns the weight of the edge afterwards
   */
  addEdge(a: T, b: T, weight = 1, distance = 1): number {
    this.checkEdge(a, b, weight, distance);
    const merged = this.insertHalves(a, b, weight, distance);
    this.log.debug("addEdge", { tail: this.render(a), head: this.render(b), weight: merged });
    this.afterMutation("addEdge");
    return merged;
  }

  /**
   * Remove the edge between `a` and `b` (both halves when undirected).
   *
   * @returns the removed weight, 0 if there was no edge
   * @throws WeightMismatchError if the undirected halves disagree
   */
  disconnect(a: T, b: T): number {
    const removed = this.detach(a, b);
    if (removed > 0) {
      this.log.debug("disconnect", { tail: this.render(a), head: this.render(b), weight: removed });
    }
    this.afterMutation("disconnect");
    return removed;
  }

  // --------------------------------------------------------------------------
  // Contraction
  // --------------------------------------------------------------------------

  /**
   * Merge `src` into `dst`: every edge of `src` is rerouted to `dst`, merging
   * with edges `dst` already has, and `src` is left without edges. Edges
   * between the two would become self-loops and are dropped.
   *
   * @returns the dropped weight
   * @throws PreconditionError if `src` and `dst` are the same key
   */
  collapse(src: T, dst: T): number {
    if (this.keys.ord.equals(src, dst)) {
      throw new PreconditionError(`Cannot collapse vertex ${this.render(src)} into itself`);
    }
    const source = this.store.find(src);
    if (!source) {
      this.log.debug("collapse skipped: unknown source", { src: this.render(src) });
      return 0;
    }
    const target = this.store.vertex(dst);

    let dropped: number;
    if (this.directed) {
      dropped = source.edges.remove(dst) + target.edges.remove(src);
      for (const edge of source.edges.toArray()) {
        target.edges.insertOrMerge(edge.head, edge.weight, edge.distance, this.distancePolicy);
      }
      for (const vertex of this.store) {
        if (vertex === source) continue;
        const incoming = vertex.edges.take(src);
        if (incoming) {
          vertex.edges.insertOrMerge(dst, incoming.weight, incoming.distance, this.distancePolicy);
        }
      }
    } else {
      dropped = this.detach(src, dst);
      for (const edge of source.edges.toArray()) {
        const neighbour = this.store.vertex(edge.head);
        const back = neighbour.edges.take(src);
        if (back) {
          neighbour.edges.insertOrMerge(dst, back.weight, back.distance, this.distancePolicy);
        }
        target.edges.insertOrMerge(edge.head, edge.weight, edge.distance, this.distancePolicy);
      }
    }
    source.edges.clear();

    this.log.debug("collapse", { src: this.render(src), dst: this.render(dst), dropped });
    this.afterMutation("collapse");
    return dropped;
  }

  // --------------------------------------------------------------------------
  // Traversal
  // --------------------------------------------------------------------------

  /** Keys reachable from `start` in breadth-first discovery order, start first. */
  breadthFirstSearch(start: T): T[] {
    return breadthFirst(this.store, start);
  }

  /**
   * Keys reachable from `start` in depth-first finishing order: each vertex
   * comes after every vertex first reached through it, so `start` is last.
   */
  depthFirstSearch(start: T): T[] {
    return depthFirst(this.store, start);
  }

  /**
   * One depth-first tree per root not reached by an earlier root, each in
   * finishing order.
   */
  depthFirstForest(roots: Iterable<T>): T[][] {
    return depthFirstForest(this.store, roots);
  }

  /** A new graph of the same kind with every edge pointing the other way. */
  reverse(): AdjacencyGraph<T> {
    return this.copy(true);
  }

  clone(): AdjacencyGraph<T> {
    return this.copy(false);
  }

  // --------------------------------------------------------------------------
  // Diagnostics
  // --------------------------------------------------------------------------

  dump(): string {
    return renderDump(this.store, (key) => this.render(key));
  }

  verify(): IntegrityReport<T> {
    return inspectStore(this.store, this.kind, this.keys.ord);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private render(key: T): string {
    return this.keys.show ? this.keys.show.show(key) : String(key);
  }

  private renderPair(a: T, b: T): string {
    return `${this.render(a)} -> ${this.render(b)}`;
  }

  private toEdge(tail: T, record: EdgeRecord<T>): Edge<T> {
    return { tail, head: record.head, weight: record.weight, distance: record.distance };
  }

  private hasHalf(tail: T, head: T): boolean {
    return this.store.find(tail)?.edges.find(head) !== undefined;
  }

  private checkEdge(a: T, b: T, weight: number, distance: number): void {
    if (this.keys.ord.equals(a, b)) {
      throw new SelfLoopError(a, this.render(a));
    }
    if (!Number.isInteger(weight) || weight <= 0) {
      throw new InvalidEdgeError(`Edge ${this.renderPair(a, b)} needs a positive integer weight, got ${weight}`);
    }
    if (!Number.isFinite(distance)) {
      throw new InvalidEdgeError(`Edge ${this.renderPair(a, b)} needs a finite distance, got ${distance}`);
    }
  }

  /** Insert or merge a→b, and b→a when undirected. Returns the a→b weight. */
  private insertHalves(a: T, b: T, weight: number, distance: number): number {
    const tail = this.store.vertex(a);
    const head = this.store.vertex(b);
    const record = tail.edges.insertOrMerge(b, weight, distance, this.distancePolicy);
    if (!this.directed) {
      head.edges.insertOrMerge(a, weight, distance, this.distancePolicy);
    }
    return record.weight;
  }

  /**
   * Remove a→b, and b→a when undirected. Undirected halves are compared
   * before anything is unlinked, so a mismatch leaves both in place.
   */
  private detach(a: T, b: T): number {
    const tail = this.store.find(a);
    if (this.directed) return tail ? tail.edges.remove(b) : 0;

    const head = this.store.find(b);
    const forward = tail?.edges.find(b)?.weight ?? 0;
    const backward = head?.edges.find(a)?.weight ?? 0;
    if (forward !== backward) {
      throw new WeightMismatchError(a, b, forward, backward, this.renderPair(a, b));
    }
    if (forward === 0) return 0;
    tail?.edges.remove(b);
    head?.edges.remove(a);
    return forward;
  }

  private copy(flip: boolean): AdjacencyGraph<T> {
    const result = new AdjacencyGraph(this.kind, this.keys, this.options);
    for (const vertex of this.store) result.store.ensure(vertex.key);
    for (const vertex of this.store) {
      for (const edge of vertex.edges) {
        const [tail, head] = flip ? [edge.head, vertex.key] : [vertex.key, edge.head];
        result.store.vertex(tail).edges.insertOrMerge(head, edge.weight, edge.distance);
      }
    }
    return result;
  }

  private afterMutation(operation: string): void {
    if (!this.verifyMutations) return;
    const report = this.verify();
    if (!report.valid) {
      const [violation] = report.violations;
      this.log.error(`integrity check failed after ${operation}`, { violation: violation.kind });
      throw new IntegrityError(operation, violation);
    }
  }
}

function build<T>(
  kind: GraphKind,
  keys: KeyInstances<T>,
  edges: Iterable<EdgeTuple<T>>,
  options: GraphOptions
): AdjacencyGraph<T> {
  const graph = new AdjacencyGraph(kind, keys, options);
  for (const [tail, head, weight, distance] of edges) {
    graph.addEdge(tail, head, weight, distance);
  }
  return graph;
}

/** Create a directed graph from `[tail, head, weight?, distance?]` tuples. */
export function createDigraph<T>(
  keys: KeyInstances<T>,
  edges: Iterable<EdgeTuple<T>> = [],
  options: GraphOptions = {}
): AdjacencyGraph<T> {
  return build("directed", keys, edges, options);
}

/** Create an undirected graph from `[tail, head, weight?, distance?]` tuples. */
export function createGraph<T>(
  keys: KeyInstances<T>,
  edges: Iterable<EdgeTuple<T>> = [],
  options: GraphOptions = {}
): AdjacencyGraph<T> {
  return build("undirected", keys, edges, options);
}

/** Non-throwing whole-graph check of every structural invariant. */
export function verifyIntegrity<T>(graph: AdjacencyGraph<T>): IntegrityReport<T> {
  return graph.verify();
}
