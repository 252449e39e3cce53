import type { Hash, Ord, Show } from "@graphfold/std";
import type { DistancePolicy, Logger } from "@graphfold/core";

/** Whether edges are one-directional or logically symmetric. */
export type GraphKind = "directed" | "undirected";

/**
 * Typeclass instances that give a key type its identity, order and rendering.
 * `ord.equals` and `hash.hash` must agree.
 */
export interface KeyInstances<T> {
  readonly ord: Ord<T>;
  readonly hash: Hash<T>;
  readonly show?: Show<T>;
}

/** A copy of one adjacency. Mutating it never touches the graph. */
export interface Edge<T> {
  readonly tail: T;
  readonly head: T;
  /** Number of parallel edges merged into this one. */
  readonly weight: number;
  readonly distance: number;
}

/** `[tail, head, weight?, distance?]`, as accepted by the graph factories. */
export type EdgeTuple<T> = readonly [tail: T, head: T, weight?: number, distance?: number];

/**
 * Result of checking both halves of an undirected pair.
 * "partial" means exactly one endpoint lists the other.
 */
export type ConnectionStatus = "connected" | "disconnected" | "partial";

export interface GraphOptions {
  /** Overrides `graph.distancePolicy` from configuration. */
  readonly distancePolicy?: DistancePolicy;
  /** Overrides `graph.verifyMutations` from configuration. */
  readonly verifyMutations?: boolean;
  readonly logger?: Logger;
}

/** One broken structural invariant found by an integrity check. */
export type IntegrityViolation<T> =
  | { readonly kind: "self-loop"; readonly vertex: T }
  | { readonly kind: "unsorted"; readonly vertex: T; readonly previous: T; readonly head: T }
  | { readonly kind: "duplicate-head"; readonly vertex: T; readonly head: T }
  | { readonly kind: "dangling-head"; readonly vertex: T; readonly head: T }
  | { readonly kind: "invalid-weight"; readonly vertex: T; readonly head: T; readonly weight: number }
  | { readonly kind: "asymmetric"; readonly tail: T; readonly head: T }
  | {
      readonly kind: "weight-mismatch";
      readonly tail: T;
      readonly head: T;
      readonly weight: number;
      readonly mirrorWeight: number;
    };

export interface IntegrityReport<T> {
  readonly valid: boolean;
  readonly violations: ReadonlyArray<IntegrityViolation<T>>;
}
