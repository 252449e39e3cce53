/**
 * Graph Error Types
 *
 * Precondition errors are caller bugs. Partial connections, weight mismatches
 * and integrity errors mean the adjacency lists were corrupted. Absent
 * vertices and edges are never errors.
 */

import type { IntegrityViolation } from "./types.js";

export type GraphErrorKind = "precondition" | "partial-connection" | "invariant";

/**
 * Base class for all graph errors.
 */
export class GraphError extends Error {
  constructor(
    message: string,
    public readonly kind: GraphErrorKind
  ) {
    super(message);
    this.name = "GraphError";
  }
}

/**
 * Thrown when an operation is called with arguments it does not accept.
 */
export class PreconditionError extends GraphError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when an edge would join a vertex to itself.
 */
export class SelfLoopError extends PreconditionError {
  constructor(public readonly vertex: unknown, rendered: string) {
    super(`Self-loop on vertex ${rendered} is not allowed`);
    this.name = "SelfLoopError";
  }
}

/**
 * Thrown for a weight that is not a positive integer or a distance that is
 * not finite.
 */
export class InvalidEdgeError extends PreconditionError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEdgeError";
  }
}

/**
 * Thrown when only one endpoint of an undirected pair lists the other.
 */
export class PartialConnectionError extends GraphError {
  constructor(
    public readonly tail: unknown,
    public readonly head: unknown,
    rendered: string
  ) {
    super(`Vertices ${rendered} are only partially connected`, "partial-connection");
    this.name = "PartialConnectionError";
  }
}

/**
 * Thrown when the two halves of an undirected edge carry different weights.
 */
export class WeightMismatchError extends GraphError {
  constructor(
    public readonly tail: unknown,
    public readonly head: unknown,
    public readonly weight: number,
    public readonly mirrorWeight: number,
    rendered: string
  ) {
    super(`Edge ${rendered} has weight ${weight} but its mirror has ${mirrorWeight}`, "invariant");
    this.name = "WeightMismatchError";
  }
}

/**
 * Thrown by graphs with `verifyMutations` on when a mutation leaves a broken
 * invariant behind.
 */
export class IntegrityError extends GraphError {
  constructor(
    public readonly operation: string,
    public readonly violation: IntegrityViolation<unknown>
  ) {
    super(`Integrity check failed after ${operation}: ${violation.kind}`, "invariant");
    this.name = "IntegrityError";
  }
}
