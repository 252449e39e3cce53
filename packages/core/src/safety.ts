/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)`: runtime assertion
 * - `unreachable(value)`: mark impossible code paths
 *
 * @example
 * ```typescript
 * type Kind = "directed" | "undirected";
 * function halves(kind: Kind): number {
 *   switch (kind) {
 *     case "directed": return 1;
 *     case "undirected": return 2;
 *     default: return unreachable(kind); // Type error if Kind is extended
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param value - A value of type `never` (for type-level exhaustiveness)
 * @throws Error always
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${String(value)}`);
}
