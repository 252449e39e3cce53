/**
 * @graphfold/std: typeclasses for graph keys.
 *
 * Graph keys carry no identity of their own; an Ord supplies equality and
 * ordering, a Hash supplies bucketing, and an optional Show supplies
 * rendering.
 *
 * @example
 * ```ts
 * import { ordBy, ordNumber, hashBy, hashNumber } from "@graphfold/std";
 *
 * interface Cell { readonly id: number }
 * const ordCell = ordBy((c: Cell) => c.id, ordNumber);
 * const hashCell = hashBy((c: Cell) => c.id, hashNumber);
 * ```
 */

export type { Eq, Ord, Ordering } from "./typeclasses/index.js";
export {
  eqNumber,
  eqString,
  LT,
  EQ_ORD,
  GT,
  makeOrd,
  ordNumber,
  ordBigInt,
  ordString,
  ordBy,
} from "./typeclasses/index.js";

export type { Hash } from "./typeclasses/hash.js";
export { hashString, hashNumber, hashBigInt, hashBy } from "./typeclasses/hash.js";

export type { Show } from "./typeclasses/show.js";
export { showNumber, showString, showBigInt } from "./typeclasses/show.js";
