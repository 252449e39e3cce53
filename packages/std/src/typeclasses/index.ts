/**
 * Standard Typeclasses
 *
 * Dictionary-passing typeclasses for the values graphfold uses as keys:
 * - Eq: equality (key identity)
 * - Ord: total ordering (edge list order)
 *
 * Hash and Show live beside this module in `hash.ts` and `show.ts`.
 */

// ============================================================================
// Eq: Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

// ============================================================================
// Ord: Haskell Ord, Rust Ord, Scala Ordering
// Types supporting total ordering.
// ============================================================================

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/**
 * Create an Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    compare,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

// NaN sorts after every other number and equals only itself, matching hashNumber.
export const ordNumber: Ord<number> = makeOrd<number>((a, b) => {
  if (Number.isNaN(a)) return Number.isNaN(b) ? EQ_ORD : GT;
  if (Number.isNaN(b)) return LT;
  return a < b ? LT : a > b ? GT : EQ_ORD;
});

export const ordBigInt: Ord<bigint> = makeOrd<bigint>((a, b) => (a < b ? LT : a > b ? GT : EQ_ORD));

// Code-unit order, not locale order: keys must sort the same everywhere.
export const ordString: Ord<string> = makeOrd<string>((a, b) => (a < b ? LT : a > b ? GT : EQ_ORD));

/**
 * Create an Ord instance by mapping to a comparable value.
 */
export function ordBy<A, B>(f: (a: A) => B, O: Ord<B>): Ord<A> {
  return {
    equals: (a, b) => O.equals(f(a), f(b)),
    notEquals: (a, b) => O.notEquals(f(a), f(b)),
    compare: (a, b) => O.compare(f(a), f(b)),
    lessThan: (a, b) => O.lessThan(f(a), f(b)),
    lessThanOrEqual: (a, b) => O.lessThanOrEqual(f(a), f(b)),
    greaterThan: (a, b) => O.greaterThan(f(a), f(b)),
    greaterThanOrEqual: (a, b) => O.greaterThanOrEqual(f(a), f(b)),
  };
}
