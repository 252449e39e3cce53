/**
 * Hash typeclass and primitive instances.
 *
 * Hashes are 32-bit integers for bucketing, not cryptographic digests.
 * Every instance must agree with the Eq/Ord instance used beside it:
 * `equals(a, b)` implies `hash(a) === hash(b)`.
 */

export interface Hash<A> {
  hash(a: A): number;
}

export const hashString: Hash<string> = {
  hash: (a) => {
    // djb2
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0;
  },
};

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) {
      return a | 0;
    }
    return hashString.hash(String(a));
  },
};

export const hashBigInt: Hash<bigint> = {
  hash: (a) => hashString.hash(a.toString()),
};

/**
 * Create a Hash instance by mapping to a hashable value.
 */
export function hashBy<A, B>(f: (a: A) => B, H: Hash<B>): Hash<A> {
  return {
    hash: (a) => H.hash(f(a)),
  };
}
