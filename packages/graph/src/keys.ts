import {
  hashBigInt,
  hashBy,
  hashNumber,
  hashString,
  ordBigInt,
  ordBy,
  ordNumber,
  ordString,
  showBigInt,
  showNumber,
  showString,
} from "@graphfold/std";
import type { KeyInstances } from "./types.js";

export const numberKeys: KeyInstances<number> = {
  ord: ordNumber,
  hash: hashNumber,
  show: showNumber,
};

export const stringKeys: KeyInstances<string> = {
  ord: ordString,
  hash: hashString,
  show: showString,
};

export const bigintKeys: KeyInstances<bigint> = {
  ord: ordBigInt,
  hash: hashBigInt,
  show: showBigInt,
};

/**
 * Key instances for a type identified by one of its fields.
 *
 * @example
 * ```ts
 * interface Host { readonly name: string; readonly zone: string }
 * const hostKeys = keysBy((h: Host) => h.name, stringKeys);
 * ```
 */
export function keysBy<A, B>(f: (a: A) => B, base: KeyInstances<B>): KeyInstances<A> {
  const show = base.show;
  return {
    ord: ordBy(f, base.ord),
    hash: hashBy(f, base.hash),
    ...(show !== undefined ? { show: { show: (a: A) => show.show(f(a)) } } : {}),
  };
}
