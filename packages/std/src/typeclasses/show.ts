/** Show typeclass: human-readable rendering, used by diagnostic dumps. */
export interface Show<A> {
  show(a: A): string;
}

export const showNumber: Show<number> = {
  show: (a) => String(a),
};

export const showString: Show<string> = {
  show: (a) => a,
};

export const showBigInt: Show<bigint> = {
  show: (a) => `${a}n`,
};
