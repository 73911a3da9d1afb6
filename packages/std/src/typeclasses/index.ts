/**
 * Standard Typeclasses
 *
 * The dictionary-passing interfaces every numeric type in quotient implements:
 * - Eq, Ord (Haskell Eq/Ord, Rust PartialEq/Ord)
 * - Numeric, Integral, Fractional (Haskell Num/Integral/Fractional)
 * - Bounded (Haskell Bounded)
 * - Printable, Parseable (Rust Display/FromStr)
 *
 * Methods that stand for an operator say so with an Op<> annotation on their
 * return type.
 */

import type { Op } from "@quotient/core";

// ============================================================================
// Eq - Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison with operator support.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean & Op<"===">;
  notEquals(a: A, b: A): boolean & Op<"!==">;
}

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

/**
 * Create an Eq instance from an equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

// ============================================================================
// Ord - Haskell Ord, Rust Ord, Scala Ordering
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
 * Ord typeclass - total ordering with operator support.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean & Op<"<">;
  lessThanOrEqual(a: A, b: A): boolean & Op<"<=">;
  greaterThan(a: A, b: A): boolean & Op<">">;
  greaterThanOrEqual(a: A, b: A): boolean & Op<">=">;
}

export const ordBigInt: Ord<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

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

// ============================================================================
// Bounded - Haskell Bounded
// Types with a minimum and maximum value.
// ============================================================================

export interface Bounded<A> {
  minBound(): A;
  maxBound(): A;
}

/**
 * Bounded instance for a closed bigint range.
 */
export function boundedBigIntRange(min: bigint, max: bigint): Bounded<bigint> {
  return {
    minBound: () => min,
    maxBound: () => max,
  };
}

// ============================================================================
// Numeric - Haskell Num, Scala Numeric
// Types supporting basic arithmetic.
// ============================================================================

/**
 * Numeric typeclass - the Ring abstraction: add, sub, mul with identities.
 *
 * Operators dispatch via Op<> annotations:
 * - `a + b` → `Numeric.add(a, b)`
 * - `a - b` → `Numeric.sub(a, b)`
 * - `a * b` → `Numeric.mul(a, b)`
 */
export interface Numeric<A> {
  add(a: A, b: A): A & Op<"+">;
  sub(a: A, b: A): A & Op<"-">;
  mul(a: A, b: A): A & Op<"*">;
  div(a: A, b: A): A & Op<"/">;
  pow(a: A, b: A): A & Op<"**">;
  negate(a: A): A;
  abs(a: A): A;
  signum(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
  zero(): A;
  one(): A;
}

export const numericBigInt: Numeric<bigint> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  pow: (a, b) => a ** b,
  negate: (a) => -a,
  abs: (a) => (a < 0n ? -a : a),
  signum: (a) => (a < 0n ? -1n : a > 0n ? 1n : 0n),
  fromNumber: (n) => BigInt(Math.trunc(n)),
  toNumber: (a) => Number(a),
  zero: () => 0n,
  one: () => 1n,
};

// ============================================================================
// Integral - Haskell Integral
// Integer-like types supporting division and modulo.
// ============================================================================

/**
 * Integral typeclass - the Euclidean Ring abstraction.
 *
 * - `div`/`mod` floor toward negative infinity
 * - `quot`/`rem` truncate toward zero
 */
export interface Integral<A> {
  div(a: A, b: A): A & Op<"/">;
  mod(a: A, b: A): A & Op<"%">;
  divMod(a: A, b: A): [A, A];
  quot(a: A, b: A): A;
  rem(a: A, b: A): A;
  toInteger(a: A): bigint;
}

export const integralBigInt: Integral<bigint> = {
  div: (a, b) => {
    const d = a / b;
    return a < 0n !== b < 0n && a % b !== 0n ? d - 1n : d;
  },
  mod: (a, b) => ((a % b) + b) % b,
  divMod: (a, b) => {
    const d = integralBigInt.div(a, b);
    return [d, a - d * b];
  },
  quot: (a, b) => a / b,
  rem: (a, b) => a % b,
  toInteger: (a) => a,
};

// ============================================================================
// Fractional - Haskell Fractional
// Types supporting real division.
// ============================================================================

/**
 * Fractional typeclass - the Field abstraction.
 */
export interface Fractional<A> {
  div(a: A, b: A): A & Op<"/">;
  recip(a: A): A;
  fromRational(num: number, den: number): A;
}

// ============================================================================
// Parseable - Haskell Read, Rust FromStr
// Types that can be parsed from a string.
// ============================================================================

export type ParseResult<A> = { ok: true; value: A; rest: string } | { ok: false; error: string };

export interface Parseable<A> {
  parse(s: string): ParseResult<A>;
}

export const parseableBigInt: Parseable<bigint> = {
  parse: (s) => {
    const match = /^\s*([+-]?\d+)/.exec(s);
    if (!match) {
      return { ok: false, error: `Cannot parse '${s.trim()}' as bigint` };
    }
    return { ok: true, value: BigInt(match[1]), rest: s.slice(match[0].length) };
  },
};

// ============================================================================
// Printable - Rust Display, Haskell Show (human-readable)
// ============================================================================

export interface Printable<A> {
  display(a: A): string;
}

export const printableBigInt: Printable<bigint> = {
  display: (a) => a.toString(),
};

// Generic derived operations
export * from "./numeric-ops.js";
