/**
 * Generic Numeric Operations
 *
 * Derived operations that work for ANY type with a Numeric, Integral, Fractional
 * or Ord instance, in dictionary-passing style.
 *
 * Functions that take an instance to do what a concrete helper would do on its
 * own carry a `With` suffix (`gcdWith`).
 *
 * @example
 * ```typescript
 * import { sum, gcdWith, numericBigInt, integralBigInt } from "@quotient/std";
 *
 * sum([1n, 2n, 3n], numericBigInt); // 6n
 * gcdWith(48n, 18n, numericBigInt, integralBigInt); // 6n
 * ```
 */

import type { Numeric, Integral, Fractional, Ord } from "./index.js";

// ============================================================================
// Aggregation Operations
// ============================================================================

/**
 * Sum all elements in an iterable.
 *
 * @returns The sum of all elements, or zero() if empty
 */
export function sum<A>(xs: Iterable<A>, N: Numeric<A>): A {
  let acc = N.zero();
  for (const x of xs) {
    acc = N.add(acc, x);
  }
  return acc;
}

/**
 * Multiply all elements in an iterable.
 *
 * @returns The product of all elements, or one() if empty
 */
export function product<A>(xs: Iterable<A>, N: Numeric<A>): A {
  let acc = N.one();
  for (const x of xs) {
    acc = N.mul(acc, x);
  }
  return acc;
}

// ============================================================================
// Exponentiation
// ============================================================================

/**
 * Raise base to a non-negative integer power using repeated squaring.
 *
 * @throws RangeError if exp is negative or not a safe integer
 */
export function pow<A>(base: A, exp: number, N: Numeric<A>): A {
  if (exp < 0 || !Number.isSafeInteger(exp)) {
    throw new RangeError(`pow: exponent must be a non-negative safe integer, got ${exp}`);
  }
  if (exp === 0) return N.one();
  if (exp === 1) return base;

  let result = N.one();
  let b = base;
  let e = exp;

  while (e > 0) {
    // Plain arithmetic: bitwise operators would truncate e to 32 bits
    if (e % 2 === 1) {
      result = N.mul(result, b);
    }
    e = Math.floor(e / 2);
    if (e > 0) {
      b = N.mul(b, b);
    }
  }

  return result;
}

/**
 * Raise base to an integer power; negative exponents go through `recip`.
 */
export function powFrac<A>(base: A, exp: number, N: Numeric<A>, F: Fractional<A>): A {
  if (exp >= 0) {
    return pow(base, exp, N);
  }
  return F.recip(pow(base, -exp, N));
}

// ============================================================================
// Number Theory (requires Integral)
// ============================================================================

/**
 * Greatest common divisor (Euclidean algorithm) of the absolute values.
 * gcd(0, 0) is zero.
 */
export function gcdWith<A>(a: A, b: A, N: Numeric<A>, I: Integral<A>): A {
  a = N.abs(a);
  b = N.abs(b);
  while (N.toNumber(b) !== 0) {
    const t = b;
    b = I.rem(a, b);
    a = t;
  }
  return a;
}

// ============================================================================
// Comparison-Based Operations
// ============================================================================

/**
 * Return the smaller of two values (the first on ties).
 */
export function min<A>(a: A, b: A, O: Ord<A>): A {
  return O.lessThanOrEqual(a, b) ? a : b;
}

/**
 * Return the larger of two values (the first on ties).
 */
export function max<A>(a: A, b: A, O: Ord<A>): A {
  return O.greaterThanOrEqual(a, b) ? a : b;
}

/**
 * Return the minimum element of a non-empty iterable.
 *
 * @throws RangeError if the iterable is empty
 */
export function minOf<A>(xs: Iterable<A>, O: Ord<A>): A {
  return extremum(xs, "minOf", (x, best) => O.lessThan(x, best));
}

/**
 * Return the maximum element of a non-empty iterable.
 *
 * @throws RangeError if the iterable is empty
 */
export function maxOf<A>(xs: Iterable<A>, O: Ord<A>): A {
  return extremum(xs, "maxOf", (x, best) => O.greaterThan(x, best));
}

function extremum<A>(xs: Iterable<A>, name: string, better: (x: A, best: A) => boolean): A {
  const it = xs[Symbol.iterator]();
  const first = it.next();
  if (first.done) {
    throw new RangeError(`${name}: empty iterable`);
  }
  let best = first.value;
  for (let next = it.next(); !next.done; next = it.next()) {
    if (better(next.value, best)) {
      best = next.value;
    }
  }
  return best;
}
