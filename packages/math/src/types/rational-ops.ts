/**
 * Free operators over rationals
 *
 * Binary arithmetic takes two rationals of any kinds (the result has the wider
 * kind) or a rational and a scalar in either position (the result has the
 * rational's kind). Operands are never mutated.
 *
 * Comparisons cross-multiply in unbounded bigint arithmetic, so they are exact
 * and never overflow, whatever the kinds involved.
 *
 * @example
 * ```typescript
 * add(rational(1, 2, "int8"), rational(1, 3, "int32")); // 5/6 as int32
 * sub(3, rational(1, 2));                                // 5/2
 * lessThan(rational(1, 3), rational(1, 2));              // true
 * ```
 */

import { unreachable } from "@quotient/core";
import { EQ_ORD, GT, LT, type Ordering } from "@quotient/std";
import { largestKind, toBigInt, type IntKind, type IntLike, type LargestType } from "./int-kind.js";
import { Rational, type RationalLike } from "./rational.js";

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * A fresh rational holding the left operand in the kind of the result.
 */
function leftOperand(a: RationalLike, b: RationalLike): Rational<IntKind> {
  if (a instanceof Rational) {
    return b instanceof Rational ? a.to(largestKind(a.kind, b.kind)) : a.clone();
  }
  if (b instanceof Rational) {
    return new Rational(b.kind, a);
  }
  return unreachable();
}

export function add<A extends IntKind, B extends IntKind>(a: Rational<A>, b: Rational<B>): Rational<LargestType<A, B>>;
export function add<A extends IntKind>(a: Rational<A>, b: IntLike): Rational<A>;
export function add<B extends IntKind>(a: IntLike, b: Rational<B>): Rational<B>;
export function add(a: RationalLike, b: RationalLike): Rational<IntKind> {
  return leftOperand(a, b).addAssign(b);
}

export function sub<A extends IntKind, B extends IntKind>(a: Rational<A>, b: Rational<B>): Rational<LargestType<A, B>>;
export function sub<A extends IntKind>(a: Rational<A>, b: IntLike): Rational<A>;
export function sub<B extends IntKind>(a: IntLike, b: Rational<B>): Rational<B>;
export function sub(a: RationalLike, b: RationalLike): Rational<IntKind> {
  return leftOperand(a, b).subAssign(b);
}

export function mul<A extends IntKind, B extends IntKind>(a: Rational<A>, b: Rational<B>): Rational<LargestType<A, B>>;
export function mul<A extends IntKind>(a: Rational<A>, b: IntLike): Rational<A>;
export function mul<B extends IntKind>(a: IntLike, b: Rational<B>): Rational<B>;
export function mul(a: RationalLike, b: RationalLike): Rational<IntKind> {
  return leftOperand(a, b).mulAssign(b);
}

/**
 * @throws DiagnosticError (Q1002) if b is zero
 */
export function div<A extends IntKind, B extends IntKind>(a: Rational<A>, b: Rational<B>): Rational<LargestType<A, B>>;
export function div<A extends IntKind>(a: Rational<A>, b: IntLike): Rational<A>;
export function div<B extends IntKind>(a: IntLike, b: Rational<B>): Rational<B>;
export function div(a: RationalLike, b: RationalLike): Rational<IntKind> {
  return leftOperand(a, b).divAssign(b);
}

export function negate<K extends IntKind>(r: Rational<K>): Rational<K> {
  return new Rational(r.kind, -r.numerator, r.denominator);
}

// ============================================================================
// Relational
// ============================================================================

function components(x: RationalLike): [bigint, bigint] {
  return x instanceof Rational ? [x.numerator, x.denominator] : [toBigInt(x, "operand"), 1n];
}

/**
 * Three-way comparison: the sign of a - b.
 */
export function compare(a: RationalLike, b: RationalLike): Ordering {
  const [an, ad] = components(a);
  const [bn, bd] = components(b);
  const diff = an * bd - bn * ad;
  return diff < 0n ? LT : diff > 0n ? GT : EQ_ORD;
}

/**
 * Component-wise equality. Both sides are canonical, so this is value
 * equality; a scalar equals n/1.
 */
export function equals(a: RationalLike, b: RationalLike): boolean {
  const [an, ad] = components(a);
  const [bn, bd] = components(b);
  return an === bn && ad === bd;
}

export function notEquals(a: RationalLike, b: RationalLike): boolean {
  return !equals(a, b);
}

export function lessThan(a: RationalLike, b: RationalLike): boolean {
  return compare(a, b) === LT;
}

export function greaterThan(a: RationalLike, b: RationalLike): boolean {
  return compare(a, b) === GT;
}

export function lessThanOrEqual(a: RationalLike, b: RationalLike): boolean {
  return !greaterThan(a, b);
}

export function greaterThanOrEqual(a: RationalLike, b: RationalLike): boolean {
  return !lessThan(a, b);
}

/**
 * The smaller of two rationals (the first on ties).
 */
export function min<K extends IntKind>(a: Rational<K>, b: Rational<K>): Rational<K> {
  return lessThanOrEqual(a, b) ? a : b;
}

/**
 * The larger of two rationals (the first on ties).
 */
export function max<K extends IntKind>(a: Rational<K>, b: Rational<K>): Rational<K> {
  return greaterThanOrEqual(a, b) ? a : b;
}

// ============================================================================
// Queries
// ============================================================================

export function isZero(r: Rational<IntKind>): boolean {
  return r.numerator === 0n;
}

export function isPositive(r: Rational<IntKind>): boolean {
  return r.numerator > 0n;
}

export function isNegative(r: Rational<IntKind>): boolean {
  return r.numerator < 0n;
}

/**
 * Check if a rational represents an integer (denominator is 1).
 */
export function isInteger(r: Rational<IntKind>): boolean {
  return r.denominator === 1n;
}

// ============================================================================
// Unary operations
// ============================================================================

export function abs<K extends IntKind>(r: Rational<K>): Rational<K> {
  return r.numerator < 0n ? negate(r) : r.clone();
}

/**
 * -1/1, 0/1 or 1/1.
 */
export function signum<K extends IntKind>(r: Rational<K>): Rational<K> {
  const sign = r.numerator < 0n ? -1n : r.numerator > 0n ? 1n : 0n;
  return new Rational(r.kind, sign);
}

/**
 * @throws DiagnosticError (Q1002) if r is zero
 */
export function reciprocal<K extends IntKind>(r: Rational<K>): Rational<K> {
  return new Rational(r.kind, 1n).divAssign(r);
}

// ============================================================================
// Rounding
// ============================================================================

/**
 * Floor of a rational (largest integer <= r).
 */
export function floor(r: Rational<IntKind>): bigint {
  const { numerator: num, denominator: den } = r;
  if (num >= 0n) {
    return num / den;
  }
  return (num - den + 1n) / den;
}

/**
 * Ceiling of a rational (smallest integer >= r).
 */
export function ceil(r: Rational<IntKind>): bigint {
  const { numerator: num, denominator: den } = r;
  if (num >= 0n) {
    return (num + den - 1n) / den;
  }
  return num / den;
}

/**
 * Truncate a rational toward zero.
 */
export function trunc(r: Rational<IntKind>): bigint {
  return r.toInteger();
}
