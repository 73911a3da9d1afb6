/**
 * Typeclass instances for Rational
 *
 * Arithmetic instances are built per kind, since `zero()`, `one()` and
 * `fromNumber()` must know which kind to produce. Eq, Ord and Printable work
 * across kinds and are plain values.
 *
 * @example
 * ```typescript
 * import { sum } from "@quotient/std";
 *
 * const N = numericRational("int32");
 * sum([rational(1, 2, "int32"), rational(1, 3, "int32")], N); // 5/6
 * ```
 */

import { DiagnosticError, Q1006, Q1007 } from "@quotient/core";
import {
  makeEq,
  makeOrd,
  powFrac,
  type Eq,
  type Fractional,
  type Numeric,
  type Ord,
  type Parseable,
  type Printable,
} from "@quotient/std";
import { formatRational, parseRational } from "../io/rational-io.js";
import type { IntKind } from "./int-kind.js";
import { fromNumber, Rational } from "./rational.js";
import { abs, compare, equals, isInteger, isZero, negate, reciprocal, signum } from "./rational-ops.js";

export const eqRational: Eq<Rational<IntKind>> = makeEq(equals);

/**
 * Compares by cross-multiplication; exact for every pair of kinds.
 */
export const ordRational: Ord<Rational<IntKind>> = makeOrd(compare);

export function numericRational<K extends IntKind>(kind: K): Numeric<Rational<K>> {
  return {
    add: (a, b) => a.clone().addAssign(b),
    sub: (a, b) => a.clone().subAssign(b),
    mul: (a, b) => a.clone().mulAssign(b),
    div: (a, b) => a.clone().divAssign(b),
    pow: (a, b) => {
      if (!isInteger(b)) {
        throw new DiagnosticError(Q1007, { exponent: b.toString() });
      }
      return pow(a, Number(b.numerator));
    },
    negate,
    abs,
    signum,
    fromNumber: (n) => fromNumber(n, kind),
    toNumber: (a) => a.toNumber(),
    zero: () => new Rational(kind),
    one: () => new Rational(kind, 1n),
  };
}

export function fractionalRational<K extends IntKind>(kind: K): Fractional<Rational<K>> {
  return {
    div: (a, b) => a.clone().divAssign(b),
    recip: reciprocal,
    fromRational: (num, den) => new Rational(kind, num, den),
  };
}

export const printableRational: Printable<Rational<IntKind>> = {
  display: formatRational,
};

export function parseableRational<K extends IntKind>(kind: K): Parseable<Rational<K>> {
  return {
    parse: (s) => parseRational(s, kind),
  };
}

// ============================================================================
// Derived operations
// ============================================================================

/**
 * Raise a rational to an integer power by repeated squaring. Negative powers
 * take the reciprocal of the positive power.
 *
 * @throws DiagnosticError Q1007 for an exponent that is not a safe integer,
 *   Q1006 for a negative power of zero
 */
export function pow<K extends IntKind>(r: Rational<K>, exp: number): Rational<K> {
  if (!Number.isSafeInteger(exp)) {
    throw new DiagnosticError(Q1007, { exponent: exp });
  }
  if (exp < 0 && isZero(r)) {
    throw new DiagnosticError(Q1006, { exponent: exp });
  }
  return powFrac(r.clone(), exp, numericRational(r.kind), fractionalRational(r.kind));
}
