/**
 * Rational Numbers
 *
 * Exact rational arithmetic over a sized integer kind. Every value is kept in
 * canonical form:
 * - den > 0 (the sign lives on the numerator)
 * - gcd(|num|, den) = 1
 * - zero is 0/1
 *
 * Products and sums are computed in the next wider kind, reduced, and then
 * narrowed back into the value's own kind. Values that do not fit are
 * reported as Q1003 (or wrapped, when `rational.overflow` is "wrapping").
 *
 * @example
 * ```typescript
 * const half = rational(1, 2);
 * half.addAssign(rational(1, 3)); // 5/6, in place
 *
 * const small = rational(2, -8, "int8"); // -1/4
 * small.to("int32");                     // -1/4 as int32
 * ```
 */

import { config, DiagnosticError, Q1001, Q1002, Q1005, Q1008, type OverflowMode } from "@quotient/core";
import { gcdWith, integralBigInt, numericBigInt } from "@quotient/std";
import {
  DEFAULT_KIND,
  INT_TRAITS,
  fitInt,
  nextKind,
  overflowError,
  toBigInt,
  type DefaultKind,
  type IntKind,
  type IntLike,
} from "./int-kind.js";

// ============================================================================
// Normalization
// ============================================================================

/**
 * Reduce a numerator/denominator pair to lowest terms with the sign on the
 * numerator. The gcd is taken over absolute values.
 *
 * @throws DiagnosticError (Q1001) if den is zero
 */
export function simplify(num: bigint, den: bigint): [bigint, bigint] {
  if (den === 0n) {
    throw new DiagnosticError(Q1001, { numerator: num });
  }

  // Always represent 0 as 0/1
  if (num === 0n) {
    return [0n, 1n];
  }

  const g = gcdWith(num, den, numericBigInt, integralBigInt);
  num /= g;
  den /= g;

  if (den < 0n) {
    num = -num;
    den = -den;
  }

  return [num, den];
}

/**
 * Narrow an already reduced pair into `kind`. Wrapping can break the reduced
 * form, so a pair that changed is reduced again.
 */
function narrow(num: bigint, den: bigint, kind: IntKind, mode: OverflowMode, operation: string): [bigint, bigint] {
  const n = fitInt(num, kind, mode, operation);
  const d = fitInt(den, kind, mode, operation);
  if (n === num && d === den) {
    return [num, den];
  }
  if (d === 0n) {
    throw overflowError(den, kind, operation);
  }
  const [rn, rd] = simplify(n, d);
  return [fitInt(rn, kind, "checked", operation), fitInt(rd, kind, "checked", operation)];
}

function canonical(num: bigint, den: bigint, kind: IntKind, mode: OverflowMode, operation: string): [bigint, bigint] {
  const [n, d] = simplify(num, den);
  return narrow(n, d, kind, mode, operation);
}

// ============================================================================
// Rational
// ============================================================================

/** Anything a rational operation accepts as an operand. */
export type RationalLike = Rational<IntKind> | IntLike;

/**
 * Exact rational number num/den of integer kind K.
 */
export class Rational<K extends IntKind = DefaultKind> {
  readonly kind: K;
  private num: bigint;
  private den: bigint;

  /**
   * @throws DiagnosticError Q1001 for a zero denominator, Q1003 when a
   *   component does not fit the kind, Q1004 for non-integral numbers
   */
  constructor(kind: K, numerator: IntLike = 0n, denominator: IntLike = 1n) {
    this.kind = kind;
    const [num, den] = this.fitInputs(numerator, denominator, "constructing");
    this.num = num;
    this.den = den;
  }

  private static raw<T extends IntKind>(kind: T, num: bigint, den: bigint): Rational<T> {
    const r = new Rational(kind);
    r.num = num;
    r.den = den;
    return r;
  }

  private fitInputs(numerator: IntLike, denominator: IntLike, operation: string): [bigint, bigint] {
    const mode = config.overflowMode();
    const n = fitInt(toBigInt(numerator, "numerator"), this.kind, mode, operation);
    const d = fitInt(toBigInt(denominator, "denominator"), this.kind, mode, operation);
    return canonical(n, d, this.kind, mode, operation);
  }

  get numerator(): bigint {
    return this.num;
  }

  get denominator(): bigint {
    return this.den;
  }

  /**
   * Set numerator and denominator in place; the pair is normalized.
   */
  set(numerator: IntLike, denominator: IntLike): this {
    [this.num, this.den] = this.fitInputs(numerator, denominator, "setting");
    return this;
  }

  /**
   * Convert to another kind. The components are copied as they are, without
   * renormalizing, and must fit the target kind.
   */
  to<T extends IntKind>(kind: T): Rational<T> {
    const [n, d] = narrow(this.num, this.den, kind, config.overflowMode(), `converting to ${kind}`);
    return Rational.raw(kind, n, d);
  }

  clone(): Rational<K> {
    return Rational.raw(this.kind, this.num, this.den);
  }

  // --------------------------------------------------------------------------
  // Compound assignment
  // --------------------------------------------------------------------------

  /**
   * Bring an operand into this value's kind: rationals of other kinds are
   * converted, scalars become scalar/1.
   */
  private operand(rhs: RationalLike): Rational<K> {
    return rhs instanceof Rational ? rhs.to(this.kind) : new Rational(this.kind, rhs);
  }

  /**
   * Store num/den computed in the wider kind back into this value.
   * `terms` are the partial products of the numerator, summed in the wide kind.
   */
  private assignWide(terms: bigint[], den: bigint, operation: string): this {
    const mode = config.overflowMode();
    const wide = nextKind(this.kind);
    const widen = (value: bigint): bigint => fitInt(value, wide, mode, operation);

    let num = 0n;
    for (const term of terms) {
      num = widen(num + widen(term));
    }
    const wideDen = widen(den);
    if (wideDen === 0n) {
      throw overflowError(den, wide, operation);
    }

    [this.num, this.den] = canonical(num, wideDen, this.kind, mode, operation);
    return this;
  }

  addAssign(rhs: RationalLike): this {
    const b = this.operand(rhs);
    return this.assignWide([b.den * this.num, this.den * b.num], this.den * b.den, "adding");
  }

  subAssign(rhs: RationalLike): this {
    const b = this.operand(rhs);
    return this.assignWide([b.den * this.num, -(this.den * b.num)], this.den * b.den, "subtracting");
  }

  mulAssign(rhs: RationalLike): this {
    const b = this.operand(rhs);
    return this.assignWide([this.num * b.num], this.den * b.den, "multiplying");
  }

  /**
   * @throws DiagnosticError (Q1002) if rhs is zero
   */
  divAssign(rhs: RationalLike): this {
    const b = this.operand(rhs);
    if (b.num === 0n) {
      throw new DiagnosticError(Q1002, { dividend: this.toString() });
    }
    return this.assignWide([b.den * this.num], b.num * this.den, "dividing");
  }

  // --------------------------------------------------------------------------
  // Increment / decrement
  // --------------------------------------------------------------------------

  /** Prefix increment: add one, return this. */
  increment(): this {
    [this.num, this.den] = this.fitInputs(this.num + this.den, this.den, "incrementing");
    return this;
  }

  /** Prefix decrement: subtract one, return this. */
  decrement(): this {
    [this.num, this.den] = this.fitInputs(this.num - this.den, this.den, "decrementing");
    return this;
  }

  /** Postfix increment: add one, return the previous value. */
  postIncrement(): Rational<K> {
    const previous = this.clone();
    this.increment();
    return previous;
  }

  /** Postfix decrement: subtract one, return the previous value. */
  postDecrement(): Rational<K> {
    const previous = this.clone();
    this.decrement();
    return previous;
  }

  // --------------------------------------------------------------------------
  // Conversions
  // --------------------------------------------------------------------------

  /** Truncating integer conversion. */
  toInteger(): bigint {
    return this.num / this.den;
  }

  /** Floating-point conversion; may lose precision. */
  toNumber(): number {
    return Number(this.num) / Number(this.den);
  }

  /** Always "num/den", also for integers. */
  toString(): string {
    return `${this.num}/${this.den}`;
  }
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a rational. The kind defaults to int64.
 *
 * @example
 * ```typescript
 * rational();               // 0/1
 * rational(6, 4);           // 3/2
 * rational(2n, -8n, "int8") // -1/4
 * ```
 */
export function rational(numerator?: IntLike, denominator?: IntLike): Rational<DefaultKind>;
export function rational<K extends IntKind>(numerator: IntLike, denominator: IntLike, kind: K): Rational<K>;
export function rational(
  numerator: IntLike = 0n,
  denominator: IntLike = 1n,
  kind: IntKind = DEFAULT_KIND
): Rational<IntKind> {
  return new Rational(kind, numerator, denominator);
}

export function isRational(value: unknown): value is Rational<IntKind> {
  return value instanceof Rational;
}

/**
 * Best rational approximation of a float, by continued fraction expansion.
 * The denominator is bounded by `maxDenominator` (default: the
 * `rational.maxDenominator` setting) and by the kind's range.
 *
 * @throws DiagnosticError Q1005 for NaN and infinities, Q1008 for a bound
 *   below 1, Q1003 when the numerator does not fit the kind
 */
export function fromNumber(n: number): Rational<DefaultKind>;
export function fromNumber<K extends IntKind>(n: number, kind: K, maxDenominator?: bigint): Rational<K>;
export function fromNumber(n: number, kind: IntKind = DEFAULT_KIND, maxDenominator?: bigint): Rational<IntKind> {
  if (!Number.isFinite(n)) {
    throw new DiagnosticError(Q1005, { value: String(n) });
  }
  if (maxDenominator !== undefined && maxDenominator < 1n) {
    throw new DiagnosticError(Q1008, { bound: maxDenominator });
  }

  if (Number.isInteger(n)) {
    return new Rational(kind, BigInt(n), 1n);
  }

  const kindMax = INT_TRAITS[kind].max;
  const requested = maxDenominator ?? config.maxDenominator();
  const bound = requested < kindMax ? requested : kindMax;

  const negative = n < 0;
  const target = Math.abs(n);

  // Successive convergents p[k]/q[k] until q exceeds the bound
  let p0 = 0n;
  let q0 = 1n;
  let p1 = 1n;
  let q1 = 0n;
  let x = target;

  const finish = (p: bigint, q: bigint): Rational<IntKind> => new Rational(kind, negative ? -p : p, q);

  for (let i = 0; i < 100; i++) {
    const a = BigInt(Math.floor(x));
    const p2 = a * p1 + p0;
    const q2 = a * q1 + q0;

    if (q2 > bound) {
      // Try the best semi-convergent below the bound
      const aMax = (bound - q0) / q1;
      if (aMax > 0n) {
        const pSemi = aMax * p1 + p0;
        const qSemi = aMax * q1 + q0;
        const errSemi = Math.abs(Number(pSemi) / Number(qSemi) - target);
        const errLast = Math.abs(Number(p1) / Number(q1) - target);
        if (errSemi < errLast) {
          return finish(pSemi, qSemi);
        }
      }
      return finish(p1, q1);
    }

    if (Math.abs(Number(p2) / Number(q2) - target) < 1e-15) {
      return finish(p2, q2);
    }

    p0 = p1;
    q0 = q1;
    p1 = p2;
    q1 = q2;

    const frac = x - Math.floor(x);
    if (frac < 1e-15) {
      break;
    }
    x = 1 / frac;
  }

  return finish(p1, q1);
}
