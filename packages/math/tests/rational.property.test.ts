/**
 * Property-based tests for canonical form and the arithmetic laws
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { gcdWith, integralBigInt, numericBigInt } from "@quotient/std";
import { add, compare, equals, formatRational, mul, parseRational, rational, sub } from "../src/index.js";

const SEED = 424242;

const component = fc.integer({ min: -1000, max: 1000 });
const nonZero = component.filter((n) => n !== 0);
const arbRational = fc.tuple(component, nonZero).map(([n, d]) => rational(n, d));

describe("Rational properties", () => {
  it("is always in canonical form", () => {
    fc.assert(
      fc.property(component, nonZero, (n, d) => {
        const r = rational(n, d);
        expect(r.denominator > 0n).toBe(true);
        expect(gcdWith(r.numerator, r.denominator, numericBigInt, integralBigInt)).toBe(1n);
        if (n === 0) {
          expect(r.denominator).toBe(1n);
        }
      }),
      { seed: SEED }
    );
  });

  it("keeps the value of n/d", () => {
    fc.assert(
      fc.property(component, nonZero, (n, d) => {
        const r = rational(n, d);
        expect(r.numerator * BigInt(d)).toBe(BigInt(n) * r.denominator);
      }),
      { seed: SEED }
    );
  });

  it("round-trips through text", () => {
    fc.assert(
      fc.property(arbRational, (r) => {
        const parsed = parseRational(formatRational(r));
        expect(parsed.ok && equals(parsed.value, r)).toBe(true);
      }),
      { seed: SEED }
    );
  });

  it("compare is antisymmetric and agrees with equals", () => {
    fc.assert(
      fc.property(arbRational, arbRational, (a, b) => {
        expect(compare(a, b)).toBe(-compare(b, a) || 0);
        expect(compare(a, b) === 0).toBe(equals(a, b));
      }),
      { seed: SEED }
    );
  });

  it("addition and multiplication commute", () => {
    fc.assert(
      fc.property(arbRational, arbRational, (a, b) => {
        expect(equals(add(a, b), add(b, a))).toBe(true);
        expect(equals(mul(a, b), mul(b, a))).toBe(true);
      }),
      { seed: SEED }
    );
  });

  it("subtraction undoes addition", () => {
    fc.assert(
      fc.property(arbRational, arbRational, (a, b) => {
        expect(equals(add(sub(a, b), b), a)).toBe(true);
      }),
      { seed: SEED }
    );
  });
});
