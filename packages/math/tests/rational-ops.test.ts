import { describe, it, expect } from "vitest";
import {
  abs,
  add,
  ceil,
  compare,
  div,
  equals,
  floor,
  greaterThan,
  greaterThanOrEqual,
  isInteger,
  isNegative,
  isPositive,
  isZero,
  lessThan,
  lessThanOrEqual,
  max,
  min,
  mul,
  negate,
  notEquals,
  rational,
  RationalOps,
  reciprocal,
  signum,
  sub,
  trunc,
} from "../src/index.js";

describe("free arithmetic", () => {
  it("adds across kinds into the wider kind", () => {
    const r = add(rational(1, 2, "int8"), rational(1, 3, "int32"));
    expect(r.kind).toBe("int32");
    expect(r.toString()).toBe("5/6");
  });

  it("leaves its operands alone", () => {
    const a = rational(1, 2);
    const b = rational(1, 3);
    mul(a, b);
    expect(a.toString()).toBe("1/2");
    expect(b.toString()).toBe("1/3");
  });

  it("mixes rationals and scalars in either position", () => {
    expect(add(rational(1, 2), 1).toString()).toBe("3/2");
    expect(add(1, rational(1, 2)).toString()).toBe("3/2");
    expect(sub(3, rational(1, 2)).toString()).toBe("5/2");
    expect(sub(rational(1, 2), 3).toString()).toBe("-5/2");
    expect(mul(2, rational(1, 4)).toString()).toBe("1/2");
    expect(div(1, rational(1, 4)).toString()).toBe("4/1");
    expect(div(rational(3, 4), 3n).toString()).toBe("1/4");
  });

  it("keeps the rational's kind for scalar operands", () => {
    expect(sub(3, rational(1, 2, "int16")).kind).toBe("int16");
  });

  it("sub(scalar, r) equals add(negate(r), scalar)", () => {
    const r = rational(2, 7);
    expect(equals(sub(5, r), add(negate(r), 5))).toBe(true);
  });

  it("div rejects a zero divisor", () => {
    expect(() => div(rational(1, 2), 0)).toThrow("[Q1002] Division of 1/2 by a zero-valued rational");
  });

  it("negate flips the numerator", () => {
    expect(negate(rational(1, 2)).toString()).toBe("-1/2");
    expect(negate(rational()).toString()).toBe("0/1");
  });

  it("negate reports the int8 minimum", () => {
    expect(() => negate(rational(-128, 1, "int8"))).toThrow(
      "[Q1003] Value 128 does not fit in int8 [-128, 127] while constructing"
    );
  });

  it("is also available as a namespace", () => {
    expect(RationalOps.add(rational(1, 2), rational(1, 2)).toString()).toBe("1/1");
  });
});

describe("relational", () => {
  it("orders rationals", () => {
    expect(lessThan(rational(1, 3), rational(1, 2))).toBe(true);
    expect(greaterThan(rational(1, 3), rational(1, 2))).toBe(false);
    expect(lessThan(rational(-1, 2), 0)).toBe(true);
    expect(greaterThanOrEqual(rational(2, 1), 2)).toBe(true);
    expect(lessThanOrEqual(rational(1, 2), rational(2, 4))).toBe(true);
    expect(greaterThan(rational(1, 2), rational(1, 2))).toBe(false);
  });

  it("compares equal values across kinds", () => {
    expect(equals(rational(1, 2), rational(1, 2, "int8"))).toBe(true);
    expect(notEquals(rational(1, 2), rational(2, 4))).toBe(false);
    expect(notEquals(rational(1, 2), rational(1, 3))).toBe(true);
  });

  it("compares with scalars", () => {
    expect(equals(rational(4, 2), 2)).toBe(true);
    expect(equals(rational(1, 2), 0)).toBe(false);
    expect(equals(3n, rational(3))).toBe(true);
  });

  it("compare returns an ordering", () => {
    expect(compare(rational(1, 3), rational(1, 2))).toBe(-1);
    expect(compare(rational(1, 2), rational(2, 4))).toBe(0);
    expect(compare(2, rational(3, 2))).toBe(1);
  });

  it("never overflows near the int64 limits", () => {
    const big = 2n ** 62n;
    expect(compare(rational(1n, big), rational(1n, big + 1n))).toBe(1);
    expect(lessThan(rational(2n ** 63n - 2n), rational(2n ** 63n - 1n))).toBe(true);
  });

  it("min and max return one of their arguments", () => {
    const a = rational(1, 2);
    const b = rational(1, 3);
    expect(min(a, b)).toBe(b);
    expect(max(a, b)).toBe(a);
    const c = rational(2, 4);
    expect(min(a, c)).toBe(a);
    expect(max(a, c)).toBe(a);
  });
});

describe("queries", () => {
  it("sign tests", () => {
    expect(isZero(rational())).toBe(true);
    expect(isPositive(rational(1, 2))).toBe(true);
    expect(isNegative(rational(1, -2))).toBe(true);
    expect(isPositive(rational())).toBe(false);
  });

  it("isInteger checks the denominator", () => {
    expect(isInteger(rational(4, 2))).toBe(true);
    expect(isInteger(rational(1, 2))).toBe(false);
  });
});

describe("unary operations", () => {
  it("abs", () => {
    expect(abs(rational(-1, 2)).toString()).toBe("1/2");
    const r = rational(1, 2);
    expect(abs(r)).not.toBe(r);
  });

  it("signum", () => {
    expect(signum(rational(-3, 4)).toString()).toBe("-1/1");
    expect(signum(rational()).toString()).toBe("0/1");
    expect(signum(rational(7, 2, "int8")).kind).toBe("int8");
  });

  it("reciprocal", () => {
    expect(reciprocal(rational(-2, 3)).toString()).toBe("-3/2");
    expect(() => reciprocal(rational())).toThrow("[Q1002] Division of 1/1 by a zero-valued rational");
  });
});

describe("rounding", () => {
  it("floor", () => {
    expect(floor(rational(7, 2))).toBe(3n);
    expect(floor(rational(-7, 2))).toBe(-4n);
    expect(floor(rational(-4))).toBe(-4n);
  });

  it("ceil", () => {
    expect(ceil(rational(7, 2))).toBe(4n);
    expect(ceil(rational(-7, 2))).toBe(-3n);
    expect(ceil(rational(4))).toBe(4n);
  });

  it("trunc", () => {
    expect(trunc(rational(-7, 2))).toBe(-3n);
  });
});
