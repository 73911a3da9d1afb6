/**
 * @quotient/math Showcase
 *
 * Self-documenting examples of exact rational arithmetic over sized integer
 * kinds. Every claim is checked with an assertion, so running the file is a
 * smoke test.
 *
 * Run with a TypeScript loader: npx tsx packages/math/examples/showcase.ts
 */

import assert from "node:assert/strict";

import { config, isDiagnosticError, Q1003 } from "@quotient/core";
import { sum } from "@quotient/std";

import {
  add,
  div,
  formatRational,
  fromNumber,
  lessThan,
  numericRational,
  parseRational,
  pow,
  rational,
  readRational,
  sub,
  TextInputStream,
  type LargestType,
  type Rational,
} from "../src/index.js";

// ============================================================================
// 1. CANONICAL FORM - every value is reduced, with the sign on top
// ============================================================================

assert.equal(rational(2, -8).toString(), "-1/4");
assert.equal(rational(-3, -9).toString(), "1/3");
assert.equal(rational(0, -128, "int8").toString(), "0/1");

// ============================================================================
// 2. ARITHMETIC - in place or free, scalars on either side
// ============================================================================

const acc = rational(1, 2);
acc.addAssign(rational(1, 3));
assert.equal(acc.toString(), "5/6");

assert.equal(sub(3, rational(1, 2)).toString(), "5/2");
assert.equal(div(rational(1, 2), rational(1, 4)).toString(), "2/1");
assert.equal(pow(rational(2, 3), -2).toString(), "9/4");

// Mixed kinds widen to the larger one, at the type level too
const mixed: Rational<LargestType<"int8", "int32">> = add(rational(1, 2, "int8"), rational(1, 3, "int32"));
assert.equal(mixed.kind, "int32");

// ============================================================================
// 3. OVERFLOW - intermediates are wide, results must fit
// ============================================================================

// 100/3 * 3/100 passes through 300/300, which only int16 can hold
assert.equal(rational(100, 3, "int8").mulAssign(rational(3, 100, "int8")).toString(), "1/1");

try {
  rational(100, 1, "int8").addAssign(100);
  assert.fail("200 does not fit in int8");
} catch (error) {
  assert.ok(isDiagnosticError(error, Q1003.code));
}

config.set({ rational: { overflow: "wrapping" } });
assert.equal(rational(100, 1, "int8").addAssign(100).toString(), "-56/1");
config.reset();

// ============================================================================
// 4. COMPARISON - exact cross-multiplication
// ============================================================================

assert.ok(lessThan(rational(1, 3), rational(1, 2)));
assert.ok(lessThan(rational(-1, 2), 0));

// ============================================================================
// 5. TEXT I/O
// ============================================================================

const input = new TextInputStream("3/4 -1/2");
const r = rational();
readRational(input, r);
assert.equal(formatRational(r), "3/4");
readRational(input, r);
assert.equal(formatRational(r), "-1/2");

const bad = parseRational("1/0");
assert.equal(bad.ok, false);

// ============================================================================
// 6. TYPECLASSES - generic code over Numeric
// ============================================================================

const N = numericRational("int32");
const thirds = [rational(1, 3, "int32"), rational(1, 3, "int32"), rational(1, 3, "int32")];
assert.equal(sum(thirds, N).toString(), "1/1");

assert.equal(fromNumber(Math.PI, "int64", 100n).toString(), "311/99");

console.log("@quotient/math showcase: all assertions passed");
