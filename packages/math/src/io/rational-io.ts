/**
 * Reading and writing rationals as text
 *
 * The text form is `<integer><any one character><integer>`, written as
 * `num/den`. Reads never throw: a failed read leaves the target at 0/1 and
 * the input stream in the failed state.
 *
 * @example
 * ```typescript
 * const input = new TextInputStream("3/4 -1/2");
 * const r = rational();
 * readRational(input, r); // 3/4
 * readRational(input, r); // -1/2
 * ```
 */

import {
  createDiagnostic,
  debugLog,
  interpolateMessage,
  isDiagnosticError,
  Q1003,
  Q1201,
  renderDiagnostic,
} from "@quotient/core";
import { printableBigInt, type ParseResult } from "@quotient/std";
import { DEFAULT_KIND, type DefaultKind, type IntKind } from "../types/int-kind.js";
import { Rational } from "../types/rational.js";
import { TextInputStream, TextOutputStream } from "./text-stream.js";

export function writeRational(out: TextOutputStream, r: Rational<IntKind>): TextOutputStream {
  return out.write(printableBigInt.display(r.numerator), "/", printableBigInt.display(r.denominator));
}

/**
 * Read `num<delim>den` into `r`, which is normalized by `set`.
 */
export function readRational<K extends IntKind>(input: TextInputStream, r: Rational<K>): TextInputStream {
  const start = input.position;
  const numerator = input.readInteger(r.kind);
  input.ignore();
  const denominator = input.readInteger(r.kind);

  if (!input.fail && denominator !== 0n && trySet(r, numerator, denominator)) {
    return input;
  }

  input.setFail();
  r.set(0n, 1n);
  debugLog("io", () =>
    renderDiagnostic(createDiagnostic(Q1201, { kind: r.kind, text: input.source.slice(start) }), { colors: false })
  );
  return input;
}

/**
 * `set`, reporting a pair that overflows the kind once reduced (such as
 * -128/-1 in int8) as `false`.
 */
function trySet(r: Rational<IntKind>, numerator: bigint, denominator: bigint): boolean {
  try {
    r.set(numerator, denominator);
    return true;
  } catch (error) {
    if (isDiagnosticError(error, Q1003.code)) {
      return false;
    }
    throw error;
  }
}

/**
 * Format a rational as "num/den".
 */
export function formatRational(r: Rational<IntKind>): string {
  return writeRational(new TextOutputStream(), r).toString();
}

/**
 * Parse one rational from the start of `text` (leading whitespace allowed).
 * `rest` is the text after it.
 */
export function parseRational(text: string): ParseResult<Rational<DefaultKind>>;
export function parseRational<K extends IntKind>(text: string, kind: K): ParseResult<Rational<K>>;
export function parseRational(text: string, kind: IntKind = DEFAULT_KIND): ParseResult<Rational<IntKind>> {
  const input = new TextInputStream(text);
  const value = new Rational(kind);
  readRational(input, value);
  if (input.fail) {
    return { ok: false, error: interpolateMessage(Q1201, { kind, text }) };
  }
  return { ok: true, value, rest: input.remaining() };
}
