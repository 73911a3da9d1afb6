/**
 * @quotient/math - exact rational arithmetic over sized integer kinds
 *
 * This package provides:
 * - **Integer kinds**: int8 to int64, with the NextType/LargestType widening maps
 * - **Rational<K>**: a canonical num/den pair with in-place compound operators
 * - **Free operators**: add, sub, mul, div and the comparisons, across kinds
 * - **Typeclass instances**: Eq, Ord, Numeric, Fractional, Printable, Parseable
 * - **Text I/O**: readRational/writeRational over simple text streams
 *
 * @example
 * ```typescript
 * import { rational, add, lessThan, formatRational } from "@quotient/math";
 *
 * const sum = add(rational(1, 2), rational(1, 3));
 * formatRational(sum);                  // "5/6"
 * lessThan(rational(1, 3), sum);        // true
 * ```
 *
 * @packageDocumentation
 */

export * from "./types/index.js";

export { TextInputStream, TextOutputStream } from "./io/text-stream.js";
export { readRational, writeRational, parseRational, formatRational } from "./io/rational-io.js";
