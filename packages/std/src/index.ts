/**
 * @quotient/std - Standard typeclasses
 *
 * Eq, Ord, Numeric, Integral, Fractional, Bounded, Parseable and Printable,
 * their bigint instances, and the generic operations derived from them.
 *
 * @example
 * ```ts
 * import { sum, numericBigInt } from "@quotient/std";
 *
 * sum([1n, 2n, 3n], numericBigInt); // 6n
 * ```
 */

export * from "./typeclasses/index.js";
