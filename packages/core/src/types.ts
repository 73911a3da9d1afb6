/**
 * Core types shared by the quotient packages
 */

// ============================================================================
// Operator Symbol Types (for Op<> typeclass method annotations)
// ============================================================================

/**
 * Operators a typeclass method can declare itself the meaning of.
 * Arithmetic, comparison and equality only: rationals have no bitwise surface.
 */
export const OPERATOR_SYMBOLS = [
  "+",
  "-",
  "*",
  "/",
  "%",
  "**",
  "<",
  "<=",
  ">",
  ">=",
  "===",
  "!==",
] as const;

/** Union type of all supported operator strings. */
export type OperatorSymbol = (typeof OPERATOR_SYMBOLS)[number];

/**
 * Branded intersection type used as a compile-time marker on typeclass method
 * return types to declare which operator the method implements.
 *
 * It has no runtime representation.
 *
 * @example
 * ```typescript
 * interface Numeric<A> {
 *   add(a: A, b: A): A & Op<"+">;
 *   sub(a: A, b: A): A & Op<"-">;
 *   mul(a: A, b: A): A & Op<"*">;
 * }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-empty-object-type
export type Op<_S extends OperatorSymbol> = {};

/** Severity shared by diagnostics and log lines. */
export type Severity = "error" | "warning" | "info";
