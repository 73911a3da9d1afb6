/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` - Runtime assertion
 * - `unreachable(value?)` - Mark impossible code paths
 * - `debugOnly(fn)` - Code that only runs when debug is configured
 *
 * @example
 * ```typescript
 * function divide(a: bigint, b: bigint): bigint {
 *   invariant(b !== 0n, "Division by zero");
 *   return a / b;
 * }
 * ```
 */

import { config } from "./config.js";
import { DiagnosticError, Q1999 } from "./diagnostics.js";

/**
 * Runtime invariant check.
 *
 * @throws DiagnosticError (Q1999) if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new DiagnosticError(Q1999, { message: message ?? "Invariant violation" });
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(value?: never): never {
  throw new DiagnosticError(Q1999, {
    message: `Unreachable code reached${value === undefined ? "" : ` with ${String(value)}`}`,
  });
}

/**
 * Run `fn` only when `debug` is set in the configuration.
 */
export function debugOnly(fn: () => void): void {
  if (config.isDebug()) {
    fn();
  }
}
