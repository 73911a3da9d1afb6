/**
 * Rational types
 *
 * The free operators are also available as the `RationalOps` namespace, for
 * call sites that already import an `add` or `equals` from elsewhere.
 *
 * @example
 * ```typescript
 * import { RationalOps, rational } from "@quotient/math";
 *
 * RationalOps.add(rational(1, 2), rational(1, 3)); // 5/6
 * ```
 */

export * from "./int-kind.js";
export * from "./rational.js";
export * from "./rational-ops.js";
export * from "./instances.js";

export * as RationalOps from "./rational-ops.js";
