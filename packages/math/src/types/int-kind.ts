/**
 * Integer kinds - sized signed integers for rational components
 *
 * JavaScript has one arbitrary-precision integer type, so the size of a
 * rational's base type is tracked as a kind at the type level and enforced
 * at run time against the two's-complement range of that size.
 *
 * The widening trait maps a kind to the kind used for intermediate products
 * (`NextType`) and two kinds to the wider of the pair (`LargestType`). Both
 * exist as type-level maps, so results are typed precisely, and as lookup
 * tables, so results carry the matching runtime kind.
 *
 * @example
 * ```typescript
 * type Wide = NextType<"int16">;              // "int32"
 * type Mixed = LargestType<"int8", "int32">;  // "int32"
 *
 * nextKind("int16");              // "int32"
 * fitInt(200n, "int8", "checked"); // throws Q1003
 * ```
 */

import { config, debugLog, DiagnosticError, Q1003, Q1004, type OverflowMode } from "@quotient/core";
import { boundedBigIntRange, type Bounded } from "@quotient/std";

// ============================================================================
// Kinds
// ============================================================================

export type IntKind = "int8" | "int16" | "int32" | "int64";

export const INT_KINDS: readonly IntKind[] = ["int8", "int16", "int32", "int64"];

/** The kind used when none is given. */
export const DEFAULT_KIND = "int64";
export type DefaultKind = typeof DEFAULT_KIND;

/** Scalar operands: bigints, or numbers that are safe integers. */
export type IntLike = number | bigint;

export interface IntTraits<K extends IntKind = IntKind> {
  readonly kind: K;
  readonly bits: number;
  readonly min: bigint;
  readonly max: bigint;
}

function traitsFor<K extends IntKind>(kind: K, bits: number): IntTraits<K> {
  const half = 1n << BigInt(bits - 1);
  return { kind, bits, min: -half, max: half - 1n };
}

export const INT_TRAITS: { readonly [K in IntKind]: IntTraits<K> } = {
  int8: traitsFor("int8", 8),
  int16: traitsFor("int16", 16),
  int32: traitsFor("int32", 32),
  int64: traitsFor("int64", 64),
};

export function isIntKind(value: unknown): value is IntKind {
  return INT_KINDS.some((kind) => kind === value);
}

// ============================================================================
// Widening Trait (Type-Level)
// ============================================================================

/** Next wider kind; the widest kind maps to itself. */
interface NextTypeMap {
  int8: "int16";
  int16: "int32";
  int32: "int64";
  int64: "int64";
}

export type NextType<K extends IntKind> = NextTypeMap[K];

/** The wider of two kinds. */
interface LargestTypeMap {
  int8: { int8: "int8"; int16: "int16"; int32: "int32"; int64: "int64" };
  int16: { int8: "int16"; int16: "int16"; int32: "int32"; int64: "int64" };
  int32: { int8: "int32"; int16: "int32"; int32: "int32"; int64: "int64" };
  int64: { int8: "int64"; int16: "int64"; int32: "int64"; int64: "int64" };
}

export type LargestType<A extends IntKind, B extends IntKind> = LargestTypeMap[A][B];

// ============================================================================
// Widening Trait (Runtime)
// ============================================================================

const NEXT_KIND: NextTypeMap = {
  int8: "int16",
  int16: "int32",
  int32: "int64",
  int64: "int64",
};

const LARGEST_KIND: LargestTypeMap = {
  int8: { int8: "int8", int16: "int16", int32: "int32", int64: "int64" },
  int16: { int8: "int16", int16: "int16", int32: "int32", int64: "int64" },
  int32: { int8: "int32", int16: "int32", int32: "int32", int64: "int64" },
  int64: { int8: "int64", int16: "int64", int32: "int64", int64: "int64" },
};

export function nextKind<K extends IntKind>(kind: K): NextType<K> {
  return NEXT_KIND[kind];
}

export function largestKind<A extends IntKind, B extends IntKind>(a: A, b: B): LargestType<A, B> {
  return LARGEST_KIND[a][b];
}

/**
 * Bounded instance for a kind's range.
 */
export function boundedInt(kind: IntKind): Bounded<bigint> {
  const { min, max } = INT_TRAITS[kind];
  return boundedBigIntRange(min, max);
}

// ============================================================================
// Range Checks
// ============================================================================

/**
 * Convert a scalar to bigint.
 *
 * @throws DiagnosticError (Q1004) for numbers that are not safe integers
 */
export function toBigInt(value: IntLike, what: string): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    throw new DiagnosticError(Q1004, { what, value: String(value) });
  }
  return BigInt(value);
}

export function inRange(value: bigint, kind: IntKind): boolean {
  const { min, max } = INT_TRAITS[kind];
  return value >= min && value <= max;
}

/**
 * Two's-complement wraparound into a kind.
 */
export function wrapInt(value: bigint, kind: IntKind): bigint {
  return BigInt.asIntN(INT_TRAITS[kind].bits, value);
}

/**
 * Bring a value into a kind's range.
 *
 * - "checked": return it unchanged, or throw Q1003 if it does not fit
 * - "wrapping": wrap it
 *
 * @param operation - What was being computed, for the error message
 */
export function fitInt(
  value: bigint,
  kind: IntKind,
  mode: OverflowMode = config.overflowMode(),
  operation = "narrowing"
): bigint {
  if (inRange(value, kind)) {
    return value;
  }
  if (mode === "wrapping") {
    const wrapped = wrapInt(value, kind);
    debugLog("overflow", () => `${operation}: ${value} wrapped to ${wrapped} in ${kind}`);
    return wrapped;
  }
  throw overflowError(value, kind, operation);
}

/**
 * The Q1003 error for a value that does not fit a kind.
 */
export function overflowError(value: bigint, kind: IntKind, operation: string): DiagnosticError {
  const { min, max } = INT_TRAITS[kind];
  return new DiagnosticError(Q1003, { value, kind, min, max, operation });
}
