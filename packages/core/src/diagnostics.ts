/**
 * Diagnostics System for quotient
 *
 * Every failure the library can report has an entry in the catalog below:
 * - A stable error code (Q1001-Q1999)
 * - A message template with {placeholders}
 * - A long-form explanation
 *
 * Failures are thrown as `DiagnosticError`, which is a `RangeError` so callers
 * that only care about "bad numeric input" can catch the built-in type.
 *
 * @example
 * ```typescript
 * throw new DiagnosticError(Q1001, { numerator: "3" });
 * // RangeError: [Q1001] Denominator cannot be zero (numerator 3)
 * ```
 */

import type { Severity } from "./types.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Arithmetic = "arithmetic",
  Overflow = "overflow",
  Conversion = "conversion",
  Parse = "parse",
  Configuration = "config",
  Internal = "internal",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 1001-1999 */
  readonly code: number;

  /** Default severity */
  readonly severity: Severity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation */
  readonly explanation: string;
}

/** Template arguments; `undefined` values are left as placeholders. */
export type DiagnosticArgs = Record<string, string | number | bigint | undefined>;

/**
 * A diagnostic with its message already interpolated.
 */
export interface Diagnostic {
  code: number;
  severity: Severity;
  category: DiagnosticCategory;
  message: string;
  notes: string[];
  explanation?: string;
}

// ============================================================================
// Error Catalog: Arithmetic (1001-1099)
// ============================================================================

export const Q1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Arithmetic,
  messageTemplate: "Denominator cannot be zero (numerator {numerator})",
  explanation: `A rational number was constructed or set with a zero denominator.

Every rational keeps a strictly positive denominator, so n/0 has no
representation. Check the value passed as the denominator, or the result of
the computation that produced it.`,
};

export const Q1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Arithmetic,
  messageTemplate: "Division of {dividend} by a zero-valued rational",
  explanation: `The right-hand side of a division (or the argument of reciprocal) is 0/1.

Dividing by zero would produce a zero denominator. Test the divisor with
isZero() before dividing.`,
};

export const Q1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Overflow,
  messageTemplate: "Value {value} does not fit in {kind} [{min}, {max}] while {operation}",
  explanation: `An intermediate or final value left the range of its integer kind.

Products are computed in the next wider kind and narrowed back after
reduction, which covers most magnitudes, but not all. Use a wider kind for
the operands, or set rational.overflow to "wrapping" to get two's-complement
wraparound instead of this error.`,
};

export const Q1004: DiagnosticDescriptor = {
  code: 1004,
  severity: "error",
  category: DiagnosticCategory.Conversion,
  messageTemplate: "Expected an integer for the {what}, got {value}",
  explanation: `Numerators, denominators and scalar operands are integers.

A JavaScript number is accepted when it is a safe integer
(Number.isSafeInteger). Pass a bigint for larger values.`,
};

export const Q1005: DiagnosticDescriptor = {
  code: 1005,
  severity: "error",
  category: DiagnosticCategory.Conversion,
  messageTemplate: "Cannot convert non-finite number {value} to a rational",
  explanation: `NaN and the infinities have no rational value.`,
};

export const Q1006: DiagnosticDescriptor = {
  code: 1006,
  severity: "error",
  category: DiagnosticCategory.Arithmetic,
  messageTemplate: "Cannot raise zero to the negative power {exponent}",
  explanation: `A negative power is the reciprocal of a positive power, and zero has no
reciprocal.`,
};

export const Q1007: DiagnosticDescriptor = {
  code: 1007,
  severity: "error",
  category: DiagnosticCategory.Arithmetic,
  messageTemplate: "Exponent {exponent} is not a safe integer",
  explanation: `Raising a rational to a fractional power generally leaves the rationals.
Only integral exponents in the safe integer range are supported.`,
};

export const Q1008: DiagnosticDescriptor = {
  code: 1008,
  severity: "error",
  category: DiagnosticCategory.Conversion,
  messageTemplate: "Denominator bound {bound} is below 1",
  explanation: `fromNumber() searches for the best approximation whose denominator does not
exceed the bound, so the bound must allow at least the denominator 1.`,
};

// ============================================================================
// Error Catalog: Configuration (1100-1199)
// ============================================================================

export const Q1101: DiagnosticDescriptor = {
  code: 1101,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "Invalid value {value} for configuration key {key} (expected {expected})",
  explanation: `A configuration file, QUOTIENT_* environment variable or config.set() call
supplied a value of the wrong shape.`,
};

// ============================================================================
// Error Catalog: Parsing (1200-1299)
// ============================================================================

export const Q1201: DiagnosticDescriptor = {
  code: 1201,
  severity: "info",
  category: DiagnosticCategory.Parse,
  messageTemplate: "Cannot read a {kind} rational from '{text}'",
  explanation: `The text form of a rational is <integer><one character><integer>,
for example "3/4". Reads that fail leave the target at 0/1 and put the input
stream in the failed state.`,
};

// ============================================================================
// Error Catalog: Internal (1900-1999)
// ============================================================================

export const Q1999: DiagnosticDescriptor = {
  code: 1999,
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Internal error: {message}",
  explanation: `An internal invariant was violated. This is a bug in quotient.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map([
  [1001, Q1001],
  [1002, Q1002],
  [1003, Q1003],
  [1004, Q1004],
  [1005, Q1005],
  [1006, Q1006],
  [1007, Q1007],
  [1008, Q1008],
  [1101, Q1101],
  [1201, Q1201],
  [1999, Q1999],
]);

/**
 * Get a diagnostic descriptor by code.
 */
export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

/**
 * Get all diagnostic descriptors for a category.
 */
export function getDiagnosticsByCategory(category: DiagnosticCategory): DiagnosticDescriptor[] {
  return Array.from(DIAGNOSTIC_CATALOG.values()).filter((d) => d.category === category);
}

/**
 * Format a code the way it appears in messages: 1001 → "Q1001".
 */
export function formatCode(code: number): string {
  return `Q${code}`;
}

/**
 * Interpolate a descriptor's message template.
 */
export function interpolateMessage(descriptor: DiagnosticDescriptor, args: DiagnosticArgs = {}): string {
  let message = descriptor.messageTemplate;
  for (const [key, value] of Object.entries(args)) {
    if (value !== undefined) {
      message = message.replace(new RegExp(`\\{${key}\\}`, "g"), String(value));
    }
  }
  return message;
}

/**
 * Build a Diagnostic from a catalog entry.
 */
export function createDiagnostic(
  descriptor: DiagnosticDescriptor,
  args: DiagnosticArgs = {},
  notes: string[] = []
): Diagnostic {
  return {
    code: descriptor.code,
    severity: descriptor.severity,
    category: descriptor.category,
    message: interpolateMessage(descriptor, args),
    notes,
    explanation: descriptor.explanation,
  };
}

// ============================================================================
// DiagnosticError
// ============================================================================

/**
 * Error thrown for every reported failure.
 */
export class DiagnosticError extends RangeError {
  readonly code: number;
  readonly descriptor: DiagnosticDescriptor;
  readonly args: DiagnosticArgs;

  constructor(descriptor: DiagnosticDescriptor, args: DiagnosticArgs = {}) {
    super(`[${formatCode(descriptor.code)}] ${interpolateMessage(descriptor, args)}`);
    this.name = "DiagnosticError";
    this.code = descriptor.code;
    this.descriptor = descriptor;
    this.args = args;
  }

  toDiagnostic(): Diagnostic {
    return createDiagnostic(this.descriptor, this.args);
  }
}

/**
 * Check whether an unknown thrown value is a DiagnosticError, optionally with
 * a specific code.
 */
export function isDiagnosticError(error: unknown, code?: number): error is DiagnosticError {
  return error instanceof DiagnosticError && (code === undefined || error.code === code);
}

// ============================================================================
// CLI Renderer
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or QUOTIENT_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.QUOTIENT_NO_COLOR && env.FORCE_COLOR !== "0";
}

function color(text: string, enabled: boolean, ...styles: (keyof typeof COLORS)[]): string {
  if (!enabled) return text;
  const prefix = styles.map((s) => COLORS[s]).join("");
  return `${prefix}${text}${COLORS.reset}`;
}

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

/**
 * Options for rendering.
 */
export interface RenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Render a diagnostic, Rust style.
 *
 * @example Output:
 * ```
 * error[Q1001]: Denominator cannot be zero (numerator 3)
 *    = note: while reading "3/0"
 * ```
 */
export function renderDiagnostic(diagnostic: Diagnostic, options: RenderOptions = {}): string {
  const { showExplanation = false } = options;
  const useColors = options.colors ?? colorsEnabled();
  const sevColor = severityColor(diagnostic.severity);

  const lines: string[] = [];
  lines.push(
    `${color(diagnostic.severity, useColors, "bold", sevColor)}${color(
      `[${formatCode(diagnostic.code)}]`,
      useColors,
      "bold",
      sevColor
    )}: ${color(diagnostic.message, useColors, "bold")}`
  );

  for (const note of diagnostic.notes) {
    lines.push(`   = note: ${note}`);
  }

  if (showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", useColors, "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Print a diagnostic to the console (stderr).
 */
export function printDiagnostic(diagnostic: Diagnostic, options: RenderOptions = {}): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnostic(diagnostic, options));
}
