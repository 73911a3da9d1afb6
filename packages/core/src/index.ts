/**
 * Core module exports for @quotient/core
 *
 * This package provides:
 * - Operator annotations for typeclass methods (Op<>)
 * - The configuration system
 * - The diagnostics catalog and DiagnosticError
 * - Debug logging
 * - Runtime safety primitives (invariant, unreachable, debugOnly)
 */

export { OPERATOR_SYMBOLS } from "./types.js";
export type { Op, OperatorSymbol, Severity } from "./types.js";

// Configuration System
export { config, defineConfig, parseEnvConfig, OVERFLOW_MODES } from "./config.js";
export type { QuotientConfig, RationalConfig, OverflowMode } from "./config.js";

// Runtime Safety Primitives
export { invariant, unreachable, debugOnly } from "./safety.js";

// Debug Logging
export { debugLog, setLogWriter } from "./debug.js";
export type { LogWriter } from "./debug.js";

// Diagnostics System
export * from "./diagnostics.js";
