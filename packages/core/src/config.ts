/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for quotient.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: QUOTIENT_* (highest priority, for CI overrides)
 * 2. Config files: quotient.config.*, .quotientrc*, or a "quotient" key in package.json
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@quotient/core";
 *
 * config.get("debug")                  // → false
 * config.get("rational.overflow")      // → "checked"
 *
 * config.set({ rational: { overflow: "wrapping" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { DiagnosticError, Q1101 } from "./diagnostics.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What happens when a value leaves the range of its integer kind.
 * - "checked": throw a Q1003 DiagnosticError
 * - "wrapping": wrap two's-complement style, then renormalize
 */
export type OverflowMode = "checked" | "wrapping";

export const OVERFLOW_MODES: readonly OverflowMode[] = ["checked", "wrapping"];

/**
 * Rational arithmetic options.
 */
export interface RationalConfig {
  /** Overflow policy for narrowing (default "checked") */
  overflow?: OverflowMode;
  /** Largest denominator fromNumber() may produce (default 1000000) */
  maxDenominator?: number;
}

/**
 * Full quotient configuration schema.
 */
export interface QuotientConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Rational arithmetic options */
  rational?: RationalConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: QuotientConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

const DEFAULTS: QuotientConfig = {
  debug: false,
  rational: {
    overflow: "checked",
    maxDenominator: 1_000_000,
  },
};

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "quotient";

/**
 * Load configuration synchronously from files.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  const result = explorer.search();
  if (result === null || result.isEmpty) {
    return {};
  }

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new DiagnosticError(Q1101, {
      key: MODULE_NAME,
      value: JSON.stringify(loaded),
      expected: `an object in ${result.filepath}`,
    });
  }

  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with QUOTIENT_ are parsed into the config object.
 * A double underscore separates nesting levels; single underscores inside a
 * level become camelCase.
 *
 * Examples:
 *   QUOTIENT_DEBUG=1                             → { debug: true }
 *   QUOTIENT_RATIONAL__OVERFLOW=wrapping         → { rational: { overflow: "wrapping" } }
 *   QUOTIENT_RATIONAL__MAX_DENOMINATOR=1000      → { rational: { maxDenominator: 1000 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "QUOTIENT_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    if (key === "QUOTIENT_NO_COLOR") continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase()))
      .join(".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Validation
// ============================================================================

function validate(cfg: Record<string, unknown>): asserts cfg is QuotientConfig {
  const debug = cfg.debug;
  if (debug !== undefined && typeof debug !== "boolean") {
    throw new DiagnosticError(Q1101, { key: "debug", value: String(debug), expected: "a boolean" });
  }

  const overflow: unknown = getNestedValue(cfg, "rational.overflow");
  if (overflow !== undefined && !OVERFLOW_MODES.some((mode) => mode === overflow)) {
    throw new DiagnosticError(Q1101, {
      key: "rational.overflow",
      value: String(overflow),
      expected: OVERFLOW_MODES.map((m) => `"${m}"`).join(" or "),
    });
  }

  const maxDenominator: unknown = getNestedValue(cfg, "rational.maxDenominator");
  if (
    maxDenominator !== undefined &&
    !(typeof maxDenominator === "number" && Number.isSafeInteger(maxDenominator) && maxDenominator >= 1)
  ) {
    throw new DiagnosticError(Q1101, {
      key: "rational.maxDenominator",
      value: String(maxDenominator),
      expected: "a positive safe integer",
    });
  }
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  const merged = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  validate(merged);
  configStore = merged;
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<QuotientConfig>): void {
  initializeConfig();
  const merged = deepMerge(configStore, values);
  validate(merged);
  configStore = merged;
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<QuotientConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read reloads it (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed Accessors
// ============================================================================

/**
 * The active overflow policy.
 */
function overflowMode(): OverflowMode {
  const mode = get("rational.overflow");
  return mode === "wrapping" ? "wrapping" : "checked";
}

/**
 * The active fromNumber() denominator bound.
 */
function maxDenominator(): bigint {
  const value = get("rational.maxDenominator");
  return typeof value === "number" ? BigInt(value) : 1_000_000n;
}

/**
 * Whether debug logging is on.
 */
function isDebug(): boolean {
  return get("debug") === true;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  overflowMode,
  maxDenominator,
  isDebug,
} as const;

/**
 * Parse QUOTIENT_* variables from an environment object. Exposed for tooling
 * that wants to show where a value came from.
 */
export { loadConfigFromEnv as parseEnvConfig };

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: QuotientConfig): QuotientConfig {
  return cfg;
}
