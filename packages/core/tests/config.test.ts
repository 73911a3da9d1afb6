/**
 * Tests for the configuration system
 */

import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { config, defineConfig, isDiagnosticError, parseEnvConfig, Q1101 } from "../src/index.js";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("starts with debug off", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.isDebug()).toBe(false);
    });

    it("uses checked overflow", () => {
      expect(config.get("rational.overflow")).toBe("checked");
      expect(config.overflowMode()).toBe("checked");
    });

    it("bounds fromNumber denominators at one million", () => {
      expect(config.get("rational.maxDenominator")).toBe(1_000_000);
      expect(config.maxDenominator()).toBe(1_000_000n);
    });

    it("returns undefined for unknown paths", () => {
      expect(config.get("rational.nope")).toBeUndefined();
      expect(config.get("debug.deeper")).toBeUndefined();
    });
  });

  describe("set", () => {
    it("merges nested values", () => {
      config.set({ rational: { overflow: "wrapping" } });
      expect(config.overflowMode()).toBe("wrapping");
      expect(config.maxDenominator()).toBe(1_000_000n);
    });

    it("accepts custom keys", () => {
      config.set({ app: { name: "demo" } });
      expect(config.get("app.name")).toBe("demo");
      expect(config.has("app.name")).toBe(true);
    });

    it("rejects a non-positive maxDenominator", () => {
      expect(() => config.set({ rational: { maxDenominator: 0 } })).toThrow(
        'Invalid value 0 for configuration key rational.maxDenominator (expected a positive safe integer)'
      );
    });

    it("is undone by reset", () => {
      config.set({ debug: true });
      config.reset();
      expect(config.isDebug()).toBe(false);
    });
  });

  describe("parseEnvConfig", () => {
    it("maps QUOTIENT_ variables to nested camelCase paths", () => {
      expect(
        parseEnvConfig({
          QUOTIENT_DEBUG: "1",
          QUOTIENT_RATIONAL__OVERFLOW: "wrapping",
          QUOTIENT_RATIONAL__MAX_DENOMINATOR: "1000",
        })
      ).toEqual({
        debug: true,
        rational: { overflow: "wrapping", maxDenominator: 1000 },
      });
    });

    it("parses boolean words", () => {
      expect(parseEnvConfig({ QUOTIENT_DEBUG: "false" })).toEqual({ debug: false });
      expect(parseEnvConfig({ QUOTIENT_DEBUG: "true" })).toEqual({ debug: true });
      expect(parseEnvConfig({ QUOTIENT_DEBUG: "" })).toEqual({ debug: false });
    });

    it("ignores unrelated variables and QUOTIENT_NO_COLOR", () => {
      expect(parseEnvConfig({ HOME: "/home/test", QUOTIENT_NO_COLOR: "1" })).toEqual({});
    });
  });

  describe("config files", () => {
    const originalCwd = process.cwd();
    let dir: string;

    beforeEach(() => {
      dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "quotient-config-")));
      process.chdir(dir);
    });

    afterEach(() => {
      process.chdir(originalCwd);
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("finds nothing in an empty directory", () => {
      config.reset();
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(config.overflowMode()).toBe("checked");
    });

    it("loads .quotientrc.json", () => {
      fs.writeFileSync(
        path.join(dir, ".quotientrc.json"),
        JSON.stringify({ rational: { overflow: "wrapping", maxDenominator: 50 } })
      );
      config.reset();
      expect(config.getConfigFilePath()).toBe(path.join(dir, ".quotientrc.json"));
      expect(config.overflowMode()).toBe("wrapping");
      expect(config.maxDenominator()).toBe(50n);
    });

    it("loads the quotient key of package.json", () => {
      fs.writeFileSync(path.join(dir, "package.json"), JSON.stringify({ name: "app", quotient: { debug: true } }));
      config.reset();
      expect(config.isDebug()).toBe(true);
    });

    it("lets environment variables override the file", () => {
      fs.writeFileSync(path.join(dir, ".quotientrc.json"), JSON.stringify({ rational: { overflow: "wrapping" } }));
      vi.stubEnv("QUOTIENT_RATIONAL__OVERFLOW", "checked");
      config.reset();
      expect(config.overflowMode()).toBe("checked");
    });

    it("rejects a file that is not an object", () => {
      fs.writeFileSync(path.join(dir, ".quotientrc.json"), "42");
      config.reset();
      expect(() => config.get("debug")).toThrow("[Q1101] Invalid value 42 for configuration key quotient");
    });
  });

  describe("environment overrides", () => {
    it("take precedence over defaults", () => {
      vi.stubEnv("QUOTIENT_RATIONAL__OVERFLOW", "wrapping");
      vi.stubEnv("QUOTIENT_DEBUG", "1");
      config.reset();
      expect(config.overflowMode()).toBe("wrapping");
      expect(config.isDebug()).toBe(true);
    });

    it("are validated", () => {
      vi.stubEnv("QUOTIENT_RATIONAL__OVERFLOW", "saturating");
      config.reset();
      let caught: unknown;
      try {
        config.get("rational.overflow");
      } catch (error) {
        caught = error;
      }
      expect(isDiagnosticError(caught, Q1101.code)).toBe(true);
    });

    it("reject a non-boolean debug flag", () => {
      vi.stubEnv("QUOTIENT_DEBUG", "yes");
      config.reset();
      expect(() => config.isDebug()).toThrow(
        "[Q1101] Invalid value yes for configuration key debug (expected a boolean)"
      );
    });
  });

  it("defineConfig returns its argument", () => {
    const cfg = defineConfig({ rational: { overflow: "wrapping" } });
    expect(cfg).toEqual({ rational: { overflow: "wrapping" } });
  });
});
