/**
 * Tests for configuration loading
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { config, createMacroContext, loadConfigFromEnv, normalizeConfig, resolveConfig, SP9002 } from "@splicer/core";

describe("config", () => {
  afterEach(() => {
    config.reset();
    vi.unstubAllEnvs();
  });

  describe("loadConfigFromEnv", () => {
    it("should map SPLICER_* variables onto nested camelCase keys", () => {
      const env = {
        SPLICER_VERBOSE: "1",
        SPLICER_DEBUG: "false",
        SPLICER_PASTE__CASE_MODIFIERS: "reject-conflicts",
        SPLICER_MACROS__ENABLED: "paste, concat_idents",
        SPLICER_NO_COLOR: "1",
        HOME: "/home/test",
      };

      expect(loadConfigFromEnv(env)).toEqual({
        verbose: true,
        debug: false,
        paste: { caseModifiers: "reject-conflicts" },
        macros: { enabled: ["paste", "concat_idents"] },
      });
    });
  });

  describe("precedence", () => {
    it("should default to last-wins case modifiers", () => {
      expect(config.get("paste.caseModifiers")).toBe("last-wins");
      expect(config.get("verbose")).toBe(false);
    });

    it("should let set() override the defaults", () => {
      config.set({ paste: { caseModifiers: "reject-conflicts" } });
      expect(config.getAll().paste?.caseModifiers).toBe("reject-conflicts");
      expect(config.get("verbose")).toBe(false);
    });

    it("should let the environment override set()", () => {
      config.set({ paste: { caseModifiers: "reject-conflicts" } });
      vi.stubEnv("SPLICER_PASTE__CASE_MODIFIERS", "last-wins");
      expect(config.get("paste.caseModifiers")).toBe("last-wins");
    });

    it("reset() drops programmatic values", () => {
      config.set({ verbose: true });
      config.reset();
      expect(config.get("verbose")).toBe(false);
    });
  });

  describe("normalizeConfig", () => {
    it("should reject an unknown case modifier policy", () => {
      expect(() => normalizeConfig({ paste: { caseModifiers: "first-wins" } })).toThrow(TypeError);
    });

    it("should reject a non-boolean flag", () => {
      expect(() => normalizeConfig({ verbose: "yes" })).toThrow("`verbose` must be a boolean");
    });

    it("should reject a macro list that is not strings", () => {
      expect(() => normalizeConfig({ macros: { enabled: ["paste", 1] } })).toThrow(
        "`macros.enabled` must be a list of strings"
      );
    });
  });

  describe("resolveConfig", () => {
    it("should merge overrides over the loaded configuration", () => {
      config.set({ verbose: true });
      const resolved = resolveConfig({ paste: { caseModifiers: "reject-conflicts" } });
      expect(resolved.verbose).toBe(true);
      expect(resolved.paste?.caseModifiers).toBe("reject-conflicts");
    });
  });

  describe("createMacroContext", () => {
    it("should snapshot the configuration and collect warnings", () => {
      const ctx = createMacroContext({
        fileName: "a.ts",
        invocationSpan: { fileName: "a.ts", start: 0, end: 10 },
        config: { paste: { caseModifiers: "reject-conflicts" } },
      });

      expect(ctx.config.paste?.caseModifiers).toBe("reject-conflicts");
      ctx.diagnostic(SP9002).at(ctx.invocationSpan).emit();
      expect(ctx.warnings).toHaveLength(1);
      expect(ctx.warnings[0].message).toBe("Empty splice unit");
    });
  });
});
