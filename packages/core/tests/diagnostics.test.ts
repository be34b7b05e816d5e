/**
 * Tests for the diagnostics catalog, builder and CLI renderer
 */

import { describe, it, expect, vi } from "vitest";
import {
  DiagnosticCategory,
  diagnostic,
  ExpansionError,
  getDiagnosticDescriptor,
  getLineAndColumn,
  isExpansionError,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
  SP9002,
  SP9004,
  type RichDiagnostic,
} from "@splicer/core";

const SOURCE = "const x = 1;\nconst [<name:title>] = 2;\n";
const TITLE_SPAN = { fileName: "a.ts", start: 26, end: 31 };

describe("diagnostics", () => {
  describe("DiagnosticBuilder", () => {
    it("should interpolate the message template", () => {
      const d = diagnostic(SP9004).at(TITLE_SPAN).withArgs({ name: "title" }).help("try `upper`").build();

      expect(d.code).toBe(9004);
      expect(d.severity).toBe("error");
      expect(d.category).toBe(DiagnosticCategory.Modifier);
      expect(d.message).toBe("Unknown paste modifier `title`");
      expect(d.primarySpan).toEqual(TITLE_SPAN);
      expect(d.help).toBe("try `upper`");
    });

    it("raise() throws an ExpansionError carrying the diagnostic", () => {
      let caught: unknown;
      try {
        diagnostic(SP9004).at(TITLE_SPAN).withArgs({ name: "title" }).raise();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ExpansionError);
      expect(isExpansionError(caught)).toBe(true);
      if (isExpansionError(caught)) {
        expect(caught.message).toBe("[SP9004] Unknown paste modifier `title`");
        expect(caught.diagnostic.primarySpan).toEqual(TITLE_SPAN);
      }
    });

    it("emit() hands the diagnostic to the emitter", () => {
      const emitter = vi.fn<(d: RichDiagnostic) => void>();
      diagnostic(SP9002, emitter).note("from a test").emit();

      expect(emitter).toHaveBeenCalledTimes(1);
      expect(emitter.mock.calls[0][0].message).toBe("Empty splice unit");
      expect(emitter.mock.calls[0][0].notes).toEqual(["from a test"]);
    });

    it("emit() without an emitter throws", () => {
      expect(() => diagnostic(SP9002).emit()).toThrow("No emitter registered for SP9002");
    });
  });

  describe("catalog", () => {
    it("should look descriptors up by code", () => {
      expect(getDiagnosticDescriptor(9002)).toBe(SP9002);
      expect(getDiagnosticDescriptor(1234)).toBeUndefined();
    });
  });

  describe("getLineAndColumn", () => {
    it("should be 1-based", () => {
      expect(getLineAndColumn("ab\ncd", 0)).toEqual({ line: 1, column: 1 });
      expect(getLineAndColumn("ab\ncd", 4)).toEqual({ line: 2, column: 2 });
    });
  });

  describe("renderDiagnosticCLI", () => {
    const d = diagnostic(SP9004)
      .at(TITLE_SPAN)
      .withArgs({ name: "title" })
      .help("Supported modifiers are `lower`, `upper` and `span`")
      .build();

    it("should underline the primary span in the source", () => {
      const output = renderDiagnosticCLI(d, {
        colors: false,
        contextLines: 0,
        readSource: (fileName) => (fileName === "a.ts" ? SOURCE : undefined),
      });

      expect(output).toBe(
        [
          "error[SP9004]: Unknown paste modifier `title`",
          "  --> a.ts:2:14",
          "     |",
          "   2 | const [<name:title>] = 2;",
          "     | " + " ".repeat(13) + "^^^^^",
          "     |",
          "   = help: Supported modifiers are `lower`, `upper` and `span`",
        ].join("\n")
      );
    });

    it("should fall back to offsets without source text", () => {
      const output = renderDiagnosticCLI(d, { colors: false });
      expect(output.split("\n")[1]).toBe("  --> a.ts@26..31");
    });

    it("should print notes", () => {
      const withNote = diagnostic(SP9002).note("first").build();
      expect(renderDiagnosticCLI(withNote, { colors: false })).toBe(
        "error[SP9002]: Empty splice unit\n   = note: first"
      );
    });
  });

  describe("renderDiagnosticsCLI", () => {
    it("should end with a summary", () => {
      const errors = [diagnostic(SP9002).build(), diagnostic(SP9002).build()];
      const output = renderDiagnosticsCLI(errors, { colors: false });
      expect(output.split("\n").pop()).toBe("2 errors generated");
    });

    it("should render nothing for no diagnostics", () => {
      expect(renderDiagnosticsCLI([])).toBe("");
    });
  });
});
