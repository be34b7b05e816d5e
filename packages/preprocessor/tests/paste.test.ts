import { describe, it, expect } from "vitest";
import { isExpansionError, renderTokens, tokensEqual, type RichDiagnostic, type TokenTree } from "@splicer/core";
import { parseTokens } from "../src/scanner.js";
import { expandPaste, type PasteOptions } from "../src/paste/index.js";

function paste(source: string, options?: PasteOptions): readonly TokenTree[] {
  return expandPaste(parseTokens(source), options);
}

function pasteDiagnostic(source: string): RichDiagnostic {
  try {
    paste(source);
  } catch (error) {
    if (isExpansionError(error)) return error.diagnostic;
    throw error;
  }
  throw new Error(`expected ${source} to fail`);
}

function pasteText(source: string, options?: PasteOptions): string {
  return renderTokens(paste(source, options));
}

describe("paste", () => {
  describe("concatenation", () => {
    it("should join identifier fragments into one identifier", () => {
      const result = paste("[<foo _ bar>]");
      expect(result).toHaveLength(1);
      expect(result[0]).toMatchObject({ kind: "ident", text: "foo_bar" });
    });

    it("should append integer literals as decimal digits", () => {
      expect(pasteText("[<item 42>]")).toBe("item42");
      expect(pasteText("[<x 0x2a>]")).toBe("x42");
      expect(pasteText("[<x 1_000>]")).toBe("x1000");
      expect(pasteText("[<x 10n>]")).toBe("x10");
    });

    it("should read legacy octal literals in base eight", () => {
      expect(pasteText("[<x 017>]")).toBe("x15");
      expect(pasteText("[<x 09>]")).toBe("x9");
    });

    it("should paste string literals without their quotes", () => {
      expect(pasteText('[<get_ "name">]')).toBe("get_name");
      expect(pasteText("[<`Tpl` Name>]")).toBe("TplName");
    });

    it("should resolve every unit in a sequence", () => {
      expect(pasteText("f([<a b>], [<c d>])")).toBe("f(ab, cd)");
    });

    it("should resolve units inside nested groups", () => {
      const result = paste("( [<a b>] )");
      expect(tokensEqual(result, parseTokens("(ab)"))).toBe(true);
      expect(renderTokens(result)).toBe("( ab )");
    });

    it("should keep the spacing after the unit", () => {
      expect(pasteText("let [<a b>]= 1")).toBe("let ab= 1");
    });
  });

  describe("modifiers", () => {
    it("should lower-case a fragment", () => {
      expect(pasteText("[<FOO:lower>]")).toBe("foo");
    });

    it("should upper-case a fragment", () => {
      expect(pasteText("[<foo:upper>]")).toBe("FOO");
    });

    it("should only touch the fragment it is attached to", () => {
      expect(pasteText("[<Get_ name:upper>]")).toBe("Get_NAME");
    });

    it("should let the last case modifier win by default", () => {
      expect(pasteText("[<Foo:lower:upper>]")).toBe(pasteText("[<Foo:upper>]"));
      expect(pasteText("[<Foo:upper:lower>]")).toBe("foo");
    });

    it("should reject conflicting case modifiers when configured to", () => {
      expect(() => paste("[<a:lower:upper>]", { caseModifiers: "reject-conflicts" })).toThrow(
        "[SP9007] Conflicting case modifiers on fragment `a`"
      );
      expect(pasteText("[<a:upper:upper>]", { caseModifiers: "reject-conflicts" })).toBe("A");
    });

    it("should reject unknown modifiers at the modifier name", () => {
      expect(pasteDiagnostic("[<a:title>]")).toMatchObject({
        code: 9004,
        message: "Unknown paste modifier `title`",
        primarySpan: { start: 4, end: 9 },
        help: "Supported modifiers are `lower`, `upper` and `span`",
      });
    });

    it("should reject a modifier before any fragment", () => {
      expect(() => paste("[<:lower a>]")).toThrow(
        "[SP9001] Malformed splice syntax: modifier must follow a fragment"
      );
    });

    it("should reject a missing modifier name", () => {
      expect(() => paste("[<a:>]")).toThrow("[SP9001] Malformed splice syntax: expected a modifier name after `:`");
    });

    it("should reject arguments to case modifiers", () => {
      expect(() => paste("[<a:lower(x)>]")).toThrow("[SP9001] Malformed splice syntax: `lower` takes no argument");
    });
  });

  describe("span", () => {
    it("should locate the result at the splice unit by default", () => {
      const result = parseTokens("let [<a b>] = 1;", { fileName: "x.ts" });
      const unit = result[1];
      const pasted = expandPaste(result)[1];

      expect(pasted.span).toBe(unit.span);
      expect(pasted.span).toEqual({ fileName: "x.ts", start: 4, end: 11 });
    });

    it("should take the location of the fragment carrying a bare span", () => {
      const [pasted] = paste("[<a b:span>]");
      expect(pasted.span).toEqual({ fileName: undefined, start: 4, end: 5 });
    });

    it("should take the location of a referenced identifier", () => {
      const result = paste("let target = 1; [<a b:span(target)>]");
      expect(result[5]).toMatchObject({ text: "ab", span: { start: 4, end: 10 } });
    });

    it("should report a reference that does not exist", () => {
      expect(() => paste("[<a:span(missing)>]")).toThrow(
        "[SP9005] span modifier target `missing` not found in this invocation"
      );
    });

    it("should allow one span per unit", () => {
      expect(() => paste("[<a:span b:span>]")).toThrow(
        "[SP9001] Malformed splice syntax: span modifier may appear at most once in a splice unit"
      );
    });

    it("should require a single identifier as span argument", () => {
      expect(() => paste("[<a:span(1)>]")).toThrow(
        "[SP9001] Malformed splice syntax: span argument must be a single identifier"
      );
    });
  });

  describe("malformed input", () => {
    it("should reject an unterminated unit", () => {
      expect(() => paste("[<a b]")).toThrow("[SP9001] Malformed splice syntax: `[<` is not closed by `>]`");
    });

    it("should reject nested units", () => {
      expect(pasteDiagnostic("[<a [<b>]>]")).toMatchObject({
        code: 9001,
        message: "Malformed splice syntax: splice units do not nest",
        primarySpan: { start: 4, end: 9 },
        labels: [{ message: "outer splice unit", span: { start: 0, end: 11 } }],
      });
    });

    it("should reject an empty unit", () => {
      expect(() => paste("[<>]")).toThrow("[SP9002] Empty splice unit");
    });

    it("should reject punctuation and groups", () => {
      expect(() => paste("[<a + b>]")).toThrow("[SP9003] Cannot paste punctuation `+` into an identifier");
      expect(() => paste("[<a (b)>]")).toThrow("[SP9003] Cannot paste a delimited group `(b)` into an identifier");
    });

    it("should reject float literals", () => {
      expect(() => paste("[<x 1.5>]")).toThrow("[SP9003] Cannot paste float literal `1.5` into an identifier");
    });

    it("should reject strings that are not identifier text", () => {
      expect(() => paste('[<"a b">]')).toThrow('[SP9003] Cannot paste string literal `"a b"` into an identifier');
    });

    it("should reject results that are not identifiers", () => {
      expect(() => paste("[<42 item>]")).toThrow("[SP9006] Pasted text `42item` is not a valid identifier");
    });
  });

  describe("non-interference", () => {
    it("should return the same sequence when there is nothing to paste", () => {
      const tokens = parseTokens("const x = f(a, [b], { c: [1] });");
      expect(expandPaste(tokens)).toBe(tokens);
    });

    it("should keep the tokens around a unit as they were", () => {
      const tokens = parseTokens("foo(1, 2) [<a b>] + bar");
      const result = expandPaste(tokens);

      expect(result).toHaveLength(tokens.length);
      expect(result[0]).toBe(tokens[0]);
      expect(result[1]).toBe(tokens[1]);
      expect(result[3]).toBe(tokens[3]);
      expect(result[4]).toBe(tokens[4]);
    });

    it("should rebuild only the groups that changed", () => {
      const tokens = parseTokens("{ a } ([<x y>])");
      const result = expandPaste(tokens);

      expect(result[0]).toBe(tokens[0]);
      expect(result[1]).not.toBe(tokens[1]);
    });

    it("should be a no-op on its own output", () => {
      const once = paste("f([<a b>])");
      expect(expandPaste(once)).toBe(once);
    });
  });
});
