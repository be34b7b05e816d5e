import { describe, it, expect } from "vitest";
import { tokenize, parseTokens } from "../src/scanner.js";
import * as ts from "typescript";

describe("scanner", () => {
  describe("tokenize", () => {
    it("should tokenize basic TypeScript", () => {
      const tokens = tokenize("const x = 1;");
      expect(tokens.map((t) => t.text)).toEqual(["const", "x", "=", "1", ";"]);
      expect(tokens[0].kind).toBe(ts.SyntaxKind.ConstKeyword);
    });

    it("should drop comments", () => {
      const tokens = tokenize("a /* b */ // c\nd");
      expect(tokens.map((t) => t.text)).toEqual(["a", "d"]);
    });

    it("should keep the splice markers as separate tokens", () => {
      const tokens = tokenize("[<a:lower>]");
      expect(tokens.map((t) => t.text)).toEqual(["[", "<", "a", ":", "lower", ">", "]"]);
    });

    it("should split template literals at substitutions", () => {
      const tokens = tokenize("`a${b}c`");
      expect(tokens.map((t) => t.text)).toEqual(["`a${", "b", "}c`"]);
      expect(tokens[2].kind).toBe(ts.SyntaxKind.TemplateTail);
    });

    it("should tell substitution braces from object braces", () => {
      const tokens = tokenize("`${ {a: 1} }`");
      expect(tokens.map((t) => t.text)).toEqual(["`${", "{", "a", ":", "1", "}", "}`"]);
    });

    it("should scan a regular expression after an operator", () => {
      const tokens = tokenize("x = /ab+c/g;");
      expect(tokens.map((t) => t.text)).toEqual(["x", "=", "/ab+c/g", ";"]);
    });

    it("should scan a regular expression after a control statement head", () => {
      const tokens = tokenize("if (ok) /\\(/.test(s);");
      expect(tokens.map((t) => t.text)).toEqual(["if", "(", "ok", ")", "/\\(/", ".", "test", "(", "s", ")", ";"]);
      expect(tokens[4].kind).toBe(ts.SyntaxKind.RegularExpressionLiteral);
    });

    it("should scan division after a parenthesized expression", () => {
      const tokens = tokenize("while ((a) / b) {}");
      expect(tokens.map((t) => t.text)).toEqual(["while", "(", "(", "a", ")", "/", "b", ")", "{", "}"]);
    });

    it("should scan division after an identifier", () => {
      const tokens = tokenize("a / b / c");
      expect(tokens.map((t) => t.text)).toEqual(["a", "/", "b", "/", "c"]);
    });

    it("should record source offsets", () => {
      const tokens = tokenize("let  abc");
      expect(tokens[1]).toMatchObject({ text: "abc", start: 5, end: 8 });
    });
  });

  describe("parseTokens", () => {
    it("should nest delimited groups", () => {
      const [callee, args] = parseTokens("f(a, [b])");
      expect(callee).toMatchObject({ kind: "ident", text: "f", spacing: "joint" });
      expect(args.kind).toBe("group");
      if (args.kind !== "group") return;
      expect(args.delimiter).toBe("paren");
      expect(args.span).toEqual({ fileName: undefined, start: 1, end: 9 });
      expect(args.tokens.map((t) => t.kind)).toEqual(["ident", "punct", "group"]);
    });

    it("should record spacing between tokens", () => {
      const tokens = parseTokens("a b\n  c(d)");
      expect(tokens.map((t) => t.spacing)).toEqual(["alone", "line", "joint", "alone"]);
    });

    it("should record the file name in spans", () => {
      const [token] = parseTokens("x", { fileName: "src/x.ts" });
      expect(token.span).toEqual({ fileName: "src/x.ts", start: 0, end: 1 });
    });

    it("should classify literals", () => {
      const tokens = parseTokens("0x2a 1.5 10n 'x' 1_000 1e3");
      expect(tokens.map((t) => (t.kind === "literal" ? t.literal : t.kind))).toEqual([
        "integer",
        "float",
        "bigint",
        "string",
        "integer",
        "float",
      ]);
    });

    it("should unquote string literal values", () => {
      const [token] = parseTokens('"na\\u006De"');
      expect(token).toMatchObject({ kind: "literal", text: '"na\\u006De"', value: "name" });
    });

    it("should treat keywords as identifiers", () => {
      const [token] = parseTokens("const");
      expect(token).toMatchObject({ kind: "ident", text: "const" });
    });

    it("should keep template substitutions balanced", () => {
      const [, args] = parseTokens("f(`${ {a} }`)");
      if (args.kind !== "group") throw new Error("expected a group");
      expect(args.tokens.map((t) => (t.kind === "literal" ? t.literal : t.kind))).toEqual([
        "template-part",
        "group",
        "template-part",
      ]);
    });

    it("should reject a mismatched close delimiter", () => {
      expect(() => parseTokens("(a]")).toThrow("[SP9201] Unbalanced delimiter `]`");
    });

    it("should reject an unclosed delimiter", () => {
      expect(() => parseTokens("f(a")).toThrow("[SP9201] Unbalanced delimiter `(`");
    });
  });
});
