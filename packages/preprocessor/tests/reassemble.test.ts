import { describe, it, expect } from "vitest";
import { ident } from "@splicer/core";
import { reassemble } from "../src/paste/reassemble.js";

describe("reassemble", () => {
  const tokens = ["a", "b", "c", "d", "e"].map((text) => ident(text));

  it("should replace each span with one token", () => {
    const x = ident("x");
    const y = ident("y");
    const result = reassemble(tokens, [
      { start: 1, end: 3, token: x },
      { start: 4, end: 5, token: y },
    ]);

    expect(result.map((t) => (t.kind === "ident" ? t.text : t.kind))).toEqual(["a", "x", "d", "y"]);
    // input length - consumed tokens + one token per replacement
    expect(result).toHaveLength(5 - 3 + 2);
    expect(result[0]).toBe(tokens[0]);
    expect(result[2]).toBe(tokens[3]);
  });

  it("should copy the sequence when there is nothing to replace", () => {
    const result = reassemble(tokens, []);
    expect(result).toEqual(tokens);
    expect(result).not.toBe(tokens);
  });

  it("should reject overlapping replacements", () => {
    expect(() =>
      reassemble(tokens, [
        { start: 1, end: 3, token: ident("x") },
        { start: 2, end: 4, token: ident("y") },
      ])
    ).toThrow(RangeError);
  });

  it("should reject replacements past the end", () => {
    expect(() => reassemble(tokens, [{ start: 4, end: 6, token: ident("x") }])).toThrow(
      "reassemble: replacement [4, 6) is out of order or out of bounds"
    );
  });
});
