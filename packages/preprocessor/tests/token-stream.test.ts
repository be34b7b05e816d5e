import { describe, it, expect } from "vitest";
import { parseTokens } from "../src/scanner.js";
import { TokenStream } from "../src/token-stream.js";

describe("TokenStream", () => {
  it("should walk one level of the tree", () => {
    const stream = new TokenStream(parseTokens("a (b) c"));

    expect(stream.next()).toMatchObject({ text: "a" });
    expect(stream.peek()).toMatchObject({ kind: "group", delimiter: "paren" });
    expect(stream.peek(1)).toMatchObject({ text: "c" });
    expect(stream.position).toBe(1);

    stream.next();
    stream.next();
    expect(stream.atEnd()).toBe(true);
    expect(stream.next()).toBeNull();
    expect(stream.position).toBe(3);
  });
});
