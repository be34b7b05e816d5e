/**
 * Token stream with cursor and lookahead over one level of a token tree
 */

import type { TokenTree } from "@splicer/core";

export class TokenStream {
  private tokens: readonly TokenTree[];
  private pos: number = 0;

  constructor(tokens: readonly TokenTree[]) {
    this.tokens = tokens;
  }

  get position(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  current(): TokenTree | null {
    return this.tokens[this.pos] ?? null;
  }

  peek(offset: number = 0): TokenTree | null {
    return this.tokens[this.pos + offset] ?? null;
  }

  /**
   * Return the current token and move past it.
   */
  next(): TokenTree | null {
    const token = this.current();
    if (token) this.pos++;
    return token;
  }
}
