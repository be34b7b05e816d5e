/**
 * Reassembler: rebuilds one level of a token sequence with resolved spans
 * swapped in.
 */

import type { TokenTree } from "@splicer/core";

/**
 * Replace tokens `[start, end)` of a level with a single token.
 */
export interface Replacement {
  start: number;
  end: number;
  token: TokenTree;
}

/**
 * Build a new sequence in which every replacement span is replaced by exactly
 * one token and every other token is carried over as is, in order.
 *
 * Output length is `tokens.length - Σ(end - start) + replacements.length`.
 * Replacements must be sorted by `start` and must not overlap.
 */
export function reassemble(tokens: readonly TokenTree[], replacements: readonly Replacement[]): TokenTree[] {
  const result: TokenTree[] = [];
  let cursor = 0;

  for (const rep of replacements) {
    if (rep.start < cursor || rep.end <= rep.start || rep.end > tokens.length) {
      throw new RangeError(
        `reassemble: replacement [${rep.start}, ${rep.end}) is out of order or out of bounds`
      );
    }
    for (let i = cursor; i < rep.start; i++) {
      result.push(tokens[i]);
    }
    result.push(rep.token);
    cursor = rep.end;
  }

  for (let i = cursor; i < tokens.length; i++) {
    result.push(tokens[i]);
  }

  return result;
}
