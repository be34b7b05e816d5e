/**
 * Splice Scanner
 *
 * Walks a token sequence depth-first. Ordinary groups are resolved from the
 * inside out and rebuilt only when something inside them changed, so a
 * sequence without splice units comes back as the very same array.
 */

import { diagnostic, SP9001, type SourceSpan, type TokenTree } from "@splicer/core";
import { concatSpliceUnit, isSpliceUnit, opensSpliceUnit, spliceContents, type ConcatEnv } from "./concat.js";
import { reassemble, type Replacement } from "./reassemble.js";

export function scanSequence(tokens: readonly TokenTree[], env: ConcatEnv): readonly TokenTree[] {
  const replacements: Replacement[] = [];

  tokens.forEach((token, index) => {
    if (token.kind !== "group") return;

    if (opensSpliceUnit(token)) {
      if (!isSpliceUnit(token)) {
        return diagnostic(SP9001)
          .at(token.span)
          .withArgs({ detail: "`[<` is not closed by `>]`" })
          .raise();
      }
      replacements.push({ start: index, end: index + 1, token: concatSpliceUnit(token, env) });
      return;
    }

    const children = scanSequence(token.tokens, env);
    if (children !== token.tokens) {
      replacements.push({ start: index, end: index + 1, token: { ...token, tokens: children } });
    }
  });

  return replacements.length === 0 ? tokens : reassemble(tokens, replacements);
}

/**
 * Index the identifiers a `span(name)` modifier may refer to: every identifier
 * in the invocation, first occurrence wins, except modifier names and their
 * arguments.
 */
export function collectReferenceTargets(tokens: readonly TokenTree[]): Map<string, SourceSpan> {
  const targets = new Map<string, SourceSpan>();

  const record = (text: string, span: SourceSpan) => {
    if (!targets.has(text)) targets.set(text, span);
  };

  const visit = (level: readonly TokenTree[]) => {
    for (const token of level) {
      if (token.kind === "ident") {
        record(token.text, token.span);
      } else if (token.kind === "group") {
        if (isSpliceUnit(token)) {
          visitSpliceContents(spliceContents(token));
        } else {
          visit(token.tokens);
        }
      }
    }
  };

  const visitSpliceContents = (contents: readonly TokenTree[]) => {
    for (let i = 0; i < contents.length; i++) {
      const token = contents[i];
      if (token.kind === "punct" && token.text === ":") {
        // skip the modifier name and its argument group
        i++;
        const argument = contents[i + 1];
        if (argument?.kind === "group" && argument.delimiter === "paren") i++;
      } else if (token.kind === "ident") {
        record(token.text, token.span);
      }
    }
  };

  visit(tokens);
  return targets;
}
