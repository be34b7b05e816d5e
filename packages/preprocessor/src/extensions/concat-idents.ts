/**
 * concat_idents!(a, b): join two identifiers into one
 *
 * The result is located at the second identifier, so diagnostics about the
 * new name point at the part the caller supplied.
 */

import { defineTokenMacro, renderTokens, SP9101, type Ident, type MacroContext, type TokenTree } from "@splicer/core";
import { isIdentifierText } from "../paste/concat.js";

function arityError(ctx: MacroContext, tokens: readonly TokenTree[], detail: string): never {
  return ctx
    .diagnostic(SP9101)
    .at(tokens[0]?.span ?? ctx.invocationSpan)
    .withArgs({ detail })
    .note(`got \`${renderTokens(tokens)}\``)
    .raise();
}

export function concatIdents(tokens: readonly TokenTree[], ctx: MacroContext): readonly TokenTree[] {
  if (tokens.length !== 3) {
    return arityError(ctx, tokens, `found ${tokens.length} token${tokens.length === 1 ? "" : "s"}`);
  }

  const [first, comma, second] = tokens;
  if (first.kind !== "ident" || second.kind !== "ident") {
    return arityError(ctx, tokens, "found a token that is not an identifier");
  }
  if (comma.kind !== "punct" || comma.text !== ",") {
    return arityError(ctx, tokens, `found \`${renderTokens([comma])}\` where \`,\` was expected`);
  }

  const joined: Ident = {
    kind: "ident",
    text: first.text + second.text,
    span: second.span,
    spacing: second.spacing,
  };
  if (!isIdentifierText(joined.text)) {
    return arityError(ctx, tokens, `but \`${joined.text}\` is not an identifier`);
  }
  return [joined];
}

export const concatIdentsMacro = defineTokenMacro({
  name: "concat_idents",
  module: "@splicer/preprocessor",
  description: "Join two identifiers into one located at the second",
  expand: concatIdents,
});
