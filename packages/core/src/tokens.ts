/**
 * Token Model
 *
 * A macro's input and output is an ordered list of token trees. Delimited
 * groups own their children outright, so a rewritten sequence is always built
 * fresh and never shares a mutable node with its input.
 */

import type { SourceSpan } from "./diagnostics.js";

/**
 * What separated a token from the one after it in the source. Only used when
 * the sequence is rendered back to text.
 */
export type Spacing = "joint" | "alone" | "line";

export type Delimiter = "paren" | "bracket" | "brace";

export type LiteralKind =
  | "integer"
  | "float"
  | "bigint"
  | "string"
  | "template"
  | "template-part"
  | "regexp";

export interface Ident {
  readonly kind: "ident";
  /** Identifier name with escapes decoded */
  readonly text: string;
  readonly span: SourceSpan;
  readonly spacing: Spacing;
}

export interface Literal {
  readonly kind: "literal";
  readonly literal: LiteralKind;
  /** Literal as written, quotes included */
  readonly text: string;
  /** Cooked value: unquoted string contents, or the numeric text */
  readonly value: string;
  readonly span: SourceSpan;
  readonly spacing: Spacing;
}

export interface Punct {
  readonly kind: "punct";
  readonly text: string;
  readonly span: SourceSpan;
  readonly spacing: Spacing;
}

export interface Group {
  readonly kind: "group";
  readonly delimiter: Delimiter;
  readonly tokens: readonly TokenTree[];
  /** Covers both delimiters */
  readonly span: SourceSpan;
  /** Spacing between the open delimiter and the first child */
  readonly openSpacing: Spacing;
  /** Spacing after the close delimiter */
  readonly spacing: Spacing;
}

export type TokenTree = Ident | Literal | Punct | Group;

export const DELIMITERS: Record<Delimiter, { open: string; close: string }> = {
  paren: { open: "(", close: ")" },
  bracket: { open: "[", close: "]" },
  brace: { open: "{", close: "}" },
};

/** Span used for tokens built outside of any source file */
export const SYNTHETIC_SPAN: SourceSpan = { start: 0, end: 0 };

// ============================================================================
// Constructors
// ============================================================================

export function ident(text: string, span: SourceSpan = SYNTHETIC_SPAN, spacing: Spacing = "alone"): Ident {
  return { kind: "ident", text, span, spacing };
}

export function punct(text: string, span: SourceSpan = SYNTHETIC_SPAN, spacing: Spacing = "alone"): Punct {
  return { kind: "punct", text, span, spacing };
}

export function literal(
  literalKind: LiteralKind,
  text: string,
  value: string,
  span: SourceSpan = SYNTHETIC_SPAN,
  spacing: Spacing = "alone"
): Literal {
  return { kind: "literal", literal: literalKind, text, value, span, spacing };
}

export function group(
  delimiter: Delimiter,
  tokens: readonly TokenTree[],
  span: SourceSpan = SYNTHETIC_SPAN,
  spacing: Spacing = "alone",
  openSpacing: Spacing = "joint"
): Group {
  return { kind: "group", delimiter, tokens, span, openSpacing, spacing };
}

/**
 * Copy a token with a different trailing spacing.
 */
export function withSpacing<T extends TokenTree>(token: T, spacing: Spacing): T {
  return token.spacing === spacing ? token : { ...token, spacing };
}

// ============================================================================
// Predicates
// ============================================================================

export function isPunct(token: TokenTree | undefined, text: string): token is Punct {
  return token?.kind === "punct" && token.text === text;
}

export function isIdent(token: TokenTree | undefined, text?: string): token is Ident {
  return token?.kind === "ident" && (text === undefined || token.text === text);
}

// ============================================================================
// Structural Equality
// ============================================================================

/**
 * Two sequences are equal when they have the same token kinds and text in the
 * same order. Spans and spacing are ignored.
 */
export function tokensEqual(a: readonly TokenTree[], b: readonly TokenTree[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!tokenEqual(a[i], b[i])) return false;
  }
  return true;
}

export function tokenEqual(a: TokenTree, b: TokenTree): boolean {
  switch (a.kind) {
    case "ident":
    case "punct":
      return b.kind === a.kind && b.text === a.text;
    case "literal":
      return b.kind === "literal" && b.literal === a.literal && b.text === a.text;
    case "group":
      return b.kind === "group" && b.delimiter === a.delimiter && tokensEqual(a.tokens, b.tokens);
  }
}

// ============================================================================
// Rendering
// ============================================================================

const SPACING_TEXT: Record<Spacing, string> = {
  joint: "",
  alone: " ",
  line: "\n",
};

/**
 * Print a token sequence back to source text.
 */
export function renderTokens(tokens: readonly TokenTree[]): string {
  let out = "";
  tokens.forEach((token, i) => {
    out += renderToken(token);
    if (i < tokens.length - 1) {
      out += SPACING_TEXT[token.spacing];
    }
  });
  return out;
}

export function renderToken(token: TokenTree): string {
  if (token.kind !== "group") {
    return token.text;
  }
  const { open, close } = DELIMITERS[token.delimiter];
  if (token.tokens.length === 0) {
    return open + close;
  }
  const last = token.tokens[token.tokens.length - 1];
  return open + SPACING_TEXT[token.openSpacing] + renderTokens(token.tokens) + SPACING_TEXT[last.spacing] + close;
}

/**
 * Visit every token depth-first in document order.
 */
export function forEachToken(tokens: readonly TokenTree[], visit: (token: TokenTree) => void): void {
  for (const token of tokens) {
    visit(token);
    if (token.kind === "group") {
      forEachToken(token.tokens, visit);
    }
  }
}
