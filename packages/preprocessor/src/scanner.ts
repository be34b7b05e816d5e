/**
 * Scanner wrapper for the splicer preprocessor
 *
 * Wraps TypeScript's scanner and nests its flat token list into token trees.
 * Spacing between tokens is taken from source-position adjacency
 * (t2.start === t1.end means "joint").
 */

import * as ts from "typescript";
import {
  diagnostic,
  SP9201,
  type Delimiter,
  type LiteralKind,
  type Spacing,
  type TokenTree,
} from "@splicer/core";

export interface Token {
  kind: ts.SyntaxKind;
  text: string;
  /** Cooked value for identifiers and literals */
  value: string;
  start: number;
  end: number;
}

export interface ScannerOptions {
  /**
   * File name used to determine JSX vs Standard language variant, and
   * recorded in every token's span.
   */
  fileName?: string;
}

function getLanguageVariant(fileName?: string): ts.LanguageVariant {
  if (fileName) {
    const lowerName = fileName.toLowerCase();
    if (lowerName.endsWith(".tsx") || lowerName.endsWith(".jsx")) {
      return ts.LanguageVariant.JSX;
    }
  }
  return ts.LanguageVariant.Standard;
}

function isTrivia(kind: ts.SyntaxKind): boolean {
  return kind >= ts.SyntaxKind.FirstTriviaToken && kind <= ts.SyntaxKind.LastTriviaToken;
}

function isKeyword(kind: ts.SyntaxKind): boolean {
  return kind >= ts.SyntaxKind.FirstKeyword && kind <= ts.SyntaxKind.LastKeyword;
}

/**
 * Keywords after which a `/` starts a regular expression rather than a division.
 */
const REGEX_PRECEDING_KEYWORDS = new Set([
  ts.SyntaxKind.ReturnKeyword,
  ts.SyntaxKind.TypeOfKeyword,
  ts.SyntaxKind.CaseKeyword,
  ts.SyntaxKind.DoKeyword,
  ts.SyntaxKind.ElseKeyword,
  ts.SyntaxKind.InKeyword,
  ts.SyntaxKind.InstanceOfKeyword,
  ts.SyntaxKind.NewKeyword,
  ts.SyntaxKind.DeleteKeyword,
  ts.SyntaxKind.VoidKeyword,
  ts.SyntaxKind.ThrowKeyword,
  ts.SyntaxKind.YieldKeyword,
  ts.SyntaxKind.AwaitKeyword,
  ts.SyntaxKind.OfKeyword,
]);

/**
 * Keywords whose parenthesized head is followed by a statement, so a `/` after
 * the closing `)` starts a regular expression.
 */
const CONTROL_HEAD_KEYWORDS = new Set([
  ts.SyntaxKind.IfKeyword,
  ts.SyntaxKind.WhileKeyword,
  ts.SyntaxKind.ForKeyword,
  ts.SyntaxKind.WithKeyword,
]);

/** `if (`, `while (`, `for (`, `with (` and `for await (` */
function opensControlHead(tokens: readonly Token[]): boolean {
  const prev = tokens[tokens.length - 1];
  if (prev === undefined) return false;
  if (prev.kind === ts.SyntaxKind.AwaitKeyword) {
    return tokens[tokens.length - 2]?.kind === ts.SyntaxKind.ForKeyword;
  }
  return CONTROL_HEAD_KEYWORDS.has(prev.kind);
}

function regexAllowedAfter(prev: Token | undefined, prevClosesControlHead: boolean): boolean {
  if (!prev) return true;
  if (prevClosesControlHead) return true;
  if (REGEX_PRECEDING_KEYWORDS.has(prev.kind)) return true;
  if (prev.kind === ts.SyntaxKind.Identifier || isKeyword(prev.kind)) return false;
  if (
    prev.kind === ts.SyntaxKind.CloseParenToken ||
    prev.kind === ts.SyntaxKind.CloseBracketToken ||
    prev.kind === ts.SyntaxKind.CloseBraceToken ||
    prev.kind === ts.SyntaxKind.PlusPlusToken ||
    prev.kind === ts.SyntaxKind.MinusMinusToken
  ) {
    return false;
  }
  return prev.kind >= ts.SyntaxKind.FirstPunctuation && prev.kind <= ts.SyntaxKind.LastPunctuation;
}

/**
 * Tokenize source code using TypeScript's scanner, dropping whitespace and
 * comments.
 *
 * The scanner does not know where a template literal's `${ ... }` ends, so
 * braces are tracked here and the closing `}` of a substitution is rescanned
 * as the template's middle or tail part.
 */
export function tokenize(source: string, options: ScannerOptions = {}): Token[] {
  const scanner = ts.createScanner(
    ts.ScriptTarget.Latest,
    false,
    getLanguageVariant(options.fileName),
    source
  );

  const tokens: Token[] = [];
  const braceStack: Array<"brace" | "template"> = [];
  // One entry per open paren: whether it opened an `if`/`while`/`for`/`with` head
  const parenStack: boolean[] = [];
  let closedControlHead = false;

  while (scanner.scan() !== ts.SyntaxKind.EndOfFileToken) {
    let kind = scanner.getToken();
    if (isTrivia(kind)) continue;

    const prev = tokens[tokens.length - 1];
    const prevClosesControlHead = closedControlHead;
    closedControlHead = false;

    if (kind === ts.SyntaxKind.OpenParenToken) {
      parenStack.push(opensControlHead(tokens));
    } else if (kind === ts.SyntaxKind.CloseParenToken) {
      closedControlHead = parenStack.pop() ?? false;
    } else if (kind === ts.SyntaxKind.OpenBraceToken) {
      braceStack.push("brace");
    } else if (kind === ts.SyntaxKind.TemplateHead) {
      braceStack.push("template");
    } else if (kind === ts.SyntaxKind.CloseBraceToken) {
      if (braceStack[braceStack.length - 1] === "template") {
        kind = scanner.reScanTemplateToken(false);
        if (kind === ts.SyntaxKind.TemplateTail) {
          braceStack.pop();
        }
      } else {
        braceStack.pop();
      }
    } else if (
      (kind === ts.SyntaxKind.SlashToken || kind === ts.SyntaxKind.SlashEqualsToken) &&
      regexAllowedAfter(prev, prevClosesControlHead)
    ) {
      kind = scanner.reScanSlashToken();
    }

    const start = scanner.getTokenStart();
    const text = scanner.getTokenText();
    tokens.push({ kind, text, value: scanner.getTokenValue() ?? text, start, end: start + text.length });
  }

  return tokens;
}

// ============================================================================
// Token Trees
// ============================================================================

function openDelimiter(kind: ts.SyntaxKind): Delimiter | null {
  switch (kind) {
    case ts.SyntaxKind.OpenParenToken:
      return "paren";
    case ts.SyntaxKind.OpenBracketToken:
      return "bracket";
    case ts.SyntaxKind.OpenBraceToken:
      return "brace";
    default:
      return null;
  }
}

function closeDelimiter(kind: ts.SyntaxKind): Delimiter | null {
  switch (kind) {
    case ts.SyntaxKind.CloseParenToken:
      return "paren";
    case ts.SyntaxKind.CloseBracketToken:
      return "bracket";
    case ts.SyntaxKind.CloseBraceToken:
      return "brace";
    default:
      return null;
  }
}

/**
 * Classify a numeric literal by how it is written.
 */
function numericKind(text: string): LiteralKind {
  if (/^0[xXbBoO]/.test(text)) return "integer";
  return /[.eE]/.test(text) ? "float" : "integer";
}

function literalKind(kind: ts.SyntaxKind, text: string): LiteralKind | null {
  switch (kind) {
    case ts.SyntaxKind.NumericLiteral:
      return numericKind(text);
    case ts.SyntaxKind.BigIntLiteral:
      return "bigint";
    case ts.SyntaxKind.StringLiteral:
      return "string";
    case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
      return "template";
    case ts.SyntaxKind.TemplateHead:
    case ts.SyntaxKind.TemplateMiddle:
    case ts.SyntaxKind.TemplateTail:
      return "template-part";
    case ts.SyntaxKind.RegularExpressionLiteral:
      return "regexp";
    default:
      return null;
  }
}

function spacingBetween(source: string, end: number, nextStart: number | undefined): Spacing {
  if (nextStart === undefined) return "alone";
  if (nextStart === end) return "joint";
  return source.slice(end, nextStart).includes("\n") ? "line" : "alone";
}

interface OpenFrame {
  delimiter: Delimiter;
  open: Token;
  openSpacing: Spacing;
  children: TokenTree[];
}

/**
 * Nest a flat token list into token trees.
 *
 * @throws ExpansionError (SP9201) on unbalanced delimiters
 */
export function buildTokenTree(source: string, tokens: readonly Token[], fileName?: string): TokenTree[] {
  const root: TokenTree[] = [];
  const stack: OpenFrame[] = [];
  const span = (start: number, end: number) => ({ fileName, start, end });

  tokens.forEach((token, i) => {
    const spacing = spacingBetween(source, token.end, tokens[i + 1]?.start);
    const siblings = stack.length > 0 ? stack[stack.length - 1].children : root;

    const opened = openDelimiter(token.kind);
    if (opened) {
      stack.push({ delimiter: opened, open: token, openSpacing: spacing, children: [] });
      return;
    }

    const closed = closeDelimiter(token.kind);
    if (closed) {
      const frame = stack.pop();
      if (!frame || frame.delimiter !== closed) {
        return diagnostic(SP9201).at(span(token.start, token.end)).withArgs({ text: token.text }).raise();
      }
      const parent = stack.length > 0 ? stack[stack.length - 1].children : root;
      parent.push({
        kind: "group",
        delimiter: frame.delimiter,
        tokens: frame.children,
        span: span(frame.open.start, token.end),
        openSpacing: frame.openSpacing,
        spacing,
      });
      return;
    }

    const lit = literalKind(token.kind, token.text);
    if (lit) {
      siblings.push({
        kind: "literal",
        literal: lit,
        text: token.text,
        value: token.value,
        span: span(token.start, token.end),
        spacing,
      });
    } else if (token.kind === ts.SyntaxKind.Identifier || isKeyword(token.kind)) {
      siblings.push({ kind: "ident", text: token.value, span: span(token.start, token.end), spacing });
    } else if (token.kind === ts.SyntaxKind.PrivateIdentifier) {
      siblings.push({ kind: "ident", text: token.text, span: span(token.start, token.end), spacing });
    } else {
      siblings.push({ kind: "punct", text: token.text, span: span(token.start, token.end), spacing });
    }
  });

  const unclosed = stack.pop();
  if (unclosed) {
    diagnostic(SP9201)
      .at(span(unclosed.open.start, unclosed.open.end))
      .withArgs({ text: unclosed.open.text })
      .raise();
  }

  return root;
}

/**
 * Tokenize and nest in one step.
 */
export function parseTokens(source: string, options: ScannerOptions = {}): TokenTree[] {
  return buildTokenTree(source, tokenize(source, options), options.fileName);
}
