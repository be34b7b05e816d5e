/**
 * Concatenation & Modifier Engine
 *
 * Turns the fragment list of one splice unit into a single identifier.
 */

import * as ts from "typescript";
import {
  diagnostic,
  renderToken,
  SP9001,
  SP9002,
  SP9003,
  SP9004,
  SP9006,
  SP9007,
  type CaseModifierPolicy,
  type Group,
  type Ident,
  type Literal,
  type SourceSpan,
  type TokenTree,
} from "@splicer/core";
import { TokenStream } from "../token-stream.js";
import {
  applyModifiers,
  isModifierName,
  type ModifierApplication,
  type ModifierEnv,
} from "./modifiers.js";

export interface Fragment {
  readonly head: Ident | Literal;
  readonly modifiers: readonly ModifierApplication[];
}

export interface ConcatEnv extends ModifierEnv {
  readonly caseModifiers: CaseModifierPolicy;
}

/**
 * A `[< ... >]` group: a bracket group opening with `<` and closing with `>`.
 */
export function isSpliceUnit(token: Group): boolean {
  return opensSpliceUnit(token) && closesSpliceUnit(token);
}

export function opensSpliceUnit(token: TokenTree): boolean {
  if (token.kind !== "group" || token.delimiter !== "bracket") return false;
  const first = token.tokens[0];
  return first?.kind === "punct" && first.text === "<";
}

function closesSpliceUnit(token: Group): boolean {
  const last = token.tokens[token.tokens.length - 1];
  return token.tokens.length >= 2 && last.kind === "punct" && last.text === ">";
}

/**
 * Tokens between the `<` and `>` markers.
 */
export function spliceContents(unit: Group): readonly TokenTree[] {
  return unit.tokens.slice(1, -1);
}

function describeKind(token: TokenTree): string {
  switch (token.kind) {
    case "punct":
      return "punctuation";
    case "group":
      return "a delimited group";
    case "ident":
      return "identifier";
    case "literal":
      switch (token.literal) {
        case "float":
          return "float literal";
        case "template-part":
          return "template literal part";
        case "regexp":
          return "regular expression";
        default:
          return `${token.literal} literal`;
      }
  }
}

function unsupported(token: TokenTree): never {
  return diagnostic(SP9003)
    .at(token.span)
    .withArgs({ kind: describeKind(token), text: renderToken(token) })
    .raise();
}

// ============================================================================
// Fragment Parsing
// ============================================================================

/**
 * Parse `fragment(:modifier(:modifier)*)*` sequences.
 */
export function parseFragments(unit: Group): Fragment[] {
  const stream = new TokenStream(spliceContents(unit));
  const fragments: Array<{ head: Ident | Literal; modifiers: ModifierApplication[] }> = [];
  let spanSeen = false;

  while (!stream.atEnd()) {
    const token = stream.next();
    if (!token) break;

    if (token.kind === "punct" && token.text === ":") {
      const fragment = fragments[fragments.length - 1];
      if (!fragment) {
        return diagnostic(SP9001)
          .at(token.span)
          .withArgs({ detail: "modifier must follow a fragment" })
          .raise();
      }
      const modifier = parseModifier(stream, token.span);
      if (modifier.name === "span") {
        if (spanSeen) {
          return diagnostic(SP9001)
            .at(modifier.token.span)
            .withArgs({ detail: "span modifier may appear at most once in a splice unit" })
            .raise();
        }
        spanSeen = true;
      }
      fragment.modifiers.push(modifier);
      continue;
    }

    if (token.kind === "ident" || token.kind === "literal") {
      fragments.push({ head: token, modifiers: [] });
      continue;
    }

    if (opensSpliceUnit(token)) {
      return diagnostic(SP9001)
        .at(token.span)
        .withArgs({ detail: "splice units do not nest" })
        .label(unit.span, "outer splice unit")
        .raise();
    }

    return unsupported(token);
  }

  return fragments;
}

function parseModifier(stream: TokenStream, colonSpan: SourceSpan): ModifierApplication {
  const name = stream.next();
  if (!name || name.kind !== "ident") {
    return diagnostic(SP9001)
      .at(name?.span ?? colonSpan)
      .withArgs({ detail: "expected a modifier name after `:`" })
      .raise();
  }
  if (!isModifierName(name.text)) {
    return diagnostic(SP9004)
      .at(name.span)
      .withArgs({ name: name.text })
      .help("Supported modifiers are `lower`, `upper` and `span`")
      .raise();
  }

  const next = stream.peek();
  if (next?.kind === "group" && next.delimiter === "paren") {
    stream.next();
    const argument = next.tokens[0];
    if (name.text !== "span") {
      return diagnostic(SP9001)
        .at(next.span)
        .withArgs({ detail: `\`${name.text}\` takes no argument` })
        .raise();
    }
    if (next.tokens.length !== 1 || argument.kind !== "ident") {
      return diagnostic(SP9001)
        .at(next.span)
        .withArgs({ detail: "span argument must be a single identifier" })
        .raise();
    }
    return { name: "span", token: name, argument };
  }

  return { name: name.text, token: name };
}

// ============================================================================
// Fragment Text
// ============================================================================

function isIdentifierPartText(text: string): boolean {
  for (const ch of text) {
    const code = ch.codePointAt(0);
    if (code === undefined || !ts.isIdentifierPart(code, ts.ScriptTarget.Latest)) {
      return false;
    }
  }
  return true;
}

/**
 * Whether `text` is a valid identifier (or `#private` name).
 */
export function isIdentifierText(text: string): boolean {
  const body = text.startsWith("#") ? text.slice(1) : text;
  const first = body.codePointAt(0);
  if (first === undefined || !ts.isIdentifierStart(first, ts.ScriptTarget.Latest)) {
    return false;
  }
  return isIdentifierPartText(body);
}

/**
 * Value of an integer literal as written: separators, radix prefixes, a bigint
 * suffix and the legacy `017` octal form.
 */
function integerValue(text: string): bigint {
  const digits = text.replace(/_/g, "").replace(/n$/, "");
  if (/^0[0-7]+$/.test(digits)) {
    return BigInt(`0o${digits.slice(1)}`);
  }
  return BigInt(digits);
}

/**
 * The text a fragment head contributes before modifiers.
 */
export function fragmentText(head: Ident | Literal): string {
  if (head.kind === "ident") {
    return head.text;
  }

  switch (head.literal) {
    case "integer":
    case "bigint":
      return integerValue(head.text).toString();
    case "string":
    case "template":
      if (!isIdentifierPartText(head.value)) {
        return unsupported(head);
      }
      return head.value;
    default:
      return unsupported(head);
  }
}

// ============================================================================
// Concatenation
// ============================================================================

function checkCaseConflict(fragment: Fragment): void {
  let sawLower = false;
  let sawUpper = false;
  for (const modifier of fragment.modifiers) {
    if (modifier.name === "lower") sawLower = true;
    if (modifier.name === "upper") sawUpper = true;
    if (sawLower && sawUpper) {
      diagnostic(SP9007)
        .at(modifier.token.span)
        .withArgs({ text: renderToken(fragment.head) })
        .raise();
    }
  }
}

/**
 * Resolve one splice unit to its identifier.
 *
 * The identifier carries the unit's span unless a `span` modifier overrides
 * it, and the unit's trailing spacing.
 */
export function concatSpliceUnit(unit: Group, env: ConcatEnv): Ident {
  const fragments = parseFragments(unit);
  if (fragments.length === 0) {
    return diagnostic(SP9002).at(unit.span).raise();
  }

  let text = "";
  let span = unit.span;

  for (const fragment of fragments) {
    if (env.caseModifiers === "reject-conflicts") {
      checkCaseConflict(fragment);
    }
    const state = applyModifiers(
      { text: fragmentText(fragment.head), span: fragment.head.span, spanOverride: false },
      fragment.modifiers,
      env
    );
    text += state.text;
    if (state.spanOverride) {
      span = state.span;
    }
  }

  if (!isIdentifierText(text)) {
    return diagnostic(SP9006).at(unit.span).withArgs({ text }).raise();
  }

  return { kind: "ident", text, span, spacing: unit.spacing };
}
