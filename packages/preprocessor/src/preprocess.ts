/**
 * Main preprocessor entry point
 *
 * Finds macro invocations in source text, expands them innermost first and
 * overwrites each outermost invocation with its rendered expansion.
 */

import MagicString from "magic-string";
import {
  createMacroContext,
  diagnostic,
  getLineAndColumn,
  globalRegistry,
  isExpansionError,
  isPunct,
  logDebug,
  logVerbose,
  logWarning,
  registerMacros,
  renderTokens,
  resolveConfig,
  SP9999,
  withSpacing,
  type MacroRegistry,
  type RichDiagnostic,
  type SplicerConfig,
  type TokenMacro,
  type TokenTree,
} from "@splicer/core";
import { parseTokens } from "./scanner.js";
import type { Invocation, PreprocessOptions, PreprocessResult, RawSourceMap } from "./extensions/types.js";
import { pasteMacro } from "./paste/index.js";
import { concatIdentsMacro } from "./extensions/concat-idents.js";

registerMacros(globalRegistry, pasteMacro, concatIdentsMacro);

interface ExpansionState {
  source: string;
  fileName?: string;
  config: SplicerConfig;
  macros: Map<string, TokenMacro>;
  warnings: RichDiagnostic[];
}

/**
 * Preprocess source code, expanding every enabled macro invocation.
 *
 * An invocation that fails leaves its source text untouched; its diagnostic
 * is returned in `diagnostics` and the rest of the file is still expanded.
 *
 * @param source - The source code to preprocess
 * @param options - Configuration options
 * @returns The preprocessed result with source map
 */
export function preprocess(source: string, options: PreprocessOptions = {}): PreprocessResult {
  const settings = resolveConfig(options.config);
  const macros = getEnabledMacros(options.registry ?? globalRegistry, options.macros ?? settings.macros?.enabled);

  if (macros.size === 0) {
    return { code: source, changed: false, map: null, diagnostics: [] };
  }

  let tokens: TokenTree[];
  try {
    tokens = parseTokens(source, { fileName: options.fileName });
  } catch (error) {
    if (isExpansionError(error)) {
      return { code: source, changed: false, map: null, diagnostics: [error.diagnostic] };
    }
    throw error;
  }

  const state: ExpansionState = {
    source,
    fileName: options.fileName,
    config: settings,
    macros,
    warnings: [],
  };
  const errors: RichDiagnostic[] = [];
  const s = new MagicString(source);
  let changed = false;

  for (const invocation of findInvocations(tokens, macros)) {
    try {
      const output = expandInvocation(invocation, state);
      const text = renderTokens(output);
      if (text.length === 0) {
        s.remove(invocation.start, invocation.end);
      } else {
        s.overwrite(invocation.start, invocation.end, text);
      }
      changed = true;
    } catch (error) {
      errors.push(toDiagnostic(error, invocation, state));
    }
  }

  const diagnostics = [...errors, ...state.warnings];
  if (!changed) {
    return { code: source, changed: false, map: null, diagnostics };
  }

  return { code: s.toString(), changed: true, map: toRawSourceMap(s, options.fileName), diagnostics };
}

/**
 * Macros to expand, by name. Unknown names are skipped with a warning.
 */
function getEnabledMacros(registry: MacroRegistry, names: readonly string[] | undefined): Map<string, TokenMacro> {
  const enabled = new Map<string, TokenMacro>();
  for (const name of names ?? registry.names()) {
    const macro = registry.get(name);
    if (macro) {
      enabled.set(name, macro);
    } else {
      logWarning(`macro '${name}' is enabled but not registered`);
    }
  }
  return enabled;
}

// ============================================================================
// Invocation Discovery
// ============================================================================

/**
 * Match `name!( ... )` at `index`. The `!` must follow the name directly, and
 * a name reached through `.` or `?.` is a property access, not a macro.
 */
function matchInvocation(
  tokens: readonly TokenTree[],
  index: number,
  macros: ReadonlyMap<string, TokenMacro>
): Invocation | null {
  const name = tokens[index];
  const bang = tokens[index + 1];
  const group = tokens[index + 2];
  if (name?.kind !== "ident" || !macros.has(name.text) || name.spacing !== "joint") return null;
  if (!isPunct(bang, "!") || group?.kind !== "group") return null;

  const previous = tokens[index - 1];
  if (isPunct(previous, ".") || isPunct(previous, "?.")) return null;

  return { name, group, start: name.span.start, end: group.span.end };
}

/**
 * Outermost invocations in document order. Invocations nested inside them are
 * handled while expanding the outer one.
 */
export function findInvocations(
  tokens: readonly TokenTree[],
  macros: ReadonlyMap<string, TokenMacro>
): Invocation[] {
  const found: Invocation[] = [];

  const visit = (level: readonly TokenTree[]) => {
    for (let i = 0; i < level.length; i++) {
      const invocation = matchInvocation(level, i, macros);
      if (invocation) {
        found.push(invocation);
        i += 2;
        continue;
      }
      const token = level[i];
      if (token.kind === "group") {
        visit(token.tokens);
      }
    }
  };

  visit(tokens);
  return found;
}

// ============================================================================
// Expansion
// ============================================================================

function expandInvocation(invocation: Invocation, state: ExpansionState): readonly TokenTree[] {
  const macro = state.macros.get(invocation.name.text);
  if (!macro) {
    throw new Error(`macro '${invocation.name.text}' is not enabled`);
  }

  const input = expandNested(invocation.group.tokens, state);
  const ctx = createMacroContext({
    fileName: state.fileName,
    invocationSpan: { fileName: state.fileName, start: invocation.start, end: invocation.end },
    config: state.config,
  });

  try {
    const output = macro.expand(input, ctx);
    logVerbose(`expanded ${macro.name}! at ${describeLocation(invocation.start, state)}`);
    logDebug(`${macro.name}! → ${renderTokens(output)}`);
    return output;
  } finally {
    state.warnings.push(...ctx.warnings);
  }
}

/**
 * Expand invocations inside another invocation's input, splicing each
 * expansion in place of the `name ! group` tokens.
 */
function expandNested(tokens: readonly TokenTree[], state: ExpansionState): readonly TokenTree[] {
  const result: TokenTree[] = [];
  let changed = false;

  for (let i = 0; i < tokens.length; i++) {
    const invocation = matchInvocation(tokens, i, state.macros);
    if (invocation) {
      const output = expandInvocation(invocation, state);
      output.forEach((token, j) => {
        result.push(j === output.length - 1 ? withSpacing(token, invocation.group.spacing) : token);
      });
      changed = true;
      i += 2;
      continue;
    }

    const token = tokens[i];
    if (token.kind === "group") {
      const children = expandNested(token.tokens, state);
      if (children !== token.tokens) {
        result.push({ ...token, tokens: children });
        changed = true;
        continue;
      }
    }
    result.push(token);
  }

  return changed ? result : tokens;
}

// ============================================================================
// Helpers
// ============================================================================

function describeLocation(pos: number, state: ExpansionState): string {
  const { line, column } = getLineAndColumn(state.source, pos);
  return `${state.fileName ?? "<input>"}:${line}:${column}`;
}

function toDiagnostic(error: unknown, invocation: Invocation, state: ExpansionState): RichDiagnostic {
  if (isExpansionError(error)) {
    return error.diagnostic;
  }
  return diagnostic(SP9999)
    .at({ fileName: state.fileName, start: invocation.start, end: invocation.end })
    .withArgs({
      macro: invocation.name.text,
      message: error instanceof Error ? error.message : String(error),
    })
    .build();
}

function toRawSourceMap(s: MagicString, fileName: string | undefined): RawSourceMap {
  const map = s.generateMap({
    hires: true,
    includeContent: true,
    source: fileName,
  });
  return {
    version: 3,
    file: map.file,
    sources: map.sources,
    sourcesContent: map.sourcesContent,
    names: map.names,
    mappings: map.mappings,
  };
}

export default preprocess;
