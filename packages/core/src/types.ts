/**
 * Core types for token macros
 */

import type { DiagnosticBuilder, DiagnosticDescriptor, RichDiagnostic, SourceSpan } from "./diagnostics.js";
import type { SplicerConfig } from "./config.js";
import type { TokenTree } from "./tokens.js";

/**
 * Everything a macro gets to see besides its input tokens.
 */
export interface MacroContext {
  /** File the invocation appears in, when known */
  readonly fileName?: string;

  /** Span of the whole invocation (`name!{ ... }`) */
  readonly invocationSpan: SourceSpan;

  /** Validated configuration snapshot taken when expansion started */
  readonly config: SplicerConfig;

  /**
   * Start a diagnostic. Call `.raise()` to abort this invocation, or `.emit()`
   * to record a warning and continue.
   */
  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder;

  /** Non-fatal diagnostics emitted so far */
  readonly warnings: readonly RichDiagnostic[];
}

/**
 * A function-like macro: a pure rewrite of the tokens between the delimiters
 * of `name!( ... )`. Macros share no state; everything they need comes from
 * their input and the context.
 */
export interface TokenMacro {
  readonly kind: "function";
  readonly name: string;
  readonly description?: string;
  /** Package that provides the macro */
  readonly module?: string;
  expand(tokens: readonly TokenTree[], ctx: MacroContext): readonly TokenTree[];
}

export interface MacroRegistry {
  register(macro: TokenMacro): void;
  get(name: string): TokenMacro | undefined;
  has(name: string): boolean;
  names(): string[];
  getAll(): TokenMacro[];
}
