/**
 * Shared types for the preprocessor
 */

import type { Group, Ident, MacroRegistry, RichDiagnostic, SplicerConfig } from "@splicer/core";

/**
 * A macro invocation found in the token tree: `name!( ... )`,
 * `name![ ... ]` or `name!{ ... }`.
 */
export interface Invocation {
  name: Ident;
  /** Delimited group holding the macro's input */
  group: Group;
  /** Source offset of the macro name */
  start: number;
  /** Source offset just past the closing delimiter */
  end: number;
}

/**
 * Standard source map v3 format (VLQ-encoded)
 */
export interface RawSourceMap {
  version: 3;
  file?: string;
  sourceRoot?: string;
  sources: string[];
  sourcesContent?: (string | null)[];
  names: string[];
  mappings: string;
}

/**
 * Result of preprocessing a source file
 */
export interface PreprocessResult {
  code: string;
  changed: boolean;
  /** Standard VLQ-encoded source map (v3 format), or null if no changes */
  map: RawSourceMap | null;
  /**
   * Errors from invocations that could not be expanded (their source is left
   * as written), followed by warnings macros emitted.
   */
  diagnostics: RichDiagnostic[];
}

export interface PreprocessOptions {
  /**
   * File name used to determine JSX vs Standard language variant, and
   * recorded in diagnostics and the source map.
   */
  fileName?: string;
  /** Names of the macros to expand; defaults to `macros.enabled`, then every registered macro */
  macros?: string[];
  /** Registry macros are looked up in; the global registry by default */
  registry?: MacroRegistry;
  /** Configuration overrides merged over the loaded configuration */
  config?: SplicerConfig;
}
