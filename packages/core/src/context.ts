/**
 * Macro Context Implementation
 */

import {
  diagnostic,
  type DiagnosticBuilder,
  type DiagnosticDescriptor,
  type RichDiagnostic,
  type SourceSpan,
} from "./diagnostics.js";
import { config as globalConfig, normalizeConfig, type SplicerConfig } from "./config.js";
import type { MacroContext } from "./types.js";

export interface MacroContextOptions {
  fileName?: string;
  invocationSpan: SourceSpan;
  /** Overrides merged over the global configuration */
  config?: SplicerConfig;
}

/**
 * Merge configuration overrides over the global configuration.
 */
export function resolveConfig(overrides?: SplicerConfig): SplicerConfig {
  const base = globalConfig.getAll();
  if (!overrides) return base;
  return normalizeConfig({
    ...base,
    ...overrides,
    paste: { ...base.paste, ...overrides.paste },
    macros: { ...base.macros, ...overrides.macros },
  });
}

class MacroContextImpl implements MacroContext {
  readonly fileName?: string;
  readonly invocationSpan: SourceSpan;
  readonly config: SplicerConfig;
  private readonly emitted: RichDiagnostic[] = [];

  constructor(options: MacroContextOptions) {
    this.fileName = options.fileName;
    this.invocationSpan = options.invocationSpan;
    this.config = resolveConfig(options.config);
  }

  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
    return diagnostic(descriptor, (d) => this.emitted.push(d));
  }

  get warnings(): readonly RichDiagnostic[] {
    return this.emitted;
  }
}

export function createMacroContext(options: MacroContextOptions): MacroContext {
  return new MacroContextImpl(options);
}
