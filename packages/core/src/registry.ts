/**
 * Macro Registry - Stores and retrieves macro definitions
 */

import type { MacroRegistry, TokenMacro } from "./types.js";

// ============================================================================
// Macro Registry Implementation
// ============================================================================

class MacroRegistryImpl implements MacroRegistry {
  private readonly macros = new Map<string, TokenMacro>();

  register(macro: TokenMacro): void {
    if (!/^[A-Za-z_$][\w$]*$/.test(macro.name)) {
      throw new Error(`Macro name '${macro.name}' is not an identifier`);
    }
    const existing = this.macros.get(macro.name);
    // Same name and module is the same macro re-imported under ESM
    if (existing && existing.module !== macro.module) {
      throw new Error(`MacroRegistry: entry for key '${macro.name}' already exists`);
    }
    this.macros.set(macro.name, macro);
  }

  get(name: string): TokenMacro | undefined {
    return this.macros.get(name);
  }

  has(name: string): boolean {
    return this.macros.has(name);
  }

  names(): string[] {
    return Array.from(this.macros.keys());
  }

  getAll(): TokenMacro[] {
    return Array.from(this.macros.values());
  }
}

export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

/** Registry the built-in macros register themselves into */
export const globalRegistry: MacroRegistry = createRegistry();

/**
 * Define a function-like token macro.
 */
export function defineTokenMacro(def: Omit<TokenMacro, "kind">): TokenMacro {
  return { kind: "function", ...def };
}

export function registerMacros(registry: MacroRegistry, ...macros: TokenMacro[]): void {
  for (const macro of macros) {
    registry.register(macro);
  }
}
