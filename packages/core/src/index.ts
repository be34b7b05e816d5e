/**
 * Core module exports for @splicer/core
 *
 * This package provides:
 * - The token model shared by every macro
 * - Macro infrastructure (types, registry, context)
 * - Diagnostics catalog and renderer
 * - Configuration loading
 */

export * from "./types.js";
export * from "./tokens.js";
export * from "./registry.js";
export * from "./context.js";

// Configuration System
export {
  config,
  defineConfig,
  normalizeConfig,
  loadConfigFromEnv,
  type SplicerConfig,
  type PasteConfig,
  type MacrosConfig,
  type CaseModifierPolicy,
} from "./config.js";

export { logVerbose, logDebug, logWarning } from "./log.js";

// Diagnostics System
export * from "./diagnostics.js";
