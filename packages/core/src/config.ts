/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: SPLICER_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: splicer.config.js, .splicerrc, "splicer" key in package.json
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@splicer/core";
 *
 * config.get("paste.caseModifiers")   // → "last-wins"
 * config.set({ verbose: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * How a fragment carrying both `lower` and `upper` is treated.
 */
export type CaseModifierPolicy = "last-wins" | "reject-conflicts";

export interface PasteConfig {
  caseModifiers?: CaseModifierPolicy;
}

export interface MacrosConfig {
  /** Names of the macros expanded by preprocess(); all registered macros when unset */
  enabled?: string[];
}

export interface SplicerConfig {
  /** Log each expanded invocation */
  verbose?: boolean;
  /** Log token-level detail */
  debug?: boolean;
  paste?: PasteConfig;
  macros?: MacrosConfig;
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

const MODULE_NAME = "splicer";

let fileStore: Record<string, unknown> = {};
let programmaticStore: Record<string, unknown> = {};
let configLoaded = false;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Variables prefixed with SPLICER_ are parsed into the config object.
 * A double underscore separates nesting levels, single underscores are
 * folded into camelCase:
 *
 *   SPLICER_VERBOSE=1                        → { verbose: true }
 *   SPLICER_PASTE__CASE_MODIFIERS=reject-conflicts
 *                                            → { paste: { caseModifiers: "reject-conflicts" } }
 *   SPLICER_MACROS__ENABLED=paste,concat_idents
 *                                            → { macros: { enabled: ["paste", "concat_idents"] } }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "SPLICER_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    // rendering switch, not configuration
    if (key === "SPLICER_NO_COLOR") continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase()))
      .join(".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (configPath === "macros.enabled") {
      parsedValue = value
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  const result = explorer.search();
  if (result && !result.isEmpty && isRecord(result.config)) {
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: SplicerConfig = {
  verbose: false,
  debug: false,
  paste: {
    caseModifiers: "last-wins",
  },
  macros: {},
};

function initializeConfig(): void {
  if (configLoaded) return;
  fileStore = loadConfigFromFiles();
  configLoaded = true;
}

function merged(): Record<string, unknown> {
  initializeConfig();
  return deepMerge(deepMerge(deepMerge(DEFAULTS, fileStore), programmaticStore), loadConfigFromEnv());
}

// ============================================================================
// Validation
// ============================================================================

function readBoolean(raw: Record<string, unknown>, path: string): boolean | undefined {
  const value = getNestedValue(raw, path);
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new TypeError(`splicer config: \`${path}\` must be a boolean`);
  }
  return value;
}

function readCasePolicy(raw: Record<string, unknown>): CaseModifierPolicy | undefined {
  const value = getNestedValue(raw, "paste.caseModifiers");
  if (value === undefined) return undefined;
  if (value !== "last-wins" && value !== "reject-conflicts") {
    throw new TypeError(
      `splicer config: \`paste.caseModifiers\` must be "last-wins" or "reject-conflicts", got ${JSON.stringify(value)}`
    );
  }
  return value;
}

function readStringList(raw: Record<string, unknown>, path: string): string[] | undefined {
  const value = getNestedValue(raw, path);
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new TypeError(`splicer config: \`${path}\` must be a list of strings`);
  }
  return value;
}

/**
 * Validate a merged raw configuration into its typed form.
 */
export function normalizeConfig(raw: Record<string, unknown>): SplicerConfig {
  return {
    ...raw,
    verbose: readBoolean(raw, "verbose"),
    debug: readBoolean(raw, "debug"),
    paste: { caseModifiers: readCasePolicy(raw) },
    macros: { enabled: readStringList(raw, "macros.enabled") },
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a raw configuration value by dot path.
 */
function get(path: string): unknown {
  return getNestedValue(merged(), path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: SplicerConfig): void {
  programmaticStore = deepMerge(programmaticStore, values);
}

/**
 * Get all configuration values, validated.
 */
function getAll(): SplicerConfig {
  return normalizeConfig(merged());
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  fileStore = {};
  programmaticStore = {};
  configLoaded = false;
}

export const config = {
  get,
  set,
  getAll,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: SplicerConfig): SplicerConfig {
  return cfg;
}
