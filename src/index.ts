/**
 * splicer - Token macros for TypeScript
 *
 * Function-like macros written as `name!( ... )` are expanded before the
 * program is compiled. The built-in `paste!` splices identifiers together:
 *
 * @example
 * ```typescript
 * import { preprocess } from "splicer";
 *
 * const { code } = preprocess("paste! { const [<max_ len:upper>] = 8; }");
 * // code === "const max_LEN = 8;"
 * ```
 *
 * @packageDocumentation
 */

export * from "@splicer/core";
export * from "@splicer/preprocessor";
export { runExpand, runCheck, formatDiff, type ExpandOptions, type CheckOptions } from "./cli/expand.js";
export { runExplain } from "./cli/explain.js";
