/**
 * @splicer/preprocessor - Token macro expansion for TypeScript sources
 *
 * This package tokenizes TypeScript with the compiler's own scanner, finds
 * `name!( ... )` invocations of registered token macros and replaces each
 * with its expansion, producing a source map for the rewrite.
 *
 * @example
 * ```typescript
 * import { preprocess } from "@splicer/preprocessor";
 *
 * const source = `
 *   paste! {
 *     export function [<get_ field:upper>]() {}
 *   }
 * `;
 *
 * const { code, changed, map, diagnostics } = preprocess(source);
 * // code now declares get_FIELD()
 * ```
 *
 * @packageDocumentation
 */

// Main entry point
export { preprocess, findInvocations } from "./preprocess.js";
export { default } from "./preprocess.js";

// Scanner
export { tokenize, buildTokenTree, parseTokens, type Token, type ScannerOptions } from "./scanner.js";

// Token stream
export { TokenStream } from "./token-stream.js";

// Shared types
export type { Invocation, RawSourceMap, PreprocessResult, PreprocessOptions } from "./extensions/types.js";

// Built-in macros
export * from "./paste/index.js";
export { concatIdents, concatIdentsMacro } from "./extensions/concat-idents.js";
