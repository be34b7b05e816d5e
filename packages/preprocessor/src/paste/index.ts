/**
 * paste!: identifier and literal splicing
 *
 * Every `[< ... >]` unit in the invocation is replaced by one identifier built
 * from its fragments:
 *
 * ```ts
 * paste! {
 *   function [<get_ name:upper>]() {}   // function get_NAME() {}
 *   const [<item 42>] = 1;               // const item42 = 1;
 * }
 * ```
 */

import { defineTokenMacro, type CaseModifierPolicy, type SourceSpan, type TokenTree } from "@splicer/core";
import { collectReferenceTargets, scanSequence } from "./splice-scanner.js";

export interface PasteOptions {
  /** How a fragment carrying both `lower` and `upper` is treated */
  caseModifiers?: CaseModifierPolicy;
}

/**
 * Resolve every splice unit in `tokens`.
 *
 * Returns `tokens` itself when it contains no splice unit.
 */
export function expandPaste(tokens: readonly TokenTree[], options: PasteOptions = {}): readonly TokenTree[] {
  let targets: Map<string, SourceSpan> | undefined;

  return scanSequence(tokens, {
    caseModifiers: options.caseModifiers ?? "last-wins",
    resolveReference(name) {
      if (!targets) targets = collectReferenceTargets(tokens);
      return targets.get(name);
    },
  });
}

export const pasteMacro = defineTokenMacro({
  name: "paste",
  module: "@splicer/preprocessor",
  description: "Concatenate identifiers and literals inside [< ... >] into one identifier",
  expand(tokens, ctx) {
    return expandPaste(tokens, { caseModifiers: ctx.config.paste?.caseModifiers });
  },
});

export { reassemble, type Replacement } from "./reassemble.js";
export { applyModifiers, isModifierName, type ModifierName, type ModifierApplication } from "./modifiers.js";
export {
  concatSpliceUnit,
  fragmentText,
  isIdentifierText,
  isSpliceUnit,
  parseFragments,
  type ConcatEnv,
  type Fragment,
} from "./concat.js";
export { collectReferenceTargets, scanSequence } from "./splice-scanner.js";
