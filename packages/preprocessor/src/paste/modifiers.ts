/**
 * Paste modifiers
 *
 * A closed set of pure transformations over a fragment's text and span,
 * dispatched through a single table. Modifiers attached to one fragment are
 * folded left to right.
 */

import { diagnostic, SP9005, type Ident, type SourceSpan } from "@splicer/core";

export type ModifierName = "lower" | "upper" | "span";

export function isModifierName(name: string): name is ModifierName {
  return name === "lower" || name === "upper" || name === "span";
}

export interface ModifierApplication {
  readonly name: ModifierName;
  /** The modifier's name token, for diagnostics */
  readonly token: Ident;
  /** `span(reference)` argument */
  readonly argument?: Ident;
}

export interface FragmentState {
  readonly text: string;
  readonly span: SourceSpan;
  /** Set once a `span` modifier has been applied */
  readonly spanOverride: boolean;
}

export interface ModifierEnv {
  /** Span of the first identifier with this name in the invocation */
  resolveReference(name: string): SourceSpan | undefined;
}

type ModifierFn = (state: FragmentState, application: ModifierApplication, env: ModifierEnv) => FragmentState;

const MODIFIERS: Record<ModifierName, ModifierFn> = {
  lower: (state) => ({ ...state, text: state.text.toLowerCase() }),

  upper: (state) => ({ ...state, text: state.text.toUpperCase() }),

  span: (state, application, env) => {
    if (!application.argument) {
      return { ...state, spanOverride: true };
    }
    const target = env.resolveReference(application.argument.text);
    if (!target) {
      return diagnostic(SP9005)
        .at(application.argument.span)
        .withArgs({ name: application.argument.text })
        .raise();
    }
    return { ...state, span: target, spanOverride: true };
  },
};

export function applyModifiers(
  initial: FragmentState,
  modifiers: readonly ModifierApplication[],
  env: ModifierEnv
): FragmentState {
  return modifiers.reduce((state, application) => MODIFIERS[application.name](state, application, env), initial);
}
