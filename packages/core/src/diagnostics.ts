/**
 * Diagnostics System for splicer
 *
 * Provides compiler-style error messages with:
 * - Structured error codes (SP9001-SP9999)
 * - Rich diagnostics with labeled spans, notes and help
 * - A builder API for macro authors
 *
 * Every expansion failure is fatal for the invocation it occurs in, so the
 * builder can either hand the diagnostic to an emitter or raise it as an
 * {@link ExpansionError}.
 *
 * @example
 * ```typescript
 * diagnostic(SP9004)
 *   .at(modifierToken.span)
 *   .withArgs({ name: "title" })
 *   .help("Supported modifiers are `lower`, `upper` and `span`")
 *   .raise();
 * ```
 */

// ============================================================================
// Source Spans
// ============================================================================

/**
 * Provenance tag of a token: the half-open character range it came from.
 * Synthesized tokens inherit the span of the tokens they were built from.
 */
export interface SourceSpan {
  readonly fileName?: string;
  readonly start: number;
  readonly end: number;
}

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Splice = "splice",
  Modifier = "modifier",
  Tokens = "tokens",
  Macro = "macro",
  Internal = "internal",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9001-9999, rendered as SP<code> */
  readonly code: number;

  /** Default severity */
  readonly severity: "error" | "warning" | "info";

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for --explain */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * A labeled span pointing at specific code with a message.
 */
export interface LabeledSpan {
  span: SourceSpan;
  message: string;
  primary?: boolean;
}

export interface RichDiagnostic {
  code: number;
  severity: "error" | "warning" | "info";
  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** The main error location */
  primarySpan?: SourceSpan;

  /** Secondary labeled spans */
  labels: LabeledSpan[];

  notes: string[];

  /** Actionable suggestion in prose */
  help?: string;

  explanation?: string;
}

/**
 * Thrown by the expansion engine. Carries the structured diagnostic so the
 * caller can render it or collect it.
 */
export class ExpansionError extends Error {
  readonly diagnostic: RichDiagnostic;

  constructor(diagnostic: RichDiagnostic) {
    super(`[${formatCode(diagnostic.code)}] ${diagnostic.message}`);
    this.name = "ExpansionError";
    this.diagnostic = diagnostic;
  }
}

export function isExpansionError(error: unknown): error is ExpansionError {
  return error instanceof ExpansionError;
}

export function formatCode(code: number): string {
  return `SP${code}`;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly emitter?: (diagnostic: RichDiagnostic) => void
  ) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      labels: [],
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(span: SourceSpan | undefined): this {
    this.diagnostic.primarySpan = span;
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  label(span: SourceSpan, message: string): this {
    this.diagnostic.labels.push({ span, message, primary: false });
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.replace(new RegExp(`\\{${key}\\}`, "g"), value);
    }
    return message;
  }

  build(): RichDiagnostic {
    return { ...this.diagnostic, message: this.interpolateMessage() };
  }

  /**
   * Hand the diagnostic to the emitter given at construction.
   */
  emit(): void {
    if (!this.emitter) {
      throw new Error(`No emitter registered for ${formatCode(this.descriptor.code)}`);
    }
    this.emitter(this.build());
  }

  /**
   * Abort the current expansion with this diagnostic.
   */
  raise(): never {
    throw new ExpansionError(this.build());
  }
}

/**
 * Start building a diagnostic from a catalog entry.
 */
export function diagnostic(
  descriptor: DiagnosticDescriptor,
  emitter?: (diagnostic: RichDiagnostic) => void
): DiagnosticBuilder {
  return new DiagnosticBuilder(descriptor, emitter);
}

// ============================================================================
// Error Catalog: Splice Units (9001-9099)
// ============================================================================

export const SP9001: DiagnosticDescriptor = {
  code: 9001,
  severity: "error",
  category: DiagnosticCategory.Splice,
  messageTemplate: "Malformed splice syntax: {detail}",
  explanation: `A splice unit is written \`[< fragments >]\` and must be closed by \`>]\`
inside the same bracket group.

Splice units do not nest:
  [<a [<b c>]>]    // ✗ inner unit inside an outer unit
  [<a b>]          // ✓

Every modifier must follow a fragment and carry a name:
  [<:lower foo>]   // ✗ modifier before any fragment
  [<foo:>]         // ✗ missing modifier name
  [<foo:lower>]    // ✓

At most one \`span\` modifier may appear in a splice unit.`,
};

export const SP9002: DiagnosticDescriptor = {
  code: 9002,
  severity: "error",
  category: DiagnosticCategory.Splice,
  messageTemplate: "Empty splice unit",
  explanation: `A splice unit must contain at least one identifier or literal fragment.

  [<>]          // ✗ nothing to paste
  [<get_ name>] // ✓`,
};

export const SP9003: DiagnosticDescriptor = {
  code: 9003,
  severity: "error",
  category: DiagnosticCategory.Splice,
  messageTemplate: "Cannot paste {kind} `{text}` into an identifier",
  explanation: `Only identifiers and literals that render as identifier text can be pasted.

Accepted:
  identifiers           foo, _bar, $baz
  integer literals      42, 0x2a (pasted as 42), 10n
  string literals       "foo" (pasted without quotes)

Rejected:
  punctuation           +, ., ::
  nested groups         (a), {b}
  float literals        1.5, 1e3
  strings that are not identifier text   "foo bar", "a-b"`,
};

export const SP9004: DiagnosticDescriptor = {
  code: 9004,
  severity: "error",
  category: DiagnosticCategory.Modifier,
  messageTemplate: "Unknown paste modifier `{name}`",
  explanation: `Supported modifiers:
  :lower          lower-case the fragment
  :upper          upper-case the fragment
  :span           give the pasted identifier this fragment's location
  :span(name)     give the pasted identifier the location of identifier \`name\``,
};

export const SP9005: DiagnosticDescriptor = {
  code: 9005,
  severity: "error",
  category: DiagnosticCategory.Modifier,
  messageTemplate: "span modifier target `{name}` not found in this invocation",
  explanation: `\`:span(name)\` copies the location of an identifier called \`name\` that appears
elsewhere in the same macro invocation. The identifier must be written somewhere in
the invocation's input, outside of modifier arguments.`,
};

export const SP9006: DiagnosticDescriptor = {
  code: 9006,
  severity: "error",
  category: DiagnosticCategory.Splice,
  messageTemplate: "Pasted text `{text}` is not a valid identifier",
  explanation: `The concatenated fragments must form a valid identifier. A common cause is a
numeric fragment in first position:

  [<42 item>]   // ✗ "42item"
  [<item 42>]   // ✓ "item42"`,
};

export const SP9007: DiagnosticDescriptor = {
  code: 9007,
  severity: "error",
  category: DiagnosticCategory.Modifier,
  messageTemplate: "Conflicting case modifiers on fragment `{text}`",
  explanation: `With \`paste.caseModifiers\` set to "reject-conflicts", a fragment may not carry
both \`lower\` and \`upper\`. In the default "last-wins" mode the last case modifier
applied decides the result.`,
};

// ============================================================================
// Error Catalog: Collaborator Macros (9101-9199)
// ============================================================================

export const SP9101: DiagnosticDescriptor = {
  code: 9101,
  severity: "error",
  category: DiagnosticCategory.Macro,
  messageTemplate: "concat_idents expects two identifiers separated by a comma, {detail}",
  explanation: `Usage:
  concat_idents!(prefix_, name)   // → prefix_name, located at \`name\``,
};

// ============================================================================
// Error Catalog: Token Trees (9201-9299)
// ============================================================================

export const SP9201: DiagnosticDescriptor = {
  code: 9201,
  severity: "error",
  category: DiagnosticCategory.Tokens,
  messageTemplate: "Unbalanced delimiter `{text}`",
  explanation: `Macro input must have balanced (), [] and {} delimiters.`,
};

// ============================================================================
// Error Catalog: Internal (9999)
// ============================================================================

export const SP9999: DiagnosticDescriptor = {
  code: 9999,
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Internal error while expanding `{macro}`: {message}",
  explanation: `An unexpected exception escaped a macro. This is a bug in the macro.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: Map<number, DiagnosticDescriptor> = new Map([
  [9001, SP9001],
  [9002, SP9002],
  [9003, SP9003],
  [9004, SP9004],
  [9005, SP9005],
  [9006, SP9006],
  [9007, SP9007],
  [9101, SP9101],
  [9201, SP9201],
  [9999, SP9999],
]);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

// ============================================================================
// CLI Renderer
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or SPLICER_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.SPLICER_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: "error" | "warning" | "info"): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

/**
 * 1-based line and column of an offset.
 */
export function getLineAndColumn(text: string, pos: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < pos && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: pos - lineStart + 1 };
}

function getLineText(text: string, lineNumber: number): string {
  const lines = text.split("\n");
  return lines[lineNumber - 1] ?? "";
}

function lineNumberWidth(maxLine: number): number {
  return Math.max(3, String(maxLine).length);
}

function createUnderline(startColumn: number, length: number, char: string = "^"): string {
  const padding = " ".repeat(startColumn - 1);
  const underline = char.repeat(Math.max(1, length));
  return padding + underline;
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Context lines before/after the error (default: 1) */
  contextLines?: number;
  /** Append each descriptor's long-form explanation */
  showExplanation?: boolean;
  /** Source text lookup for the spans' file names */
  readSource?: (fileName: string | undefined) => string | undefined;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Render a RichDiagnostic to CLI output.
 *
 * @example Output:
 * ```
 * error[SP9004]: Unknown paste modifier `title`
 *   --> src/consts.ts:2:14
 *    |
 *  2 | const [<name:title>] = 1;
 *    |              ^^^^^
 *    |
 *    = help: Supported modifiers are `lower`, `upper` and `span`
 * ```
 */
export function renderDiagnosticCLI(
  diagnostic: RichDiagnostic,
  options: CLIRenderOptions = {}
): string {
  const { contextLines = 1, showExplanation = false } = options;
  const useColors = options.colors ?? colorsEnabled();
  const color = (text: string, ...styles: (keyof typeof COLORS)[]): string => {
    if (!useColors) return text;
    const prefix = styles.map((s) => COLORS[s]).join("");
    return `${prefix}${text}${COLORS.reset}`;
  };

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[${formatCode(diagnostic.code)}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );

  const span = diagnostic.primarySpan;
  const text = span ? options.readSource?.(span.fileName) : undefined;

  if (span && text !== undefined) {
    const startPos = getLineAndColumn(text, span.start);
    const endPos = getLineAndColumn(text, span.end);
    lines.push(`  ${color("-->", "blue")} ${span.fileName ?? "<input>"}:${startPos.line}:${startPos.column}`);

    const minLine = Math.max(1, startPos.line - contextLines);
    const maxLine = Math.min(text.split("\n").length, endPos.line + contextLines);
    const numWidth = lineNumberWidth(maxLine);
    const gutter = " ".repeat(numWidth);

    lines.push(` ${gutter} ${color("|", "blue")}`);

    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = getLineText(text, lineNum);
      lines.push(
        ` ${color(String(lineNum).padStart(numWidth, " "), "blue")} ${color("|", "blue")} ${lineText}`
      );

      if (lineNum >= startPos.line && lineNum <= endPos.line) {
        const lineStartCol = lineNum === startPos.line ? startPos.column : 1;
        const lineEndCol = lineNum === endPos.line ? endPos.column : lineText.length + 1;
        const underline = createUnderline(lineStartCol, lineEndCol - lineStartCol, "^");
        lines.push(` ${gutter} ${color("|", "blue")} ${color(underline, severityClr)}`);
      }
    }

    for (const label of diagnostic.labels) {
      const labelStart = getLineAndColumn(text, label.span.start);
      const labelEnd = getLineAndColumn(text, label.span.end);
      const labelLineNum = String(labelStart.line).padStart(numWidth, " ");
      lines.push(
        ` ${color(labelLineNum, "blue")} ${color("|", "blue")} ${getLineText(text, labelStart.line)}`
      );
      const underline = createUnderline(labelStart.column, labelEnd.column - labelStart.column, "-");
      lines.push(
        ` ${gutter} ${color("|", "blue")} ${color(underline, "blue")} ${color(label.message, "blue")}`
      );
    }

    lines.push(` ${gutter} ${color("|", "blue")}`);
  } else if (span) {
    lines.push(`  ${color("-->", "blue")} ${span.fileName ?? "<input>"}@${span.start}..${span.end}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(
  diagnostics: RichDiagnostic[],
  options: CLIRenderOptions = {}
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) {
    parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  }
  if (warnCount > 0) {
    parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  }

  if (parts.length > 0) {
    lines.push(`${parts.join(", ")} generated`);
  }

  return lines.join("\n");
}

/**
 * Print multiple diagnostics with a summary (stderr by default).
 */
export function printDiagnostics(
  diagnostics: RichDiagnostic[],
  options: CLIRenderOptions = {}
): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnosticsCLI(diagnostics, options));
}
