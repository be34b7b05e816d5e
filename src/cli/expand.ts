/**
 * splicer expand / check
 *
 * `expand` prints a file with its macro invocations expanded.
 * `check` only reports the invocations that fail to expand.
 *
 * Usage:
 *   splicer expand src/models/user.ts
 *   splicer expand --diff src/models/user.ts
 *   splicer check --explain src/a.ts src/b.ts
 */

import * as path from "path";
import * as fs from "fs";
import { preprocess } from "@splicer/preprocessor";
import { config, printDiagnostics, type RichDiagnostic } from "@splicer/core";

export interface ExpandOptions {
  /** File to expand */
  file: string;

  /** Show unified diff between original and expanded */
  diff: boolean;

  /** Enable verbose logging */
  verbose: boolean;

  /** Use ANSI colors (default: auto-detect) */
  colors?: boolean;

  /** Follow each diagnostic with its long-form explanation */
  explain?: boolean;
}

export interface CheckOptions {
  files: string[];
  verbose: boolean;
  colors?: boolean;
  explain?: boolean;
}

interface LoadedFile {
  displayPath: string;
  source: string;
}

function loadFile(file: string): LoadedFile | null {
  const absolutePath = path.resolve(file);
  if (!fs.existsSync(absolutePath)) {
    console.error(`File not found: ${absolutePath}`);
    return null;
  }
  return { displayPath: file, source: fs.readFileSync(absolutePath, "utf-8") };
}

function reportDiagnostics(
  diagnostics: RichDiagnostic[],
  file: LoadedFile,
  options: { colors?: boolean; explain?: boolean }
): number {
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  if (diagnostics.length > 0) {
    printDiagnostics(diagnostics, {
      colors: options.colors,
      showExplanation: options.explain,
      readSource: (fileName) => (fileName === file.displayPath ? file.source : undefined),
    });
  }
  return errors;
}

/**
 * Run the expand command. Returns the process exit code.
 */
export function runExpand(options: ExpandOptions): number {
  if (options.verbose) config.set({ verbose: true });

  const file = loadFile(options.file);
  if (!file) return 1;

  const result = preprocess(file.source, { fileName: file.displayPath });

  if (options.diff) {
    for (const line of formatDiff(file.source, result.code, file.displayPath, options.colors ?? false)) {
      console.log(line);
    }
  } else {
    console.log(result.code);
  }

  return reportDiagnostics(result.diagnostics, file, options) > 0 ? 1 : 0;
}

/**
 * Run the check command over every file. Returns the process exit code.
 */
export function runCheck(options: CheckOptions): number {
  if (options.verbose) config.set({ verbose: true });
  let failed = false;

  for (const name of options.files) {
    const file = loadFile(name);
    if (!file) {
      failed = true;
      continue;
    }
    const result = preprocess(file.source, { fileName: file.displayPath });
    if (reportDiagnostics(result.diagnostics, file, options) > 0) {
      failed = true;
    } else if (options.verbose) {
      console.log(`[splicer] ${file.displayPath}: ok`);
    }
  }

  return failed ? 1 : 0;
}

/**
 * A simple line-by-line diff between original and expanded source.
 */
export function formatDiff(original: string, expanded: string, filePath: string, colors: boolean): string[] {
  const origLines = original.split("\n");
  const expLines = expanded.split("\n");
  const red = (text: string) => (colors ? `\x1b[31m${text}\x1b[0m` : text);
  const green = (text: string) => (colors ? `\x1b[32m${text}\x1b[0m` : text);

  const hunks: Array<{
    origStart: number;
    origLines: string[];
    expLines: string[];
  }> = [];
  let inHunk = false;

  const maxLen = Math.max(origLines.length, expLines.length);
  for (let i = 0; i < maxLen; i++) {
    const origLine = origLines[i] ?? "";
    const expLine = expLines[i] ?? "";

    if (origLine !== expLine) {
      if (!inHunk) {
        inHunk = true;
        hunks.push({ origStart: i, origLines: [], expLines: [] });
      }
      const hunk = hunks[hunks.length - 1];
      if (i < origLines.length) hunk.origLines.push(origLine);
      if (i < expLines.length) hunk.expLines.push(expLine);
    } else {
      inHunk = false;
    }
  }

  const out = [`--- ${filePath} (original)`, `+++ ${filePath} (expanded)`, ""];

  if (hunks.length === 0) {
    out.push("(no changes, no macros expanded)");
    return out;
  }

  for (const hunk of hunks) {
    out.push(
      `@@ -${hunk.origStart + 1},${hunk.origLines.length} +${hunk.origStart + 1},${hunk.expLines.length} @@`
    );
    for (const line of hunk.origLines) {
      out.push(red(`- ${line}`));
    }
    for (const line of hunk.expLines) {
      out.push(green(`+ ${line}`));
    }
    out.push("");
  }

  return out;
}
