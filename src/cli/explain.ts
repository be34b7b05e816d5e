/**
 * splicer explain
 *
 * Prints the long-form explanation of a diagnostic code.
 *
 * Usage:
 *   splicer explain SP9004
 *   splicer explain 9004
 */

import { formatCode, getDiagnosticDescriptor } from "@splicer/core";

function parseCode(text: string): number | undefined {
  const match = /^(?:SP)?(\d{4})$/i.exec(text.trim());
  return match ? Number(match[1]) : undefined;
}

/**
 * Run the explain command. Returns the process exit code.
 */
export function runExplain(code: string): number {
  const parsed = parseCode(code);
  const descriptor = parsed === undefined ? undefined : getDiagnosticDescriptor(parsed);
  if (!descriptor) {
    console.error(`Unknown diagnostic code: ${code}`);
    return 1;
  }

  console.log(
    `${formatCode(descriptor.code)} (${descriptor.severity}, ${descriptor.category}): ${descriptor.messageTemplate}\n\n${descriptor.explanation}`
  );
  return 0;
}
