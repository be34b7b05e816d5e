#!/usr/bin/env node

/**
 * splicer CLI -- Expand token macros in TypeScript sources
 *
 * Usage:
 *   splicer expand <file> [--diff] [--explain] [--verbose]
 *   splicer check <files...> [--explain] [--verbose]
 *   splicer explain <code>
 */

import { runCheck, runExpand } from "./expand.js";
import { runExplain } from "./explain.js";

interface CliOptions {
  command: "expand" | "check" | "explain";
  files: string[];
  verbose: boolean;
  diff: boolean;
  explain: boolean;
}

function isCommand(value: string | undefined): value is CliOptions["command"] {
  return value === "expand" || value === "check" || value === "explain";
}

function parseArgs(args: string[]): CliOptions {
  const command = args[0];
  if (!isCommand(command)) {
    console.error(
      `Unknown command: ${command}\nUsage: splicer <expand|check|explain> <file...|code> [--diff] [--explain] [--verbose]`
    );
    process.exit(1);
  }

  const files: string[] = [];
  let verbose = false;
  let diff = false;
  let explain = false;

  for (let i = 1; i < args.length; i++) {
    if (args[i] === "--verbose" || args[i] === "-v") {
      verbose = true;
    } else if (args[i] === "--diff") {
      diff = true;
    } else if (args[i] === "--explain") {
      explain = true;
    } else if (args[i] === "--help" || args[i] === "-h") {
      printHelp();
      process.exit(0);
    } else if (!args[i].startsWith("-")) {
      files.push(args[i]);
    }
  }

  return { command, files, verbose, diff, explain };
}

function printHelp(): void {
  console.log(`
splicer - Token macros for TypeScript

USAGE:
  splicer <command> [options] <file...>

COMMANDS:
  expand   Show macro-expanded output of one file
  check    Report invocations that fail to expand
  explain  Describe a diagnostic code, such as SP9004

OPTIONS:
  --diff                 Show unified diff (expand command)
  --explain              Print each diagnostic's explanation
  -v, --verbose          Enable verbose logging
  -h, --help             Show this help message

EXAMPLES:
  splicer expand src/models/user.ts
  splicer expand --diff src/models/user.ts
  splicer check src/**/*.ts
  splicer explain SP9004
`);
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    printHelp();
    process.exit(0);
  }

  const options = parseArgs(args);

  switch (options.command) {
    case "expand":
      if (options.files.length !== 1) {
        console.error("expand requires one file argument: splicer expand <file>");
        process.exit(1);
      }
      process.exit(
        runExpand({
          file: options.files[0],
          diff: options.diff,
          verbose: options.verbose,
          explain: options.explain,
        })
      );
      break;
    case "check":
      if (options.files.length === 0) {
        console.error("check requires at least one file: splicer check <files...>");
        process.exit(1);
      }
      process.exit(runCheck({ files: options.files, verbose: options.verbose, explain: options.explain }));
      break;
    case "explain":
      if (options.files.length !== 1) {
        console.error("explain requires one diagnostic code: splicer explain <code>");
        process.exit(1);
      }
      process.exit(runExplain(options.files[0]));
      break;
  }
}

main();
