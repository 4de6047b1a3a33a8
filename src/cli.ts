#!/usr/bin/env node
/**
 * Command line front end.
 *
 * Usage:
 *   metaforms [file] [options]
 *
 * Options:
 *   --ast               Print each expression's tree instead of evaluating it
 *   --max-depth <n>     Nesting limit for evaluation (default 500)
 *   --max-steps <n>     Step budget per run (default unlimited)
 *   -h, --help          Show help
 *
 * Without a file, starts the REPL.
 */

import * as fs from "fs";
import * as path from "path";
import { parse } from "./reader";
import { valueToString } from "./value";
import { Session, isVisible } from "./session";
import { formatError } from "./errors";
import { startRepl } from "./repl";

export interface CliOptions {
  inputFile: string | null;
  ast: boolean;
  maxDepth?: number;
  maxSteps?: number;
}

function printHelp(): void {
  console.log(`
metaforms - evaluate and inspect code as data

Usage:
  metaforms [file] [options]

Options:
  --ast               Print each expression's tree instead of evaluating it
  --max-depth <n>     Nesting limit for evaluation (default 500)
  --max-steps <n>     Step budget per run (default unlimited)
  -h, --help          Show this help

Without a file, starts an interactive session.
`);
}

function parseCount(flag: string, text: string | undefined): number | null {
  const n = text === undefined ? NaN : Number(text);
  if (!Number.isInteger(n) || n <= 0) {
    console.error(`Error: ${flag} requires a positive integer`);
    return null;
  }
  return n;
}

/**
 * Parse command line arguments. Prints the problem and returns null on
 * invalid input.
 */
export function parseArgs(args: readonly string[]): CliOptions | null {
  const options: CliOptions = { inputFile: null, ast: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h" || arg === "--help") {
      printHelp();
      process.exit(0);
    } else if (arg === "--ast") {
      options.ast = true;
    } else if (arg === "--max-depth" || arg === "--max-steps") {
      const n = parseCount(arg, args[++i]);
      if (n === null) return null;
      if (arg === "--max-depth") options.maxDepth = n;
      else options.maxSteps = n;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      return null;
    } else {
      if (options.inputFile !== null) {
        console.error("Error: Multiple input files not supported");
        return null;
      }
      options.inputFile = arg;
    }
  }

  return options;
}

/**
 * Evaluate (or with --ast, print) every expression in `source`, writing
 * visible results to stdout. Returns the process exit code.
 */
export function runSource(source: string, options: CliOptions): number {
  try {
    const nodes = parse(source);
    if (options.ast) {
      for (const node of nodes) {
        console.log(JSON.stringify(node, null, 2));
      }
      return 0;
    }
    const session = new Session({ maxDepth: options.maxDepth, maxSteps: options.maxSteps });
    const ctx = session.context();
    for (const node of nodes) {
      const value = session.eval(node, ctx);
      if (isVisible(node)) {
        console.log(valueToString(value));
      }
    }
    return 0;
  } catch (e) {
    console.error(formatError(e, options.inputFile));
    return 1;
  }
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    process.exit(1);
  }

  if (options.inputFile === null) {
    startRepl({ maxDepth: options.maxDepth, maxSteps: options.maxSteps });
    return;
  }

  const inputPath = path.resolve(options.inputFile);
  let source: string;
  try {
    source = fs.readFileSync(inputPath, "utf-8");
  } catch (err) {
    console.error(`Error: Cannot read file: ${inputPath}: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  process.exitCode = runSource(source, options);
}

if (require.main === module) {
  main();
}
