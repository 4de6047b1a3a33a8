/**
 * REPL - Read-Eval-Print Loop over a Session.
 */

import * as readline from "readline";
import type { Node } from "./node";
import { parse } from "./reader";
import { deparse } from "./deparse";
import { valueToString } from "./value";
import type { SessionOptions } from "./session";
import { Session, isVisible } from "./session";
import { findFunction } from "./evaluate";
import { standardize } from "./standardize";
import { formatError } from "./errors";

// ============================================================================
// REPL State
// ============================================================================

type ReplMode = "eval" | "ast" | "standardize";

const MODES: readonly ReplMode[] = ["eval", "ast", "standardize"];

const isMode = (text: string): text is ReplMode => MODES.some((m) => m === text);

export interface ReplState {
  mode: ReplMode;
  session: Session;
  /** Where output goes; console.log unless a caller captures it. */
  print: (line: string) => void;
  exit: () => void;
}

export function createReplState(session: Session = new Session(), print: (line: string) => void = console.log): ReplState {
  return { mode: "eval", session, print, exit: () => process.exit(0) };
}

// ============================================================================
// Commands
// ============================================================================

const COMMANDS: Record<string, { description: string; handler: (state: ReplState, args: string) => void }> = {
  help: {
    description: "Show this help message",
    handler: (state) => showHelp(state),
  },
  mode: {
    description: "Set mode: eval, ast, or standardize",
    handler: (state, args) => {
      const mode = args.trim();
      if (isMode(mode)) {
        state.mode = mode;
        state.print(`Mode set to: ${mode}`);
      } else {
        state.print(`Valid modes: ${MODES.join(", ")}`);
      }
    },
  },
  env: {
    description: "List the global bindings",
    handler: (state) => {
      const names = state.session.global.names();
      state.print(names.length === 0 ? "(empty)" : names.sort().join(" "));
    },
  },
  exit: {
    description: "Exit the REPL",
    handler: (state) => state.exit(),
  },
};

function showHelp(state: ReplState): void {
  state.print("Commands:");
  for (const [name, { description }] of Object.entries(COMMANDS)) {
    state.print(`  :${name.padEnd(12)} ${description}`);
  }
  state.print("Modes:");
  state.print("  eval         Evaluate and print the result (default)");
  state.print("  ast          Show the parsed tree");
  state.print("  standardize  Show a call with its arguments matched to the callee's formals");
  state.print("Examples:");
  state.print("  f = (x, y = 2) => substitute(x)");
  state.print("  f(a + b)");
  state.print("  bquote(g(unquote(1 + 2), z))");
}

// ============================================================================
// Evaluation
// ============================================================================

export function processInput(state: ReplState, input: string): void {
  const trimmed = input.trim();

  if (!trimmed) return;

  if (trimmed.startsWith(":")) {
    const spaceIdx = trimmed.indexOf(" ");
    const cmdName = spaceIdx > 0 ? trimmed.slice(1, spaceIdx) : trimmed.slice(1);
    const cmdArgs = spaceIdx > 0 ? trimmed.slice(spaceIdx + 1) : "";

    const cmd = Object.hasOwn(COMMANDS, cmdName) ? COMMANDS[cmdName] : undefined;
    if (cmd) {
      cmd.handler(state, cmdArgs);
    } else {
      state.print(`Unknown command: :${cmdName}. Type :help for available commands.`);
    }
    return;
  }

  try {
    const nodes = parse(trimmed);
    switch (state.mode) {
      case "eval":
        evalMode(state, nodes);
        break;
      case "ast":
        astMode(state, nodes);
        break;
      case "standardize":
        standardizeMode(state, nodes);
        break;
    }
  } catch (e) {
    state.print(`Error: ${formatError(e, null)}`);
  }
}

function evalMode(state: ReplState, nodes: readonly Node[]): void {
  const ctx = state.session.context();
  for (const node of nodes) {
    const value = state.session.eval(node, ctx);
    if (isVisible(node)) {
      state.print(valueToString(value));
    }
  }
}

function astMode(state: ReplState, nodes: readonly Node[]): void {
  for (const node of nodes) {
    state.print(JSON.stringify(node, null, 2));
  }
}

function standardizeMode(state: ReplState, nodes: readonly Node[]): void {
  for (const node of nodes) {
    if (node.tag !== "call" || node.fn.tag !== "symbol") {
      state.print(`Not a call to a named function: ${deparse(node)}`);
      continue;
    }
    const fn = findFunction(node.fn.name, state.session.global, state.session.context());
    const formals = fn.formals;
    if (formals === null) {
      state.print(`${node.fn.name} has no formals to match against`);
      continue;
    }
    state.print(deparse(standardize(node, formals)));
  }
}

// ============================================================================
// Main
// ============================================================================

export function startRepl(options: SessionOptions = {}): void {
  const state = createReplState(new Session(options));
  state.print("metaforms");
  state.print("Type :help for available commands, :exit to quit\n");

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });

  rl.prompt();

  rl.on("line", (line: string) => {
    processInput(state, line);
    rl.prompt();
  });

  rl.on("close", () => {
    state.print("\nGoodbye!");
    process.exit(0);
  });
}
