/**
 * Tests for sessions and the command line and REPL front ends.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { BUILTINS, MetaError, Session, UnboundSymbolError, formatError, parseOne } from "../src/index";
import type { HostTable } from "../src/index";
import { isVisible } from "../src/session";
import { parseArgs, runSource } from "../src/cli";
import { createReplState, processInput } from "../src/repl";

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// Session
// ============================================================================

describe("Session", () => {
  it("keeps global bindings between runs", () => {
    const s = new Session();
    s.run("x = 20");
    expect(s.run("x + 1")).toBe(21);
    expect(s.global.hasLocal("x")).toBe(true);
    expect(s.root.hasLocal("x")).toBe(false);
  });

  it("returns NULL for an empty program", () => {
    expect(new Session().run("// nothing")).toBeNull();
  });

  it("reports the value and visibility of each expression", () => {
    const results = new Session().runAll("a = 1\na + 1");
    expect(results.map((r) => [r.value, r.visible])).toEqual([
      [1, false],
      [2, true],
    ]);
  });

  it("runs with a custom builtin table", () => {
    const builtins: HostTable = new Map([...BUILTINS].filter(([name]) => name !== "+"));
    const s = new Session({ builtins });
    expect(() => s.run("1 + 1")).toThrow(UnboundSymbolError);
    expect(s.run("2 * 3")).toBe(6);
  });
});

describe("isVisible", () => {
  it("hides assignments and print", () => {
    expect(isVisible(parseOne("x = 1"))).toBe(false);
    expect(isVisible(parseOne("print(1)"))).toBe(false);
    expect(isVisible(parseOne("f(x)"))).toBe(true);
  });
});

describe("formatError", () => {
  it("prefixes the code and the file", () => {
    expect(formatError(new UnboundSymbolError("x"), "prog.txt")).toBe("prog.txt: UnboundSymbol: object 'x' not found");
    expect(formatError(new Error("plain"), null)).toBe("plain");
    expect(formatError("odd", null)).toBe("Unknown error: odd");
  });

  it("reports every failure as a MetaError", () => {
    expect(new UnboundSymbolError("x")).toBeInstanceOf(MetaError);
  });
});

// ============================================================================
// Command Line
// ============================================================================

describe("parseArgs", () => {
  it("reads a file and limits", () => {
    expect(parseArgs(["prog.txt", "--max-depth", "10", "--ast"])).toEqual({
      inputFile: "prog.txt",
      ast: true,
      maxDepth: 10,
    });
  });

  it("rejects bad counts and unknown options", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(parseArgs(["--max-steps", "x"])).toBeNull();
    expect(parseArgs(["--verbose"])).toBeNull();
    expect(error).toHaveBeenCalledWith("Error: --max-steps requires a positive integer");
    expect(error).toHaveBeenCalledWith("Error: Unknown option: --verbose");
  });
});

describe("runSource", () => {
  it("prints visible results", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const code = runSource("x = 2\nx * 3\nprint(x)\nquote(f(x))", { inputFile: null, ast: false });
    expect(code).toBe(0);
    expect(log.mock.calls).toEqual([["6"], ["2"], ["f(x)"]]);
  });

  it("reports the first error and fails", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const code = runSource("1\nzz\n2", { inputFile: "prog.txt", ast: false });
    expect(code).toBe(1);
    expect(log.mock.calls).toEqual([["1"]]);
    expect(error).toHaveBeenCalledWith("prog.txt: UnboundSymbol: object 'zz' not found");
  });

  it("prints trees with --ast", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(runSource("x", { inputFile: null, ast: true })).toBe(0);
    expect(log).toHaveBeenCalledWith(JSON.stringify({ tag: "symbol", name: "x" }, null, 2));
  });
});

// ============================================================================
// REPL
// ============================================================================

describe("processInput", () => {
  function repl() {
    const lines: string[] = [];
    const state = createReplState(new Session(), (line) => lines.push(line));
    return { state, lines };
  }

  it("evaluates and echoes visible values", () => {
    const { state, lines } = repl();
    processInput(state, "y = 4");
    processInput(state, "y * 2");
    expect(lines).toEqual(["8"]);
  });

  it("prints errors without stopping", () => {
    const { state, lines } = repl();
    processInput(state, "nope");
    processInput(state, "1");
    expect(lines).toEqual(["Error: UnboundSymbol: object 'nope' not found", "1"]);
  });

  it("standardizes calls in standardize mode", () => {
    const { state, lines } = repl();
    processInput(state, "f = (alpha, beta) => 0");
    processInput(state, ":mode standardize");
    processInput(state, "f(2, al = 1)");
    expect(lines).toEqual(["Mode set to: standardize", "f(alpha = 1, beta = 2)"]);
  });

  it("lists global bindings", () => {
    const { state, lines } = repl();
    processInput(state, "b = 1; a = 2");
    processInput(state, ":env");
    expect(lines).toEqual(["a b"]);
  });

  it("rejects unknown commands and modes", () => {
    const { state, lines } = repl();
    processInput(state, ":bogus");
    processInput(state, ":mode fast");
    expect(lines).toEqual([
      "Unknown command: :bogus. Type :help for available commands.",
      "Valid modes: eval, ast, standardize",
    ]);
  });

  it("ignores blank input", () => {
    const { state, lines } = repl();
    processInput(state, "   ");
    expect(lines).toEqual([]);
  });
});
