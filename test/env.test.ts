/**
 * Tests for environments: lookup, definition, super-assignment and aliasing.
 */

import { describe, it, expect } from "vitest";
import {
  ArgumentTypeError,
  BUILTINS,
  Environment,
  MISSING,
  MissingValueAccessError,
  Session,
  UnboundSymbolError,
  call,
  cnst,
  item,
  langVal,
  params,
  sym,
  valueToString,
} from "../src/index";

function chain(): { root: Environment; global: Environment; local: Environment } {
  const root = new Environment(null, { label: "root" });
  const global = new Environment(root, { label: "global" });
  const local = new Environment(global, { label: "local" });
  return { root, global, local };
}

// ============================================================================
// Lookup
// ============================================================================

describe("lookup", () => {
  it("walks the parent chain to the nearest binding", () => {
    const { root, global, local } = chain();
    root.define("x", 1);
    global.define("x", 2);
    expect(local.lookup("x")).toEqual({ tag: "value", value: 2 });
    expect(local.whereBound("x")).toBe(global);
  });

  it("raises UnboundSymbol when nothing binds the name", () => {
    const { local } = chain();
    expect(() => local.lookup("nope")).toThrow(UnboundSymbolError);
    expect(() => local.lookup("nope")).toThrow("object 'nope' not found");
  });

  it("only sees local bindings through lookupLocal", () => {
    const { global, local } = chain();
    global.define("x", 1);
    expect(local.lookupLocal("x")).toBeUndefined();
    expect(local.has("x")).toBe(true);
    expect(local.hasLocal("x")).toBe(false);
  });
});

// ============================================================================
// Mutation
// ============================================================================

describe("define", () => {
  it("shadows without touching the parent", () => {
    const { global, local } = chain();
    global.define("x", 1);
    local.define("x", 2);
    expect(global.lookup("x")).toEqual({ tag: "value", value: 1 });
    expect(local.lookup("x")).toEqual({ tag: "value", value: 2 });
  });

  it("refuses to store the missing marker", () => {
    const { global } = chain();
    expect(() => global.define("x", langVal(MISSING))).toThrow(MissingValueAccessError);
  });
});

describe("assign", () => {
  it("rebinds in the nearest ancestor, skipping the current frame", () => {
    const { global, local } = chain();
    global.define("x", 0);
    local.define("x", 1);
    local.assign("x", 5);
    expect(global.lookup("x")).toEqual({ tag: "value", value: 5 });
    expect(local.lookup("x")).toEqual({ tag: "value", value: 1 });
  });

  it("falls back to the top level when no ancestor binds the name", () => {
    const { root, global, local } = chain();
    local.assign("z", 1);
    expect(global.hasLocal("z")).toBe(true);
    expect(root.hasLocal("z")).toBe(false);
    expect(local.topLevel).toBe(global);
  });

  it("leaves root bindings alone and shadows them at the top level", () => {
    const { root, global, local } = chain();
    root.define("c", "builtin");
    local.assign("c", 1);
    expect(root.lookup("c")).toEqual({ tag: "value", value: "builtin" });
    expect(global.lookup("c")).toEqual({ tag: "value", value: 1 });
  });

  it("keeps builtins callable after a function super-assigns their name", () => {
    const s = new Session();
    // f <- function() c <<- 1
    s.eval(call("<-", sym("f"), call("function", params(), call("<<-", sym("c"), cnst(1)))));
    s.run("f()");
    expect(s.run("c")).toBe(1);
    expect(valueToString(s.run("c(1, 2)"))).toBe("list(1, 2)");
    expect(s.root.lookup("c")).toEqual({ tag: "value", value: BUILTINS.get("c") });
    expect(s.global.hasLocal("c")).toBe(true);
  });
});

describe("fromList", () => {
  it("builds bindings from named items", () => {
    const env = Environment.fromList([item(1, "a"), item("b", "b")], null);
    expect(env.names()).toEqual(["a", "b"]);
    expect(env.parent).toBeNull();
  });

  it("rejects unnamed items", () => {
    expect(() => Environment.fromList([item(1)], null)).toThrow(ArgumentTypeError);
  });
});

// ============================================================================
// Aliasing
// ============================================================================

describe("aliasing", () => {
  it("lets every holder of an environment see writes made through another", () => {
    const s = new Session();
    s.run("e = environment()\nf = () => e.n\ne.n = 1");
    expect(s.run("f()")).toBe(1);
    s.run("e.n = 2");
    expect(s.run("f()")).toBe(2);
  });

  it("shares a defining environment between closures", () => {
    const s = new Session();
    s.run(`
      make = () => {
        state = environment()
        state.count = 0
        list(bump = () => { state.count = state.count + 1 }, read = () => state.count)
      }
      counter = make()
    `);
    s.run("bump = counter.bump\nread = counter.read\nbump()\nbump()");
    expect(s.run("read()")).toBe(2);
  });
});
