/**
 * Tests for the generic tree walker and the analyses built on it.
 */

import { describe, it, expect, vi } from "vitest";
import {
  Limits,
  RecursionLimitExceededError,
  UnknownNodeKindError,
  allNames,
  assignTargets,
  call,
  callWith,
  cnst,
  deparse,
  findForbidden,
  params,
  parseOne,
  rebuild,
  renameSymbols,
  someNode,
  sym,
  transformNode,
  usesSymbol,
  visit,
} from "../src/index";
import type { Node } from "../src/index";

// ============================================================================
// Walker
// ============================================================================

describe("visit", () => {
  it("counts leaves with a summing visitor", () => {
    const leaves = visit<number>(parseOne("f(x, g(y, 1))"), {
      leaf: () => 1,
      combine: (_node, children) => {
        let total = 0;
        for (const n of children) total += n;
        return total;
      },
    });
    // f, x, g, y, 1
    expect(leaves).toBe(5);
  });

  it("visits a child only when combine asks for it", () => {
    const leaf = vi.fn(() => 0);
    visit<number>(call("f", sym("a"), sym("b")), {
      leaf,
      combine: (_node, children) => children.get(1),
    });
    expect(leaf).toHaveBeenCalledTimes(1);
    expect(leaf).toHaveBeenCalledWith(sym("a"), [1]);
  });

  it("visits parameter defaults as the children of a parameter list", () => {
    const found = visit<string[]>(params("a", "b"), {
      leaf: (node) => (node.tag === "symbol" ? [node.name] : []),
      combine: (_node, children) => [...children].flat(),
    });
    expect(found).toEqual(["", ""]);
  });

  it("reports an unknown node kind with its path", () => {
    const bogus: Node = JSON.parse('{"tag":"bogus"}');
    const tree = callWith("f", [{ name: null, value: sym("x") }, { name: null, value: bogus }]);
    let caught: unknown;
    try {
      visit<number>(tree, { leaf: () => 0, combine: (_n, children) => [...children].length });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnknownNodeKindError);
    if (caught instanceof UnknownNodeKindError) {
      expect(caught.path).toEqual([2]);
    }
  });

  it("stops at the depth limit", () => {
    let deep: Node = sym("x");
    for (let i = 0; i < 20; i++) deep = call("f", deep);
    const visitor = { leaf: () => 0, combine: (_n: Node, children: Iterable<number>) => Math.max(0, ...children) };
    expect(() => visit<number>(deep, visitor, new Limits({ maxDepth: 10 }))).toThrow(RecursionLimitExceededError);
  });
});

describe("someNode", () => {
  it("stops at the first match", () => {
    const predicate = vi.fn((node: Node) => node.tag === "symbol" && node.name === "a");
    expect(someNode(call("f", sym("a"), sym("b"), sym("c")), predicate)).toBe(true);
    // the call itself, then f, then a
    expect(predicate).toHaveBeenCalledTimes(3);
  });
});

describe("transformNode", () => {
  it("rewrites bottom-up without touching the input", () => {
    const node = parseOne("1 + 2 * 3");
    const doubled = transformNode(node, (n) => (n.tag === "constant" && typeof n.value === "number" ? cnst(n.value * 2) : n));
    expect(deparse(doubled)).toBe("2 + 4 * 6");
    expect(deparse(node)).toBe("1 + 2 * 3");
  });
});

describe("rebuild", () => {
  it("keeps argument names", () => {
    const node = parseOne("f(x, y = 2)");
    if (node.tag !== "call") throw new Error("expected a call");
    expect(deparse(rebuild(node, [sym("g"), cnst(1), cnst(3)]))).toBe("g(1, y = 3)");
  });

  it("rejects the wrong number of children", () => {
    expect(() => rebuild(call("f", cnst(1)), [sym("f")])).toThrow(RangeError);
  });
});

// ============================================================================
// Analyses
// ============================================================================

describe("usesSymbol and findForbidden", () => {
  const node = parseOne("f(x, g(y))");

  it("finds symbols in any position", () => {
    expect(usesSymbol(node, ["y"])).toBe(true);
    expect(usesSymbol(node, "g")).toBe(true);
    expect(usesSymbol(node, ["z"])).toBe(false);
  });

  it("reports the first forbidden name in depth-first order", () => {
    expect(findForbidden(node, ["y", "g"])).toBe("g");
    expect(findForbidden(node, ["z"])).toBeNull();
  });
});

describe("assignTargets", () => {
  it("lists assigned names once, in order", () => {
    expect(assignTargets(parseOne("{ a = 1; b = 2; a = 3 }"))).toEqual(["a", "b"]);
  });

  it("follows nested assignments", () => {
    expect(assignTargets(parseOne("a = b = 1"))).toEqual(["a", "b"]);
  });

  it("reports the variable behind a replacement target", () => {
    const node = call("<-", call("names", sym("x")), call("c", cnst("a")));
    expect(assignTargets(node)).toEqual(["x"]);
  });

  it("finds assignments inside function bodies", () => {
    expect(assignTargets(parseOne("f = (p) => { q = p }"))).toEqual(["f", "q"]);
  });
});

describe("allNames", () => {
  const node = parseOne("f(x, y + x)");

  it("lists every symbol in order", () => {
    expect(allNames(node)).toEqual(["f", "x", "+", "y", "x"]);
  });

  it("lists free-variable candidates without callees or repeats", () => {
    expect(allNames(node, { functions: false, unique: true })).toEqual(["x", "y"]);
  });
});

describe("renameSymbols", () => {
  it("renames callees and variables alike", () => {
    expect(deparse(renameSymbols(parseOne("f(x) + x"), { x: "z", f: "g" }))).toBe("g(z) + z");
  });
});
