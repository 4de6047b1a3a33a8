/**
 * Tests for the reader (source text to trees) and deparse (trees to text).
 */

import { describe, it, expect } from "vitest";
import {
  ReadError,
  call,
  cnst,
  deparse,
  identical,
  named,
  param,
  params,
  parse,
  parseOne,
  sym,
} from "../src/index";
import type { Node } from "../src/index";

function expectTree(source: string, expected: Node): void {
  expect(identical(parseOne(source), expected)).toBe(true);
}

// ============================================================================
// Reader
// ============================================================================

describe("parse", () => {
  describe("literals and names", () => {
    it("reads numbers, strings and logical constants", () => {
      expectTree("42", cnst(42));
      expectTree("'it\\'s'", cnst("it's"));
      expectTree('"a\\nb"', cnst("a\nb"));
      expectTree("true", cnst(true));
      expectTree("FALSE", cnst(false));
      expectTree("NULL", cnst(null));
      expectTree("Inf", cnst(Infinity));
    });

    it("reads identifiers as symbols", () => {
      expectTree("x", sym("x"));
    });
  });

  describe("operators", () => {
    it("reads binary operators as calls", () => {
      expectTree("a + b * c", call("+", sym("a"), call("*", sym("b"), sym("c"))));
      expectTree("a === b", call("==", sym("a"), sym("b")));
      expectTree("a % b", call("%%", sym("a"), sym("b")));
      expectTree("2 ** 3", call("^", cnst(2), cnst(3)));
    });

    it("keeps parentheses as calls", () => {
      expectTree("(a + b) * c", call("*", call("(", call("+", sym("a"), sym("b"))), sym("c")));
    });

    it("reads unary operators", () => {
      expectTree("-x", call("-", sym("x")));
      expectTree("!x", call("!", sym("x")));
      expectTree("typeof x", call("typeof", sym("x")));
    });

    it("reads the conditional operator as if", () => {
      expectTree("c ? a : b", call("if", sym("c"), sym("a"), sym("b")));
    });
  });

  describe("calls", () => {
    it("reads named arguments", () => {
      expectTree("f(x, y = 2)", call("f", sym("x"), named("y", cnst(2))));
    });

    it("reads a spread argument as ...", () => {
      expectTree("f(...rest)", call("f", sym("...")));
    });

    it("reads a dotted callee as one name", () => {
      expectTree("is.call(x)", call("is.call", sym("x")));
    });

    it("reads member access as $ and [[", () => {
      expectTree("a.b", call("$", sym("a"), sym("b")));
      expectTree("a[1]", call("[[", sym("a"), cnst(1)));
    });

    it("reads array literals as c()", () => {
      expectTree("[1, 2]", call("c", cnst(1), cnst(2)));
    });
  });

  describe("functions and assignment", () => {
    it("reads arrow functions with defaults and rest parameters", () => {
      expectTree(
        "(a, b = 1, ...rest) => a + b",
        call("function", params("a", param("b", cnst(1)), "..."), call("+", sym("a"), sym("b")))
      );
    });

    it("reads a single bare parameter", () => {
      expectTree("x => x", call("function", params("x"), sym("x")));
    });

    it("reads block bodies as {", () => {
      expectTree("() => { 1; 2 }", call("function", params(), call("{", cnst(1), cnst(2))));
    });

    it("reads function declarations as assignments", () => {
      expectTree("function f(x) { return x }", call("<-", sym("f"), call("function", params("x"), call("{", call("return", sym("x"))))));
    });

    it("reads assignments and declarations as <-", () => {
      expectTree("x = 1", call("<-", sym("x"), cnst(1)));
      expectTree("x += 2", call("<-", sym("x"), call("+", sym("x"), cnst(2))));
      expect(parse("const x = 1, y")).toEqual([call("<-", sym("x"), cnst(1)), call("<-", sym("y"), cnst(null))]);
    });

    it("reads if statements", () => {
      expectTree("if (a) b; else c", call("if", sym("a"), sym("b"), sym("c")));
    });
  });

  describe("programs", () => {
    it("returns top-level expressions in order", () => {
      const nodes = parse("x = 1\n// note\nx + 1");
      expect(nodes.map(deparse)).toEqual(["x <- 1", "x + 1"]);
    });

    it("requires exactly one expression in parseOne", () => {
      expect(() => parseOne("1; 2")).toThrow("expected one expression, found 2");
    });
  });

  describe("errors", () => {
    it("reports syntax errors with a position", () => {
      expect(() => parse("f(")).toThrow(ReadError);
      expect(() => parse("1 +")).toThrow(/^syntax error at 1:/);
    });

    it("rejects syntax with no meaning here", () => {
      expect(() => parse("new Foo()")).toThrow("unsupported syntax: NewExpression");
      expect(() => parse("a ?? b")).toThrow("unsupported operator: ??");
      expect(() => parse("a & b")).toThrow("unsupported operator: &");
      expect(() => parse("`${x}`")).toThrow("template interpolation is not supported");
    });
  });
});

// ============================================================================
// Deparse
// ============================================================================

describe("deparse", () => {
  it("uses the fewest parentheses precedence allows", () => {
    expect(deparse(call("*", call("+", sym("a"), sym("b")), sym("c")))).toBe("(a + b) * c");
    expect(deparse(call("+", sym("a"), call("*", sym("b"), sym("c"))))).toBe("a + b * c");
    expect(deparse(call("-", sym("a"), call("-", sym("b"), sym("c"))))).toBe("a - (b - c)");
    expect(deparse(call("-", call("-", sym("a"), sym("b")), sym("c")))).toBe("a - b - c");
  });

  it("groups ^ to the right", () => {
    expect(deparse(call("^", sym("a"), call("^", sym("b"), sym("c"))))).toBe("a^b^c");
    expect(deparse(call("^", call("^", sym("a"), sym("b")), sym("c")))).toBe("(a^b)^c");
  });

  it("wraps operands of unary minus", () => {
    expect(deparse(call("-", call("+", sym("a"), sym("b"))))).toBe("-(a + b)");
    expect(deparse(call("-", sym("a")))).toBe("-a");
  });

  it("prints operators with other arities as calls", () => {
    expect(deparse(call("+", cnst(1), cnst(2), cnst(3)))).toBe("`+`(1, 2, 3)");
  });

  it("quotes names that are not syntactic", () => {
    expect(deparse(sym("my var"))).toBe("`my var`");
    expect(deparse(call("my fn", cnst(1)))).toBe("`my fn`(1)");
    expect(deparse(call("f", named("if", cnst(1))))).toBe("f(`if` = 1)");
  });

  it("prints special forms in their own syntax", () => {
    expect(deparse(parseOne("c ? a : b"))).toBe("if (c) a else b");
    expect(deparse(parseOne("f = (x, y = 1) => x + y"))).toBe("f <- function(x, y = 1) x + y");
    expect(deparse(parseOne("() => { a; b }"))).toBe("function() { a; b }");
    expect(deparse(parseOne("a.b[2]"))).toBe("a$b[[2]]");
  });

  it("prints constants", () => {
    expect(deparse(cnst("hi"))).toBe('"hi"');
    expect(deparse(cnst(1.5))).toBe("1.5");
    expect(deparse(cnst(-Infinity))).toBe("-Inf");
    expect(deparse(cnst(true))).toBe("TRUE");
    expect(deparse(cnst(null))).toBe("NULL");
  });

  it("agrees with the reader on what it prints", () => {
    for (const source of ["a + b * c", "(a + b) * c", "f(x, y = g(z))", "g(-x, !y)"]) {
      expect(deparse(parseOne(source))).toBe(source);
    }
  });
});
