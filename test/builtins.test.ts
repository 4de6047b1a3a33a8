/**
 * Tests for the builtin functions bound in every session's root environment.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { ArgumentTypeError, BUILTINS, Session, UserError, valueToString } from "../src/index";

const show = (s: Session, source: string): string => valueToString(s.run(source));

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// Arithmetic and Comparison
// ============================================================================

describe("arithmetic", () => {
  const s = new Session();

  it("computes with numbers", () => {
    expect(s.run("7 - 2 * 3")).toBe(1);
    expect(s.run("2 ** 10")).toBe(1024);
  });

  it("takes the modulo with the sign of the divisor", () => {
    expect(s.run("7 % 3")).toBe(1);
    expect(s.run("-7 % 3")).toBe(2);
    expect(s.run("1 % 0")).toBeNaN();
  });

  it("rejects non-numbers", () => {
    expect(() => s.run('1 + "a"')).toThrow(ArgumentTypeError);
  });

  it("compares numbers and strings", () => {
    expect(s.run("2 < 3")).toBe(true);
    expect(s.run('"b" >= "a"')).toBe(true);
    expect(s.run("NaN == NaN")).toBe(false);
    expect(s.run("!TRUE")).toBe(false);
  });
});

// ============================================================================
// Data
// ============================================================================

describe("lists", () => {
  const s = new Session();

  it("combines values with c", () => {
    expect(s.run("c()")).toBeNull();
    expect(s.run("c(1)")).toBe(1);
    expect(show(s, "c(1, list(2, 3), NULL)")).toBe("list(1, 2, 3)");
  });

  it("measures length", () => {
    expect(s.run("length(list(1, 2, 3))")).toBe(3);
    expect(s.run("length(NULL)")).toBe(0);
    expect(s.run("length(quote(f(x, y)))")).toBe(3);
  });

  it("indexes by position and by name", () => {
    s.run("l = list(10, b = 20)");
    expect(s.run("l[2]")).toBe(20);
    expect(s.run('l["b"]')).toBe(20);
    expect(s.run("l.b")).toBe(20);
    expect(s.run("l.missingField")).toBeNull();
  });

  it("replaces items through assignment", () => {
    s.run("m = list(1, 2)\nm[2] = 5");
    expect(show(s, "m")).toBe("list(1, 5)");
    s.run("n = list(a = 1)\nn.b = 2");
    expect(show(s, "n")).toBe("list(a = 1, b = 2)");
  });

  it("compares structurally with identical", () => {
    expect(s.run("identical(list(1, a = 2), list(1, a = 2))")).toBe(true);
    expect(s.run("identical(quote(a + b), quote(a + b))")).toBe(true);
    expect(s.run("identical(quote(a + b), quote(b + a))")).toBe(false);
  });

  it("reports type names", () => {
    expect(s.run("typeof 1")).toBe("double");
    expect(s.run("typeof quote(x)")).toBe("symbol");
    expect(s.run("typeof quote(f(x))")).toBe("language");
    expect(s.run("typeof list()")).toBe("list");
    expect(s.run("typeof quote")).toBe("special");
  });
});

// ============================================================================
// Code Construction
// ============================================================================

describe("code as data", () => {
  const s = new Session();

  it("classifies quoted code", () => {
    expect(s.run("is.call(quote(f(x)))")).toBe(true);
    expect(s.run("is.name(quote(x))")).toBe(true);
    expect(s.run("is.symbol(quote(f(x)))")).toBe(false);
    expect(s.run("is.function(print)")).toBe(true);
    expect(s.run("is.null(NULL)")).toBe(true);
  });

  it("builds calls from names and values", () => {
    expect(show(s, 'as.call(list(as.name("f"), 1, b = 2))')).toBe("f(1, b = 2)");
    expect(show(s, 'call("g", 1, quote(x))')).toBe("g(1, x)");
    expect(show(s, 'as.symbol("y")')).toBe("y");
  });

  it("takes calls apart by position", () => {
    s.run("e = quote(f(x, y))");
    expect(show(s, "e[1]")).toBe("f");
    expect(show(s, "e[3]")).toBe("y");
    s.run("e[1] = quote(g)");
    expect(show(s, "e")).toBe("g(x, y)");
  });

  it("reads and replaces the parts of a closure", () => {
    s.run("f = (x, y = 2) => x + y");
    expect(show(s, "body(f)")).toBe("x + y");
    expect(s.run("formals(f).y")).toBe(2);
    expect(show(s, "formals(f)")).toBe("list(x = , y = 2)");
    s.run('g = doCall("body<-", list(f, quote(x * y)))');
    expect(s.run("g(3)")).toBe(6);
  });

  it("deparses code to a string", () => {
    expect(s.run("deparse(quote(a ? b : c))")).toBe("if (a) b else c");
  });

  it("lists names in an expression", () => {
    expect(show(s, "all.names(quote(f(x, y + x)))")).toBe('list("f", "x", "+", "y", "x")');
    expect(show(s, "all.vars(quote(f(x, y + x)))")).toBe('list("x", "y")');
    expect(s.run("all.vars(quote(1))")).toBeNull();
  });
});

// ============================================================================
// Evaluation
// ============================================================================

describe("evaluation builtins", () => {
  const s = new Session();

  it("evaluates quoted code in a list of bindings", () => {
    expect(s.run("eval(quote(x + 1), list(x = 10))")).toBe(11);
  });

  it("evaluates in an environment", () => {
    s.run("e = (() => { inner = 7; environment() })()");
    expect(s.run("eval(quote(inner), e)")).toBe(7);
  });

  it("calls a function by name with doCall", () => {
    s.run("sum2 = (a, b) => a + b");
    expect(s.run('doCall("sum2", list(1, b = 2))')).toBe(3);
    expect(s.run("doCall(sum2, list(4, 5))")).toBe(9);
    expect(s.run("x = doCall(sum2, list(1, 1))")).toBe(2);
  });

  it("binds do.call and new.env under names the reader accepts", () => {
    expect(BUILTINS.get("doCall")).toBe(BUILTINS.get("do.call"));
    expect(s.run("typeof doCall")).toBe("builtin");
    expect(s.run("is.environment(newEnv())")).toBe(true);
  });

  it("raises user errors with stop", () => {
    expect(() => s.run('stop("bad ", 1)')).toThrow(UserError);
    expect(() => s.run('stop("bad ", 1)')).toThrow("bad 1");
  });

  it("prints a value and returns it", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(s.run("print(quote(a + b))")).toEqual(s.run("quote(a + b)"));
    expect(log).toHaveBeenCalledWith("a + b");
  });

  it("binds pi in the root environment", () => {
    expect(s.run("pi")).toBe(Math.PI);
  });
});
