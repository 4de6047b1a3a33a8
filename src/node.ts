/**
 * Node - the closed tree representation of code.
 *
 * Exactly four kinds exist: constants, symbols, calls and parameter lists.
 * Nodes are immutable values; every edit below returns a new tree and
 * leaves its input untouched.
 */

import type { LangValue, Value } from "./value";
import { valuesIdentical } from "./value";
import { ArityError, UnknownNodeKindError } from "./errors";
import { Limits } from "./limits";

// ============================================================================
// Node Types
// ============================================================================

export type Node = Constant | Sym | Call | ParameterList;

export type NodeKind = Node["tag"];

/**
 * Anything a constant may hold. Quoted code is never wrapped in a constant;
 * it is embedded as the node itself (see valueToNode).
 */
export type ConstantValue = Exclude<Value, LangValue>;

export interface Constant {
  readonly tag: "constant";
  readonly value: ConstantValue;
}

export interface Sym {
  readonly tag: "symbol";
  readonly name: string;
}

/**
 * One argument of a call. `name` is null for positional arguments.
 */
export interface Arg {
  readonly name: string | null;
  readonly value: Node;
}

export interface Call {
  readonly tag: "call";
  /** Child 0: the callee, usually a symbol or a nested call. */
  readonly fn: Node;
  readonly args: readonly Arg[];
}

/**
 * A formal parameter. `value` is the default expression, or MISSING.
 */
export interface Param {
  readonly name: string;
  readonly value: Node;
}

export interface ParameterList {
  readonly tag: "params";
  readonly params: readonly Param[];
}

/** Name of the variadic formal and of the symbol that forwards it. */
export const DOTS = "...";

/**
 * The empty symbol: an absent default or an empty argument slot.
 */
export const MISSING: Sym = Object.freeze({ tag: "symbol", name: "" });

// ============================================================================
// Constructors
// ============================================================================

export const cnst = (value: ConstantValue): Constant => ({ tag: "constant", value });

export const sym = (name: string): Sym => (name === "" ? MISSING : { tag: "symbol", name });

export const named = (name: string, value: Node): Arg => ({ name, value });

export const positional = (value: Node): Arg => ({ name: null, value });

/**
 * Build a call. A string callee is shorthand for a symbol; arguments are
 * nodes (positional) or `named(...)` pairs.
 *
 * @example
 * call("+", sym("x"), cnst(1))          // x + 1
 * call("f", named("a", cnst(1)))        // f(a = 1)
 */
export function call(fn: Node | string, ...args: (Node | Arg)[]): Call {
  return callWith(fn, args.map(toArg));
}

export function callWith(fn: Node | string, args: readonly Arg[]): Call {
  return { tag: "call", fn: typeof fn === "string" ? sym(fn) : fn, args };
}

function toArg(arg: Node | Arg): Arg {
  return "tag" in arg ? positional(arg) : arg;
}

export const param = (name: string, value: Node = MISSING): Param => ({ name, value });

/**
 * Build a parameter list. Bare strings are formals without defaults.
 * Names must be unique, except for "...".
 */
export function params(...entries: (string | Param)[]): ParameterList {
  const list = entries.map((e) => (typeof e === "string" ? param(e) : e));
  const seen = new Set<string>();
  for (const p of list) {
    if (p.name !== DOTS && seen.has(p.name)) {
      throw new ArityError("function", `repeated formal argument '${p.name}'`, [p.name]);
    }
    seen.add(p.name);
  }
  return { tag: "params", params: list };
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Report the kind of a node. Input that is not one of the four kinds
 * (e.g. from untyped callers) raises UnknownNodeKind.
 */
export function kindOf(node: Node): NodeKind {
  switch (node.tag) {
    case "constant":
    case "symbol":
    case "call":
    case "params":
      return node.tag;
    default:
      return unknownNode(node);
  }
}

/**
 * Exhaustiveness guard for switches over Node.
 */
export function unknownNode(node: never, path: readonly number[] = []): never {
  throw new UnknownNodeKindError(path, node);
}

export const isConstant = (node: Node): node is Constant => node.tag === "constant";
export const isSym = (node: Node): node is Sym => node.tag === "symbol";
export const isCall = (node: Node): node is Call => node.tag === "call";
export const isParams = (node: Node): node is ParameterList => node.tag === "params";

export const isMissing = (node: Node): boolean => node.tag === "symbol" && node.name === "";

/**
 * True when `node` is a call whose callee is the symbol `name`.
 */
export function isCallTo(node: Node, name: string): node is Call & { readonly fn: Sym } {
  return node.tag === "call" && node.fn.tag === "symbol" && node.fn.name === name;
}

/**
 * The callee name of a call, or null when the callee is not a symbol.
 */
export function calleeName(node: Call): string | null {
  return node.fn.tag === "symbol" ? node.fn.name : null;
}

// ============================================================================
// Child Accessors (index 0 is the callee)
// ============================================================================

export const childCount = (node: Call): number => node.args.length + 1;

export function getChild(node: Call, index: number): Node {
  checkIndex(node, index, childCount(node) - 1);
  return index === 0 ? node.fn : node.args[index - 1].value;
}

/**
 * The name attached to child `index`, or null. The callee never has one.
 */
export function getChildName(node: Call, index: number): string | null {
  checkIndex(node, index, childCount(node) - 1);
  return index === 0 ? null : node.args[index - 1].name;
}

/**
 * Replace child `index`, or append when `index` equals the child count.
 * The existing name is kept unless a new one is given.
 */
export function setChild(node: Call, index: number, value: Node, name?: string | null): Call {
  checkIndex(node, index, childCount(node));
  if (index === 0) {
    return callWith(value, node.args);
  }
  const args = [...node.args];
  const previous = args[index - 1];
  args[index - 1] = { name: name !== undefined ? name : previous?.name ?? null, value };
  return callWith(node.fn, args);
}

/**
 * Remove argument `index`; later children shift down by one.
 */
export function removeChild(node: Call, index: number): Call {
  if (index === 0) {
    throw new RangeError("cannot remove the callee of a call");
  }
  checkIndex(node, index, childCount(node) - 1);
  return callWith(node.fn, node.args.filter((_, i) => i !== index - 1));
}

/**
 * First argument carrying `name`, if any.
 */
export function argNamed(node: Call, name: string): Node | undefined {
  return node.args.find((a) => a.name === name)?.value;
}

export const withArgs = (node: Call, args: readonly Arg[]): Call => callWith(node.fn, args);

function checkIndex(node: Call, index: number, max: number): void {
  if (!Number.isInteger(index) || index < 0 || index > max) {
    throw new RangeError(`child index ${index} out of range for call with ${childCount(node)} children`);
  }
}

// ============================================================================
// Structural Equality
// ============================================================================

/**
 * Deep structural equality, sensitive to argument order and names.
 * f(a = 1, b = 2) is not identical to f(b = 2, a = 1).
 */
export function identical(a: Node, b: Node, limits: Limits = new Limits()): boolean {
  if (a === b) return true;
  return limits.nested("identical", () => {
    switch (a.tag) {
      case "constant":
        return b.tag === "constant" && valuesIdentical(a.value, b.value, limits);
      case "symbol":
        return b.tag === "symbol" && a.name === b.name;
      case "call":
        return (
          b.tag === "call" &&
          identical(a.fn, b.fn, limits) &&
          a.args.length === b.args.length &&
          a.args.every((arg, i) => arg.name === b.args[i].name && identical(arg.value, b.args[i].value, limits))
        );
      case "params":
        return (
          b.tag === "params" &&
          a.params.length === b.params.length &&
          a.params.every((p, i) => p.name === b.params[i].name && identical(p.value, b.params[i].value, limits))
        );
      default:
        return unknownNode(a);
    }
  });
}
