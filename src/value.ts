/**
 * Runtime values produced by evaluation.
 *
 * Atoms are plain JavaScript primitives; everything else is a tagged object.
 * Quoted code travels as a `lang` value wrapping the node itself.
 */

import type { Environment } from "./env";
import type { EvalContext } from "./evaluate";
import type { Call, Node, ParameterList, Sym } from "./node";
import { cnst, identical } from "./node";
import { deparse, deparseParams } from "./deparse";
import { Limits } from "./limits";

// ============================================================================
// Value Types
// ============================================================================

export type Atom = number | string | boolean | null;

export type Value = Atom | LangValue | ListValue | ClosureValue | BuiltinValue | EnvValue;

export interface LangValue {
  readonly tag: "lang";
  readonly node: Sym | Call | ParameterList;
}

export interface ListItem {
  readonly name: string | null;
  readonly value: Value;
}

export interface ListValue {
  readonly tag: "list";
  readonly items: readonly ListItem[];
}

export interface ClosureValue {
  readonly tag: "closure";
  readonly formals: ParameterList;
  readonly body: Node;
  /** The defining environment; calls get a child of this, not of the caller. */
  readonly env: Environment;
}

/**
 * A special form sees its arguments unevaluated, plus the calling environment.
 */
export interface SpecialForm {
  readonly tag: "builtin";
  readonly kind: "special";
  readonly name: string;
  readonly formals: ParameterList | null;
  readonly impl: (call: Call, env: Environment, ctx: EvalContext) => Value;
}

/**
 * A primitive receives its arguments already forced, left to right.
 */
export interface Primitive {
  readonly tag: "builtin";
  readonly kind: "primitive";
  readonly name: string;
  readonly formals: ParameterList | null;
  readonly impl: (args: readonly ListItem[], env: Environment, ctx: EvalContext) => Value;
}

export type BuiltinValue = SpecialForm | Primitive;

export type Callable = ClosureValue | BuiltinValue;

export interface EnvValue {
  readonly tag: "env";
  readonly env: Environment;
}

// ============================================================================
// Constructors
// ============================================================================

export const langVal = (node: Sym | Call | ParameterList): LangValue => ({ tag: "lang", node });

export const listVal = (items: readonly ListItem[]): ListValue => ({ tag: "list", items });

export const item = (value: Value, name: string | null = null): ListItem => ({ name, value });

export const envVal = (env: Environment): EnvValue => ({ tag: "env", env });

export const closureVal = (formals: ParameterList, body: Node, env: Environment): ClosureValue =>
  ({ tag: "closure", formals, body, env });

// ============================================================================
// Classification
// ============================================================================

export const isAtom = (v: Value): v is Atom => v === null || typeof v !== "object";

export const isCallable = (v: Value): v is Callable =>
  v !== null && typeof v === "object" && (v.tag === "closure" || v.tag === "builtin");

export const isLang = (v: Value): v is LangValue => v !== null && typeof v === "object" && v.tag === "lang";

export const isList = (v: Value): v is ListValue => v !== null && typeof v === "object" && v.tag === "list";

export const isEnv = (v: Value): v is EnvValue => v !== null && typeof v === "object" && v.tag === "env";

/**
 * Type names as reported in diagnostics and by typeof-style checks.
 */
export function typeName(v: Value): string {
  if (v === null) return "NULL";
  if (typeof v === "number") return "double";
  if (typeof v === "string") return "character";
  if (typeof v === "boolean") return "logical";
  switch (v.tag) {
    case "lang":
      return v.node.tag === "symbol" ? "symbol" : v.node.tag === "call" ? "language" : "pairlist";
    case "list":
      return "list";
    case "closure":
      return "closure";
    case "builtin":
      return v.kind === "special" ? "special" : "builtin";
    case "env":
      return "environment";
  }
}

// ============================================================================
// Code <-> Value
// ============================================================================

/**
 * The value a quoted node denotes: a constant's own value, otherwise the
 * code itself.
 */
export function nodeToValue(node: Node): Value {
  return node.tag === "constant" ? node.value : langVal(node);
}

/**
 * Embed a value into a tree as a literal sub-tree. Quoted code is spliced
 * in as code, so a call value becomes a call node.
 */
export function valueToNode(value: Value): Node {
  return isLang(value) ? value.node : cnst(value);
}

// ============================================================================
// Equality
// ============================================================================

export function valuesIdentical(a: Value, b: Value, limits: Limits = new Limits()): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (isAtom(a) || isAtom(b)) return false;
  switch (a.tag) {
    case "lang":
      return b.tag === "lang" && identical(a.node, b.node, limits);
    case "list":
      return (
        b.tag === "list" &&
        a.items.length === b.items.length &&
        limits.nested("identical", () =>
          a.items.every((it, i) => it.name === b.items[i].name && valuesIdentical(it.value, b.items[i].value, limits))
        )
      );
    case "closure":
      return (
        b.tag === "closure" &&
        a.env === b.env &&
        identical(a.formals, b.formals, limits) &&
        identical(a.body, b.body, limits)
      );
    case "builtin":
      return b.tag === "builtin" && a.impl === b.impl;
    case "env":
      return b.tag === "env" && a.env === b.env;
  }
}

// ============================================================================
// Pretty Printing
// ============================================================================

export function valueToString(v: Value): string {
  if (v === null) return "NULL";
  if (typeof v === "number") return formatNumber(v);
  if (typeof v === "string") return JSON.stringify(v);
  if (typeof v === "boolean") return v ? "TRUE" : "FALSE";
  switch (v.tag) {
    case "lang":
      return deparse(v.node);
    case "list": {
      const items = v.items.map((it) => (it.name !== null ? `${it.name} = ${valueToString(it.value)}` : valueToString(it.value)));
      return `list(${items.join(", ")})`;
    }
    case "closure":
      return `function(${deparseParams(v.formals)}) ${deparse(v.body)}`;
    case "builtin":
      return `<builtin: ${v.name}>`;
    case "env":
      return `<environment: ${v.env.label}>`;
  }
}

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "Inf";
  if (n === -Infinity) return "-Inf";
  return String(n);
}
