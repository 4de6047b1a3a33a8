/**
 * Host callable table.
 *
 * Special forms receive the call unevaluated together with the calling
 * environment; primitives receive their arguments already forced. Both are
 * bound into the root environment of every session by createRootEnv().
 */

import type { Arg, Call, Node, ParameterList } from "./node";
import {
  DOTS,
  MISSING,
  childCount,
  callWith,
  cnst,
  getChild,
  isMissing,
  param,
  params,
  setChild,
  sym,
  withArgs,
} from "./node";
import type { Binding } from "./env";
import { Environment } from "./env";
import type { BuiltinValue, Callable, ClosureValue, ListItem, Primitive, SpecialForm, Value } from "./value";
import {
  closureVal,
  envVal,
  isCallable,
  isEnv,
  isLang,
  isList,
  item,
  langVal,
  listVal,
  nodeToValue,
  typeName,
  valueToNode,
  valueToString,
  valuesIdentical,
} from "./value";
import type { EvalContext } from "./evaluate";
import { closureFrame, evaluate, findFunction, force, invoke, lookupDots, signalReturn } from "./evaluate";
import type { ActualArg, ArgMatch } from "./standardize";
import { matchArguments, standardize } from "./standardize";
import { substitute } from "./substitute";
import { quasiquote } from "./quasiquote";
import { allNames } from "./analysis";
import { deparse } from "./deparse";
import { ArgumentTypeError, ArityError, MissingValueAccessError, UserError } from "./errors";

export type HostTable = ReadonlyMap<string, BuiltinValue>;

// ============================================================================
// Definition Helpers
// ============================================================================

type SpecialImpl = SpecialForm["impl"];
type PrimitiveImpl = Primitive["impl"];

const special = (name: string, formals: ParameterList | null, impl: SpecialImpl): SpecialForm => ({
  tag: "builtin",
  kind: "special",
  name,
  formals,
  impl,
});

const primitive = (name: string, formals: ParameterList | null, impl: PrimitiveImpl): Primitive => ({
  tag: "builtin",
  kind: "primitive",
  name,
  formals,
  impl,
});

/**
 * Match a special form's unevaluated arguments against its formals.
 */
function matchCall(name: string, call: Call, formals: ParameterList): ArgMatch<Node> {
  return matchArguments<Node>(call.args, formals, { callee: name, describe: deparse });
}

function matchValues(name: string, args: readonly ActualArg<Value>[], formals: ParameterList): ArgMatch<Value> {
  return matchArguments(args, formals, { callee: name, describe: valueToString });
}

/**
 * A matched argument that must be present (and, for nodes, not empty).
 */
function required<T>(match: ArgMatch<T>, formal: string): T {
  const value = match.matched.get(formal);
  if (value === undefined) {
    throw new MissingValueAccessError(formal);
  }
  return value;
}

function suppliedNode(match: ArgMatch<Node>, formal: string): Node | undefined {
  const node = match.matched.get(formal);
  return node === undefined || isMissing(node) ? undefined : node;
}

function expectArgs(name: string, args: readonly unknown[], count: number): void {
  if (args.length !== count) {
    throw new ArityError(name, `${args.length} arguments passed to '${name}' which requires ${count}`);
  }
}

// ============================================================================
// Coercions
// ============================================================================

function asNumber(callee: string, v: Value): number {
  if (typeof v === "number") return v;
  if (typeof v === "boolean") return v ? 1 : 0;
  throw new ArgumentTypeError(callee, "a number", typeName(v));
}

function asLogical(callee: string, v: Value): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number" && !Number.isNaN(v)) return v !== 0;
  throw new ArgumentTypeError(callee, "a logical value", typeName(v));
}

function asString(callee: string, v: Value): string {
  if (typeof v === "string") return v;
  throw new ArgumentTypeError(callee, "a string", typeName(v));
}

function asClosure(callee: string, v: Value): ClosureValue {
  if (v !== null && typeof v === "object" && v.tag === "closure") return v;
  throw new ArgumentTypeError(callee, "a closure", typeName(v));
}

/**
 * Resolve an environment argument: an environment as-is, a list as a new
 * environment enclosed by `enclos`.
 */
function asEnvironment(callee: string, v: Value, enclos: Environment | null): Environment {
  if (isEnv(v)) return v.env;
  if (isList(v)) return Environment.fromList(v.items, enclos);
  throw new ArgumentTypeError(callee, "an environment or a list", typeName(v));
}

/**
 * The printable text of a value as stop() and friends join it.
 */
function asText(v: Value): string {
  return typeof v === "string" ? v : valueToString(v);
}

// ============================================================================
// Quoting
// ============================================================================

const quoteForm = special("quote", params("expr"), (call) => {
  expectArgs("quote", call.args, 1);
  return nodeToValue(call.args[0].value);
});

const substituteForm = special(
  "substitute",
  params("expr", "env"),
  (call, env, ctx) => {
    const m = matchCall("substitute", call, params("expr", "env"));
    const expr = suppliedNode(m, "expr") ?? MISSING;
    const envArg = suppliedNode(m, "env");
    let target = env;
    if (envArg !== undefined) {
      const v = evaluate(envArg, env, ctx);
      // A list becomes a table of bindings with no parent to fall back on.
      target = isList(v)
        ? Environment.fromList(v.items, null, { frame: { kind: "bindings" }, label: "bindings" })
        : asEnvironment("substitute", v, null);
    }
    return nodeToValue(substitute(expr, target, ctx.limits));
  }
);

const bquoteForm = special("bquote", params("expr", "where"), (call, env, ctx) => {
  const m = matchCall("bquote", call, params("expr", "where"));
  const expr = required(m, "expr");
  const whereArg = suppliedNode(m, "where");
  const where = whereArg === undefined ? env : asEnvironment("bquote", evaluate(whereArg, env, ctx), env);
  return nodeToValue(quasiquote(expr, where, ctx));
});

// ============================================================================
// Control Flow
// ============================================================================

const ifForm = special("if", null, (call, env, ctx) => {
  const args = call.args;
  if (args.length < 2 || args.length > 3) {
    throw new ArityError("if", `expected 2 or 3 arguments, got ${args.length}`);
  }
  if (asLogical("if", evaluate(args[0].value, env, ctx))) {
    return evaluate(args[1].value, env, ctx);
  }
  return args.length === 3 ? evaluate(args[2].value, env, ctx) : null;
});

const blockForm = special("{", null, (call, env, ctx) => {
  let result: Value = null;
  for (const arg of call.args) {
    result = evaluate(arg.value, env, ctx);
  }
  return result;
});

const parenForm = special("(", null, (call, env, ctx) => {
  expectArgs("(", call.args, 1);
  return evaluate(call.args[0].value, env, ctx);
});

const andForm = special("&&", null, (call, env, ctx) => {
  expectArgs("&&", call.args, 2);
  if (!asLogical("&&", evaluate(call.args[0].value, env, ctx))) return false;
  return asLogical("&&", evaluate(call.args[1].value, env, ctx));
});

const orForm = special("||", null, (call, env, ctx) => {
  expectArgs("||", call.args, 2);
  if (asLogical("||", evaluate(call.args[0].value, env, ctx))) return true;
  return asLogical("||", evaluate(call.args[1].value, env, ctx));
});

const functionForm = special("function", null, (call, env) => {
  const formals = call.args.length > 0 ? call.args[0].value : undefined;
  if (formals === undefined || formals.tag !== "params") {
    throw new ArgumentTypeError("function", "a parameter list", formals === undefined ? "nothing" : deparse(formals));
  }
  const body = call.args.length > 1 ? call.args[1].value : cnst(null);
  return closureVal(formals, body, env);
});

const returnForm = special("return", params("value"), (call, env, ctx) => {
  if (call.args.length > 1) {
    throw new ArityError("return", "multi-argument returns are not permitted");
  }
  const value = call.args.length === 1 ? evaluate(call.args[0].value, env, ctx) : null;
  return signalReturn(value, env, ctx);
});

// ============================================================================
// Assignment
// ============================================================================

type Store = (name: string, value: Value) => void;

/**
 * Assign `value` through `target`. A call target such as `f(x, i) <- v`
 * becomes `x <- \`f<-\`(x, i, value = v)`, recursively, so `f(g(x)) <- v`
 * works too.
 */
function assignInto(callee: string, target: Node, value: Value, env: Environment, ctx: EvalContext, store: Store): void {
  if (target.tag === "symbol" && !isMissing(target)) {
    store(target.name, value);
    return;
  }
  if (target.tag === "constant" && typeof target.value === "string") {
    store(target.value, value);
    return;
  }
  if (target.tag === "call" && target.fn.tag === "symbol" && target.args.length > 0) {
    const fname = target.fn.name;
    const inner = target.args[0].value;
    const current = evaluate(inner, env, ctx);
    const rest: ListItem[] = target.args.slice(1).map((a) => {
      // x$name <- v: the field is a name, not an expression to evaluate
      if (fname === "$" && a.value.tag === "symbol") return item(a.value.name, a.name);
      return item(evaluate(a.value, env, ctx), a.name);
    });
    const replacer = findFunction(`${fname}<-`, env, ctx);
    const updated = invoke(replacer, [item(current), ...rest, item(value, "value")], env, ctx);
    assignInto(callee, inner, updated, env, ctx, store);
    return;
  }
  throw new ArgumentTypeError(callee, "a name or a replacement call as assignment target", deparse(target));
}

function assignment(name: string, superAssign: boolean): SpecialForm {
  return special(name, null, (call, env, ctx) => {
    expectArgs(name, call.args, 2);
    const value = evaluate(call.args[1].value, env, ctx);
    const store: Store = superAssign ? (n, v) => env.assign(n, v) : (n, v) => env.define(n, v);
    assignInto(name, call.args[0].value, value, env, ctx, store);
    return value;
  });
}

// ============================================================================
// Introspection
// ============================================================================

/**
 * missing(x): was the formal `x` left unsupplied in this call? Follows
 * arguments that were passed straight through from an enclosing call.
 */
function isMissingBinding(binding: Binding | undefined): boolean {
  if (binding === undefined) return false;
  switch (binding.tag) {
    case "missing":
      return true;
    case "dots":
      return binding.entries.length === 0;
    case "value":
      return false;
    case "promise": {
      const p = binding.promise;
      if (p.isDefault || isMissing(p.expr)) return true;
      if (p.forced || p.expr.tag !== "symbol") return false;
      return isMissingBinding(p.env.lookupLocal(p.expr.name));
    }
  }
}

const missingForm = special("missing", params("x"), (call, env) => {
  expectArgs("missing", call.args, 1);
  const target = call.args[0].value;
  if (target.tag !== "symbol" || isMissing(target)) {
    throw new ArgumentTypeError("missing", "a formal argument name", deparse(target));
  }
  const binding = env.lookupLocal(target.name);
  if (binding === undefined) {
    throw new ArgumentTypeError("missing", "a formal argument of the current function", target.name);
  }
  return isMissingBinding(binding);
});

/**
 * match.call(definition, call): standardize a call against a function's
 * formals. By default, the call that invoked the current function, with
 * its `...` expanded from the caller.
 */
const matchCallForm = special("match.call", params("definition", "call"), (mc, env, ctx) => {
  const m = matchCall("match.call", mc, params("definition", "call"));
  const defArg = suppliedNode(m, "definition");
  const callArg = suppliedNode(m, "call");
  const owner = closureFrame(env);

  const definition =
    defArg !== undefined
      ? asClosure("match.call", evaluate(defArg, env, ctx))
      : owner?.frame.closure;

  let target: Call | undefined;
  if (callArg !== undefined) {
    const v = evaluate(callArg, env, ctx);
    if (!isLang(v) || v.node.tag !== "call") {
      throw new ArgumentTypeError("match.call", "a call", typeName(v));
    }
    target = v.node;
  } else if (owner !== null) {
    target = expandDots(owner.frame.call, owner.frame.callerEnv);
  }

  if (definition === undefined || target === undefined) {
    throw new UserError("match.call() was called from outside a function");
  }
  return langVal(standardize(target, definition.formals));
});

function expandDots(call: Call, callerEnv: Environment): Call {
  const args: Arg[] = [];
  for (const a of call.args) {
    if (a.value.tag === "symbol" && a.value.name === DOTS) {
      for (const entry of lookupDots(callerEnv)) {
        args.push({ name: entry.name, value: entry.promise.expr });
      }
    } else {
      args.push(a);
    }
  }
  return withArgs(call, args);
}

const sysCallForm = special("sys.call", null, (_call, env) => {
  const owner = closureFrame(env);
  return owner === null ? null : langVal(owner.frame.call);
});

const sysFunctionForm = special("sys.function", null, (_call, env) => {
  const owner = closureFrame(env);
  return owner === null ? null : owner.frame.closure;
});

const parentFrameForm = special("parent.frame", null, (_call, env) => {
  const owner = closureFrame(env);
  return envVal(owner === null ? env.topLevel : owner.frame.callerEnv);
});

const environmentForm = special("environment", params("fun"), (call, env, ctx) => {
  const m = matchCall("environment", call, params("fun"));
  const funArg = suppliedNode(m, "fun");
  if (funArg === undefined) return envVal(env);
  const fun = evaluate(funArg, env, ctx);
  if (fun === null) return envVal(env);
  if (!isCallable(fun)) {
    throw new ArgumentTypeError("environment", "a function", typeName(fun));
  }
  return fun.tag === "closure" ? envVal(fun.env) : null;
});

const dollarForm = special("$", null, (call, env, ctx) => {
  expectArgs("$", call.args, 2);
  const field = call.args[1].value;
  let name: string;
  if (field.tag === "symbol") {
    name = field.name;
  } else if (field.tag === "constant" && typeof field.value === "string") {
    name = field.value;
  } else {
    throw new ArgumentTypeError("$", "a field name", deparse(field));
  }
  return getField("$", evaluate(call.args[0].value, env, ctx), name, ctx);
});

function getField(callee: string, target: Value, name: string, ctx: EvalContext): Value {
  if (isList(target)) {
    return target.items.find((it) => it.name === name)?.value ?? null;
  }
  if (isEnv(target)) {
    const binding = target.env.lookupLocal(name);
    if (binding === undefined) return null;
    switch (binding.tag) {
      case "value":
        return binding.value;
      case "promise":
        return force(binding.promise, ctx);
      case "missing":
      case "dots":
        throw new MissingValueAccessError(name);
    }
  }
  throw new ArgumentTypeError(callee, "a list or an environment", typeName(target));
}

// ============================================================================
// Arithmetic and Comparison
// ============================================================================

function arithmetic(name: string, binary: (a: number, b: number) => number, unary?: (a: number) => number): Primitive {
  return primitive(name, null, (args) => {
    if (args.length === 1 && unary !== undefined) {
      return unary(asNumber(name, args[0].value));
    }
    expectArgs(name, args, 2);
    return binary(asNumber(name, args[0].value), asNumber(name, args[1].value));
  });
}

const modulo = (a: number, b: number): number => (b === 0 ? NaN : a - Math.floor(a / b) * b);

type Ordering = (c: number) => boolean;

function compareValues(name: string, a: Value, b: Value): number {
  const numeric = (v: Value) => typeof v === "number" || typeof v === "boolean";
  if (numeric(a) && numeric(b)) {
    const x = asNumber(name, a);
    const y = asNumber(name, b);
    if (Number.isNaN(x) || Number.isNaN(y)) return NaN;
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if ((typeof a === "string" || numeric(a)) && (typeof b === "string" || numeric(b))) {
    const x = asText(a);
    const y = asText(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  throw new ArgumentTypeError(name, "comparable values", `${typeName(a)} and ${typeName(b)}`);
}

function comparison(name: string, holds: Ordering): Primitive {
  return primitive(name, null, (args) => {
    expectArgs(name, args, 2);
    const c = compareValues(name, args[0].value, args[1].value);
    return Number.isNaN(c) ? false : holds(c);
  });
}

const notPrimitive = primitive("!", null, (args) => {
  expectArgs("!", args, 1);
  return !asLogical("!", args[0].value);
});

// ============================================================================
// Data
// ============================================================================

const combinePrimitive = primitive("c", params(DOTS), (args) => {
  const items: ListItem[] = [];
  for (const a of args) {
    if (a.value === null) continue;
    if (isList(a.value)) {
      items.push(...a.value.items);
    } else {
      items.push(a);
    }
  }
  if (items.length === 0) return null;
  if (items.length === 1 && items[0].name === null && !isList(items[0].value)) return items[0].value;
  return listVal(items);
});

const listPrimitive = primitive("list", params(DOTS), (args) => listVal(args));

function lengthOf(v: Value): number {
  if (v === null) return 0;
  if (typeof v !== "object") return 1;
  switch (v.tag) {
    case "list":
      return v.items.length;
    case "lang":
      if (v.node.tag === "call") return childCount(v.node);
      if (v.node.tag === "params") return v.node.params.length;
      return 1;
    case "env":
      return v.env.names().length;
    case "closure":
    case "builtin":
      return 1;
  }
}

const lengthPrimitive = primitive("length", params("x"), (args) => {
  expectArgs("length", args, 1);
  return lengthOf(args[0].value);
});

const identicalPrimitive = primitive("identical", params("x", "y"), (args, _env, ctx) => {
  const m = matchValues("identical", args, params("x", "y"));
  return valuesIdentical(required(m, "x"), required(m, "y"), ctx.limits);
});

function predicate(name: string, test: (v: Value) => boolean): Primitive {
  return primitive(name, params("x"), (args) => {
    expectArgs(name, args, 1);
    return test(args[0].value);
  });
}

const typeofPrimitive = primitive("typeof", params("x"), (args) => {
  expectArgs("typeof", args, 1);
  return typeName(args[0].value);
});

/**
 * [[: list items by 1-based position or name; a call's children by
 * position, the callee being element 1.
 */
function index(callee: string, target: Value, i: Value): Value {
  if (isList(target)) {
    if (typeof i === "string") {
      const found = target.items.find((it) => it.name === i);
      if (found === undefined) throw new ArgumentTypeError(callee, "an existing name", JSON.stringify(i));
      return found.value;
    }
    const n = asPosition(callee, i, target.items.length);
    return target.items[n - 1].value;
  }
  if (isLang(target) && target.node.tag === "call") {
    const n = asPosition(callee, i, childCount(target.node));
    return nodeToValue(getChild(target.node, n - 1));
  }
  if (isEnv(target) && typeof i === "string") {
    const binding = target.env.lookupLocal(i);
    return binding?.tag === "value" ? binding.value : null;
  }
  throw new ArgumentTypeError(callee, "a list, a call or an environment", typeName(target));
}

function asPosition(callee: string, i: Value, length: number): number {
  const n = asNumber(callee, i);
  if (!Number.isInteger(n) || n < 1 || n > length) {
    throw new ArgumentTypeError(callee, `an index between 1 and ${length}`, typeof i === "number" ? String(i) : typeName(i));
  }
  return n;
}

const indexPrimitive = primitive("[[", params("x", "i"), (args) => {
  const m = matchValues("[[", args, params("x", "i"));
  return index("[[", required(m, "x"), required(m, "i"));
});

const indexAssignPrimitive = primitive("[[<-", params("x", "i", "value"), (args) => {
  const m = matchValues("[[<-", args, params("x", "i", "value"));
  const target = required(m, "x");
  const i = required(m, "i");
  const value = required(m, "value");
  if (isList(target)) {
    const items = [...target.items];
    if (typeof i === "string") {
      const at = items.findIndex((it) => it.name === i);
      if (at < 0) items.push(item(value, i));
      else items[at] = item(value, i);
    } else {
      const n = asPosition("[[<-", i, items.length + 1);
      items[n - 1] = item(value, items[n - 1]?.name ?? null);
    }
    return listVal(items);
  }
  if (isLang(target) && target.node.tag === "call") {
    const n = asPosition("[[<-", i, childCount(target.node) + 1);
    return langVal(setChild(target.node, n - 1, valueToNode(value)));
  }
  throw new ArgumentTypeError("[[<-", "a list or a call", typeName(target));
});

const dollarAssignPrimitive = primitive("$<-", params("x", "name", "value"), (args) => {
  const m = matchValues("$<-", args, params("x", "name", "value"));
  const target = required(m, "x");
  const name = asString("$<-", required(m, "name"));
  const value = required(m, "value");
  if (isEnv(target)) {
    target.env.define(name, value);
    return target;
  }
  if (target !== null && !isList(target)) {
    throw new ArgumentTypeError("$<-", "a list or an environment", typeName(target));
  }
  const items = target === null ? [] : [...target.items];
  const at = items.findIndex((it) => it.name === name);
  if (at < 0) items.push(item(value, name));
  else items[at] = item(value, name);
  return listVal(items);
});

// ============================================================================
// Code Construction
// ============================================================================

const asNamePrimitive = (name: string) =>
  primitive(name, params("x"), (args) => {
    expectArgs(name, args, 1);
    const x = args[0].value;
    if (isLang(x) && x.node.tag === "symbol") return x;
    const text = asString(name, x);
    if (text === "") {
      throw new ArgumentTypeError(name, "a non-empty name", '""');
    }
    return langVal(sym(text));
  });

/**
 * The callee node a value denotes at the head of a call.
 */
function calleeNode(callee: string, v: Value): Node {
  if (typeof v === "string") return sym(v);
  if (isLang(v)) return v.node;
  if (isCallable(v)) return valueToNode(v);
  throw new ArgumentTypeError(callee, "a function or a function name", typeName(v));
}

const asCallPrimitive = primitive("as.call", params("x"), (args) => {
  expectArgs("as.call", args, 1);
  const x = args[0].value;
  if (isLang(x) && x.node.tag === "call") return x;
  if (!isList(x) || x.items.length === 0) {
    throw new ArgumentTypeError("as.call", "a non-empty list", typeName(x));
  }
  const [head, ...rest] = x.items;
  return langVal(callWith(calleeNode("as.call", head.value), rest.map((it) => ({ name: it.name, value: valueToNode(it.value) }))));
});

const callPrimitive = primitive("call", params("name", DOTS), (args) => {
  if (args.length === 0) {
    throw new MissingValueAccessError("name");
  }
  const [head, ...rest] = args;
  const name = asString("call", head.value);
  return langVal(callWith(sym(name), rest.map((it) => ({ name: it.name, value: valueToNode(it.value) }))));
});

const bodyPrimitive = primitive("body", params("fun"), (args) => {
  expectArgs("body", args, 1);
  return nodeToValue(asClosure("body", args[0].value).body);
});

const formalsPrimitive = primitive("formals", params("fun"), (args) => {
  expectArgs("formals", args, 1);
  const fun = args[0].value;
  if (isCallable(fun) && fun.tag === "builtin") return null;
  const formals = asClosure("formals", fun).formals;
  if (formals.params.length === 0) return null;
  return listVal(formals.params.map((p) => item(nodeToValue(p.value), p.name)));
});

const bodyAssignPrimitive = primitive("body<-", params("fun", "value"), (args) => {
  const m = matchValues("body<-", args, params("fun", "value"));
  const fun = asClosure("body<-", required(m, "fun"));
  return closureVal(fun.formals, valueToNode(required(m, "value")), fun.env);
});

const formalsAssignPrimitive = primitive("formals<-", params("fun", "value"), (args) => {
  const m = matchValues("formals<-", args, params("fun", "value"));
  const fun = asClosure("formals<-", required(m, "fun"));
  const value = required(m, "value");
  const items = value === null ? [] : isList(value) ? value.items : null;
  if (items === null) {
    throw new ArgumentTypeError("formals<-", "a list", typeName(value));
  }
  const entries = items.map((it) => {
    if (it.name === null || it.name === "") {
      throw new ArgumentTypeError("formals<-", "named list items", valueToString(it.value));
    }
    return param(it.name, valueToNode(it.value));
  });
  return closureVal(params(...entries), fun.body, fun.env);
});

// ============================================================================
// Evaluation
// ============================================================================

const evalPrimitive = primitive("eval", params("expr", "envir"), (args, env, ctx) => {
  const m = matchValues("eval", args, params("expr", "envir"));
  const expr = required(m, "expr");
  const envir = m.matched.get("envir");
  const target = envir === undefined ? env : asEnvironment("eval", envir, env);
  return isLang(expr) ? evaluate(expr.node, target, ctx) : expr;
});

const doCallPrimitive = primitive("do.call", params("what", "args"), (args, env, ctx) => {
  const m = matchValues("do.call", args, params("what", "args"));
  const what = required(m, "what");
  const fn: Callable = typeof what === "string" ? findFunction(what, env, ctx) : isCallable(what) ? what : notCallable(what);
  const list = m.matched.get("args") ?? null;
  if (list !== null && !isList(list)) {
    throw new ArgumentTypeError("do.call", "a list of arguments", typeName(list));
  }
  return invoke(fn, list === null ? [] : list.items, env, ctx);
});

function notCallable(v: Value): never {
  throw new ArgumentTypeError("do.call", "a function or a function name", typeName(v));
}

const forcePrimitive = primitive("force", params("x"), (args) => {
  expectArgs("force", args, 1);
  return args[0].value;
});

// ============================================================================
// Output and Analysis
// ============================================================================

const deparsePrimitive = primitive("deparse", params("expr"), (args) => {
  expectArgs("deparse", args, 1);
  return deparse(valueToNode(args[0].value));
});

const printPrimitive = primitive("print", params("x"), (args) => {
  expectArgs("print", args, 1);
  console.log(valueToString(args[0].value));
  return args[0].value;
});

const newEnvPrimitive = primitive("new.env", params("parent"), (args, env) => {
  const m = matchValues("new.env", args, params("parent"));
  const parent = m.matched.get("parent");
  if (parent === undefined) return envVal(new Environment(env));
  if (!isEnv(parent)) {
    throw new ArgumentTypeError("new.env", "an environment", typeName(parent));
  }
  return envVal(new Environment(parent.env));
});

function exprNode(callee: string, v: Value): Node {
  if (isLang(v)) return v.node;
  if (isCallable(v) || isEnv(v) || isList(v)) {
    throw new ArgumentTypeError(callee, "an expression", typeName(v));
  }
  return cnst(v);
}

const namesList = (names: readonly string[]): Value => (names.length === 0 ? null : listVal(names.map((n) => item(n))));

const allNamesPrimitive = primitive("all.names", params("expr", "functions", "unique"), (args, _env, ctx) => {
  const m = matchValues("all.names", args, params("expr", "functions", "unique"));
  const functions = m.matched.get("functions");
  const unique = m.matched.get("unique");
  return namesList(
    allNames(
      exprNode("all.names", required(m, "expr")),
      {
        functions: functions === undefined ? true : asLogical("all.names", functions),
        unique: unique === undefined ? false : asLogical("all.names", unique),
      },
      ctx.limits
    )
  );
});

const allVarsPrimitive = primitive("all.vars", params("expr"), (args, _env, ctx) => {
  const m = matchValues("all.vars", args, params("expr"));
  return namesList(allNames(exprNode("all.vars", required(m, "expr")), { functions: false, unique: true }, ctx.limits));
});

const stopPrimitive = primitive("stop", params(DOTS), (args) => {
  throw new UserError(args.map((a) => asText(a.value)).join(""));
});

// ============================================================================
// Table
// ============================================================================

const DEFINITIONS: readonly BuiltinValue[] = [
  quoteForm,
  substituteForm,
  bquoteForm,
  ifForm,
  functionForm,
  assignment("<-", false),
  assignment("=", false),
  assignment("<<-", true),
  blockForm,
  parenForm,
  andForm,
  orForm,
  missingForm,
  matchCallForm,
  sysCallForm,
  sysFunctionForm,
  parentFrameForm,
  environmentForm,
  returnForm,
  dollarForm,

  arithmetic("+", (a, b) => a + b, (a) => a),
  arithmetic("-", (a, b) => a - b, (a) => -a),
  arithmetic("*", (a, b) => a * b),
  arithmetic("/", (a, b) => a / b),
  arithmetic("^", (a, b) => Math.pow(a, b)),
  arithmetic("%%", modulo),
  comparison("==", (c) => c === 0),
  comparison("!=", (c) => c !== 0),
  comparison("<", (c) => c < 0),
  comparison(">", (c) => c > 0),
  comparison("<=", (c) => c <= 0),
  comparison(">=", (c) => c >= 0),
  notPrimitive,

  combinePrimitive,
  listPrimitive,
  lengthPrimitive,
  identicalPrimitive,
  typeofPrimitive,
  indexPrimitive,
  indexAssignPrimitive,
  dollarAssignPrimitive,
  predicate("is.call", (v) => isLang(v) && v.node.tag === "call"),
  predicate("is.name", (v) => isLang(v) && v.node.tag === "symbol"),
  predicate("is.symbol", (v) => isLang(v) && v.node.tag === "symbol"),
  predicate("is.function", isCallable),
  predicate("is.null", (v) => v === null),
  predicate("is.list", isList),
  predicate("is.environment", isEnv),
  asNamePrimitive("as.name"),
  asNamePrimitive("as.symbol"),
  asCallPrimitive,
  callPrimitive,
  bodyPrimitive,
  formalsPrimitive,
  bodyAssignPrimitive,
  formalsAssignPrimitive,

  evalPrimitive,
  doCallPrimitive,
  forcePrimitive,
  deparsePrimitive,
  printPrimitive,
  newEnvPrimitive,
  allNamesPrimitive,
  allVarsPrimitive,
  stopPrimitive,
];

/**
 * Second names for builtins whose own names are not JavaScript syntax:
 * `do` and `new` are keywords, so `do.call(...)` cannot be read.
 */
const ALIASES: Readonly<Record<string, string>> = {
  doCall: "do.call",
  newEnv: "new.env",
};

function withAliases(table: Map<string, BuiltinValue>): HostTable {
  for (const [alias, name] of Object.entries(ALIASES)) {
    const target = table.get(name);
    if (target !== undefined) table.set(alias, target);
  }
  return table;
}

export const BUILTINS: HostTable = withAliases(new Map(DEFINITIONS.map((b): [string, BuiltinValue] => [b.name, b])));

/**
 * A fresh root environment holding every entry of `table`. It has no
 * parent; sessions hang their global environment below it.
 */
export function createRootEnv(table: HostTable = BUILTINS): Environment {
  const root = new Environment(null, { label: "root" });
  for (const [name, builtin] of table) {
    root.define(name, builtin);
  }
  root.define("pi", Math.PI);
  return root;
}
