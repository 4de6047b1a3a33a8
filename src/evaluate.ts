/**
 * Tree-walking evaluator.
 *
 * Closures take their arguments as promises bound in a fresh child of the
 * closure's defining environment, forced on first use. Special forms get
 * their argument nodes unevaluated, which is what quote, substitute and
 * bquote are built on.
 */

import type { Call, Node } from "./node";
import { DOTS, isMissing, unknownNode } from "./node";
import type { CallFrame, ClosureFrame, DotsEntry } from "./env";
import { Environment, Thunk } from "./env";
import type { Callable, ClosureValue, ListItem, Value } from "./value";
import { isCallable, langVal, valueToNode } from "./value";
import type { ActualArg } from "./standardize";
import { matchArguments } from "./standardize";
import type { EngineOptions } from "./limits";
import { Limits } from "./limits";
import { deparse } from "./deparse";
import {
  ArityError,
  MissingValueAccessError,
  NotCallableError,
  RecursiveDefaultEvaluationError,
  UnboundSymbolError,
  UserError,
} from "./errors";

// ============================================================================
// Evaluation Context
// ============================================================================

export interface EvalContext {
  readonly limits: Limits;
  /** Environments of the active closure calls, innermost last. */
  readonly frames: Environment[];
}

export function createContext(options: Partial<EngineOptions> = {}): EvalContext {
  return { limits: new Limits(options), frames: [] };
}

/**
 * Thrown by return() and caught at the boundary of the closure call whose
 * environment it names. Not an error.
 */
export class ReturnSignal {
  constructor(
    readonly value: Value,
    readonly target: Environment
  ) {}
}

// ============================================================================
// Main Evaluation Function
// ============================================================================

export function evaluate(node: Node, env: Environment, ctx: EvalContext = createContext()): Value {
  return ctx.limits.nested("evaluate", () => {
    switch (node.tag) {
      case "constant":
        return node.value;

      case "symbol":
        return evalSymbol(node.name, env, ctx);

      case "call":
        return evalCall(node, env, ctx);

      case "params":
        return langVal(node);

      default:
        return unknownNode(node);
    }
  });
}

function evalSymbol(name: string, env: Environment, ctx: EvalContext): Value {
  if (name === "") {
    throw new MissingValueAccessError("");
  }
  const binding = env.lookup(name);
  switch (binding.tag) {
    case "value":
      return binding.value;
    case "promise":
      return force(binding.promise, ctx);
    case "missing":
      throw new MissingValueAccessError(name);
    case "dots":
      throw new ArityError(name, "'...' used in an incorrect context");
  }
}

/**
 * Force a promise: evaluate its expression once in its own environment and
 * memoize the result. Re-entering a promise that is being forced raises
 * RecursiveDefaultEvaluation.
 */
export function force(thunk: Thunk, ctx: EvalContext): Value {
  if (thunk.forced) {
    return thunk.cache;
  }
  if (thunk.forcing) {
    throw new RecursiveDefaultEvaluationError(deparse(thunk.expr));
  }
  thunk.forcing = true;
  let value: Value;
  try {
    value = evaluate(thunk.expr, thunk.env, ctx);
  } finally {
    thunk.forcing = false;
  }
  thunk.cache = value;
  thunk.forced = true;
  return value;
}

// ============================================================================
// Calls
// ============================================================================

function evalCall(node: Call, env: Environment, ctx: EvalContext): Value {
  const fn = resolveCallee(node.fn, env, ctx);
  switch (fn.tag) {
    case "closure":
      return applyClosure(fn, node, promiseArgs(node, env), env, ctx);
    case "builtin":
      if (fn.kind === "special") {
        return fn.impl(node, env, ctx);
      }
      return fn.impl(evaluateArgs(node, env, ctx), env, ctx);
  }
}

function resolveCallee(head: Node, env: Environment, ctx: EvalContext): Callable {
  if (head.tag === "symbol") {
    return findFunction(head.name, env, ctx);
  }
  const value = evaluate(head, env, ctx);
  if (!isCallable(value)) {
    throw new NotCallableError(deparse(head));
  }
  return value;
}

/**
 * Find the nearest binding of `name` that holds a function, skipping
 * bindings of other values. Promises met on the way are forced.
 */
export function findFunction(name: string, env: Environment, ctx: EvalContext): Callable {
  let sawBinding = false;
  for (let e: Environment | null = env; e !== null; e = e.parent) {
    const binding = e.lookupLocal(name);
    if (binding === undefined) continue;
    sawBinding = true;
    if (binding.tag === "missing") {
      throw new MissingValueAccessError(name);
    }
    if (binding.tag === "value" && isCallable(binding.value)) {
      return binding.value;
    }
    if (binding.tag === "promise") {
      const value = force(binding.promise, ctx);
      if (isCallable(value)) return value;
    }
  }
  if (sawBinding) {
    throw new NotCallableError(name);
  }
  throw new UnboundSymbolError(name);
}

/**
 * The entries of the `...` visible from `env`.
 */
export function lookupDots(env: Environment): readonly DotsEntry[] {
  const binding = env.find(DOTS);
  if (binding === undefined) {
    throw new UnboundSymbolError(DOTS);
  }
  if (binding.tag !== "dots") {
    throw new ArityError(DOTS, "'...' used in an incorrect context");
  }
  return binding.entries;
}

const isDotsSymbol = (node: Node): boolean => node.tag === "symbol" && node.name === DOTS;

/**
 * Wrap each argument in a promise over the caller's environment. A `...`
 * argument forwards the caller's own collected promises unforced.
 */
function promiseArgs(node: Call, env: Environment): ActualArg<Thunk>[] {
  const args: ActualArg<Thunk>[] = [];
  for (const arg of node.args) {
    if (isDotsSymbol(arg.value)) {
      for (const entry of lookupDots(env)) {
        args.push({ name: entry.name, value: entry.promise });
      }
      continue;
    }
    args.push({ name: arg.name, value: new Thunk(arg.value, env) });
  }
  return args;
}

/**
 * Evaluate arguments left to right for a primitive, expanding `...`.
 */
function evaluateArgs(node: Call, env: Environment, ctx: EvalContext): ListItem[] {
  const items: ListItem[] = [];
  for (const arg of node.args) {
    if (isDotsSymbol(arg.value)) {
      for (const entry of lookupDots(env)) {
        items.push({ name: entry.name, value: force(entry.promise, ctx) });
      }
      continue;
    }
    if (isMissing(arg.value)) {
      throw new MissingValueAccessError(arg.name ?? "");
    }
    items.push({ name: arg.name, value: evaluate(arg.value, env, ctx) });
  }
  return items;
}

// ============================================================================
// Closure Application
// ============================================================================

/**
 * Apply a closure to argument promises. The new frame's parent is the
 * closure's defining environment, so free variables resolve lexically.
 */
export function applyClosure(
  closure: ClosureValue,
  node: Call,
  args: readonly ActualArg<Thunk>[],
  callerEnv: Environment,
  ctx: EvalContext
): Value {
  const match = matchArguments(args, closure.formals, {
    callee: deparse(node.fn),
    describe: (t) => deparse(t.expr),
  });

  const frame: CallFrame = { kind: "closure", call: node, closure, callerEnv };
  const local = new Environment(closure.env, { frame, label: `frame:${deparse(node.fn)}` });

  for (const p of closure.formals.params) {
    if (p.name === DOTS) {
      local.bindDots(match.dots.map((d) => ({ name: d.name, promise: d.value })));
      continue;
    }
    const supplied = match.matched.get(p.name);
    if (supplied !== undefined) {
      local.bindPromise(p.name, supplied);
    } else if (!isMissing(p.value)) {
      local.bindPromise(p.name, new Thunk(p.value, local, true));
    } else {
      local.bindMissing(p.name);
    }
  }

  ctx.frames.push(local);
  try {
    return evaluate(closure.body, local, ctx);
  } catch (e) {
    if (e instanceof ReturnSignal && e.target === local) {
      return e.value;
    }
    throw e;
  } finally {
    ctx.frames.pop();
  }
}

/**
 * Call any callable with already-computed values, as a host would.
 * Values are passed as forced promises, so closures see them through
 * substitute() as literal code.
 */
export function invoke(fn: Callable, args: readonly ListItem[], env: Environment, ctx: EvalContext = createContext()): Value {
  const thunks = args.map((a) => ({ name: a.name, value: Thunk.resolved(valueToNode(a.value), a.value, env) }));
  const node: Call = {
    tag: "call",
    fn: fn.tag === "builtin" ? { tag: "symbol", name: fn.name } : valueToNode(fn),
    args: thunks.map((t) => ({ name: t.name, value: t.value.expr })),
  };
  return applyWithPromises(fn, node, thunks, env, ctx);
}

/**
 * Apply a callable to promises that were built by the caller.
 */
export function applyWithPromises(
  fn: Callable,
  node: Call,
  args: readonly ActualArg<Thunk>[],
  env: Environment,
  ctx: EvalContext
): Value {
  switch (fn.tag) {
    case "closure":
      return applyClosure(fn, node, args, env, ctx);
    case "builtin":
      if (fn.kind === "special") {
        return fn.impl(node, env, ctx);
      }
      return fn.impl(
        args.map((a) => ({ name: a.name, value: force(a.value, ctx) })),
        env,
        ctx
      );
  }
}

// ============================================================================
// Frames
// ============================================================================

/**
 * The closest environment on the chain from `env` that belongs to a
 * closure call, or null at top level.
 */
export function closureFrame(env: Environment): { env: Environment; frame: ClosureFrame } | null {
  for (let e: Environment | null = env; e !== null; e = e.parent) {
    const frame = e.frame;
    if (frame !== null && frame.kind === "closure") {
      return { env: e, frame };
    }
  }
  return null;
}

/**
 * Unwind to the closure call that owns `env`. That call must still be
 * active: a promise forced after its frame has returned has nowhere to go.
 */
export function signalReturn(value: Value, env: Environment, ctx: EvalContext): never {
  const owner = closureFrame(env);
  if (owner === null || !ctx.frames.includes(owner.env)) {
    throw new UserError("no function to return from, jumping to top level");
  }
  throw new ReturnSignal(value, owner.env);
}
