/**
 * Session - a root environment of builtins and a global environment below
 * it, plus the options every evaluation in the session runs under.
 */

import type { Node } from "./node";
import { isCallTo } from "./node";
import { Environment } from "./env";
import type { Value } from "./value";
import type { EngineOptions } from "./limits";
import { DEFAULT_ENGINE_OPTIONS } from "./limits";
import type { EvalContext } from "./evaluate";
import { createContext, evaluate } from "./evaluate";
import type { HostTable } from "./builtins";
import { BUILTINS, createRootEnv } from "./builtins";
import { ASSIGNMENT_OPERATORS } from "./analysis";
import { parse } from "./reader";

export interface SessionOptions extends Partial<EngineOptions> {
  /** Builtins bound in the root environment (default: BUILTINS). */
  builtins?: HostTable;
}

export interface RunResult {
  node: Node;
  value: Value;
  /** False for results a REPL does not echo, such as assignments. */
  visible: boolean;
}

export class Session {
  readonly root: Environment;
  readonly global: Environment;
  readonly options: EngineOptions;

  constructor(options: SessionOptions = {}) {
    this.options = {
      maxDepth: options.maxDepth ?? DEFAULT_ENGINE_OPTIONS.maxDepth,
      maxSteps: options.maxSteps ?? DEFAULT_ENGINE_OPTIONS.maxSteps,
    };
    this.root = createRootEnv(options.builtins ?? BUILTINS);
    this.global = new Environment(this.root, { label: "global" });
  }

  /**
   * A fresh context: the step budget applies to one top-level run.
   */
  context(): EvalContext {
    return createContext(this.options);
  }

  /**
   * Evaluate every top-level expression of `source` in the global
   * environment, returning the value of the last one (NULL if none).
   */
  run(source: string): Value {
    const results = this.runAll(source);
    return results.length === 0 ? null : results[results.length - 1].value;
  }

  /**
   * Evaluate each top-level expression in turn; evaluation stops at the
   * first error.
   */
  runAll(source: string): RunResult[] {
    const ctx = this.context();
    return parse(source).map((node) => ({
      node,
      value: evaluate(node, this.global, ctx),
      visible: isVisible(node),
    }));
  }

  eval(node: Node, ctx: EvalContext = this.context()): Value {
    return evaluate(node, this.global, ctx);
  }
}

/**
 * Whether a front end should echo the value of a top-level expression.
 */
export function isVisible(node: Node): boolean {
  if (isCallTo(node, "print")) return false;
  return !(node.tag === "call" && node.fn.tag === "symbol" && ASSIGNMENT_OPERATORS.has(node.fn.name));
}
