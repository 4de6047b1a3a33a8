/**
 * Quoting and substitution.
 *
 * quote() captures code as-is. substitute() rewrites the free symbols of a
 * tree against one call frame: supplied arguments come back as the code
 * the caller wrote, not as their values.
 */

import type { Arg, Node } from "./node";
import { DOTS, callWith, unknownNode } from "./node";
import type { Environment } from "./env";
import { valueToNode } from "./value";
import { Limits } from "./limits";

/**
 * Identity: the node is returned verbatim, with no lookups.
 */
export function quote(node: Node): Node {
  return node;
}

/**
 * Rebuild `node`, replacing symbols bound in `env` itself (parents are
 * never consulted):
 *
 * - an ordinary binding becomes its value, embedded as a literal;
 * - a promise becomes its unevaluated expression, never its forced value;
 * - `...` as a call argument is replaced by the collected arguments,
 *   spliced in order with their names;
 * - anything else is left alone.
 *
 * Outside a call frame (e.g. the global environment) this is quote().
 */
export function substitute(node: Node, env: Environment, limits: Limits = new Limits()): Node {
  if (!env.isSubstitutionContext) {
    return node;
  }
  return rewrite(node, env, limits);
}

function rewrite(node: Node, env: Environment, limits: Limits): Node {
  return limits.nested("substitute", () => {
    switch (node.tag) {
      case "constant":
        return node;
      case "symbol":
        return replaceSymbol(node.name, env) ?? node;
      case "call":
        return callWith(rewrite(node.fn, env, limits), rewriteArgs(node.args, env, limits));
      case "params":
        return {
          tag: "params",
          params: node.params.map((p) => ({ name: p.name, value: rewrite(p.value, env, limits) })),
        };
      default:
        return unknownNode(node);
    }
  });
}

function replaceSymbol(name: string, env: Environment): Node | undefined {
  const binding = env.lookupLocal(name);
  if (binding === undefined) return undefined;
  switch (binding.tag) {
    case "value":
      return valueToNode(binding.value);
    case "promise":
      return binding.promise.expr;
    case "dots":
    case "missing":
      return undefined;
  }
}

function rewriteArgs(args: readonly Arg[], env: Environment, limits: Limits): Arg[] {
  const result: Arg[] = [];
  for (const arg of args) {
    const dots = arg.value.tag === "symbol" && arg.value.name === DOTS ? env.dots : null;
    if (dots !== null) {
      for (const entry of dots) {
        result.push({ name: entry.name, value: entry.promise.expr });
      }
      continue;
    }
    result.push({ name: arg.name, value: rewrite(arg.value, env, limits) });
  }
  return result;
}
