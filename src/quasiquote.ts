/**
 * Quasiquotation: quote a tree while evaluating marked holes in it.
 *
 *   unquote(e)         evaluate e and embed the result (values become
 *                      constants, quoted code is spliced in as code)
 *   unquoteSplice(e)   in argument position only: evaluate e and insert
 *                      each item of the resulting list as its own argument
 */

import type { Arg, Call, Node, Sym } from "./node";
import { callWith, isCallTo } from "./node";
import type { Environment } from "./env";
import type { Value } from "./value";
import { isLang, isList, valueToNode } from "./value";
import type { EvalContext } from "./evaluate";
import { createContext, evaluate } from "./evaluate";
import { rebuild, visit } from "./walker";
import { deparse } from "./deparse";
import { InvalidSpliceError } from "./errors";

export const UNQUOTE = "unquote";
export const UNQUOTE_SPLICE = "unquoteSplice";

/**
 * A hole: a call to unquote with exactly one argument. `unquote()` with no
 * arguments is not a hole and is copied like any other call.
 */
function isUnquote(node: Node): node is Call & { readonly fn: Sym } {
  return isCallTo(node, UNQUOTE) && node.args.length === 1;
}

function isSplice(node: Node): node is Call & { readonly fn: Sym } {
  return isCallTo(node, UNQUOTE_SPLICE) && node.args.length === 1;
}

/**
 * Copy `node`, replacing holes by their values computed in `where`.
 * The input tree is not modified.
 *
 * @example
 * // where: x = 2
 * quasiquote(parseOne("f(unquote(x), y)"), where)  // f(2, y)
 */
export function quasiquote(node: Node, where: Environment, ctx: EvalContext = createContext()): Node {
  return visit<Node>(
    node,
    {
      leaf: (leaf) => leaf,
      combine: (composite, children) => {
        if (isUnquote(composite)) {
          return valueToNode(evaluate(composite.args[0].value, where, ctx));
        }
        if (isSplice(composite)) {
          throw new InvalidSpliceError(`${deparse(composite)} can only be used as a call argument`);
        }
        if (composite.tag === "params") {
          return rebuild(composite, [...children]);
        }
        const fn = children.get(0);
        const args: Arg[] = [];
        composite.args.forEach((arg, i) => {
          if (isSplice(arg.value)) {
            args.push(...spliced(evaluate(arg.value.args[0].value, where, ctx)));
          } else {
            args.push({ name: arg.name, value: children.get(i + 1) });
          }
        });
        return callWith(fn, args);
      },
    },
    ctx.limits
  );
}

/**
 * The arguments a spliced value contributes.
 */
function spliced(value: Value): Arg[] {
  if (value === null) {
    return [];
  }
  if (isList(value)) {
    return value.items.map((it) => ({ name: it.name, value: valueToNode(it.value) }));
  }
  if (isLang(value) && value.node.tag === "call") {
    return [...value.node.args];
  }
  return [{ name: null, value: valueToNode(value) }];
}
