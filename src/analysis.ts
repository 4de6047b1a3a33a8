/**
 * Static checks and rewrites built on the generic walker.
 */

import type { Node } from "./node";
import { isMissing, sym } from "./node";
import type { Limits } from "./limits";
import { transformNode, visit } from "./walker";

/** Operators whose first argument names the variable being assigned. */
export const ASSIGNMENT_OPERATORS: ReadonlySet<string> = new Set(["<-", "=", "<<-"]);

const toSet = (names: Iterable<string> | string): ReadonlySet<string> =>
  new Set(typeof names === "string" ? [names] : names);

// ============================================================================
// Searches
// ============================================================================

/**
 * Does the tree mention any of `names` as a symbol, including in callee
 * position? Stops at the first occurrence.
 */
export function usesSymbol(node: Node, names: Iterable<string> | string, limits?: Limits): boolean {
  return findForbidden(node, names, limits) !== null;
}

/**
 * The first symbol from `names` met in depth-first, left-to-right order,
 * or null when there is none.
 */
export function findForbidden(node: Node, names: Iterable<string> | string, limits?: Limits): string | null {
  const forbidden = toSet(names);
  return visit<string | null>(
    node,
    {
      leaf: (leaf) => (leaf.tag === "symbol" && forbidden.has(leaf.name) ? leaf.name : null),
      combine: (_node, children) => {
        for (const found of children) {
          if (found !== null) return found;
        }
        return null;
      },
    },
    limits
  );
}

// ============================================================================
// Collections
// ============================================================================

function appendUnique(into: string[], names: readonly string[]): string[] {
  for (const name of names) {
    if (!into.includes(name)) into.push(name);
  }
  return into;
}

/**
 * The variable a replacement-style target ultimately modifies:
 * `names(x)` and `attr(x, "a")` both modify `x`.
 */
function assignedVariable(target: Node): string | null {
  switch (target.tag) {
    case "symbol":
      return isMissing(target) ? null : target.name;
    case "constant":
      return typeof target.value === "string" ? target.value : null;
    case "call":
      return target.args.length > 0 ? assignedVariable(target.args[0].value) : null;
    case "params":
      return null;
  }
}

/**
 * Names assigned anywhere in the tree, in order of first assignment and
 * without duplicates. Right-hand sides are searched too, since assignments
 * nest: `a <- b <- 1` assigns `a` then `b`.
 */
export function assignTargets(node: Node, limits?: Limits): string[] {
  return visit<string[]>(
    node,
    {
      leaf: () => [],
      combine: (composite, children) => {
        const result: string[] = [];
        if (
          composite.tag === "call" &&
          composite.fn.tag === "symbol" &&
          ASSIGNMENT_OPERATORS.has(composite.fn.name) &&
          composite.args.length === 2
        ) {
          const target = assignedVariable(composite.args[0].value);
          if (target !== null) result.push(target);
          if (composite.args[0].value.tag === "call") {
            appendUnique(result, children.get(1));
          }
          return appendUnique(result, children.get(2));
        }
        for (const names of children) appendUnique(result, names);
        return result;
      },
    },
    limits
  );
}

export interface AllNamesOptions {
  /** Include symbols in callee position (default true). */
  functions?: boolean;
  /** Drop repeated names, keeping the first (default false). */
  unique?: boolean;
}

/**
 * Every symbol name in the tree in depth-first order. With
 * `{ functions: false, unique: true }` this lists the free-variable
 * candidates of an expression.
 */
export function allNames(node: Node, options: AllNamesOptions = {}, limits?: Limits): string[] {
  const functions = options.functions ?? true;
  const names = visit<string[]>(
    node,
    {
      leaf: (leaf) => (leaf.tag === "symbol" && !isMissing(leaf) ? [leaf.name] : []),
      combine: (composite, children) => {
        const result: string[] = [];
        for (let i = 0; i < children.length; i++) {
          if (i === 0 && composite.tag === "call" && !functions && composite.fn.tag === "symbol") continue;
          result.push(...children.get(i));
        }
        return result;
      },
    },
    limits
  );
  return options.unique ? appendUnique([], names) : names;
}

// ============================================================================
// Rewrites
// ============================================================================

/**
 * Rename symbols everywhere, callee positions included.
 */
export function renameSymbols(node: Node, mapping: Readonly<Record<string, string>>, limits?: Limits): Node {
  return transformNode(
    node,
    (n) => (n.tag === "symbol" && Object.hasOwn(mapping, n.name) ? sym(mapping[n.name]) : n),
    limits
  );
}
