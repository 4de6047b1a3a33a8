/**
 * Generic recursive tree walker.
 *
 * A visitor supplies the result for leaves (constants and symbols) and a
 * combine step for calls and parameter lists. Child results are computed
 * lazily: combine pulls only the children it asks for, so the same walker
 * serves short-circuiting searches, selective scans and tree rebuilds.
 */

import type { Call, Constant, Node, ParameterList, Sym } from "./node";
import { callWith, unknownNode } from "./node";
import { Limits } from "./limits";

// ============================================================================
// Visitor Interface
// ============================================================================

/**
 * Results for the children of a call (index 0 is the callee, then the
 * arguments) or a parameter list (one per default expression).
 * Each child is visited at most once, on first access.
 */
export interface ChildResults<R> extends Iterable<R> {
  readonly length: number;
  get(index: number): R;
}

export interface TreeVisitor<R> {
  leaf(node: Constant | Sym, path: readonly number[]): R;
  combine(node: Call | ParameterList, children: ChildResults<R>, path: readonly number[]): R;
}

class LazyResults<R> implements ChildResults<R> {
  private readonly slots: ({ value: R } | undefined)[] = [];

  constructor(
    private readonly nodes: readonly Node[],
    private readonly compute: (node: Node, index: number) => R
  ) {}

  get length(): number {
    return this.nodes.length;
  }

  get(index: number): R {
    if (index < 0 || index >= this.nodes.length) {
      throw new RangeError(`child index ${index} out of range (${this.nodes.length} children)`);
    }
    let slot = this.slots[index];
    if (slot === undefined) {
      slot = { value: this.compute(this.nodes[index], index) };
      this.slots[index] = slot;
    }
    return slot.value;
  }

  *[Symbol.iterator](): Iterator<R> {
    for (let i = 0; i < this.nodes.length; i++) {
      yield this.get(i);
    }
  }
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Walk `node` with `visitor`. Dispatch is exhaustive over the four node
 * kinds; anything else raises UnknownNodeKind with the offending path.
 */
export function visit<R>(node: Node, visitor: TreeVisitor<R>, limits: Limits = new Limits()): R {
  return walk(node, visitor, limits, []);
}

function walk<R>(node: Node, visitor: TreeVisitor<R>, limits: Limits, path: readonly number[]): R {
  return limits.nested("visit", () => {
    switch (node.tag) {
      case "constant":
      case "symbol":
        return visitor.leaf(node, path);
      case "call":
      case "params": {
        const children = new LazyResults(childNodes(node), (child, i) => walk(child, visitor, limits, [...path, i]));
        return visitor.combine(node, children, path);
      }
      default:
        return unknownNode(node, path);
    }
  });
}

/**
 * The direct children of a composite node, in walk order.
 */
export function childNodes(node: Call | ParameterList): Node[] {
  return node.tag === "call" ? [node.fn, ...node.args.map((a) => a.value)] : node.params.map((p) => p.value);
}

/**
 * Rebuild a composite node of the same kind from new children, keeping
 * argument and parameter names.
 */
export function rebuild(node: Call | ParameterList, children: readonly Node[]): Call | ParameterList {
  const expected = node.tag === "call" ? node.args.length + 1 : node.params.length;
  if (children.length !== expected) {
    throw new RangeError(`rebuild expected ${expected} children, got ${children.length}`);
  }
  if (node.tag === "call") {
    return callWith(
      children[0],
      node.args.map((a, i) => ({ name: a.name, value: children[i + 1] }))
    );
  }
  return { tag: "params", params: node.params.map((p, i) => ({ name: p.name, value: children[i] })) };
}

// ============================================================================
// Common Shapes
// ============================================================================

/**
 * True if `predicate` holds for any node in the tree. Stops at the first hit.
 */
export function someNode(root: Node, predicate: (node: Node) => boolean, limits?: Limits): boolean {
  return visit<boolean>(
    root,
    {
      leaf: (node) => predicate(node),
      combine: (node, children) => {
        if (predicate(node)) return true;
        for (const found of children) {
          if (found) return true;
        }
        return false;
      },
    },
    limits
  );
}

/**
 * Bottom-up rewrite: children are transformed first, then `fn` is applied
 * to the rebuilt node. The input tree is not modified.
 */
export function transformNode(root: Node, fn: (node: Node) => Node, limits?: Limits): Node {
  return visit<Node>(
    root,
    {
      leaf: (node) => fn(node),
      combine: (node, children) => fn(rebuild(node, [...children])),
    },
    limits
  );
}
