/**
 * Reader: source text -> code trees, over @lezer/javascript.
 *
 * Usage:
 *   import { parse, parseOne } from "./reader";
 *
 *   parse("x = 1; f(x, y = 2)")    // [`<-`(x, 1), f(x, y = 2)]
 *   parseOne("(a, b = 1) => a + b") // function(a, b = 1) a + b
 */

import { parser } from "@lezer/javascript";
import type { Tree } from "@lezer/common";
import type { Node } from "../node";
import { ReadError } from "../errors";
import { convertExpr, convertScript } from "./convert";

/**
 * Parse a program into its top-level expressions, in order.
 *
 * @throws ReadError on a syntax error or unsupported syntax
 */
export function parse(source: string): Node[] {
  const tree = parser.parse(source);
  checkSyntax(tree, source);
  return convertScript(tree.topNode, source);
}

/**
 * Parse source that must hold exactly one expression.
 */
export function parseOne(source: string): Node {
  const nodes = parse(source);
  if (nodes.length !== 1) {
    throw new ReadError(`expected one expression, found ${nodes.length}`, 0, source.length);
  }
  return nodes[0];
}

function checkSyntax(tree: Tree, source: string): void {
  const cursor = tree.cursor();
  do {
    if (cursor.type.isError) {
      const line = source.slice(0, cursor.from).split("\n").length;
      const column = cursor.from - source.lastIndexOf("\n", cursor.from - 1);
      throw new ReadError(`syntax error at ${line}:${column}`, cursor.from, cursor.to);
    }
  } while (cursor.next());
}

export { convertExpr, convertScript };
