/**
 * Deparse: Node -> source text.
 *
 * Renders calls to known operators infix with the fewest parentheses the
 * precedence table allows; everything else prints as `f(a, name = b)`.
 * Output is for diagnostics and the REPL, not a faithful round trip.
 */

import type { Arg, Call, Constant, Node, ParameterList } from "./node";
import { DOTS, unknownNode } from "./node";
import { formatNumber, valueToString } from "./value";
import { RecursionLimitExceededError } from "./errors";
import { DEFAULT_ENGINE_OPTIONS } from "./limits";

// ============================================================================
// Precedence
// ============================================================================

// Higher = tighter binding
export const PREC = {
  EQ_ASSIGN: 1,
  LEFT_ASSIGN: 2,
  TILDE: 3,
  OR: 4,
  AND: 5,
  NOT: 6,
  COMPARE: 7,
  ADDITIVE: 8,
  MULTIPLICATIVE: 9,
  SPECIAL: 10, // %op%
  RANGE: 11,
  UNARY: 12,
  POWER: 13,
  DOLLAR: 14,
  POSTFIX: 15, // calls, [[ ]]
  PRIMARY: 16,
} as const;

interface InfixOp {
  prec: number;
  right: boolean;
}

const BINARY_OPS: ReadonlyMap<string, InfixOp> = new Map([
  ["=", { prec: PREC.EQ_ASSIGN, right: true }],
  ["<-", { prec: PREC.LEFT_ASSIGN, right: true }],
  ["<<-", { prec: PREC.LEFT_ASSIGN, right: true }],
  ["~", { prec: PREC.TILDE, right: false }],
  ["||", { prec: PREC.OR, right: false }],
  ["|", { prec: PREC.OR, right: false }],
  ["&&", { prec: PREC.AND, right: false }],
  ["&", { prec: PREC.AND, right: false }],
  ["==", { prec: PREC.COMPARE, right: false }],
  ["!=", { prec: PREC.COMPARE, right: false }],
  ["<", { prec: PREC.COMPARE, right: false }],
  [">", { prec: PREC.COMPARE, right: false }],
  ["<=", { prec: PREC.COMPARE, right: false }],
  [">=", { prec: PREC.COMPARE, right: false }],
  ["+", { prec: PREC.ADDITIVE, right: false }],
  ["-", { prec: PREC.ADDITIVE, right: false }],
  ["*", { prec: PREC.MULTIPLICATIVE, right: false }],
  ["/", { prec: PREC.MULTIPLICATIVE, right: false }],
  [":", { prec: PREC.RANGE, right: false }],
  ["^", { prec: PREC.POWER, right: true }],
]);

const UNARY_OPS: ReadonlyMap<string, number> = new Map([
  ["-", PREC.UNARY],
  ["+", PREC.UNARY],
  ["!", PREC.NOT],
]);

function binaryOp(name: string): InfixOp | undefined {
  if (/^%[^%]*%$/.test(name)) {
    return { prec: PREC.SPECIAL, right: false };
  }
  return BINARY_OPS.get(name);
}

// ============================================================================
// Names
// ============================================================================

const RESERVED = new Set([
  "if", "else", "repeat", "while", "function", "for", "next", "break", "in",
  "TRUE", "FALSE", "NULL", "Inf", "NaN", "NA",
]);

/**
 * Can `name` be written bare, without backticks?
 */
export function isSyntacticName(name: string): boolean {
  if (name === DOTS || /^\.\.[0-9]+$/.test(name)) return true;
  if (RESERVED.has(name)) return false;
  return /^(([A-Za-z]|\.[A-Za-z._])[A-Za-z0-9._]*|\.)$/.test(name);
}

export function quoteName(name: string): string {
  return isSyntacticName(name) ? name : "`" + name.replace(/`/g, "\\`") + "`";
}

// ============================================================================
// Rendering
// ============================================================================

// `if` and `function`: operands that swallow everything to their right
const OPEN = 0;

interface Rendered {
  text: string;
  prec: number;
}

const primary = (text: string): Rendered => ({ text, prec: PREC.PRIMARY });

/**
 * Render a node as source text.
 *
 * @example
 * deparse(call("+", sym("x"), call("*", cnst(2), sym("y"))))  // "x + 2 * y"
 * deparse(call("*", call("+", sym("x"), cnst(2)), sym("y")))  // "(x + 2) * y"
 */
export function deparse(node: Node): string {
  return render(node).text;
}

/**
 * Formals as they appear between `function(` and `)`.
 */
export function deparseParams(formals: ParameterList): string {
  return formals.params
    .map((p) => (p.value.tag === "symbol" && p.value.name === "" ? quoteName(p.name) : `${quoteName(p.name)} = ${deparse(p.value)}`))
    .join(", ");
}

// Nesting of render() across the current deparse, including calls that
// re-enter deparse() for sub-expressions.
let depth = 0;

function render(node: Node): Rendered {
  if (depth >= DEFAULT_ENGINE_OPTIONS.maxDepth) {
    throw new RecursionLimitExceededError(DEFAULT_ENGINE_OPTIONS.maxDepth, "deparse");
  }
  depth++;
  try {
    return renderNode(node);
  } finally {
    depth--;
  }
}

function renderNode(node: Node): Rendered {
  switch (node.tag) {
    case "constant":
      return { text: renderConstant(node), prec: isNegative(node) ? PREC.UNARY : PREC.PRIMARY };
    case "symbol":
      return primary(node.name === "" ? "" : quoteName(node.name));
    case "call":
      return renderCall(node);
    case "params":
      return primary(`pairlist(${node.params.map((p) => `${quoteName(p.name)} = ${deparse(p.value)}`).join(", ")})`);
    default:
      return unknownNode(node);
  }
}

function renderConstant(node: Constant): string {
  const v = node.value;
  if (typeof v === "number") return formatNumber(v);
  return valueToString(v);
}

function isNegative(node: Constant): boolean {
  return typeof node.value === "number" && (node.value < 0 || Object.is(node.value, -0));
}

function allPositional(args: readonly Arg[]): boolean {
  return args.every((a) => a.name === null);
}

function renderCall(node: Call): Rendered {
  const args = node.args;
  if (node.fn.tag === "symbol") {
    const name = node.fn.name;

    const infix = binaryOp(name);
    if (infix !== undefined && args.length === 2 && allPositional(args)) {
      const left = wrap(render(args[0].value), infix.right ? infix.prec + 1 : infix.prec);
      const rhs = render(args[1].value);
      // `if` and `function` extend to the right, so they need no parentheses
      // there, but the whole expression then binds as loosely as they do.
      const right = rhs.prec === OPEN ? rhs.text : wrap(rhs, infix.right ? infix.prec : infix.prec + 1);
      const sep = name === ":" || name === "^" ? "" : " ";
      return { text: `${left}${sep}${name}${sep}${right}`, prec: rhs.prec === OPEN ? OPEN : infix.prec };
    }

    const unary = UNARY_OPS.get(name);
    if (unary !== undefined && args.length === 1 && allPositional(args)) {
      return { text: name + wrap(render(args[0].value), unary), prec: unary };
    }

    const special = renderSpecial(name, node);
    if (special !== null) return special;
  }

  const callee = render(node.fn);
  const head = callee.prec < PREC.DOLLAR ? `(${callee.text})` : callee.text;
  return { text: `${head}(${renderArgs(args)})`, prec: PREC.POSTFIX };
}

function renderSpecial(name: string, node: Call): Rendered | null {
  const args = node.args;
  switch (name) {
    case "{":
      if (!allPositional(args)) return null;
      return primary(args.length === 0 ? "{}" : `{ ${args.map((a) => deparse(a.value)).join("; ")} }`);

    case "(":
      if (args.length !== 1 || !allPositional(args)) return null;
      return primary(`(${deparse(args[0].value)})`);

    case "if": {
      if ((args.length !== 2 && args.length !== 3) || !allPositional(args)) return null;
      const head = `if (${deparse(args[0].value)}) ${deparse(args[1].value)}`;
      return { text: args.length === 3 ? `${head} else ${deparse(args[2].value)}` : head, prec: OPEN };
    }

    case "function": {
      if (args.length !== 2 || !allPositional(args)) return null;
      const formals = args[0].value;
      if (formals.tag !== "params") return null;
      return { text: `function(${deparseParams(formals)}) ${deparse(args[1].value)}`, prec: OPEN };
    }

    case "[[":
    case "[": {
      if (args.length < 1 || args[0].name !== null) return null;
      const target = wrap(render(args[0].value), PREC.DOLLAR);
      const close = name === "[[" ? "]]" : "]";
      return { text: `${target}${name}${renderArgs(args.slice(1))}${close}`, prec: PREC.POSTFIX };
    }

    case "$": {
      if (args.length !== 2 || !allPositional(args)) return null;
      const field = args[1].value;
      let fieldText: string;
      if (field.tag === "symbol") {
        fieldText = quoteName(field.name);
      } else if (field.tag === "constant" && typeof field.value === "string") {
        fieldText = JSON.stringify(field.value);
      } else {
        return null;
      }
      return { text: `${wrap(render(args[0].value), PREC.DOLLAR)}$${fieldText}`, prec: PREC.DOLLAR };
    }

    default:
      return null;
  }
}

function renderArgs(args: readonly Arg[]): string {
  return args
    .map((a) => {
      const value = deparse(a.value);
      if (a.name === null) return value;
      return value === "" ? `${quoteName(a.name)} = ` : `${quoteName(a.name)} = ${value}`;
    })
    .join(", ");
}

function wrap(r: Rendered, minPrec: number): string {
  return r.prec < minPrec ? `(${r.text})` : r.text;
}
