/**
 * Lezer Tree to Node Conversion
 *
 * Converts JavaScript syntax trees from @lezer/javascript into code trees.
 * Operators become calls named by the operator, declarations and
 * assignments become `<-`, and functions become `function(params, body)`.
 */

import type { SyntaxNode } from "@lezer/common";
import type { Arg, Node, Param } from "../node";
import { DOTS, call, callWith, cnst, named, param, params, positional, sym } from "../node";
import { ReadError } from "../errors";

// ============================================================================
// Utility Functions
// ============================================================================

function getText(node: SyntaxNode, source: string): string {
  return source.slice(node.from, node.to);
}

function getChild(node: SyntaxNode, name: string): SyntaxNode | null {
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.type.name === name) return child;
  }
  return null;
}

const PUNCTUATION = new Set(["(", ")", "[", "]", "{", "}", ",", ";", "."]);

const isComment = (node: SyntaxNode): boolean =>
  node.type.name === "LineComment" || node.type.name === "BlockComment";

/**
 * Direct children that carry meaning: no brackets, separators or comments.
 */
function getParts(node: SyntaxNode, source: string): SyntaxNode[] {
  const parts: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (isComment(child) || PUNCTUATION.has(getText(child, source))) continue;
    parts.push(child);
  }
  return parts;
}

function fail(message: string, node: SyntaxNode): never {
  throw new ReadError(message, node.from, node.to);
}

// ============================================================================
// Operator Mapping
// ============================================================================

const BINARY_OPS: Readonly<Record<string, string>> = {
  "+": "+",
  "-": "-",
  "*": "*",
  "/": "/",
  "%": "%%",
  "**": "^",
  "==": "==",
  "===": "==",
  "!=": "!=",
  "!==": "!=",
  "<": "<",
  ">": ">",
  "<=": "<=",
  ">=": ">=",
  "&&": "&&",
  "||": "||",
};

const UPDATE_OPS: Readonly<Record<string, string>> = {
  "+=": "+",
  "-=": "-",
  "*=": "*",
  "/=": "/",
};

const CONSTANT_NAMES: Readonly<Record<string, Node>> = {
  TRUE: cnst(true),
  FALSE: cnst(false),
  NULL: cnst(null),
  undefined: cnst(null),
  Inf: cnst(Infinity),
  NaN: cnst(NaN),
};

// ============================================================================
// Statements
// ============================================================================

/**
 * Convert a Script node to its top-level expressions.
 */
export function convertScript(node: SyntaxNode, source: string): Node[] {
  return getParts(node, source).flatMap((stmt) => convertStatement(stmt, source));
}

function convertStatement(node: SyntaxNode, source: string): Node[] {
  switch (node.type.name) {
    case "ExpressionStatement": {
      const [expr] = getParts(node, source);
      if (!expr) fail("empty expression statement", node);
      return [convertExpr(expr, source)];
    }

    case "VariableDeclaration":
      return convertVariableDeclaration(node, source);

    case "FunctionDeclaration": {
      const name = getChild(node, "VariableDefinition");
      if (!name) fail("function declaration without a name", node);
      return [call("<-", sym(getText(name, source)), convertFunction(node, source))];
    }

    case "IfStatement":
      return [convertIf(node, source)];

    case "ReturnStatement": {
      const [, value] = getParts(node, source);
      return [value ? call("return", convertExpr(value, source)) : call("return")];
    }

    case "Block":
      return [convertBlock(node, source)];

    default:
      return [convertExpr(node, source)];
  }
}

/**
 * `const x = e, y = f` -> `x <- e; y <- f`. A declaration without an
 * initializer binds NULL.
 */
function convertVariableDeclaration(node: SyntaxNode, source: string): Node[] {
  const result: Node[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.type.name !== "VariableDefinition") continue;
    const target = sym(getText(child, source));
    const equals = child.nextSibling;
    const init = equals && getText(equals, source) === "=" ? equals.nextSibling : null;
    result.push(call("<-", target, init ? convertExpr(init, source) : cnst(null)));
  }
  if (result.length === 0) fail("empty declaration", node);
  return result;
}

function convertIf(node: SyntaxNode, source: string): Node {
  const parts = getParts(node, source).filter((p) => {
    const text = getText(p, source);
    return text !== "if" && text !== "else";
  });
  const [test, consequent, alternative] = parts;
  if (!test || !consequent) fail("incomplete if statement", node);
  const args = [unparen(test, source), statementExpr(consequent, source)];
  if (alternative) args.push(statementExpr(alternative, source));
  return call("if", ...args);
}

/**
 * The condition of an `if` without its parentheses.
 */
function unparen(node: SyntaxNode, source: string): Node {
  if (node.type.name === "ParenthesizedExpression") {
    const [inner] = getParts(node, source);
    if (!inner) fail("empty condition", node);
    return convertExpr(inner, source);
  }
  return convertExpr(node, source);
}

function statementExpr(node: SyntaxNode, source: string): Node {
  const converted = convertStatement(node, source);
  return converted.length === 1 ? converted[0] : callWith("{", converted.map(positional));
}

function convertBlock(node: SyntaxNode, source: string): Node {
  const body = getParts(node, source).flatMap((stmt) => convertStatement(stmt, source));
  return callWith("{", body.map(positional));
}

// ============================================================================
// Expressions
// ============================================================================

export function convertExpr(node: SyntaxNode, source: string): Node {
  const name = node.type.name;
  switch (name) {
    case "Number":
      return cnst(Number(getText(node, source).replace(/_/g, "")));

    case "String":
      return cnst(parseStringLiteral(getText(node, source)));

    case "TemplateString": {
      const text = getText(node, source);
      if (text.includes("${")) fail("template interpolation is not supported", node);
      return cnst(parseStringLiteral(text));
    }

    case "BooleanLiteral":
      return cnst(getText(node, source) === "true");

    case "null":
      return cnst(null);

    case "VariableName": {
      const text = getText(node, source);
      return Object.hasOwn(CONSTANT_NAMES, text) ? CONSTANT_NAMES[text] : sym(text);
    }

    case "BinaryExpression":
      return convertBinary(node, source);

    case "UnaryExpression":
      return convertUnary(node, source);

    case "ConditionalExpression": {
      const parts = getParts(node, source).filter((p) => p.type.name !== "LogicOp");
      if (parts.length !== 3) fail("invalid conditional expression", node);
      return call("if", ...parts.map((p) => convertExpr(p, source)));
    }

    case "ParenthesizedExpression": {
      const [inner] = getParts(node, source);
      if (!inner) fail("empty parentheses", node);
      return call("(", convertExpr(inner, source));
    }

    case "CallExpression":
      return convertCall(node, source);

    case "MemberExpression":
      return convertMember(node, source);

    case "ArrowFunction":
    case "FunctionExpression":
      return convertFunction(node, source);

    case "AssignmentExpression":
      return convertAssignment(node, source);

    case "ArrayExpression":
      return callWith(
        "c",
        getParts(node, source).map((p) => positional(convertExpr(p, source)))
      );

    case "Block":
      return convertBlock(node, source);

    default:
      return fail(`unsupported syntax: ${name}`, node);
  }
}

const ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
};

/**
 * Strip the quotes of a string literal and resolve its escapes.
 */
function parseStringLiteral(text: string): string {
  return text
    .slice(1, -1)
    .replace(/\\(u\{[0-9a-fA-F]+\}|u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[\s\S])/g, (_, esc: string) => {
      if (esc.startsWith("u{")) return String.fromCodePoint(parseInt(esc.slice(2, -1), 16));
      if (esc.length > 1) return String.fromCharCode(parseInt(esc.slice(1), 16));
      return Object.hasOwn(ESCAPES, esc) ? ESCAPES[esc] : esc;
    });
}

function convertBinary(node: SyntaxNode, source: string): Node {
  const parts = getParts(node, source);
  if (parts.length !== 3) fail("invalid binary expression", node);
  const [left, opNode, right] = parts;
  const opText = getText(opNode, source);
  if (!Object.hasOwn(BINARY_OPS, opText)) {
    fail(`unsupported operator: ${opText}`, opNode);
  }
  return call(BINARY_OPS[opText], convertExpr(left, source), convertExpr(right, source));
}

function convertUnary(node: SyntaxNode, source: string): Node {
  const parts = getParts(node, source);
  if (parts.length !== 2) fail("invalid unary expression", node);
  const [opNode, operand] = parts;
  const op = getText(opNode, source);
  if (op === "typeof") return call("typeof", convertExpr(operand, source));
  if (op !== "-" && op !== "+" && op !== "!") {
    fail(`unsupported unary operator: ${op}`, opNode);
  }
  return call(op, convertExpr(operand, source));
}

/**
 * `a.b.c` as a single name, or null when `node` is anything else.
 */
function dottedName(node: SyntaxNode, source: string): string | null {
  if (node.type.name === "VariableName") return getText(node, source);
  if (node.type.name !== "MemberExpression") return null;
  const parts = getParts(node, source);
  if (parts.length !== 2 || parts[1].type.name !== "PropertyName") return null;
  const head = dottedName(parts[0], source);
  return head === null ? null : `${head}.${getText(parts[1], source)}`;
}

/**
 * A dotted callee is one name: `is.call(x)` calls `is.call`.
 * Arguments: `name = e` is a named argument, `...rest` forwards `...`.
 */
function convertCall(node: SyntaxNode, source: string): Node {
  const callee = node.firstChild;
  const argList = getChild(node, "ArgList");
  if (!callee || !argList) fail("invalid call expression", node);
  const dotted = callee.type.name === "MemberExpression" ? dottedName(callee, source) : null;
  const fn = dotted !== null ? sym(dotted) : convertExpr(callee, source);

  const args: Arg[] = [];
  let spread = false;
  for (const part of getParts(argList, source)) {
    if (getText(part, source) === "...") {
      spread = true;
      continue;
    }
    if (spread) {
      args.push(positional(sym(DOTS)));
      spread = false;
      continue;
    }
    args.push(convertArg(part, source));
  }
  return callWith(fn, args);
}

function convertArg(node: SyntaxNode, source: string): Arg {
  if (node.type.name === "AssignmentExpression") {
    const [target, op, value] = getParts(node, source);
    if (target && op && value && target.type.name === "VariableName" && getText(op, source) === "=") {
      return named(getText(target, source), convertExpr(value, source));
    }
  }
  return positional(convertExpr(node, source));
}

/**
 * `a.b` -> `$`(a, b); `a[i]` -> `[[`(a, i).
 */
function convertMember(node: SyntaxNode, source: string): Node {
  const parts = getParts(node, source);
  if (parts.length !== 2) fail("invalid member expression", node);
  const [object, property] = parts;
  const target = convertExpr(object, source);
  if (property.type.name === "PropertyName") {
    return call("$", target, sym(getText(property, source)));
  }
  return call("[[", target, convertExpr(property, source));
}

function convertAssignment(node: SyntaxNode, source: string): Node {
  const parts = getParts(node, source);
  if (parts.length !== 3) fail("invalid assignment", node);
  const [targetNode, opNode, valueNode] = parts;
  const target = convertExpr(targetNode, source);
  const value = convertExpr(valueNode, source);
  const op = getText(opNode, source);
  if (op === "=") {
    return call("<-", target, value);
  }
  if (Object.hasOwn(UPDATE_OPS, op)) {
    return call("<-", target, call(UPDATE_OPS[op], target, value));
  }
  return fail(`unsupported assignment operator: ${op}`, opNode);
}

// ============================================================================
// Functions
// ============================================================================

/**
 * Arrow functions, function expressions and declarations alike become
 * `function(params, body)`. A rest parameter becomes `...`.
 */
function convertFunction(node: SyntaxNode, source: string): Node {
  const paramList = getChild(node, "ParamList");
  let formals: Param[] = [];
  if (paramList) {
    formals = convertParams(paramList, source);
  } else {
    const single = getChild(node, "VariableDefinition");
    if (single) formals = [param(getText(single, source))];
  }

  const bodyNode = getChild(node, "Block") ?? node.lastChild;
  if (!bodyNode || bodyNode === paramList || getText(bodyNode, source) === "=>") {
    fail("function without a body", node);
  }
  const body = bodyNode.type.name === "Block" ? convertBlock(bodyNode, source) : convertExpr(bodyNode, source);
  return call("function", params(...formals), body);
}

function convertParams(node: SyntaxNode, source: string): Param[] {
  const result: Param[] = [];
  let rest = false;
  for (let child = node.firstChild; child; child = child.nextSibling) {
    const text = getText(child, source);
    if (isComment(child) || PUNCTUATION.has(text)) continue;
    if (text === "...") {
      rest = true;
    } else if (child.type.name === "VariableDefinition") {
      result.push(param(rest ? DOTS : text));
      rest = false;
    } else if (text === "=") {
      const defaultNode = child.nextSibling;
      const last = result.pop();
      if (!defaultNode || !last) fail("invalid default value", child);
      result.push(param(last.name, convertExpr(defaultNode, source)));
      child = defaultNode;
    } else {
      fail(`unsupported parameter syntax: ${child.type.name}`, child);
    }
  }
  return result;
}
