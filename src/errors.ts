/**
 * Error taxonomy for the engine.
 *
 * Every failure surfaces as a MetaError subclass with a stable `code`,
 * so callers can branch on the kind without string matching.
 */

// ============================================================================
// Base
// ============================================================================

export type ErrorCode =
  | "UnboundSymbol"
  | "NotCallable"
  | "ArityError"
  | "AmbiguousArgumentMatch"
  | "RecursiveDefaultEvaluation"
  | "MissingValueAccess"
  | "UnknownNodeKind"
  | "RecursionLimitExceeded"
  | "BudgetExceeded"
  | "InvalidSplice"
  | "ArgumentTypeError"
  | "UserError"
  | "ReadError";

export class MetaError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = code;
  }
}

// ============================================================================
// Lookup and application
// ============================================================================

export class UnboundSymbolError extends MetaError {
  constructor(public readonly symbol: string) {
    super("UnboundSymbol", `object '${symbol}' not found`);
  }
}

export class NotCallableError extends MetaError {
  constructor(public readonly callee: string) {
    super("NotCallable", `attempt to apply non-function: ${callee}`);
  }
}

/**
 * Wrong number of arguments, or arguments that no formal accepts.
 */
export class ArityError extends MetaError {
  constructor(
    public readonly callee: string,
    message: string,
    public readonly argumentNames: readonly string[] = []
  ) {
    super("ArityError", `in ${callee}: ${message}`);
  }
}

export class AmbiguousArgumentMatchError extends MetaError {
  constructor(
    public readonly argument: string,
    public readonly candidates: readonly string[],
    message?: string
  ) {
    super(
      "AmbiguousArgumentMatch",
      message ?? `argument '${argument}' matches multiple formal arguments: ${candidates.join(", ")}`
    );
  }
}

export class RecursiveDefaultEvaluationError extends MetaError {
  constructor(public readonly expression: string) {
    super(
      "RecursiveDefaultEvaluation",
      `promise already under evaluation: recursive default argument reference or earlier problems? (${expression})`
    );
  }
}

export class MissingValueAccessError extends MetaError {
  constructor(public readonly symbol: string) {
    super(
      "MissingValueAccess",
      symbol === ""
        ? "argument is missing, with no default"
        : `argument '${symbol}' is missing, with no default`
    );
  }
}

// ============================================================================
// Structure
// ============================================================================

export class UnknownNodeKindError extends MetaError {
  constructor(
    public readonly path: readonly number[],
    public readonly found: unknown
  ) {
    super("UnknownNodeKind", `unknown node kind at [${path.join(", ")}]: ${describe(found)}`);
  }
}

function describe(found: unknown): string {
  if (typeof found === "object" && found !== null && "tag" in found) {
    return `tag ${JSON.stringify(found.tag)}`;
  }
  return typeof found;
}

export class InvalidSpliceError extends MetaError {
  constructor(message: string) {
    super("InvalidSplice", message);
  }
}

// ============================================================================
// Resource limits
// ============================================================================

export class RecursionLimitExceededError extends MetaError {
  constructor(
    public readonly limit: number,
    public readonly operation: string
  ) {
    super("RecursionLimitExceeded", `evaluation nested too deeply (limit ${limit}) in ${operation}`);
  }
}

export class BudgetExceededError extends MetaError {
  constructor(
    public readonly limit: number,
    public readonly operation: string
  ) {
    super("BudgetExceeded", `step budget of ${limit} exhausted in ${operation}`);
  }
}

// ============================================================================
// Host-level errors
// ============================================================================

export class ArgumentTypeError extends MetaError {
  constructor(
    public readonly callee: string,
    public readonly expected: string,
    public readonly got: string
  ) {
    super("ArgumentTypeError", `in ${callee}: expected ${expected}, got ${got}`);
  }
}

/**
 * Raised by `stop()`.
 */
export class UserError extends MetaError {
  constructor(message: string) {
    super("UserError", message);
  }
}

export class ReadError extends MetaError {
  constructor(
    message: string,
    public readonly from: number,
    public readonly to: number
  ) {
    super("ReadError", message);
  }
}

// ============================================================================
// Reporting
// ============================================================================

/**
 * One-line description of a failure, for the CLI and REPL.
 */
export function formatError(error: unknown, filePath: string | null): string {
  const prefix = filePath === null ? "" : `${filePath}: `;
  if (error instanceof MetaError) {
    return `${prefix}${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${prefix}${error.message}`;
  }
  return `${prefix}Unknown error: ${String(error)}`;
}
