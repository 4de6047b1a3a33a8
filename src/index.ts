/**
 * Code as data: a closed expression tree, an evaluator with lazy arguments,
 * and the quoting, substitution and standardization tools built on them.
 */

// Trees
export type { Node, NodeKind, Constant, ConstantValue, Sym, Call, Arg, Param, ParameterList } from "./node";
export {
  DOTS,
  MISSING,
  cnst,
  sym,
  named,
  positional,
  call,
  callWith,
  param,
  params,
  kindOf,
  unknownNode,
  isConstant,
  isSym,
  isCall,
  isParams,
  isMissing,
  isCallTo,
  calleeName,
  childCount,
  getChild,
  getChildName,
  setChild,
  removeChild,
  argNamed,
  withArgs,
  identical,
} from "./node";

// Values
export type {
  Atom,
  Value,
  LangValue,
  ListItem,
  ListValue,
  ClosureValue,
  SpecialForm,
  Primitive,
  BuiltinValue,
  Callable,
  EnvValue,
} from "./value";
export {
  langVal,
  listVal,
  item,
  envVal,
  closureVal,
  isAtom,
  isCallable,
  isLang,
  isList,
  isEnv,
  typeName,
  nodeToValue,
  valueToNode,
  valuesIdentical,
  valueToString,
} from "./value";

// Environments
export type { Binding, CallFrame, ClosureFrame, DotsEntry, EnvironmentOptions } from "./env";
export { Environment, Thunk } from "./env";

// Evaluation
export type { EngineOptions } from "./limits";
export { DEFAULT_ENGINE_OPTIONS, Limits } from "./limits";
export type { EvalContext } from "./evaluate";
export { createContext, evaluate, force, findFunction, invoke, closureFrame } from "./evaluate";
export type { HostTable } from "./builtins";
export { BUILTINS, createRootEnv } from "./builtins";

// Quoting and rewriting
export { quote, substitute } from "./substitute";
export { quasiquote, UNQUOTE, UNQUOTE_SPLICE } from "./quasiquote";
export type { ActualArg, ArgMatch, MatchOptions } from "./standardize";
export { matchArguments, standardize } from "./standardize";
export type { ChildResults, TreeVisitor } from "./walker";
export { visit, childNodes, rebuild, someNode, transformNode } from "./walker";
export type { AllNamesOptions } from "./analysis";
export { ASSIGNMENT_OPERATORS, usesSymbol, findForbidden, assignTargets, allNames, renameSymbols } from "./analysis";

// Text
export { parse, parseOne } from "./reader";
export { deparse, deparseParams, isSyntacticName } from "./deparse";

// Sessions
export type { SessionOptions, RunResult } from "./session";
export { Session } from "./session";

// Errors
export type { ErrorCode } from "./errors";
export {
  MetaError,
  UnboundSymbolError,
  NotCallableError,
  ArityError,
  AmbiguousArgumentMatchError,
  RecursiveDefaultEvaluationError,
  MissingValueAccessError,
  UnknownNodeKindError,
  InvalidSpliceError,
  RecursionLimitExceededError,
  BudgetExceededError,
  ArgumentTypeError,
  UserError,
  ReadError,
  formatError,
} from "./errors";
