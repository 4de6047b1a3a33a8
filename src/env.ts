/**
 * Environment - scope frames linked to their parent.
 *
 * Bindings are mutable in place: every closure or promise holding an
 * environment sees writes made through any other reference to it.
 * Parent links only point upward and end at a single root.
 */

import type { Call, Node } from "./node";
import { DOTS, isMissing } from "./node";
import type { ClosureValue, ListItem, Value } from "./value";
import { isLang, valueToString } from "./value";
import { ArgumentTypeError, MissingValueAccessError, UnboundSymbolError } from "./errors";

// ============================================================================
// Promises
// ============================================================================

/**
 * A promise: an expression paired with the environment to evaluate it in,
 * forced at most once. `forcing` is set while the expression is being
 * evaluated so that re-entry can be reported instead of looping.
 */
export class Thunk {
  forced = false;
  forcing = false;
  cache: Value = null;

  constructor(
    readonly expr: Node,
    readonly env: Environment,
    /** True for a formal's default expression rather than a supplied argument. */
    readonly isDefault: boolean = false
  ) {}

  /**
   * A promise that is already forced, for values that need no evaluation.
   */
  static resolved(expr: Node, value: Value, env: Environment): Thunk {
    const thunk = new Thunk(expr, env);
    thunk.forced = true;
    thunk.cache = value;
    return thunk;
  }
}

/**
 * One argument collected by a variadic formal.
 */
export interface DotsEntry {
  readonly name: string | null;
  readonly promise: Thunk;
}

// ============================================================================
// Bindings and Frames
// ============================================================================

export type Binding =
  | { readonly tag: "value"; value: Value }
  | { readonly tag: "promise"; readonly promise: Thunk }
  | { readonly tag: "dots"; readonly entries: readonly DotsEntry[] }
  | { readonly tag: "missing" };

/**
 * What makes an environment a substitution context. Closure frames are
 * created by the evaluator for each invocation; `bindings` frames wrap an
 * explicit table handed to substitute().
 */
export interface ClosureFrame {
  readonly kind: "closure";
  readonly call: Call;
  readonly closure: ClosureValue;
  readonly callerEnv: Environment;
}

export type CallFrame = ClosureFrame | { readonly kind: "bindings" };

export interface EnvironmentOptions {
  frame?: CallFrame | null;
  label?: string;
}

let envCounter = 0;

// ============================================================================
// Environment
// ============================================================================

export class Environment {
  private readonly bindings = new Map<string, Binding>();
  readonly frame: CallFrame | null;
  readonly label: string;

  constructor(
    readonly parent: Environment | null,
    options: EnvironmentOptions = {}
  ) {
    this.frame = options.frame ?? null;
    this.label = options.label ?? `env${++envCounter}`;
  }

  /**
   * Build an environment from a flat table of named values. There is no
   * implicit fallback: the parent must be given, even if it is null.
   */
  static fromList(items: readonly ListItem[], parent: Environment | null, options: EnvironmentOptions = {}): Environment {
    const env = new Environment(parent, options);
    for (const it of items) {
      if (it.name === null || it.name === "") {
        throw new ArgumentTypeError("environment from list", "named items", valueToString(it.value));
      }
      env.define(it.name, it.value);
    }
    return env;
  }

  static fromRecord(values: Readonly<Record<string, Value>>, parent: Environment | null, options: EnvironmentOptions = {}): Environment {
    return Environment.fromList(
      Object.entries(values).map(([name, value]) => ({ name, value })),
      parent,
      options
    );
  }

  // --------------------------------------------------------------------------
  // Lookup
  // --------------------------------------------------------------------------

  /**
   * Find the nearest binding for `name`, walking the parent chain.
   * Throws UnboundSymbol if no environment binds it.
   */
  lookup(name: string): Binding {
    const binding = this.find(name);
    if (binding === undefined) {
      throw new UnboundSymbolError(name);
    }
    return binding;
  }

  find(name: string): Binding | undefined {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      const binding = env.bindings.get(name);
      if (binding !== undefined) return binding;
    }
    return undefined;
  }

  lookupLocal(name: string): Binding | undefined {
    return this.bindings.get(name);
  }

  /**
   * The environment in the chain that binds `name`, if any.
   */
  whereBound(name: string): Environment | undefined {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      if (env.bindings.has(name)) return env;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  hasLocal(name: string): boolean {
    return this.bindings.has(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Create or overwrite a binding in this environment only.
   * The missing marker cannot be stored as an ordinary value.
   */
  define(name: string, value: Value): void {
    if (isLang(value) && isMissing(value.node)) {
      throw new MissingValueAccessError(name);
    }
    this.bindings.set(name, { tag: "value", value });
  }

  bindPromise(name: string, promise: Thunk): void {
    this.bindings.set(name, { tag: "promise", promise });
  }

  bindDots(entries: readonly DotsEntry[]): void {
    this.bindings.set(DOTS, { tag: "dots", entries });
  }

  bindMissing(name: string): void {
    this.bindings.set(name, { tag: "missing" });
  }

  /**
   * Super-assignment: rebind `name` in the nearest ancestor that has it,
   * or at top level when none does. This environment itself is skipped,
   * and so is the root: its host bindings are never overwritten.
   */
  assign(name: string, value: Value): void {
    const found = this.parent?.whereBound(name);
    const target = found === undefined || found.parent === null ? this.topLevel : found;
    target.define(name, value);
  }

  remove(name: string): boolean {
    return this.bindings.delete(name);
  }

  // --------------------------------------------------------------------------
  // Structure
  // --------------------------------------------------------------------------

  child(options: EnvironmentOptions = {}): Environment {
    return new Environment(this, options);
  }

  get root(): Environment {
    let env: Environment = this;
    while (env.parent !== null) env = env.parent;
    return env;
  }

  /**
   * The root's direct child on this chain (the global environment of a
   * session), or the root itself.
   */
  get topLevel(): Environment {
    let env: Environment = this;
    while (env.parent !== null && env.parent.parent !== null) env = env.parent;
    return env;
  }

  /**
   * True when substitute() should rewrite symbols against this environment.
   */
  get isSubstitutionContext(): boolean {
    return this.frame !== null;
  }

  /**
   * Entries collected by this frame's variadic formal, or null.
   */
  get dots(): readonly DotsEntry[] | null {
    const binding = this.bindings.get(DOTS);
    return binding?.tag === "dots" ? binding.entries : null;
  }
}
