/**
 * Argument matching and call standardization.
 *
 * Actual arguments are matched to formals in three passes: exact names,
 * then unambiguous name prefixes, then position. Whatever is left goes to
 * the variadic formal `...`, in its original order.
 */

import type { Arg, Call, ParameterList } from "./node";
import { DOTS, named, withArgs } from "./node";
import { deparse } from "./deparse";
import { AmbiguousArgumentMatchError, ArityError } from "./errors";

// ============================================================================
// Matching
// ============================================================================

export interface ActualArg<T> {
  readonly name: string | null;
  readonly value: T;
}

export interface ArgMatch<T> {
  /** Formal name -> matched actual, for every formal other than `...`. */
  readonly matched: ReadonlyMap<string, T>;
  /** Actuals collected by `...`, in call order. */
  readonly dots: readonly ActualArg<T>[];
}

export interface MatchOptions<T> {
  /** Callee description for error messages. */
  callee?: string;
  /** Renders a positional actual in error messages. */
  describe?: (value: T) => string;
}

function isNamed<T>(arg: ActualArg<T>): arg is ActualArg<T> & { readonly name: string } {
  return arg.name !== null && arg.name !== "";
}

const UNMATCHED = -1;

/**
 * Match actual arguments to a formal parameter list.
 *
 * Formals after `...` can only be matched by their exact name. Actuals no
 * formal accepts are collected by `...`, or rejected with ArityError when
 * there is no variadic formal.
 */
export function matchArguments<T>(
  args: readonly ActualArg<T>[],
  formals: ParameterList,
  options: MatchOptions<T> = {}
): ArgMatch<T> {
  const callee = options.callee ?? "call";
  const names = formals.params.map((p) => p.name);
  const dotsIndex = names.indexOf(DOTS);
  const positionalLimit = dotsIndex >= 0 ? dotsIndex : names.length;

  const assigned: number[] = args.map(() => UNMATCHED);
  const taken: boolean[] = names.map(() => false);

  // Pass 1: exact names
  names.forEach((formal, fi) => {
    if (formal === DOTS) return;
    const hits: number[] = [];
    args.forEach((a, ai) => {
      if (isNamed(a) && a.name === formal) hits.push(ai);
    });
    if (hits.length > 1) {
      throw new AmbiguousArgumentMatchError(
        formal,
        [formal],
        `formal argument '${formal}' matched by multiple actual arguments`
      );
    }
    if (hits.length === 1) {
      assigned[hits[0]] = fi;
      taken[fi] = true;
    }
  });

  // Pass 2: partial names, only for formals before `...`
  const partialOwners = new Map<number, number>();
  args.forEach((a, ai) => {
    if (assigned[ai] !== UNMATCHED || !isNamed(a)) return;
    const candidates: number[] = [];
    for (let fi = 0; fi < positionalLimit; fi++) {
      if (!taken[fi] && names[fi].startsWith(a.name)) candidates.push(fi);
    }
    if (candidates.length > 1) {
      throw new AmbiguousArgumentMatchError(a.name, candidates.map((fi) => names[fi]));
    }
    if (candidates.length === 1) {
      const fi = candidates[0];
      if (partialOwners.has(fi)) {
        throw new AmbiguousArgumentMatchError(
          a.name,
          [names[fi]],
          `formal argument '${names[fi]}' matched by multiple actual arguments`
        );
      }
      partialOwners.set(fi, ai);
      assigned[ai] = fi;
    }
  });
  for (const fi of partialOwners.keys()) taken[fi] = true;

  // Pass 3: positional
  let next = 0;
  args.forEach((a, ai) => {
    if (assigned[ai] !== UNMATCHED || isNamed(a)) return;
    while (next < positionalLimit && taken[next]) next++;
    if (next < positionalLimit) {
      assigned[ai] = next;
      taken[next] = true;
      next++;
    }
  });

  const matched = new Map<string, T>();
  const dots: ActualArg<T>[] = [];
  const unused: ActualArg<T>[] = [];
  args.forEach((a, ai) => {
    const fi = assigned[ai];
    if (fi !== UNMATCHED) {
      matched.set(names[fi], a.value);
    } else if (dotsIndex >= 0) {
      dots.push(isNamed(a) ? a : { name: null, value: a.value });
    } else {
      unused.push(a);
    }
  });

  if (unused.length > 0) {
    const describe = options.describe ?? (() => "<value>");
    const labels = unused.map((a) => (isNamed(a) ? `${a.name} = ${describe(a.value)}` : describe(a.value)));
    throw new ArityError(
      callee,
      `unused argument${unused.length === 1 ? "" : "s"} (${labels.join(", ")})`,
      unused.flatMap((a) => (isNamed(a) ? [a.name] : []))
    );
  }

  return { matched, dots };
}

// ============================================================================
// Standardization
// ============================================================================

/**
 * Rewrite a call so every argument is named by the formal it matches,
 * in formal order. Arguments collected by `...` keep their own names and
 * sit at the position of `...`. Unsupplied formals are omitted.
 *
 * The result standardizes to itself.
 *
 * @example
 * standardize(call("f", cnst(1), named("b", cnst(2))), params("a", "b"))
 * // f(a = 1, b = 2)
 */
export function standardize(node: Call, formals: ParameterList): Call {
  const match = matchArguments(node.args, formals, {
    callee: deparse(node.fn),
    describe: deparse,
  });

  const args: Arg[] = [];
  for (const p of formals.params) {
    if (p.name === DOTS) {
      args.push(...match.dots);
      continue;
    }
    const value = match.matched.get(p.name);
    if (value !== undefined) {
      args.push(named(p.name, value));
    }
  }
  return withArgs(node, args);
}
