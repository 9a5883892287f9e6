/**
 * Untyped lambda calculus term representation and utilities.
 *
 * This module defines the AST types for untyped lambda calculus terms:
 * variables, abstractions, applications and named combinators. A combinator
 * is a closed term with a name; it prints as its name and can be inlined
 * with `expandCombinators`.
 *
 * @module
 */

/**
 * This is a single term variable with a name.
 *
 * For instance, in the expression "λx.y", this is just "y".
 */
export interface LambdaVar {
  kind: "lambda-var";
  name: string;
}

export const mkVar = (name: string): LambdaVar => ({
  kind: "lambda-var",
  name,
});

// λx.<body>, where x is a name
export interface UntypedLambdaAbs {
  kind: "lambda-abs";
  name: string;
  body: UntypedLambda;
}

export const mkUntypedAbs = (
  name: string,
  body: UntypedLambda,
): UntypedLambda => ({
  kind: "lambda-abs",
  name,
  body,
});

/**
 * λx.λy.…body, one abstraction per name.
 */
export const mkAbsMany = (
  names: readonly string[],
  body: UntypedLambda,
): UntypedLambda => names.reduceRight((acc, name) => mkUntypedAbs(name, acc), body);

/**
 * An application in the untyped lambda calculus
 */
export interface UntypedApplication {
  kind: "non-terminal";
  lft: UntypedLambda;
  rgt: UntypedLambda;
}

/**
 * A named, closed term such as `succ` or `Z`.
 */
export interface LambdaCombinator {
  kind: "lambda-combinator";
  name: string;
  definition: UntypedLambda;
}

export const mkCombinator = (
  name: string,
  definition: UntypedLambda,
): LambdaCombinator => ({
  kind: "lambda-combinator",
  name,
  definition,
});

/**
 * The legal terms of the untyped lambda calculus.
 * e ::= x | λx.e | e e | C, where x is a variable name, C a named closed
 * term, and e is a valid expr
 */
export type UntypedLambda =
  | LambdaVar
  | UntypedLambdaAbs
  | UntypedApplication
  | LambdaCombinator;

/**
 * Creates an application of one untyped lambda term to another.
 * @param left the function term
 * @param right the argument term
 * @returns a new application node
 */
export const createApplication = (
  left: UntypedLambda,
  right: UntypedLambda,
): UntypedLambda => ({
  kind: "non-terminal",
  lft: left,
  rgt: right,
});

export const typelessApp = (
  head: UntypedLambda,
  ...args: UntypedLambda[]
): UntypedLambda => args.reduce(createApplication, head);

/**
 * Pretty-prints an untyped lambda expression using λ and parentheses.
 * Combinators print as their name.
 *
 * Terms nest as deeply as the programs they encode, so the walk keeps its
 * own stack instead of recursing.
 * @param ut the untyped lambda term
 * @returns a human-readable string representation
 */
export const prettyPrintUntypedLambda = (ut: UntypedLambda): string => {
  const parts: string[] = [];
  // text still to emit, the next piece last
  const pending: (UntypedLambda | string)[] = [ut];
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (typeof next === "string") {
      parts.push(next);
      continue;
    }
    switch (next.kind) {
      case "lambda-var":
      case "lambda-combinator":
        parts.push(next.name);
        break;
      case "lambda-abs":
        parts.push(`λ${next.name}.`);
        pending.push(next.body);
        break;
      case "non-terminal":
        parts.push("(");
        pending.push(")", next.rgt, " ");
        // an abstraction in function position would swallow the argument
        if (next.lft.kind === "lambda-abs") {
          pending.push(")", next.lft, "(");
        } else {
          pending.push(next.lft);
        }
        break;
    }
  }
  return parts.join("");
};

type ExpandTask =
  | { kind: "expand"; term: UntypedLambda }
  | { kind: "abs"; name: string }
  | { kind: "app" }
  | { kind: "cache"; combinator: LambdaCombinator };

/**
 * Replaces every combinator by its definition, recursively.
 */
export const expandCombinators = (ut: UntypedLambda): UntypedLambda => {
  const cache = new Map<LambdaCombinator, UntypedLambda>();
  const tasks: ExpandTask[] = [{ kind: "expand", term: ut }];
  const results: UntypedLambda[] = [];
  const result = (): UntypedLambda => {
    const top = results.pop();
    if (top === undefined) throw new Error("expansion lost a subterm");
    return top;
  };

  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    switch (task.kind) {
      case "abs":
        results.push(mkUntypedAbs(task.name, result()));
        continue;
      case "app": {
        const rgt = result();
        results.push(createApplication(result(), rgt));
        continue;
      }
      case "cache": {
        const expanded = result();
        cache.set(task.combinator, expanded);
        results.push(expanded);
        continue;
      }
      case "expand":
        break;
    }
    const t = task.term;
    switch (t.kind) {
      case "lambda-var":
        results.push(t);
        break;
      case "lambda-abs":
        tasks.push({ kind: "abs", name: t.name }, {
          kind: "expand",
          term: t.body,
        });
        break;
      case "non-terminal":
        tasks.push(
          { kind: "app" },
          { kind: "expand", term: t.rgt },
          { kind: "expand", term: t.lft },
        );
        break;
      case "lambda-combinator": {
        const cached = cache.get(t);
        if (cached !== undefined) {
          results.push(cached);
          break;
        }
        tasks.push({ kind: "cache", combinator: t }, {
          kind: "expand",
          term: t.definition,
        });
        break;
      }
    }
  }
  return result();
};

/**
 * Free variables of a term. Combinators are closed and contribute none.
 */
export const freeVariables = (ut: UntypedLambda): Set<string> => {
  const free = new Set<string>();
  const pending: [UntypedLambda, ReadonlySet<string>][] = [[ut, new Set()]];
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const [t, bound] = next;
    switch (t.kind) {
      case "lambda-var":
        if (!bound.has(t.name)) free.add(t.name);
        break;
      case "lambda-abs":
        pending.push([
          t.body,
          bound.has(t.name) ? bound : new Set([...bound, t.name]),
        ]);
        break;
      case "non-terminal":
        pending.push([t.rgt, bound], [t.lft, bound]);
        break;
      case "lambda-combinator":
        break;
    }
  }
  return free;
};

/**
 * Every distinct combinator reachable from a term, dependencies before
 * the combinators that use them.
 */
export const collectCombinators = (ut: UntypedLambda): LambdaCombinator[] => {
  const seen = new Set<LambdaCombinator>();
  const ordered: LambdaCombinator[] = [];
  // a combinator is emitted once its definition has been walked
  const pending: (UntypedLambda | { emit: LambdaCombinator })[] = [ut];
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if ("emit" in next) {
      ordered.push(next.emit);
      continue;
    }
    switch (next.kind) {
      case "lambda-var":
        break;
      case "lambda-abs":
        pending.push(next.body);
        break;
      case "non-terminal":
        pending.push(next.rgt, next.lft);
        break;
      case "lambda-combinator":
        if (seen.has(next)) break;
        seen.add(next);
        pending.push({ emit: next }, next.definition);
        break;
    }
  }
  return ordered;
};

/**
 * Structural equality; combinators are equal when their names are.
 */
export const lambdaEquals = (a: UntypedLambda, b: UntypedLambda): boolean => {
  const pending: [UntypedLambda, UntypedLambda][] = [[a, b]];
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const [x, y] = next;
    switch (x.kind) {
      case "lambda-var":
        if (y.kind !== "lambda-var" || y.name !== x.name) return false;
        break;
      case "lambda-combinator":
        if (y.kind !== "lambda-combinator" || y.name !== x.name) return false;
        break;
      case "lambda-abs":
        if (y.kind !== "lambda-abs" || y.name !== x.name) return false;
        pending.push([x.body, y.body]);
        break;
      case "non-terminal":
        if (y.kind !== "non-terminal") return false;
        pending.push([x.rgt, y.rgt], [x.lft, y.lft]);
        break;
    }
  }
  return true;
};
