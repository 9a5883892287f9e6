/**
 * Call-by-need evaluation of untyped lambda terms.
 *
 * Terms run on an environment machine: arguments are suspended as thunks
 * and updated in place the first time they are forced, so a shared
 * argument is evaluated at most once. Evaluation stops at weak head normal
 * form.
 *
 * Results are read back by applying them to native values. A Church
 * numeral applied to a native successor and a native zero yields a chain of
 * native successors, a Church boolean picks one of two native booleans, and
 * so on.
 *
 * @module
 */
import type { LambdaCombinator, UntypedLambda } from "../terms/lambda.js";
import { mkVar } from "../terms/lambda.js";
import { EvaluationError } from "./evaluationError.js";

export const DEFAULT_MAX_STEPS = 5_000_000;

export interface EvaluateOptions {
  /** Machine transitions allowed before evaluation is abandoned. */
  maxSteps?: number;
}

export interface Closure {
  kind: "closure";
  param: string;
  body: UntypedLambda;
  env: Env;
}

export interface NativeFunction {
  kind: "native";
  name: string;
  apply: (arg: Thunk) => Value;
}

export type Datum =
  | { kind: "nat"; value: number }
  | { kind: "succ"; pred: Thunk }
  | { kind: "bool"; value: boolean }
  | { kind: "pair"; first: Thunk; second: Thunk }
  | { kind: "nil" }
  | { kind: "cons"; head: Thunk; tail: Thunk };

export interface DatumValue {
  kind: "datum";
  datum: Datum;
}

export type Value = Closure | NativeFunction | DatumValue;

export interface Frame {
  readonly name: string;
  readonly thunk: Thunk;
  readonly next: Env;
}

export type Env = Frame | undefined;

const bind = (name: string, thunk: Thunk, next: Env): Env => ({
  name,
  thunk,
  next,
});

type ThunkState =
  | { kind: "delayed"; term: UntypedLambda; env: Env }
  | { kind: "forced"; value: Value };

/**
 * A suspended term, or the value it evaluated to.
 */
export class Thunk {
  private constructor(private state: ThunkState) {}

  static delay(term: UntypedLambda, env: Env): Thunk {
    return new Thunk({ kind: "delayed", term, env });
  }

  static of(value: Value): Thunk {
    return new Thunk({ kind: "forced", value });
  }

  force(evaluator: LazyEvaluator): Value {
    if (this.state.kind === "forced") return this.state.value;
    const value = evaluator.evaluateIn(this.state.term, this.state.env);
    this.state = { kind: "forced", value };
    return value;
  }
}

const native = (name: string, apply: (arg: Thunk) => Value): Value => ({
  kind: "native",
  name,
  apply,
});

const datum = (d: Datum): Value => ({ kind: "datum", datum: d });

const NAT_ZERO = datum({ kind: "nat", value: 0 });
const BOOL_TRUE = datum({ kind: "bool", value: true });
const BOOL_FALSE = datum({ kind: "bool", value: false });
const NIL = datum({ kind: "nil" });

// cannot collide with a name the term reader accepts
const FOCUS = "%focus";

const describeValue = (value: Value): string => {
  switch (value.kind) {
    case "closure":
      return `an abstraction over ${value.param}`;
    case "native":
      return `the native ${value.name}`;
    case "datum":
      return `a native ${value.datum.kind}`;
  }
};

export class LazyEvaluator {
  private stepCount = 0;
  private readonly maxSteps: number;
  private readonly combinatorValues = new Map<LambdaCombinator, Value>();

  // leaves its argument suspended; readNat walks the chain in a loop
  private readonly inc = native("inc", (pred) => datum({ kind: "succ", pred }));

  private readonly pairCollector = native(
    "pair",
    (first) => native("pair", (second) => datum({ kind: "pair", first, second })),
  );

  private readonly consCollector = native(
    "cons",
    (head) => native("cons", (tail) => datum({ kind: "cons", head, tail })),
  );

  constructor(options: EvaluateOptions = {}) {
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  /** Machine transitions taken so far. */
  get steps(): number {
    return this.stepCount;
  }

  /**
   * Evaluates a closed term to weak head normal form.
   */
  evaluate(term: UntypedLambda): Value {
    return this.guardStack(() => this.evaluateIn(term, undefined));
  }

  evaluateIn(term: UntypedLambda, env: Env): Value {
    return this.run(term, env, []);
  }

  force(thunk: Thunk): Value {
    return thunk.force(this);
  }

  /**
   * Applies a value to already evaluated arguments.
   */
  apply(fn: Value, ...args: Value[]): Value {
    const stack = args.map((arg) => Thunk.of(arg)).reverse();
    return this.guardStack(() =>
      this.run(mkVar(FOCUS), bind(FOCUS, Thunk.of(fn), undefined), stack)
    );
  }

  readNat(value: Value): number {
    let count = 0;
    let current = this.apply(value, this.inc, NAT_ZERO);
    for (;;) {
      const d = current.kind === "datum" ? current.datum : undefined;
      if (d === undefined || d.kind !== "succ") break;
      count++;
      const pred = d.pred;
      current = this.guardStack(() => this.force(pred));
    }
    return count + this.expectNat(current);
  }

  readBool(value: Value): boolean {
    const result = this.apply(value, BOOL_TRUE, BOOL_FALSE);
    if (result.kind === "datum" && result.datum.kind === "bool") {
      return result.datum.value;
    }
    throw new EvaluationError(
      "unexpected-shape",
      `expected a Church boolean, found ${describeValue(result)}`,
    );
  }

  readPair(value: Value): [Value, Value] {
    const result = this.apply(value, this.pairCollector);
    if (result.kind === "datum" && result.datum.kind === "pair") {
      const { first, second } = result.datum;
      return this.guardStack<[Value, Value]>(
        () => [this.force(first), this.force(second)],
      );
    }
    throw new EvaluationError(
      "unexpected-shape",
      `expected a pair, found ${describeValue(result)}`,
    );
  }

  /**
   * The integer encoded as a pair of naturals `(p, n)`, that is `p − n`.
   */
  readInt(value: Value): number {
    const [p, n] = this.readPair(value);
    return this.readNat(p) - this.readNat(n);
  }

  readList(value: Value): Value[] {
    const items: Value[] = [];
    let current = this.apply(value, this.consCollector, NIL);
    for (;;) {
      const d = current.kind === "datum" ? current.datum : undefined;
      if (d === undefined || d.kind !== "cons") break;
      const { head, tail } = d;
      items.push(this.guardStack(() => this.force(head)));
      current = this.guardStack(() => this.force(tail));
    }
    if (current.kind === "datum" && current.datum.kind === "nil") return items;
    throw new EvaluationError(
      "unexpected-shape",
      `expected a list, found ${describeValue(current)}`,
    );
  }

  private expectNat(value: Value): number {
    if (value.kind === "datum" && value.datum.kind === "nat") {
      return value.datum.value;
    }
    throw new EvaluationError(
      "unexpected-shape",
      `expected a Church numeral, found ${describeValue(value)}`,
    );
  }

  private guardStack<T>(f: () => T): T {
    try {
      return f();
    } catch (e) {
      if (e instanceof RangeError) {
        throw new EvaluationError(
          "stack-exhausted",
          `evaluation nested too deeply after ${this.stepCount} steps`,
        );
      }
      throw e;
    }
  }

  private tick(): void {
    if (++this.stepCount > this.maxSteps) {
      throw new EvaluationError(
        "step-limit",
        `evaluation did not finish within ${this.maxSteps} steps`,
      );
    }
  }

  private lookup(env: Env, name: string): Thunk {
    for (let frame = env; frame !== undefined; frame = frame.next) {
      if (frame.name === name) return frame.thunk;
    }
    throw new EvaluationError("unbound-variable", `unbound variable ${name}`);
  }

  private combinatorValue(combinator: LambdaCombinator): Value {
    const cached = this.combinatorValues.get(combinator);
    if (cached !== undefined) return cached;
    const value = this.evaluateIn(combinator.definition, undefined);
    this.combinatorValues.set(combinator, value);
    return value;
  }

  /**
   * Reduces `term` applied to the arguments on `stack`, the last element
   * being the first argument.
   */
  private run(start: UntypedLambda, startEnv: Env, stack: Thunk[]): Value {
    let term = start;
    let env = startEnv;

    for (;;) {
      this.tick();
      let value: Value;
      switch (term.kind) {
        case "non-terminal":
          stack.push(Thunk.delay(term.rgt, env));
          term = term.lft;
          continue;
        case "lambda-abs": {
          const arg = stack.pop();
          if (arg === undefined) {
            return { kind: "closure", param: term.name, body: term.body, env };
          }
          env = bind(term.name, arg, env);
          term = term.body;
          continue;
        }
        case "lambda-var":
          value = this.force(this.lookup(env, term.name));
          break;
        case "lambda-combinator":
          value = this.combinatorValue(term);
          break;
      }

      for (;;) {
        const arg = stack.pop();
        if (arg === undefined) return value;
        if (value.kind === "closure") {
          env = bind(value.param, arg, value.env);
          term = value.body;
          break;
        }
        if (value.kind === "native") {
          value = value.apply(arg);
          continue;
        }
        throw new EvaluationError(
          "bad-application",
          `cannot apply ${describeValue(value)} to an argument`,
        );
      }
    }
  }
}
