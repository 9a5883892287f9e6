/**
 * Random generation of well-typed GCL programs.
 *
 * Generated programs always pass context analysis and always terminate:
 * every loop counts a fresh local variable up to a small bound and nothing
 * else assigns to it.
 *
 * @module
 */
import { mkPosition } from "../shared/position.js";
import {
  type BinaryOperator,
  boolType,
  type Declaration,
  type Expression,
  functionType,
  type Guard,
  type Instruction,
  intType,
  mkAssignment,
  mkBinary,
  mkBlock,
  mkBool,
  mkDeclaration,
  mkIdentifier,
  mkIf,
  mkIndex,
  mkInt,
  mkPrint,
  mkSkip,
  mkUnary,
  mkWhile,
  mkWrite,
  type Program,
  type TypeSpec,
} from "./ast.js";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

const at = mkPosition(1, 1);

interface Variable {
  readonly name: string;
  readonly type: TypeSpec;
  /** Loop counters are read but never assigned by generated code. */
  readonly counter: boolean;
}

const pick = <T>(rs: RandomSource, items: readonly T[]): T => {
  const item = items[rs.intBetween(0, items.length - 1)];
  if (item === undefined) {
    throw new Error("cannot pick from an empty list");
  }
  return item;
};

const PREFIXES: Record<TypeSpec["kind"], string> = {
  int: "x",
  bool: "b",
  function: "f",
};

const ARITHMETIC: readonly BinaryOperator[] = ["+", "-", "*"];
const RELATIONAL: readonly BinaryOperator[] = ["<", "<=", ">", ">=", "==", "<>"];
const LOGICAL: readonly BinaryOperator[] = ["and", "or"];

class ProgramGenerator {
  private fresh = 0;

  constructor(private readonly rs: RandomSource) {}

  private name(prefix: string): string {
    return `${prefix}${this.fresh++}`;
  }

  intExpr(scope: readonly Variable[], depth: number): Expression {
    const ints = scope.filter((v) => v.type.kind === "int");
    const ranges = scope.filter((v) => v.type.kind === "function");
    const die = depth <= 0 ? this.rs.intBetween(0, 1) : this.rs.intBetween(0, 4);
    switch (die) {
      case 1:
        if (ints.length > 0) {
          return mkIdentifier(pick(this.rs, ints).name, at);
        }
        break;
      case 2:
        return mkBinary(
          pick(this.rs, ARITHMETIC),
          this.intExpr(scope, depth - 1),
          this.intExpr(scope, depth - 1),
          at,
        );
      case 3:
        return mkUnary("-", this.intExpr(scope, depth - 1), at);
      case 4: {
        if (ranges.length > 0) {
          const range = pick(this.rs, ranges);
          const upper = range.type.kind === "function" ? range.type.upper : 0;
          return mkIndex(
            mkIdentifier(range.name, at),
            mkInt(this.rs.intBetween(0, upper), at),
            at,
          );
        }
        break;
      }
    }
    return mkInt(this.rs.intBetween(0, 9), at);
  }

  boolExpr(scope: readonly Variable[], depth: number): Expression {
    const bools = scope.filter((v) => v.type.kind === "bool");
    const die = depth <= 0 ? this.rs.intBetween(0, 1) : this.rs.intBetween(0, 4);
    switch (die) {
      case 1:
        if (bools.length > 0) {
          return mkIdentifier(pick(this.rs, bools).name, at);
        }
        break;
      case 2:
        return mkBinary(
          pick(this.rs, RELATIONAL),
          this.intExpr(scope, depth - 1),
          this.intExpr(scope, depth - 1),
          at,
        );
      case 3:
        return mkBinary(
          pick(this.rs, LOGICAL),
          this.boolExpr(scope, depth - 1),
          this.boolExpr(scope, depth - 1),
          at,
        );
      case 4:
        return mkUnary("!", this.boolExpr(scope, depth - 1), at);
    }
    return mkBool(this.rs.intBetween(0, 1) === 1, at);
  }

  private assignment(scope: readonly Variable[]): Instruction {
    const targets = scope.filter((v) => !v.counter);
    if (targets.length === 0) return mkSkip(at);
    const target = pick(this.rs, targets);
    switch (target.type.kind) {
      case "int":
        return mkAssignment(target.name, this.intExpr(scope, 2), at);
      case "bool":
        return mkAssignment(target.name, this.boolExpr(scope, 2), at);
      case "function":
        return mkAssignment(
          target.name,
          mkWrite(
            mkIdentifier(target.name, at),
            mkInt(this.rs.intBetween(0, target.type.upper), at),
            this.intExpr(scope, 1),
            at,
          ),
          at,
        );
    }
  }

  private print(scope: readonly Variable[]): Instruction {
    const ranges = scope.filter((v) => v.type.kind === "function");
    switch (this.rs.intBetween(0, 2)) {
      case 0:
        return mkPrint(this.intExpr(scope, 2), at);
      case 1:
        return mkPrint(this.boolExpr(scope, 2), at);
      default:
        return ranges.length > 0
          ? mkPrint(mkIdentifier(pick(this.rs, ranges).name, at), at)
          : mkPrint(this.intExpr(scope, 1), at);
    }
  }

  /**
   * An `if` whose last guard is `true`, so it never aborts.
   */
  private conditional(scope: readonly Variable[], size: number): Instruction {
    const guards: Guard[] = [];
    const count = this.rs.intBetween(1, 2);
    for (let i = 0; i < count; i++) {
      guards.push({
        condition: this.boolExpr(scope, 1),
        body: this.instructions(scope, size),
      });
    }
    guards.push({
      condition: mkBool(true, at),
      body: this.instructions(scope, size),
    });
    return mkIf(guards, at);
  }

  /**
   * `{ int i; while i < k --> body; i := i + 1 end }`
   */
  private loop(scope: readonly Variable[], size: number): Instruction {
    const counter: Variable = {
      name: this.name("i"),
      type: intType,
      counter: true,
    };
    const inner = [...scope, counter];
    const bound = this.rs.intBetween(1, 3);
    const step = mkAssignment(
      counter.name,
      mkBinary("+", mkIdentifier(counter.name, at), mkInt(1, at), at),
      at,
    );
    const loop = mkWhile([{
      condition: mkBinary(
        "<",
        mkIdentifier(counter.name, at),
        mkInt(bound, at),
        at,
      ),
      body: [...this.instructions(inner, size), step],
    }], at);
    return mkBlock(
      [mkDeclaration(intType, [counter.name], [at], at)],
      [loop],
      at,
    );
  }

  private instruction(scope: readonly Variable[], size: number): Instruction {
    const die = size <= 1 ? this.rs.intBetween(0, 2) : this.rs.intBetween(0, 4);
    switch (die) {
      case 0:
        return this.assignment(scope);
      case 1:
        return this.print(scope);
      case 2:
        return mkSkip(at);
      case 3:
        return this.conditional(scope, Math.floor(size / 2));
      default:
        return this.loop(scope, Math.floor(size / 2));
    }
  }

  instructions(scope: readonly Variable[], size: number): Instruction[] {
    const count = Math.max(1, Math.min(size, this.rs.intBetween(1, 3)));
    return Array.from(
      { length: count },
      () => this.instruction(scope, Math.max(1, size - count)),
    );
  }

  program(size: number): Program {
    const declared: Variable[] = [];
    const declarations: Declaration[] = [];
    const types: TypeSpec[] = [
      intType,
      boolType,
      functionType(this.rs.intBetween(0, 2)),
    ];
    for (const type of types) {
      const names = Array.from(
        { length: this.rs.intBetween(1, 2) },
        () => this.name(PREFIXES[type.kind]),
      );
      declarations.push(
        mkDeclaration(type, names, names.map(() => at), at),
      );
      declared.push(...names.map((name) => ({ name, type, counter: false })));
    }
    const body: Instruction[] = [];
    for (let remaining = size; remaining > 0; remaining -= 2) {
      body.push(this.instruction(declared, remaining));
    }
    if (body.length === 0) body.push(mkSkip(at));
    return mkBlock(declarations, body, at);
  }
}

/**
 * @param rs the random source to use.
 * @param size roughly the number of instructions to generate
 * @returns a well-typed, terminating program
 */
export const randProgram = (rs: RandomSource, size: number): Program =>
  new ProgramGenerator(rs).program(size);
