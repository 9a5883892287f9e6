/**
 * Translation of analyzed GCL programs into untyped lambda calculus.
 *
 * A running program is a configuration `cfg ok state out`:
 *
 * - `ok` is a Church boolean that turns false once an `if` finds no true
 *   guard; every later instruction is then skipped.
 * - `state` is a right-nested tuple `pair v0 (pair v1 (… unit))` with one
 *   slot per declaration in the program, nested blocks included.
 * - `out` is a fold list of printed values, each a `pair tag value`.
 *
 * Every instruction becomes a closed term mapping configurations to
 * configurations, and the whole program is one such term. Expressions are
 * translated under a single free variable `s` bound to the current state.
 *
 * @module
 */
import type {
  Assignment,
  BinaryExpr,
  Block,
  Expression,
  Guard,
  If,
  Instruction,
  Literal,
  Print,
  While,
} from "../gcl/ast.js";
import type { GclType } from "../gcl/types.js";
import type { AnalyzedProgram } from "../context/analyzer.js";
import type { SymbolInfo } from "../context/symbolTable.js";
import {
  ABORT,
  AND,
  APPEND,
  ARR0,
  BEQ,
  CFG,
  churchBool,
  churchInt,
  churchNumeral,
  CONS,
  FALSE,
  FST,
  IADD,
  IEQ,
  IGEQ,
  IGT,
  ILEQ,
  ILT,
  IMULT,
  INEG,
  INT0,
  ISUB,
  NIL,
  NOT,
  OK,
  OR,
  OUT,
  PAIR,
  READ,
  SEQ,
  SKIP,
  SND,
  SNOC,
  STATE,
  TRUE,
  UNIT,
  WRITE,
  Z,
} from "../consts/lambdas.js";
import {
  collectCombinators,
  expandCombinators,
  type LambdaCombinator,
  mkAbsMany,
  mkCombinator,
  mkVar,
  prettyPrintUntypedLambda,
  typelessApp,
  type UntypedLambda,
} from "../terms/lambda.js";
import type { SourcePosition } from "../shared/position.js";
import { TranslationError } from "./translationError.js";

export const DEFAULT_MAX_DEPTH = 200;

export interface TranslateOptions {
  /** Deepest AST nesting the translator follows before giving up. */
  maxDepth?: number;
}

/**
 * Tags of printed values and of string fragments.
 */
export const OutputTag = {
  int: 0,
  bool: 1,
  string: 2,
  function: 3,
} as const;

export type OutputTag = typeof OutputTag[keyof typeof OutputTag];

/**
 * One state slot: the declaration that owns it and its accessors.
 */
export interface SlotLayout {
  readonly symbol: SymbolInfo;
  /** `λs.fst (snd … s)` */
  readonly get: LambdaCombinator;
  /** `λv s.…`, the state with this slot replaced by `v` */
  readonly set: LambdaCombinator;
  readonly initial: UntypedLambda;
}

export interface Translation {
  /** The program block as a configuration transformer. */
  readonly program: UntypedLambda;
  /** The starting configuration: ok, default slots, empty output. */
  readonly initial: UntypedLambda;
  /** `program initial` */
  readonly main: UntypedLambda;
  readonly layout: readonly SlotLayout[];
  /** Every combinator `main` refers to, dependencies first. */
  readonly combinators: readonly LambdaCombinator[];
}

const c = mkVar("c");
const s = mkVar("s");
const v = mkVar("v");
const a = mkVar("a");
const loop = mkVar("loop");

const tag = (t: OutputTag): UntypedLambda => churchNumeral(t);

const list = (items: readonly UntypedLambda[]): UntypedLambda =>
  items.reduceRight<UntypedLambda>(
    (acc, item) => typelessApp(CONS, item, acc),
    NIL,
  );

function defaultValue(type: GclType): UntypedLambda {
  switch (type.kind) {
    case "int":
      return INT0;
    case "bool":
      return FALSE;
    case "function":
      return ARR0;
    default:
      throw new Error(`no storage for values of kind ${type.kind}`);
  }
}

/**
 * Builds the accessor combinators of every slot. `set_i` walks down the
 * tuple through `set_{i-1}`.
 */
export function layoutSlots(slots: readonly SymbolInfo[]): SlotLayout[] {
  const layout: SlotLayout[] = [];
  let previous: LambdaCombinator | undefined;
  let path: UntypedLambda = s;

  for (const symbol of slots) {
    const get = mkCombinator(
      `get_${symbol.slot}`,
      mkAbsMany(["s"], typelessApp(FST, path)),
    );
    const set = mkCombinator(
      `set_${symbol.slot}`,
      mkAbsMany(
        ["v", "s"],
        previous === undefined
          ? typelessApp(PAIR, v, typelessApp(SND, s))
          : typelessApp(
            PAIR,
            typelessApp(FST, s),
            typelessApp(previous, v, typelessApp(SND, s)),
          ),
      ),
    );
    layout.push({ symbol, get, set, initial: defaultValue(symbol.type) });
    previous = set;
    path = typelessApp(SND, path);
  }
  return layout;
}

/**
 * `λc.(λs.body) (state c)`
 */
const withState = (body: UntypedLambda): UntypedLambda =>
  mkAbsMany(
    ["c"],
    typelessApp(mkAbsMany(["s"], body), typelessApp(STATE, c)),
  );

class Translator {
  private depth = 0;

  constructor(
    private readonly analyzed: AnalyzedProgram,
    private readonly layout: readonly SlotLayout[],
    private readonly maxDepth: number,
  ) {}

  private nested<T>(position: SourcePosition, f: () => T): T {
    if (this.depth >= this.maxDepth) {
      throw new TranslationError(
        "depth-exceeded",
        `Program nesting exceeds the maximum depth of ${this.maxDepth}`,
        position,
      );
    }
    this.depth++;
    try {
      return f();
    } finally {
      this.depth--;
    }
  }

  private slot(symbol: SymbolInfo | undefined, name: string): SlotLayout {
    const layout = symbol === undefined ? undefined : this.layout[symbol.slot];
    if (layout === undefined) {
      throw new Error(`no storage was allocated for ${name}`);
    }
    return layout;
  }

  private typeOf(expr: Expression): GclType {
    const type = this.analyzed.types.get(expr);
    if (type === undefined) {
      throw new Error(
        `expression at line ${expr.position.line} was not analyzed`,
      );
    }
    return type;
  }

  block(block: Block, fresh: boolean): UntypedLambda {
    const body = this.sequence(block.instructions);
    const declared = this.analyzed.scopes.get(block)?.entries() ?? [];
    if (!fresh || declared.length === 0) return body;

    const reset = declared.reduce<UntypedLambda>((state, symbol) => {
      const slot = this.slot(symbol, symbol.name);
      return typelessApp(slot.set, slot.initial, state);
    }, typelessApp(STATE, c));
    return typelessApp(
      SEQ,
      mkAbsMany(
        ["c"],
        typelessApp(CFG, typelessApp(OK, c), reset, typelessApp(OUT, c)),
      ),
      body,
    );
  }

  sequence(instructions: readonly Instruction[]): UntypedLambda {
    const steps = instructions.map((instruction) =>
      this.instruction(instruction)
    );
    const last = steps.pop();
    if (last === undefined) return SKIP;
    return steps.reduceRight<UntypedLambda>(
      (rest, step) => typelessApp(SEQ, step, rest),
      last,
    );
  }

  instruction(instruction: Instruction): UntypedLambda {
    return this.nested(instruction.position, () => {
      switch (instruction.kind) {
        case "block":
          return this.block(instruction, true);
        case "assignment":
          return this.assignment(instruction);
        case "print":
          return this.print(instruction);
        case "skip":
          return SKIP;
        case "if":
          return this.conditional(instruction);
        case "while":
          return this.loop(instruction);
      }
    });
  }

  private assignment(assignment: Assignment): UntypedLambda {
    const slot = this.slot(
      this.analyzed.bindings.get(assignment),
      assignment.target,
    );
    let value = this.expression(assignment.value);
    // a single int fills a function[..0]
    if (
      slot.symbol.type.kind === "function" &&
      this.typeOf(assignment.value).kind === "int"
    ) {
      value = typelessApp(WRITE, ARR0, churchInt(0), value);
    }
    return withState(
      typelessApp(
        CFG,
        typelessApp(OK, c),
        typelessApp(slot.set, value, s),
        typelessApp(OUT, c),
      ),
    );
  }

  private print(print: Print): UntypedLambda {
    return withState(
      typelessApp(
        CFG,
        typelessApp(OK, c),
        s,
        typelessApp(SNOC, typelessApp(OUT, c), this.printed(print.value)),
      ),
    );
  }

  private printed(expr: Expression): UntypedLambda {
    const type = this.typeOf(expr);
    const value = this.expression(expr);
    switch (type.kind) {
      case "int":
        return typelessApp(PAIR, tag(OutputTag.int), value);
      case "bool":
        return typelessApp(PAIR, tag(OutputTag.bool), value);
      case "string":
        return typelessApp(PAIR, tag(OutputTag.string), value);
      case "function":
      case "list": {
        const size = type.kind === "function" ? type.upper + 1 : type.length;
        const reads = Array.from(
          { length: size },
          (_, i) => typelessApp(READ, a, churchInt(i)),
        );
        return typelessApp(
          PAIR,
          tag(OutputTag.function),
          typelessApp(mkAbsMany(["a"], list(reads)), value),
        );
      }
      case "error":
        throw new Error("cannot print an ill-typed expression");
    }
  }

  /**
   * Tries the guards in textual order; `otherwise` runs when none holds.
   */
  private guards(
    guards: readonly Guard[],
    body: (guard: Guard) => UntypedLambda,
    otherwise: UntypedLambda,
  ): UntypedLambda {
    return guards.reduceRight<UntypedLambda>(
      (rest, guard) =>
        this.nested(
          guard.condition.position,
          () => typelessApp(this.expression(guard.condition), body(guard), rest),
        ),
      otherwise,
    );
  }

  private conditional(stmt: If): UntypedLambda {
    return withState(
      this.guards(
        stmt.guards,
        (guard) => typelessApp(this.sequence(guard.body), c),
        typelessApp(ABORT, c),
      ),
    );
  }

  private loop(stmt: While): UntypedLambda {
    const step = this.guards(
      stmt.guards,
      (guard) => typelessApp(SEQ, this.sequence(guard.body), loop, c),
      c,
    );
    return typelessApp(
      Z,
      mkAbsMany(
        ["loop", "c"],
        typelessApp(mkAbsMany(["s"], step), typelessApp(STATE, c)),
      ),
    );
  }

  expression(expr: Expression): UntypedLambda {
    return this.nested(expr.position, () => {
      switch (expr.kind) {
        case "literal":
          return this.literal(expr);
        case "identifier":
          return typelessApp(
            this.slot(this.analyzed.bindings.get(expr), expr.name).get,
            s,
          );
        case "unary":
          return typelessApp(
            expr.op === "-" ? INEG : NOT,
            this.expression(expr.operand),
          );
        case "binary":
          return this.binary(expr);
        case "index":
          return typelessApp(
            READ,
            this.expression(expr.target),
            this.expression(expr.index),
          );
        case "write":
          return typelessApp(
            WRITE,
            this.expression(expr.target),
            this.expression(expr.index),
            this.expression(expr.value),
          );
      }
    });
  }

  private literal(literal: Literal): UntypedLambda {
    switch (literal.value.kind) {
      case "int":
        return churchInt(literal.value.value);
      case "bool":
        return churchBool(literal.value.value);
      case "string":
        return stringFragments(literal.value.value);
    }
  }

  private binary(expr: BinaryExpr): UntypedLambda {
    if (expr.op === ",") return this.array(expr);
    if (expr.op === "+" && this.typeOf(expr).kind === "string") {
      return typelessApp(
        APPEND,
        this.fragments(expr.left),
        this.fragments(expr.right),
      );
    }

    const left = this.expression(expr.left);
    const right = this.expression(expr.right);
    switch (expr.op) {
      case "+":
        return typelessApp(IADD, left, right);
      case "-":
        return typelessApp(ISUB, left, right);
      case "*":
        return typelessApp(IMULT, left, right);
      case "<":
        return typelessApp(ILT, left, right);
      case "<=":
        return typelessApp(ILEQ, left, right);
      case ">":
        return typelessApp(IGT, left, right);
      case ">=":
        return typelessApp(IGEQ, left, right);
      case "and":
        return typelessApp(AND, left, right);
      case "or":
        return typelessApp(OR, left, right);
      case "==":
        return this.equality(expr, left, right);
      case "<>":
        return typelessApp(NOT, this.equality(expr, left, right));
    }
  }

  private equality(
    expr: BinaryExpr,
    left: UntypedLambda,
    right: UntypedLambda,
  ): UntypedLambda {
    const type = this.typeOf(expr.left);
    switch (type.kind) {
      case "int":
        return typelessApp(IEQ, left, right);
      case "bool":
        return typelessApp(BEQ, left, right);
      case "string":
        throw new TranslationError(
          "unsupported-construct",
          `Comparison of String values with '${expr.op}' is not supported`,
          expr.position,
        );
      default:
        throw new TranslationError(
          "unsupported-construct",
          `Comparison of function ranges with '${expr.op}' is not supported`,
          expr.position,
        );
    }
  }

  /**
   * The operand of a string concatenation as a list of fragments.
   */
  private fragments(expr: Expression): UntypedLambda {
    const value = this.expression(expr);
    switch (this.typeOf(expr).kind) {
      case "string":
        return value;
      case "bool":
        return list([typelessApp(PAIR, tag(OutputTag.bool), value)]);
      default:
        return list([typelessApp(PAIR, tag(OutputTag.int), value)]);
    }
  }

  /**
   * `e0, e1, …, en` as the function range mapping `i` to `ei`.
   */
  private array(expr: BinaryExpr): UntypedLambda {
    return listElements(expr).reduce<UntypedLambda>(
      (range, element, i) =>
        typelessApp(WRITE, range, churchInt(i), this.expression(element)),
      ARR0,
    );
  }
}

const listElements = (expr: Expression): Expression[] =>
  expr.kind === "binary" && expr.op === ","
    ? [...listElements(expr.left), expr.right]
    : [expr];

/**
 * A string literal as a one-fragment list; the fragment holds the list of
 * its code points.
 */
export function stringFragments(value: string): UntypedLambda {
  if (value.length === 0) return NIL;
  const codes = Array.from(value, (ch) => churchNumeral(ch.codePointAt(0) ?? 0));
  return list([typelessApp(PAIR, tag(OutputTag.string), list(codes))]);
}

/**
 * Runs `f`, reporting a host stack overflow as `depth-exceeded` at
 * `position`.
 */
export function guardDepth<T>(position: SourcePosition, f: () => T): T {
  try {
    return f();
  } catch (e) {
    if (e instanceof RangeError) {
      throw new TranslationError(
        "depth-exceeded",
        "Program is too large to translate",
        position,
      );
    }
    throw e;
  }
}

/**
 * Translates a program that passed context analysis.
 *
 * @throws TranslationError for constructs without an encoding and for
 *   programs nested deeper than `maxDepth`
 */
export function translate(
  analyzed: AnalyzedProgram,
  options: TranslateOptions = {},
): Translation {
  return guardDepth(
    analyzed.program.position,
    () => translateProgram(analyzed, options.maxDepth ?? DEFAULT_MAX_DEPTH),
  );
}

function translateProgram(
  analyzed: AnalyzedProgram,
  maxDepth: number,
): Translation {
  const layout = layoutSlots(analyzed.slots);
  const translator = new Translator(analyzed, layout, maxDepth);

  const program = translator.block(analyzed.program, false);
  const state = layout.reduceRight<UntypedLambda>(
    (rest, slot) => typelessApp(PAIR, slot.initial, rest),
    UNIT,
  );
  const initial = typelessApp(CFG, TRUE, state, NIL);
  const main = typelessApp(program, initial);

  return {
    program,
    initial,
    main,
    layout,
    combinators: collectCombinators(main),
  };
}

export interface SerializeOptions {
  /** Emit one closed term with every combinator inlined. */
  expand?: boolean;
}

/**
 * Renders a translation as text. By default every combinator is a
 * `name := term` line, in dependency order, followed by `main := …`.
 */
export function serializeTranslation(
  translation: Translation,
  options: SerializeOptions = {},
): string {
  if (options.expand === true) {
    return `${prettyPrintUntypedLambda(expandCombinators(translation.main))}\n`;
  }
  const lines = translation.combinators.map((combinator) =>
    `${combinator.name} := ${prettyPrintUntypedLambda(combinator.definition)}`
  );
  lines.push(`main := ${prettyPrintUntypedLambda(translation.main)}`);
  return `${lines.join("\n")}\n`;
}
