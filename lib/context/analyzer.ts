/**
 * Context analysis for GCL programs.
 *
 * The analyzer resolves every identifier against a chain of block scopes,
 * infers a type for every expression and checks the typing rules of each
 * instruction. It never changes the tree: results are recorded in side
 * tables keyed by node. Analysis keeps going after an error so that one run
 * reports every problem; an expression that fails gets the `error` type and
 * does not cause further reports higher up.
 *
 * @module
 */
import type {
  Assignment,
  BinaryExpr,
  Block,
  Expression,
  Guard,
  Identifier,
  IndexExpr,
  Instruction,
  Program,
  UnaryExpr,
  WriteExpr,
} from "../gcl/ast.js";
import {
  BOOL,
  ERROR,
  fromTypeSpec,
  type GclType,
  INT,
  mkListType,
  prettyPrintType,
  STRING,
  typesEqual,
} from "../gcl/types.js";
import { formatPosition, type SourcePosition } from "../shared/position.js";
import type { SemanticError, SemanticErrorKind } from "./semanticError.js";
import { Scope, type SymbolInfo } from "./symbolTable.js";

/**
 * A program that passed context analysis, with its annotations.
 */
export interface AnalyzedProgram {
  readonly program: Program;
  readonly types: ReadonlyMap<Expression, GclType>;
  readonly bindings: ReadonlyMap<Identifier | Assignment, SymbolInfo>;
  readonly scopes: ReadonlyMap<Block, Scope>;
  /** Every declared symbol, indexed by slot. */
  readonly slots: readonly SymbolInfo[];
}

export type AnalysisResult =
  | { readonly ok: true; readonly program: AnalyzedProgram }
  | { readonly ok: false; readonly errors: readonly SemanticError[] };

interface AnalysisContext {
  readonly errors: SemanticError[];
  readonly types: Map<Expression, GclType>;
  readonly bindings: Map<Identifier | Assignment, SymbolInfo>;
  readonly scopes: Map<Block, Scope>;
  readonly slots: SymbolInfo[];
}

/** Largest upper bound a `function[..N]` declaration may have. */
export const MAX_RANGE_UPPER = 1023;

export function analyze(program: Program): AnalysisResult {
  const ctx: AnalysisContext = {
    errors: [],
    types: new Map(),
    bindings: new Map(),
    scopes: new Map(),
    slots: [],
  };

  analyzeBlock(program, undefined, ctx);

  if (ctx.errors.length > 0) {
    return { ok: false, errors: ctx.errors };
  }
  return {
    ok: true,
    program: {
      program,
      types: ctx.types,
      bindings: ctx.bindings,
      scopes: ctx.scopes,
      slots: ctx.slots,
    },
  };
}

function report(
  ctx: AnalysisContext,
  kind: SemanticErrorKind,
  message: string,
  position: SourcePosition,
  name?: string,
): void {
  ctx.errors.push(
    name === undefined
      ? { kind, message, position }
      : { kind, message, position, name },
  );
}

function analyzeBlock(
  block: Block,
  parent: Scope | undefined,
  ctx: AnalysisContext,
): void {
  const scope = new Scope(ctx.scopes.size, parent);
  ctx.scopes.set(block, scope);

  for (const declaration of block.declarations) {
    const type = fromTypeSpec(declaration.type);
    if (type.kind === "function" && type.upper > MAX_RANGE_UPPER) {
      report(
        ctx,
        "arity-or-range-mismatch",
        `Range [0..${type.upper}] is larger than the supported [0..${MAX_RANGE_UPPER}] at ${
          formatPosition(declaration.position)
        }`,
        declaration.position,
      );
    }
    declaration.names.forEach((name, i) => {
      const position = declaration.namePositions[i] ?? declaration.position;
      const symbol: SymbolInfo = {
        name,
        type,
        scope,
        depth: scope.depth,
        slot: ctx.slots.length,
        position,
      };
      const existing = scope.declare(symbol);
      if (existing !== undefined) {
        report(
          ctx,
          "redeclaration",
          `Variable ${name} is already declared in the block at line ${existing.position.line}`,
          position,
          name,
        );
        return;
      }
      ctx.slots.push(symbol);
    });
  }

  analyzeInstructions(block.instructions, scope, ctx);
}

function analyzeInstructions(
  instructions: readonly Instruction[],
  scope: Scope,
  ctx: AnalysisContext,
): void {
  for (const instruction of instructions) {
    analyzeInstruction(instruction, scope, ctx);
  }
}

function analyzeInstruction(
  instruction: Instruction,
  scope: Scope,
  ctx: AnalysisContext,
): void {
  switch (instruction.kind) {
    case "block":
      analyzeBlock(instruction, scope, ctx);
      return;
    case "assignment":
      analyzeAssignment(instruction, scope, ctx);
      return;
    case "print":
      analyzeExpression(instruction.value, scope, ctx);
      return;
    case "skip":
      return;
    case "if":
    case "while":
      analyzeGuards(instruction.guards, scope, ctx);
      return;
  }
}

function analyzeGuards(
  guards: readonly Guard[],
  scope: Scope,
  ctx: AnalysisContext,
): void {
  for (const guard of guards) {
    const ty = analyzeExpression(guard.condition, scope, ctx);
    if (ty.kind !== "bool" && ty.kind !== "error") {
      report(
        ctx,
        "type-mismatch",
        `Guard must be of type bool, found ${prettyPrintType(ty)} at ${
          formatPosition(guard.condition.position)
        }`,
        guard.condition.position,
      );
    }
    analyzeInstructions(guard.body, scope, ctx);
  }
}

function analyzeAssignment(
  assignment: Assignment,
  scope: Scope,
  ctx: AnalysisContext,
): void {
  const symbol = scope.lookup(assignment.target);
  const rhs = analyzeExpression(assignment.value, scope, ctx);

  if (symbol === undefined) {
    report(
      ctx,
      "undeclared-identifier",
      `Variable ${assignment.target} not declared at ${
        formatPosition(assignment.position)
      }`,
      assignment.position,
      assignment.target,
    );
    return;
  }
  ctx.bindings.set(assignment, symbol);

  if (rhs.kind === "error") return;
  const lhs = symbol.type;

  if (lhs.kind === "function") {
    if (rhs.kind === "list") {
      if (rhs.length !== lhs.upper + 1) {
        report(
          ctx,
          "arity-or-range-mismatch",
          `Assignment to ${assignment.target} expects ${lhs.upper + 1} values, but found ${rhs.length} at ${
            formatPosition(assignment.position)
          }`,
          assignment.position,
          assignment.target,
        );
      }
      return;
    }
    if (lhs.upper === 0 && rhs.kind === "int") return;
  }

  if (!typesEqual(lhs, rhs)) {
    report(
      ctx,
      "type-mismatch",
      `Type error. Variable ${assignment.target} has different type than expression at ${
        formatPosition(assignment.position)
      }`,
      assignment.position,
      assignment.target,
    );
  }
}

function analyzeExpression(
  expr: Expression,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  const ty = inferExpression(expr, scope, ctx);
  ctx.types.set(expr, ty);
  return ty;
}

function inferExpression(
  expr: Expression,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  switch (expr.kind) {
    case "literal":
      return literalType(expr.value.kind);
    case "identifier":
      return inferIdentifier(expr, scope, ctx);
    case "unary":
      return inferUnary(expr, scope, ctx);
    case "binary":
      return inferBinary(expr, scope, ctx);
    case "index":
      return inferIndex(expr, scope, ctx);
    case "write":
      return inferWrite(expr, scope, ctx);
  }
}

function literalType(kind: "int" | "bool" | "string"): GclType {
  switch (kind) {
    case "int":
      return INT;
    case "bool":
      return BOOL;
    case "string":
      return STRING;
  }
}

function inferIdentifier(
  expr: Identifier,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  const symbol = scope.lookup(expr.name);
  if (symbol === undefined) {
    report(
      ctx,
      "undeclared-identifier",
      `Variable ${expr.name} not declared at ${formatPosition(expr.position)}`,
      expr.position,
      expr.name,
    );
    return ERROR;
  }
  ctx.bindings.set(expr, symbol);
  return symbol.type;
}

function typeError(
  ctx: AnalysisContext,
  expr: Expression,
  detail: string,
): GclType {
  report(
    ctx,
    "type-mismatch",
    `Type error at ${formatPosition(expr.position)}: ${detail}`,
    expr.position,
  );
  return ERROR;
}

function inferUnary(
  expr: UnaryExpr,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  const operand = analyzeExpression(expr.operand, scope, ctx);
  if (operand.kind === "error") return ERROR;
  const expected = expr.op === "-" ? INT : BOOL;
  if (!typesEqual(operand, expected)) {
    return typeError(
      ctx,
      expr,
      `operator '${expr.op}' expects ${prettyPrintType(expected)}, found ${
        prettyPrintType(operand)
      }`,
    );
  }
  return expected;
}

const ARITHMETIC = new Set(["+", "-", "*"]);
const ORDERING = new Set(["<", "<=", ">", ">="]);
const LOGICAL = new Set(["and", "or"]);

function inferBinary(
  expr: BinaryExpr,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  const lt = analyzeExpression(expr.left, scope, ctx);
  const rt = analyzeExpression(expr.right, scope, ctx);
  if (lt.kind === "error" || rt.kind === "error") return ERROR;

  const mismatch = (): GclType =>
    typeError(
      ctx,
      expr,
      `operator '${expr.op}' does not accept ${prettyPrintType(lt)} and ${
        prettyPrintType(rt)
      }`,
    );

  if (expr.op === "+" && (lt.kind === "string" || rt.kind === "string")) {
    return isPrintable(lt) && isPrintable(rt) ? STRING : mismatch();
  }
  if (ARITHMETIC.has(expr.op)) {
    return lt.kind === "int" && rt.kind === "int" ? INT : mismatch();
  }
  if (ORDERING.has(expr.op)) {
    return lt.kind === "int" && rt.kind === "int" ? BOOL : mismatch();
  }
  if (LOGICAL.has(expr.op)) {
    return lt.kind === "bool" && rt.kind === "bool" ? BOOL : mismatch();
  }
  if (expr.op === "==" || expr.op === "<>") {
    return typesEqual(lt, rt) && lt.kind !== "list" ? BOOL : mismatch();
  }

  // ","
  if (lt.kind === "int" && rt.kind === "int") return mkListType(2);
  if (lt.kind === "list" && rt.kind === "int") {
    return mkListType(lt.length + 1);
  }
  report(
    ctx,
    "type-mismatch",
    `There is no integer list at ${formatPosition(expr.position)}`,
    expr.position,
  );
  return ERROR;
}

const isPrintable = (ty: GclType): boolean =>
  ty.kind === "int" || ty.kind === "bool" || ty.kind === "string";

/**
 * The value of an index written as a (possibly negated) integer literal.
 */
export function constantIndex(expr: Expression): number | undefined {
  if (expr.kind === "literal" && expr.value.kind === "int") {
    return expr.value.value;
  }
  if (expr.kind === "unary" && expr.op === "-") {
    const inner = constantIndex(expr.operand);
    return inner === undefined ? undefined : -inner;
  }
  return undefined;
}

const describeTarget = (expr: Expression): string =>
  expr.kind === "identifier" ? expr.name : "<expr>";

function checkFunctionAccess(
  expr: IndexExpr | WriteExpr,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  const target = analyzeExpression(expr.target, scope, ctx);
  const index = analyzeExpression(expr.index, scope, ctx);
  if (target.kind === "error" || index.kind === "error") return ERROR;

  if (target.kind !== "function") {
    report(
      ctx,
      "type-mismatch",
      `Error. ${describeTarget(expr.target)} is not indexable at ${
        formatPosition(expr.target.position)
      }`,
      expr.target.position,
    );
    return ERROR;
  }
  if (index.kind !== "int") {
    report(
      ctx,
      "type-mismatch",
      `Error. Not integer index for function at ${
        formatPosition(expr.index.position)
      }`,
      expr.index.position,
    );
    return ERROR;
  }
  const constant = constantIndex(expr.index);
  if (constant !== undefined && (constant < 0 || constant > target.upper)) {
    report(
      ctx,
      "arity-or-range-mismatch",
      `Index ${constant} is out of range [0..${target.upper}] for ${
        describeTarget(expr.target)
      } at ${formatPosition(expr.index.position)}`,
      expr.index.position,
    );
    return ERROR;
  }
  return target;
}

function inferIndex(
  expr: IndexExpr,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  const target = checkFunctionAccess(expr, scope, ctx);
  return target.kind === "error" ? ERROR : INT;
}

function inferWrite(
  expr: WriteExpr,
  scope: Scope,
  ctx: AnalysisContext,
): GclType {
  const target = checkFunctionAccess(expr, scope, ctx);
  const value = analyzeExpression(expr.value, scope, ctx);
  if (target.kind === "error" || value.kind === "error") return ERROR;
  if (value.kind !== "int") {
    report(
      ctx,
      "type-mismatch",
      `Expected expression of type int at ${
        formatPosition(expr.value.position)
      }`,
      expr.value.position,
    );
    return ERROR;
  }
  return target;
}
