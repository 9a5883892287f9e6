/**
 * GCL abstract syntax tree.
 *
 * Every node is immutable, carries the source position of the token that
 * introduced it, and owns its children exclusively: the tree has no sharing
 * and no cycles, so nodes can key the analyzer's annotation tables.
 *
 * @module
 */
import type { SourcePosition } from "../shared/position.js";

/**
 * The declarable types: `int`, `bool` and `function[..N]`.
 */
export type TypeSpec =
  | { readonly kind: "int" }
  | { readonly kind: "bool" }
  | { readonly kind: "function"; readonly upper: number };

export interface Declaration {
  readonly kind: "declaration";
  readonly type: TypeSpec;
  readonly names: readonly string[];
  /** Position of each name, parallel to `names`. */
  readonly namePositions: readonly SourcePosition[];
  readonly position: SourcePosition;
}

/**
 * `{ declarations instructions }`. A nested block is itself an instruction.
 */
export interface Block {
  readonly kind: "block";
  readonly declarations: readonly Declaration[];
  readonly instructions: readonly Instruction[];
  readonly position: SourcePosition;
}

export interface Assignment {
  readonly kind: "assignment";
  readonly target: string;
  readonly value: Expression;
  readonly position: SourcePosition;
}

export interface Print {
  readonly kind: "print";
  readonly value: Expression;
  readonly position: SourcePosition;
}

export interface Skip {
  readonly kind: "skip";
  readonly position: SourcePosition;
}

export interface Guard {
  readonly condition: Expression;
  readonly body: readonly Instruction[];
}

export interface If {
  readonly kind: "if";
  readonly guards: readonly Guard[];
  readonly position: SourcePosition;
}

export interface While {
  readonly kind: "while";
  readonly guards: readonly Guard[];
  readonly position: SourcePosition;
}

export type Instruction = Block | Assignment | Print | Skip | If | While;

export type BinaryOperator =
  | "or"
  | "and"
  | "<"
  | "<="
  | ">"
  | ">="
  | "=="
  | "<>"
  | "+"
  | "-"
  | "*"
  | ",";

export type UnaryOperator = "-" | "!";

export interface BinaryExpr {
  readonly kind: "binary";
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  readonly position: SourcePosition;
}

export interface UnaryExpr {
  readonly kind: "unary";
  readonly op: UnaryOperator;
  readonly operand: Expression;
  readonly position: SourcePosition;
}

export type LiteralValue =
  | { readonly kind: "int"; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "string"; readonly value: string };

export interface Literal {
  readonly kind: "literal";
  readonly value: LiteralValue;
  readonly position: SourcePosition;
}

export interface Identifier {
  readonly kind: "identifier";
  readonly name: string;
  readonly position: SourcePosition;
}

/**
 * Function-range read, `a.i`.
 */
export interface IndexExpr {
  readonly kind: "index";
  readonly target: Expression;
  readonly index: Expression;
  readonly position: SourcePosition;
}

/**
 * Function-range write, `a(i:v)`: the function equal to `a` except at `i`.
 */
export interface WriteExpr {
  readonly kind: "write";
  readonly target: Expression;
  readonly index: Expression;
  readonly value: Expression;
  readonly position: SourcePosition;
}

export type Expression =
  | BinaryExpr
  | UnaryExpr
  | Literal
  | Identifier
  | IndexExpr
  | WriteExpr;

export type Program = Block;

export type AstNode = Declaration | Instruction | Expression;

export const intType: TypeSpec = { kind: "int" };
export const boolType: TypeSpec = { kind: "bool" };
export const functionType = (upper: number): TypeSpec => ({
  kind: "function",
  upper,
});

export const mkBlock = (
  declarations: readonly Declaration[],
  instructions: readonly Instruction[],
  position: SourcePosition,
): Block => ({ kind: "block", declarations, instructions, position });

export const mkDeclaration = (
  type: TypeSpec,
  names: readonly string[],
  namePositions: readonly SourcePosition[],
  position: SourcePosition,
): Declaration => ({
  kind: "declaration",
  type,
  names,
  namePositions,
  position,
});

export const mkAssignment = (
  target: string,
  value: Expression,
  position: SourcePosition,
): Assignment => ({ kind: "assignment", target, value, position });

export const mkPrint = (
  value: Expression,
  position: SourcePosition,
): Print => ({ kind: "print", value, position });

export const mkSkip = (position: SourcePosition): Skip => ({
  kind: "skip",
  position,
});

export const mkIf = (
  guards: readonly Guard[],
  position: SourcePosition,
): If => ({ kind: "if", guards, position });

export const mkWhile = (
  guards: readonly Guard[],
  position: SourcePosition,
): While => ({ kind: "while", guards, position });

export const mkBinary = (
  op: BinaryOperator,
  left: Expression,
  right: Expression,
  position: SourcePosition,
): BinaryExpr => ({ kind: "binary", op, left, right, position });

export const mkUnary = (
  op: UnaryOperator,
  operand: Expression,
  position: SourcePosition,
): UnaryExpr => ({ kind: "unary", op, operand, position });

export const mkInt = (value: number, position: SourcePosition): Literal => ({
  kind: "literal",
  value: { kind: "int", value },
  position,
});

export const mkBool = (value: boolean, position: SourcePosition): Literal => ({
  kind: "literal",
  value: { kind: "bool", value },
  position,
});

export const mkString = (value: string, position: SourcePosition): Literal => ({
  kind: "literal",
  value: { kind: "string", value },
  position,
});

export const mkIdentifier = (
  name: string,
  position: SourcePosition,
): Identifier => ({ kind: "identifier", name, position });

export const mkIndex = (
  target: Expression,
  index: Expression,
  position: SourcePosition,
): IndexExpr => ({ kind: "index", target, index, position });

export const mkWrite = (
  target: Expression,
  index: Expression,
  value: Expression,
  position: SourcePosition,
): WriteExpr => ({ kind: "write", target, index, value, position });

export const prettyPrintTypeSpec = (type: TypeSpec): string => {
  switch (type.kind) {
    case "int":
    case "bool":
      return type.kind;
    case "function":
      return `function[..${type.upper}]`;
  }
};
