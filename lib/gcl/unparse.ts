/**
 * GCL source printing.
 *
 * Every binary and unary expression is parenthesised, so the output parses
 * back into the same tree whatever the precedence of its operators.
 *
 * @module
 */
import { encodeStringLiteral } from "../lexer/lexer.js";
import {
  type Block,
  type Declaration,
  type Expression,
  type Guard,
  type Instruction,
  type Literal,
  prettyPrintTypeSpec,
} from "./ast.js";

const INDENT = "  ";

const unparseLiteral = (literal: Literal): string => {
  switch (literal.value.kind) {
    case "int":
      return literal.value.value < 0
        ? `(-${-literal.value.value})`
        : String(literal.value.value);
    case "bool":
      return String(literal.value.value);
    case "string":
      return encodeStringLiteral(literal.value.value);
  }
};

export const unparseExpression = (expr: Expression): string => {
  switch (expr.kind) {
    case "literal":
      return unparseLiteral(expr);
    case "identifier":
      return expr.name;
    case "unary":
      return `(${expr.op}${unparseExpression(expr.operand)})`;
    case "binary":
      return expr.op === ","
        ? `(${unparseExpression(expr.left)}, ${unparseExpression(expr.right)})`
        : `(${unparseExpression(expr.left)} ${expr.op} ${
          unparseExpression(expr.right)
        })`;
    case "index":
      return `${unparseExpression(expr.target)}.${indexOperand(expr.index)}`;
    case "write":
      return `${unparseExpression(expr.target)}(${
        unparseExpression(expr.index)
      }:${unparseExpression(expr.value)})`;
  }
};

// the index of `a.i` is a primary: a postfix expression needs parentheses
const indexOperand = (index: Expression): string =>
  index.kind === "index" || index.kind === "write"
    ? `(${unparseExpression(index)})`
    : unparseExpression(index);

const unparseDeclaration = (declaration: Declaration): string =>
  `${prettyPrintTypeSpec(declaration.type)} ${declaration.names.join(", ")};`;

function unparseGuards(
  guards: readonly Guard[],
  depth: number,
): string[] {
  const pad = INDENT.repeat(depth);
  return guards.flatMap((guard, i) => [
    `${pad}${i === 0 ? "" : "[] "}${unparseExpression(guard.condition)} -->`,
    ...unparseInstructions(guard.body, depth + 1),
  ]);
}

function unparseInstructions(
  instructions: readonly Instruction[],
  depth: number,
): string[] {
  return instructions.flatMap((instruction, i) => {
    const lines = unparseInstruction(instruction, depth);
    if (i < instructions.length - 1) {
      lines[lines.length - 1] += ";";
    }
    return lines;
  });
}

function unparseInstruction(instruction: Instruction, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  switch (instruction.kind) {
    case "block":
      return unparseBlock(instruction, depth);
    case "assignment":
      return [
        `${pad}${instruction.target} := ${unparseExpression(instruction.value)}`,
      ];
    case "print":
      return [`${pad}print ${unparseExpression(instruction.value)}`];
    case "skip":
      return [`${pad}skip`];
    case "if":
      return [
        `${pad}if`,
        ...unparseGuards(instruction.guards, depth + 1),
        `${pad}fi`,
      ];
    case "while":
      return [
        `${pad}while`,
        ...unparseGuards(instruction.guards, depth + 1),
        `${pad}end`,
      ];
  }
}

function unparseBlock(block: Block, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  const inner = INDENT.repeat(depth + 1);
  return [
    `${pad}{`,
    ...block.declarations.map((d) => `${inner}${unparseDeclaration(d)}`),
    ...unparseInstructions(block.instructions, depth + 1),
    `${pad}}`,
  ];
}

/**
 * Prints a program as GCL source, one instruction per line.
 */
export const unparseProgram = (program: Block): string =>
  `${unparseBlock(program, 0).join("\n")}\n`;
