/**
 * Decorated tree printing.
 *
 * One node per line, each indented by one `-` per level below the root.
 * Expressions carry their inferred type and every block lists its symbol
 * table before its instructions.
 *
 * @module
 */
import type { AnalyzedProgram } from "../context/analyzer.js";
import type {
  BinaryOperator,
  Block,
  Expression,
  Guard,
  Instruction,
} from "./ast.js";
import { encodeStringLiteral } from "../lexer/lexer.js";
import { prettyPrintType } from "./types.js";

const OPERATOR_NAMES: Record<BinaryOperator, string> = {
  "or": "Or",
  "and": "And",
  "<": "Less",
  "<=": "Leq",
  ">": "Greater",
  ">=": "Geq",
  "==": "Equal",
  "<>": "NotEqual",
  "+": "Plus",
  "-": "Minus",
  "*": "Mult",
  ",": "Comma",
};

class TreeWriter {
  readonly lines: string[] = [];

  constructor(private readonly analyzed: AnalyzedProgram) {}

  private line(depth: number, label: string): void {
    this.lines.push(`${"-".repeat(depth)}${label}`);
  }

  private typed(expr: Expression): string {
    const type = this.analyzed.types.get(expr);
    return type === undefined ? "" : ` | type: ${prettyPrintType(type)}`;
  }

  block(block: Block, depth: number): void {
    this.line(depth, "Block");
    const scope = this.analyzed.scopes.get(block);
    const symbols = scope?.entries() ?? [];
    if (symbols.length > 0) {
      this.line(depth + 1, "Symbols Table");
      for (const symbol of symbols) {
        this.line(
          depth + 2,
          `variable: ${symbol.name} | type: ${prettyPrintType(symbol.type)}`,
        );
      }
    }
    this.sequence(block.instructions, depth + 1);
  }

  /**
   * `a; b; c` prints as `Sequencing(Sequencing(a, b), c)`.
   */
  private sequence(instructions: readonly Instruction[], depth: number): void {
    for (let i = instructions.length - 1; i > 0; i--) {
      this.line(depth + instructions.length - 1 - i, "Sequencing");
    }
    instructions.forEach((instruction, i) => {
      const level = depth + instructions.length - 1 - Math.max(i - 1, 0);
      this.instruction(instruction, level);
    });
  }

  private instruction(instruction: Instruction, depth: number): void {
    switch (instruction.kind) {
      case "block":
        this.block(instruction, depth);
        return;
      case "assignment": {
        this.line(depth, "Asig");
        const symbol = this.analyzed.bindings.get(instruction);
        const type = symbol === undefined
          ? ""
          : ` | type: ${prettyPrintType(symbol.type)}`;
        this.line(depth + 1, `Ident: ${instruction.target}${type}`);
        this.expression(instruction.value, depth + 1);
        return;
      }
      case "print":
        this.line(depth, "Print");
        this.expression(instruction.value, depth + 1);
        return;
      case "skip":
        this.line(depth, "skip");
        return;
      case "if":
        this.line(depth, "If");
        this.guards(instruction.guards, depth + 1);
        return;
      case "while":
        this.line(depth, "While");
        this.guards(instruction.guards, depth + 1);
        return;
    }
  }

  private guards(guards: readonly Guard[], depth: number): void {
    for (const guard of guards) {
      this.line(depth, "Guard");
      this.expression(guard.condition, depth + 1);
      this.sequence(guard.body, depth + 1);
    }
  }

  private expression(expr: Expression, depth: number): void {
    switch (expr.kind) {
      case "literal":
        if (expr.value.kind === "string") {
          this.line(depth, `String: ${encodeStringLiteral(expr.value.value)}`);
        } else {
          this.line(depth, `Literal: ${expr.value.value}${this.typed(expr)}`);
        }
        return;
      case "identifier":
        this.line(depth, `Ident: ${expr.name}${this.typed(expr)}`);
        return;
      case "unary":
        this.line(
          depth,
          `${expr.op === "-" ? "Minus" : "Not"}${this.typed(expr)}`,
        );
        this.expression(expr.operand, depth + 1);
        return;
      case "binary":
        this.line(depth, `${OPERATOR_NAMES[expr.op]}${this.typed(expr)}`);
        this.expression(expr.left, depth + 1);
        this.expression(expr.right, depth + 1);
        return;
      case "index":
        this.line(depth, `ReadFunction${this.typed(expr)}`);
        this.expression(expr.target, depth + 1);
        this.expression(expr.index, depth + 1);
        return;
      case "write":
        this.line(depth, `WriteFunction${this.typed(expr)}`);
        this.expression(expr.target, depth + 1);
        this.line(depth + 1, "TwoPoints");
        this.expression(expr.index, depth + 2);
        this.expression(expr.value, depth + 2);
        return;
    }
  }
}

/**
 * Renders the decorated tree of an analyzed program.
 */
export function dumpProgram(analyzed: AnalyzedProgram): string {
  const writer = new TreeWriter(analyzed);
  writer.block(analyzed.program, 0);
  return `${writer.lines.join("\n")}\n`;
}
