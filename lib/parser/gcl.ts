/**
 * Recursive-descent parser for GCL.
 *
 * Statements follow the grammar directly. Expressions use one function per
 * precedence level, lowest first:
 *
 *   ,  →  or  →  and  →  relational (non-associative)  →  + -  →  *
 *      →  prefix - !  →  postfix ., (i:v) and [i:v]  →  primary
 *
 * Nesting is limited to `MAX_PARSE_DEPTH` levels, counting nested blocks,
 * `if` and `while` bodies, parentheses, prefix operators and the height of
 * operator chains.
 *
 * @module
 */
import {
  type BinaryOperator,
  type Block,
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
  mkString,
  mkUnary,
  mkWhile,
  mkWrite,
  type Program,
  type TypeSpec,
} from "../gcl/ast.js";
import { decodeStringLiteral, lex } from "../lexer/lexer.js";
import type { Token, TokenKind } from "../lexer/token.js";
import type { SourcePosition } from "../shared/position.js";
import { ParseError } from "./parseError.js";
import { TokenBuffer } from "./tokenBuffer.js";

export const MAX_PARSE_DEPTH = 256;

const TYPE_START: TokenKind[] = ["TkInt", "TkBool", "TkFunction"];

const INSTRUCTION_START: TokenKind[] = [
  "TkId",
  "TkPrint",
  "TkSkip",
  "TkIf",
  "TkWhile",
  "TkOBlock",
];

const PRIMARY_START: TokenKind[] = [
  "TkNum",
  "TkTrue",
  "TkFalse",
  "TkString",
  "TkId",
  "TkOpenPar",
];

const RELATIONAL: ReadonlyMap<TokenKind, BinaryOperator> = new Map<
  TokenKind,
  BinaryOperator
>([
  ["TkLess", "<"],
  ["TkLeq", "<="],
  ["TkGreater", ">"],
  ["TkGeq", ">="],
  ["TkEqual", "=="],
  ["TkNEqual", "<>"],
]);

const ADDITIVE: ReadonlyMap<TokenKind, BinaryOperator> = new Map<
  TokenKind,
  BinaryOperator
>([
  ["TkPlus", "+"],
  ["TkMinus", "-"],
]);

/**
 * Parses a GCL program: exactly one block followed by end of input.
 *
 * @param input the source text, or a token stream produced by `lex`
 * @throws LexicalError if the source contains a malformed token
 * @throws ParseError on the first grammar violation
 */
export function parseGcl(input: string | Iterable<Token>): Program {
  const tokens = typeof input === "string" ? lex(input) : input;
  return new GclParser(new TokenBuffer(tokens)).parseProgram();
}

/**
 * Parses a standalone GCL expression.
 */
export function parseGclExpression(input: string): Expression {
  const parser = new GclParser(new TokenBuffer(lex(input)));
  return parser.parseStandaloneExpression();
}

class GclParser {
  private depth = 0;
  private readonly heights = new WeakMap<Expression, number>();

  public constructor(private readonly buf: TokenBuffer) {}

  private tooDeep(token: Token): ParseError {
    return new ParseError(
      "nesting-too-deep",
      token.position,
      new Set(),
      token.lexeme,
    );
  }

  private nested<T>(token: Token, f: () => T): T {
    if (this.depth >= MAX_PARSE_DEPTH) throw this.tooDeep(token);
    this.depth++;
    try {
      return f();
    } finally {
      this.depth--;
    }
  }

  /**
   * Records the height of a new operator node.
   */
  private node<T extends Expression>(
    token: Token,
    expr: T,
    ...children: Expression[]
  ): T {
    const height = 1 +
      Math.max(0, ...children.map((child) => this.heights.get(child) ?? 1));
    if (height + this.depth > MAX_PARSE_DEPTH) throw this.tooDeep(token);
    this.heights.set(expr, height);
    return expr;
  }

  private binary(
    op: BinaryOperator,
    token: Token,
    left: Expression,
    right: Expression,
  ): Expression {
    return this.node(
      token,
      mkBinary(op, left, right, token.position),
      left,
      right,
    );
  }

  parseProgram(): Program {
    const block = this.parseBlock();
    this.buf.match("TkEOF");
    return block;
  }

  parseStandaloneExpression(): Expression {
    const expr = this.parseExpression();
    this.buf.match("TkEOF");
    return expr;
  }

  private parseBlock(): Block {
    const open = this.buf.match("TkOBlock");
    const declarations: Declaration[] = [];
    while (this.buf.at(...TYPE_START)) {
      declarations.push(this.parseDeclaration());
    }
    const instructions = this.parseInstructions();
    if (!this.buf.at("TkCBlock")) {
      throw this.buf.unexpected(["TkSemicolon", "TkCBlock"]);
    }
    this.buf.consume();
    return mkBlock(declarations, instructions, open.position);
  }

  private parseDeclaration(): Declaration {
    const start = this.buf.peek().position;
    const type = this.parseType();
    const names: string[] = [];
    const positions: SourcePosition[] = [];
    do {
      const id = this.buf.match("TkId");
      names.push(id.lexeme);
      positions.push(id.position);
    } while (this.buf.accept("TkComma"));
    if (!this.buf.at("TkSemicolon")) {
      throw this.buf.unexpected(["TkComma", "TkSemicolon"]);
    }
    this.buf.consume();
    return mkDeclaration(type, names, positions, start);
  }

  private parseType(): TypeSpec {
    const token = this.buf.peek();
    switch (token.kind) {
      case "TkInt":
        this.buf.consume();
        return intType;
      case "TkBool":
        this.buf.consume();
        return boolType;
      case "TkFunction": {
        this.buf.consume();
        this.buf.match("TkOBracket");
        this.buf.match("TkSoForth");
        const upper = this.parseNumber(this.buf.match("TkNum"));
        this.buf.match("TkCBracket");
        return functionType(upper);
      }
      default:
        throw this.buf.unexpected(TYPE_START);
    }
  }

  private parseInstructions(): Instruction[] {
    const instructions = [this.parseInstruction()];
    while (this.buf.accept("TkSemicolon")) {
      instructions.push(this.parseInstruction());
    }
    return instructions;
  }

  private parseInstruction(): Instruction {
    const token = this.buf.peek();
    switch (token.kind) {
      case "TkId": {
        this.buf.consume();
        this.buf.match("TkAsig");
        return mkAssignment(token.lexeme, this.parseExpression(), token.position);
      }
      case "TkPrint":
        this.buf.consume();
        return mkPrint(this.parseExpression(), token.position);
      case "TkSkip":
        this.buf.consume();
        return mkSkip(token.position);
      case "TkIf": {
        this.buf.consume();
        const guards = this.nested(token, () => this.parseGuards("TkFi"));
        return mkIf(guards, token.position);
      }
      case "TkWhile": {
        this.buf.consume();
        const guards = this.nested(token, () => this.parseGuards("TkEnd"));
        return mkWhile(guards, token.position);
      }
      case "TkOBlock":
        return this.nested(token, () => this.parseBlock());
      default:
        throw this.buf.unexpected(INSTRUCTION_START);
    }
  }

  private parseGuards(terminator: TokenKind): Guard[] {
    const guards = [this.parseGuard()];
    while (this.buf.accept("TkGuard")) {
      guards.push(this.parseGuard());
    }
    if (!this.buf.at(terminator)) {
      throw this.buf.unexpected(["TkSemicolon", "TkGuard", terminator]);
    }
    this.buf.consume();
    return guards;
  }

  private parseGuard(): Guard {
    const condition = this.parseExpression();
    this.buf.match("TkArrow");
    return { condition, body: this.parseInstructions() };
  }

  private parseExpression(): Expression {
    let left = this.parseDisjunction();
    for (;;) {
      const comma = this.buf.accept("TkComma");
      if (comma === undefined) return left;
      left = this.binary(",", comma, left, this.parseDisjunction());
    }
  }

  private parseDisjunction(): Expression {
    let left = this.parseConjunction();
    for (;;) {
      const op = this.buf.accept("TkOr");
      if (op === undefined) return left;
      left = this.binary("or", op, left, this.parseConjunction());
    }
  }

  private parseConjunction(): Expression {
    let left = this.parseRelational();
    for (;;) {
      const op = this.buf.accept("TkAnd");
      if (op === undefined) return left;
      left = this.binary("and", op, left, this.parseRelational());
    }
  }

  private parseRelational(): Expression {
    const left = this.parseAdditive();
    const opToken = this.buf.peek();
    const op = RELATIONAL.get(opToken.kind);
    if (op === undefined) return left;
    this.buf.consume();
    const right = this.parseAdditive();
    if (RELATIONAL.has(this.buf.peek().kind)) {
      throw this.buf.unexpected(["TkAnd", "TkOr", "TkComma"]);
    }
    return this.binary(op, opToken, left, right);
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    for (;;) {
      const opToken = this.buf.peek();
      const op = ADDITIVE.get(opToken.kind);
      if (op === undefined) return left;
      this.buf.consume();
      left = this.binary(op, opToken, left, this.parseMultiplicative());
    }
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    for (;;) {
      const op = this.buf.accept("TkMult");
      if (op === undefined) return left;
      left = this.binary("*", op, left, this.parseUnary());
    }
  }

  private parseUnary(): Expression {
    const token = this.buf.peek();
    if (token.kind !== "TkMinus" && token.kind !== "TkNot") {
      return this.parsePostfix();
    }
    this.buf.consume();
    const operand = this.nested(token, () => this.parseUnary());
    return this.node(
      token,
      mkUnary(token.kind === "TkMinus" ? "-" : "!", operand, token.position),
      operand,
    );
  }

  private parsePostfix(): Expression {
    let expr = this.parsePrimary();
    for (;;) {
      const dot = this.buf.accept("TkApp");
      if (dot !== undefined) {
        const index = this.parsePrimary();
        expr = this.node(dot, mkIndex(expr, index, dot.position), expr, index);
        continue;
      }
      const paren = this.buf.accept("TkOpenPar");
      if (paren !== undefined) {
        expr = this.parseWrite(expr, paren, "TkClosePar");
        continue;
      }
      const bracket = this.buf.accept("TkOBracket");
      if (bracket !== undefined) {
        expr = this.parseWrite(expr, bracket, "TkCBracket");
        continue;
      }
      return expr;
    }
  }

  /**
   * The `i:v` part of `e(i:v)` or `e[i:v]`, after the opening token.
   */
  private parseWrite(
    target: Expression,
    open: Token,
    close: TokenKind,
  ): Expression {
    const [index, value] = this.nested(open, () => {
      const i = this.parseDisjunction();
      this.buf.match("TkTwoPoints");
      const v = this.parseDisjunction();
      this.buf.match(close);
      return [i, v] as const;
    });
    return this.node(
      open,
      mkWrite(target, index, value, open.position),
      target,
      index,
      value,
    );
  }

  private parsePrimary(): Expression {
    const token = this.buf.peek();
    switch (token.kind) {
      case "TkNum":
        this.buf.consume();
        return mkInt(this.parseNumber(token), token.position);
      case "TkTrue":
        this.buf.consume();
        return mkBool(true, token.position);
      case "TkFalse":
        this.buf.consume();
        return mkBool(false, token.position);
      case "TkString":
        this.buf.consume();
        return mkString(decodeStringLiteral(token.lexeme), token.position);
      case "TkId":
        this.buf.consume();
        return mkIdentifier(token.lexeme, token.position);
      case "TkOpenPar": {
        this.buf.consume();
        return this.nested(token, () => {
          const inner = this.parseExpression();
          this.buf.match("TkClosePar");
          return inner;
        });
      }
      default:
        throw this.buf.unexpected(PRIMARY_START);
    }
  }

  private parseNumber(token: Token): number {
    const value = Number(token.lexeme);
    if (!Number.isSafeInteger(value)) {
      throw new ParseError(
        "unexpected-token",
        token.position,
        new Set(),
        token.lexeme,
      );
    }
    return value;
  }
}
