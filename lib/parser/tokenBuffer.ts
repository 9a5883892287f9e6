import type { Token, TokenKind } from "../lexer/token.js";
import { ParseError } from "./parseError.js";

/**
 * One-token lookahead over a token iterator, pulling tokens from the lexer
 * only as the parser advances.
 */
export class TokenBuffer {
  private current: Token;
  private readonly tokens: Iterator<Token>;

  public constructor(tokens: Iterable<Token>) {
    this.tokens = tokens[Symbol.iterator]();
    this.current = this.pull();
  }

  private pull(): Token {
    const next = this.tokens.next();
    if (next.done) {
      throw new Error("token stream ended without TkEOF");
    }
    return next.value;
  }

  /**
   * Returns the next token without consuming it.
   */
  peek(): Token {
    return this.current;
  }

  /**
   * Whether the next token is one of the given kinds.
   */
  at(...kinds: TokenKind[]): boolean {
    return kinds.includes(this.current.kind);
  }

  /**
   * Consumes one token and returns it.
   */
  consume(): Token {
    const token = this.current;
    if (token.kind !== "TkEOF") {
      this.current = this.pull();
    }
    return token;
  }

  /**
   * Consumes the next token if it has the given kind.
   */
  accept(kind: TokenKind): Token | undefined {
    return this.current.kind === kind ? this.consume() : undefined;
  }

  /**
   * Consumes the next token, which must have the given kind.
   */
  match(kind: TokenKind): Token {
    const token = this.accept(kind);
    if (token === undefined) {
      throw this.unexpected([kind]);
    }
    return token;
  }

  /**
   * Builds the error for the current token given the kinds acceptable here.
   */
  unexpected(expected: Iterable<TokenKind>): ParseError {
    const token = this.current;
    return new ParseError(
      token.kind === "TkEOF" ? "unexpected-end-of-input" : "unexpected-token",
      token.position,
      new Set(expected),
      token.lexeme,
    );
  }
}
