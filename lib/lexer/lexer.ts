/**
 * GCL lexer.
 *
 * The lexer is a single-pass, maximal-munch scanner. `lex` returns a
 * `TokenStream`, an iterable that scans on demand and starts over from the
 * beginning of the source on every iteration.
 *
 * @module
 */
import { mkPosition, type SourcePosition } from "../shared/position.js";
import { LexicalError } from "./lexicalError.js";
import { KEYWORDS, OPERATORS, type Token, type TokenKind } from "./token.js";

const WHITESPACE_REGEX = /\s/;
const IDENTIFIER_START_REGEX = /[A-Za-z_]/;
const IDENTIFIER_CHAR_REGEX = /[A-Za-z0-9_]/;
const DIGIT_REGEX = /[0-9]/;
const STRING_ESCAPES = new Set(['"', "\\", "n", "t"]);

/**
 * A lazily scanned, restartable sequence of tokens ending in `TkEOF`.
 */
export class TokenStream implements Iterable<Token> {
  public constructor(public readonly source: string) {}

  public *[Symbol.iterator](): Iterator<Token> {
    const scanner = new Scanner(this.source);
    for (;;) {
      const token = scanner.next();
      yield token;
      if (token.kind === "TkEOF") return;
    }
  }
}

export function lex(source: string): TokenStream {
  return new TokenStream(source);
}

/**
 * Scans the whole source eagerly.
 * @throws LexicalError on the first malformed token
 */
export function tokenize(source: string): Token[] {
  return Array.from(lex(source));
}

class Scanner {
  private idx = 0;
  private line = 1;
  private column = 1;

  public constructor(private readonly buf: string) {}

  next(): Token {
    this.skipTrivia();
    const start = this.here();

    if (this.idx >= this.buf.length) {
      return { kind: "TkEOF", lexeme: "", position: start };
    }

    const ch = this.buf[this.idx];

    if (IDENTIFIER_START_REGEX.test(ch)) {
      const word = this.takeWhile(IDENTIFIER_CHAR_REGEX);
      return this.token(KEYWORDS.get(word) ?? "TkId", word, start);
    }

    if (DIGIT_REGEX.test(ch)) {
      return this.token("TkNum", this.takeWhile(DIGIT_REGEX), start);
    }

    if (ch === '"') {
      return this.token("TkString", this.scanString(start), start);
    }

    for (const [symbol, kind] of OPERATORS) {
      if (this.buf.startsWith(symbol, this.idx)) {
        this.advance(symbol.length);
        return this.token(kind, symbol, start);
      }
    }

    throw new LexicalError(
      "invalid-character",
      `Unexpected character '${ch}'`,
      start,
    );
  }

  private token(
    kind: TokenKind,
    lexeme: string,
    position: SourcePosition,
  ): Token {
    return { kind, lexeme, position };
  }

  private here(): SourcePosition {
    return mkPosition(this.line, this.column);
  }

  private advance(count = 1): void {
    for (let i = 0; i < count && this.idx < this.buf.length; i++) {
      if (this.buf[this.idx] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.idx++;
    }
  }

  private takeWhile(pattern: RegExp): string {
    const from = this.idx;
    while (this.idx < this.buf.length && pattern.test(this.buf[this.idx])) {
      this.advance();
    }
    return this.buf.slice(from, this.idx);
  }

  private skipTrivia(): void {
    while (this.idx < this.buf.length) {
      const ch = this.buf[this.idx];
      if (WHITESPACE_REGEX.test(ch)) {
        this.advance();
      } else if (this.buf.startsWith("//", this.idx)) {
        while (this.idx < this.buf.length && this.buf[this.idx] !== "\n") {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  /**
   * Consumes a string literal and returns its raw slice, quotes included.
   */
  private scanString(start: SourcePosition): string {
    const from = this.idx;
    this.advance();
    for (;;) {
      if (this.idx >= this.buf.length || this.buf[this.idx] === "\n") {
        throw new LexicalError(
          "unterminated-string",
          "Unterminated string literal",
          start,
        );
      }
      const ch = this.buf[this.idx];
      if (ch === '"') {
        this.advance();
        return this.buf.slice(from, this.idx);
      }
      if (ch === "\\") {
        const escapePosition = this.here();
        const escaped = this.buf[this.idx + 1];
        if (escaped === undefined || !STRING_ESCAPES.has(escaped)) {
          throw new LexicalError(
            "invalid-escape",
            `Invalid escape sequence '\\${escaped ?? ""}'`,
            escapePosition,
          );
        }
        this.advance(2);
      } else {
        this.advance();
      }
    }
  }
}

/**
 * Decodes the raw lexeme of a `TkString` token into its value.
 */
export function decodeStringLiteral(lexeme: string): string {
  const body = lexeme.slice(1, -1);
  return body.replace(/\\(.)/g, (_match, escaped: string) => {
    switch (escaped) {
      case "n":
        return "\n";
      case "t":
        return "\t";
      default:
        return escaped;
    }
  });
}

/**
 * Inverse of `decodeStringLiteral`.
 */
export function encodeStringLiteral(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t");
  return `"${escaped}"`;
}
