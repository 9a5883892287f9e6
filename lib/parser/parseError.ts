/**
 * Parse error definitions.
 *
 * This module defines the syntax error raised by the GCL parser. The parser
 * fails fast, so a single `ParseError` describes the first token that did
 * not fit the grammar together with what would have been accepted there.
 *
 * @module
 */
import { describeTokenKind, type TokenKind } from "../lexer/token.js";
import { formatPosition, type SourcePosition } from "../shared/position.js";

export type ParseErrorKind =
  | "unexpected-token"
  | "unexpected-end-of-input"
  | "nesting-too-deep";

export class ParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    public readonly position: SourcePosition,
    public readonly expected: ReadonlySet<TokenKind>,
    public readonly found: string,
  ) {
    super(describeParseError(kind, position, expected, found));
    this.name = "ParseError";
  }
}

function describeParseError(
  kind: ParseErrorKind,
  position: SourcePosition,
  expected: ReadonlySet<TokenKind>,
  found: string,
): string {
  if (kind === "nesting-too-deep") {
    return `Syntax error in ${formatPosition(position)}: '${found}' nests too deeply`;
  }
  const wanted = [...expected].map(describeTokenKind).join(", ");
  const head = kind === "unexpected-end-of-input"
    ? "Syntax error: unexpected end of input"
    : `Syntax error in ${formatPosition(position)}: unexpected token '${found}'`;
  return wanted.length > 0 ? `${head}, expected ${wanted}` : head;
}

/**
 * Raised by the textual lambda calculus reader.
 */
export class LambdaParseError extends Error {
  constructor(message: string, public readonly offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = "LambdaParseError";
  }
}
