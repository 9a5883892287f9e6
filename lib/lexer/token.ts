/**
 * GCL token definitions.
 *
 * This module defines the closed set of token kinds the lexer produces,
 * together with the keyword and operator tables that drive maximal-munch
 * scanning.
 *
 * @module
 */
import type { SourcePosition } from "../shared/position.js";

export type TokenKind =
  | "TkOBlock"
  | "TkCBlock"
  | "TkInt"
  | "TkBool"
  | "TkFunction"
  | "TkOBracket"
  | "TkCBracket"
  | "TkSoForth"
  | "TkId"
  | "TkNum"
  | "TkString"
  | "TkTrue"
  | "TkFalse"
  | "TkSkip"
  | "TkPrint"
  | "TkIf"
  | "TkFi"
  | "TkWhile"
  | "TkEnd"
  | "TkAsig"
  | "TkSemicolon"
  | "TkComma"
  | "TkArrow"
  | "TkGuard"
  | "TkOr"
  | "TkAnd"
  | "TkNot"
  | "TkLess"
  | "TkLeq"
  | "TkGreater"
  | "TkGeq"
  | "TkEqual"
  | "TkNEqual"
  | "TkPlus"
  | "TkMinus"
  | "TkMult"
  | "TkOpenPar"
  | "TkClosePar"
  | "TkTwoPoints"
  | "TkApp"
  | "TkEOF";

export interface Token {
  readonly kind: TokenKind;
  /** The exact source slice; empty for TkEOF. */
  readonly lexeme: string;
  readonly position: SourcePosition;
}

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<
  string,
  TokenKind
>([
  ["int", "TkInt"],
  ["bool", "TkBool"],
  ["function", "TkFunction"],
  ["true", "TkTrue"],
  ["false", "TkFalse"],
  ["skip", "TkSkip"],
  ["print", "TkPrint"],
  ["if", "TkIf"],
  ["fi", "TkFi"],
  ["while", "TkWhile"],
  ["end", "TkEnd"],
  ["or", "TkOr"],
  ["and", "TkAnd"],
]);

/**
 * Operators and punctuation, longest first so the scanner can take the
 * first entry that matches.
 */
export const OPERATORS: ReadonlyArray<readonly [string, TokenKind]> = [
  ["-->", "TkArrow"],
  [":=", "TkAsig"],
  ["..", "TkSoForth"],
  ["[]", "TkGuard"],
  ["<=", "TkLeq"],
  [">=", "TkGeq"],
  ["==", "TkEqual"],
  ["<>", "TkNEqual"],
  ["→", "TkArrow"],
  ["{", "TkOBlock"],
  ["}", "TkCBlock"],
  ["[", "TkOBracket"],
  ["]", "TkCBracket"],
  [";", "TkSemicolon"],
  [",", "TkComma"],
  ["!", "TkNot"],
  ["<", "TkLess"],
  [">", "TkGreater"],
  ["+", "TkPlus"],
  ["-", "TkMinus"],
  ["*", "TkMult"],
  ["(", "TkOpenPar"],
  [")", "TkClosePar"],
  [":", "TkTwoPoints"],
  [".", "TkApp"],
];

const DESCRIPTIONS: Partial<Record<TokenKind, string>> = {
  TkId: "identifier",
  TkNum: "number",
  TkString: "string literal",
  TkEOF: "end of input",
};

/**
 * Human-readable description of a token kind for diagnostics, e.g. `'fi'`
 * or `identifier`.
 */
export function describeTokenKind(kind: TokenKind): string {
  const described = DESCRIPTIONS[kind];
  if (described !== undefined) return described;
  for (const [word, k] of KEYWORDS) {
    if (k === kind) return `'${word}'`;
  }
  for (const [symbol, k] of OPERATORS) {
    if (k === kind) return `'${symbol}'`;
  }
  return kind;
}
