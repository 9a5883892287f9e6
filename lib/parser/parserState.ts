import { LambdaParseError } from "./parseError.js";

const WHITESPACE_REGEX = /\s/;
const IDENTIFIER_CHAR_REGEX = /[A-Za-z0-9_']/;

/**
 * Immutable cursor into the text of a lambda term.
 */
export interface ParserState {
  buf: string;
  idx: number;
}

export function createParserState(buf: string): ParserState {
  return { buf, idx: 0 };
}

export function skipWhitespace(state: ParserState): ParserState {
  let idx = state.idx;
  while (idx < state.buf.length && WHITESPACE_REGEX.test(state.buf[idx])) {
    idx++;
  }
  return { buf: state.buf, idx };
}

export function peek(state: ParserState): [string | null, ParserState] {
  const newState = skipWhitespace(state);
  if (newState.idx < newState.buf.length) {
    return [newState.buf[newState.idx], newState];
  }
  return [null, newState];
}

export function consume(state: ParserState): ParserState {
  return { buf: state.buf, idx: state.idx + 1 };
}

export function matchCh(state: ParserState, ch: string): ParserState {
  const [next, newState] = peek(state);
  if (next !== ch) {
    throw new LambdaParseError(
      `expected '${ch}' but found '${next ?? "EOF"}'`,
      newState.idx,
    );
  }
  return consume(newState);
}

export function isIdentifierChar(ch: string | null): boolean {
  return ch !== null && IDENTIFIER_CHAR_REGEX.test(ch);
}

export function parseIdentifier(state: ParserState): [string, ParserState] {
  let id = "";
  let currentState = skipWhitespace(state);
  while (currentState.idx < currentState.buf.length) {
    const ch = currentState.buf[currentState.idx];
    if (!isIdentifierChar(ch)) break;
    id += ch;
    currentState = consume(currentState);
  }
  if (id.length === 0) {
    throw new LambdaParseError("expected an identifier", currentState.idx);
  }
  return [id, currentState];
}

export function remaining(state: ParserState): [boolean, ParserState] {
  const newState = skipWhitespace(state);
  return [newState.idx < newState.buf.length, newState];
}
