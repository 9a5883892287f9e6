import {
  createApplication,
  type LambdaCombinator,
  mkAbsMany,
  mkVar,
  type UntypedLambda,
} from "../terms/lambda.js";
import { LambdaParseError } from "./parseError.js";
import {
  createParserState,
  isIdentifierChar,
  matchCh,
  parseIdentifier,
  type ParserState,
  peek,
  remaining,
} from "./parserState.js";

export type CombinatorTable = ReadonlyMap<string, LambdaCombinator>;

const LAMBDA_SIGILS = new Set(["λ", "\\"]);

interface ReaderContext {
  readonly combinators: CombinatorTable;
  readonly bound: ReadonlySet<string>;
}

/**
 * Parses an untyped lambda term (including applications) by chaining
 * together atomic terms.
 *
 * Returns a triple: [literal, UntypedLambda, updatedState]
 */
function parseApplicationChain(
  state: ParserState,
  ctx: ReaderContext,
): [string, UntypedLambda, ParserState] {
  let term: UntypedLambda | undefined;
  let currentState = state;

  for (;;) {
    const [next, s] = peek(currentState);
    if (next === null || next === ")") break;
    const [, atom, after] = parseAtom(s, ctx);
    term = term === undefined ? atom : createApplication(term, atom);
    currentState = after;
  }

  if (term === undefined) {
    const [, s] = peek(currentState);
    throw new LambdaParseError("expected a term", s.idx);
  }
  const [, start] = peek(state);
  return [state.buf.slice(start.idx, currentState.idx), term, currentState];
}

/**
 * Parses an abstraction, a parenthesised term or a name. An abstraction
 * may bind several names at once: `λx y.e` reads as `λx.λy.e`.
 */
function parseAtom(
  state: ParserState,
  ctx: ReaderContext,
): [string, UntypedLambda, ParserState] {
  const [peeked, s] = peek(state);

  if (peeked !== null && LAMBDA_SIGILS.has(peeked)) {
    let currentState = matchCh(s, peeked);
    const names: string[] = [];
    for (;;) {
      const [next] = peek(currentState);
      if (!isIdentifierChar(next)) break;
      const [name, afterName] = parseIdentifier(currentState);
      names.push(name);
      currentState = afterName;
    }
    if (names.length === 0) {
      throw new LambdaParseError("expected a bound variable", currentState.idx);
    }
    currentState = matchCh(currentState, ".");
    const inner: ReaderContext = {
      combinators: ctx.combinators,
      bound: new Set([...ctx.bound, ...names]),
    };
    const [, body, afterBody] = parseApplicationChain(currentState, inner);
    return [
      s.buf.slice(s.idx, afterBody.idx),
      mkAbsMany(names, body),
      afterBody,
    ];
  }

  if (peeked === "(") {
    const [, inner, afterInner] = parseApplicationChain(consumeOpen(s), ctx);
    const closed = matchCh(afterInner, ")");
    return [s.buf.slice(s.idx, closed.idx), inner, closed];
  }

  const [name, afterName] = parseIdentifier(s);
  const combinator = ctx.bound.has(name)
    ? undefined
    : ctx.combinators.get(name);
  return [name, combinator ?? mkVar(name), afterName];
}

const consumeOpen = (state: ParserState): ParserState => matchCh(state, "(");

/**
 * Parses an input string into an untyped lambda term.
 *
 * Accepts `λ` or `\` for abstraction. Free names that appear in
 * `combinators` become references to those combinators.
 *
 * @returns the consumed literal and the term
 */
export function parseLambda(
  input: string,
  combinators: CombinatorTable = new Map(),
): [string, UntypedLambda] {
  const ctx: ReaderContext = { combinators, bound: new Set() };
  const [lit, term, state] = parseApplicationChain(
    createParserState(input),
    ctx,
  );
  const [hasRemaining, rest] = remaining(state);
  if (hasRemaining) {
    throw new LambdaParseError(
      `unexpected '${rest.buf[rest.idx]}'`,
      rest.idx,
    );
  }
  return [lit, term];
}
