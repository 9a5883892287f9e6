/**
 * Predefined lambda calculus terms.
 *
 * This module provides the Church encodings the translator emits. Each
 * combinator is written as lambda calculus text and may refer to the
 * combinators defined before it by name.
 *
 * Integers are pairs of Church numerals `(p, n)` standing for `p − n`, so
 * every GCL integer, negative ones included, has a representation.
 *
 * @module
 */
import { parseLambda } from "../parser/untyped.js";
import type { CombinatorTable } from "../parser/untyped.js";
import {
  createApplication,
  freeVariables,
  type LambdaCombinator,
  mkCombinator,
  mkUntypedAbs,
  mkVar,
  typelessApp,
  type UntypedLambda,
} from "../terms/lambda.js";

const table = new Map<string, LambdaCombinator>();

const define = (name: string, source: string): LambdaCombinator => {
  const [, term] = parseLambda(source, table);
  const free = freeVariables(term);
  if (free.size > 0) {
    throw new Error(
      `combinator ${name} has free variables: ${[...free].join(", ")}`,
    );
  }
  const combinator = mkCombinator(name, term);
  table.set(name, combinator);
  return combinator;
};

// booleans
export const TRUE = define("true", "λx y.x");
export const FALSE = define("false", "λx y.y");
export const NOT = define("not", "λb x y.b y x");
export const AND = define("and", "λp q.p q p");
export const OR = define("or", "λp q.p p q");
export const BEQ = define("beq", "λp q.p q (not q)");

// pairs
export const PAIR = define("pair", "λa b f.f a b");
export const FST = define("fst", "λp.p true");
export const SND = define("snd", "λp.p false");

// naturals
export const ZERO = define("zero", "λf x.x");
export const SUCC = define("succ", "λn f x.f (n f x)");
export const PRED = define("pred", "λn f x.n (λg h.h (g f)) (λu.x) (λu.u)");
export const ADD = define("add", "λm n f x.m f (n f x)");
export const SUB = define("sub", "λm n.n pred m");
export const MULT = define("mult", "λm n f.m (n f)");
export const ISZERO = define("iszero", "λn.n (λx.false) true");
export const LEQ = define("leq", "λm n.iszero (sub m n)");
export const NATEQ = define("nateq", "λm n.and (leq m n) (leq n m)");

// integers
export const INT0 = define("int0", "pair zero zero");
export const IADD = define(
  "iadd",
  "λx y.pair (add (fst x) (fst y)) (add (snd x) (snd y))",
);
export const ISUB = define(
  "isub",
  "λx y.pair (add (fst x) (snd y)) (add (snd x) (fst y))",
);
export const IMULT = define(
  "imult",
  "λx y.pair (add (mult (fst x) (fst y)) (mult (snd x) (snd y))) " +
    "(add (mult (fst x) (snd y)) (mult (snd x) (fst y)))",
);
export const INEG = define("ineg", "λx.pair (snd x) (fst x)");
export const ILEQ = define(
  "ileq",
  "λx y.leq (add (fst x) (snd y)) (add (fst y) (snd x))",
);
export const ILT = define("ilt", "λx y.not (ileq y x)");
export const IGEQ = define("igeq", "λx y.ileq y x");
export const IGT = define("igt", "λx y.not (ileq x y)");
export const IEQ = define("ieq", "λx y.and (ileq x y) (ileq y x)");
// negative integers clamp to zero
export const TONAT = define("tonat", "λx.sub (fst x) (snd x)");

// fold lists: λc n.c x1 (c x2 (… n))
export const NIL = define("nil", "λc n.n");
export const CONS = define("cons", "λh t c n.c h (t c n)");
export const SNOC = define("snoc", "λxs x c n.xs c (c x n)");
export const APPEND = define("append", "λxs ys c n.xs c (ys c n)");

// function ranges: maps from naturals to integers
export const ARR0 = define("arr0", "λi.int0");
export const READ = define("read", "λa i.a (tonat i)");
export const WRITE = define("write", "λa i v j.nateq j (tonat i) v (a j)");

// configurations: (ok, state, output)
export const UNIT = define("unit", "λx.x");
export const CFG = define("cfg", "λk s o.pair k (pair s o)");
export const OK = define("ok", "λc.fst c");
export const STATE = define("state", "λc.fst (snd c)");
export const OUT = define("out", "λc.snd (snd c)");
export const ABORT = define("abort", "λc.cfg false (state c) (out c)");
export const SKIP = define("skip", "λc.c");
export const GUARDED = define("guarded", "λt c.ok c (t c) c");
export const SEQ = define("seq", "λt1 t2 c.guarded t2 (t1 c)");

// fixed point, safe under call-by-value as well as normal order
export const Z = define("Z", "λf.(λx.f (λv.x x v)) (λx.f (λv.x x v))");

export const COMBINATORS: CombinatorTable = table;

// larger numerals are spelled in this base with add and mult
const NUMERAL_BASE = 256;

const unaryNumeral = (n: number): UntypedLambda => {
  let body: UntypedLambda = mkVar("x");
  for (let i = 0; i < n; i++) {
    body = createApplication(mkVar("f"), body);
  }
  return mkUntypedAbs("f", mkUntypedAbs("x", body));
};

/**
 * A term for the natural `n`. Up to 256 this is the Church numeral
 * `λf.λx.f (… (f x))` itself; above, it is `add (mult q 256) r`, which
 * reduces to that numeral and stays shallow.
 */
export function churchNumeral(n: number): UntypedLambda {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new Error(`not a natural number: ${n}`);
  }
  if (n <= NUMERAL_BASE) return unaryNumeral(n);
  return typelessApp(
    ADD,
    typelessApp(
      MULT,
      churchNumeral(Math.floor(n / NUMERAL_BASE)),
      unaryNumeral(NUMERAL_BASE),
    ),
    unaryNumeral(n % NUMERAL_BASE),
  );
}

/**
 * The integer `value` as a pair of Church numerals.
 */
export function churchInt(value: number): UntypedLambda {
  return value >= 0
    ? typelessApp(PAIR, churchNumeral(value), ZERO)
    : typelessApp(PAIR, ZERO, churchNumeral(-value));
}

export const churchBool = (value: boolean): UntypedLambda =>
  value ? TRUE : FALSE;
