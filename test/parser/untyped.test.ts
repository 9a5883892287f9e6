import { describe, it } from "mocha";
import { expect } from "chai";

import {
  lambdaEquals,
  mkUntypedAbs,
  mkVar,
  prettyPrintUntypedLambda,
  typelessApp,
} from "../../lib/terms/lambda.js";
import { parseLambda } from "../../lib/parser/untyped.js";
import { LambdaParseError } from "../../lib/parser/parseError.js";
import { COMBINATORS, PRED, SUCC } from "../../lib/consts/lambdas.js";

describe("parseLambda", () => {
  describe("applications", () => {
    it("parses a simple application", () => {
      const src = "a b";
      const [lit, term] = parseLambda(src);
      expect(lit).to.equal(src);
      expect(term).to.deep.equal(typelessApp(mkVar("a"), mkVar("b")));
    });

    it("parses an application with parentheses", () => {
      const [, term] = parseLambda("(a b)");
      expect(term).to.deep.equal(typelessApp(mkVar("a"), mkVar("b")));
    });

    it("associates to the left", () => {
      const [, term] = parseLambda("a b c");
      expect(term).to.deep.equal(
        typelessApp(typelessApp(mkVar("a"), mkVar("b")), mkVar("c")),
      );
    });

    it("parses a nested application", () => {
      const [, term] = parseLambda("a (b c)");
      expect(term).to.deep.equal(
        typelessApp(mkVar("a"), typelessApp(mkVar("b"), mkVar("c"))),
      );
    });
  });

  describe("abstractions", () => {
    it("extends the body as far right as possible", () => {
      const [, term] = parseLambda("a (λb.b (a a))");
      expect(term).to.deep.equal(
        typelessApp(
          mkVar("a"),
          mkUntypedAbs(
            "b",
            typelessApp(mkVar("b"), typelessApp(mkVar("a"), mkVar("a"))),
          ),
        ),
      );
    });

    it("reads several binders as nested abstractions", () => {
      const [, single] = parseLambda(
        "λn.λf.λx.n (λg.λh.h (g f)) (λu.x) (λu.u)",
      );
      expect(lambdaEquals(PRED.definition, single)).to.equal(true);
    });

    it("accepts a backslash for lambda", () => {
      const [, term] = parseLambda("\\x.x");
      expect(term).to.deep.equal(mkUntypedAbs("x", mkVar("x")));
    });
  });

  describe("combinators", () => {
    it("resolves free names against the table", () => {
      const [, term] = parseLambda("succ n", COMBINATORS);
      expect(term).to.deep.equal(typelessApp(SUCC, mkVar("n")));
    });

    it("lets a binder shadow a combinator name", () => {
      const [, term] = parseLambda("λsucc.succ", COMBINATORS);
      expect(term).to.deep.equal(mkUntypedAbs("succ", mkVar("succ")));
    });
  });

  it("reads back what the printer writes", () => {
    const [, term] = parseLambda("(λx.x x) (λf y.f (f y)) z");
    const printed = prettyPrintUntypedLambda(term);
    expect(printed).to.equal("(((λx.(x x)) λf.λy.(f (f y))) z)");
    const [, again] = parseLambda(printed);
    expect(lambdaEquals(again, term)).to.equal(true);
  });

  describe("errors", () => {
    it("requires a bound variable", () => {
      expect(() => parseLambda("λ.x")).to.throw(
        LambdaParseError,
        "expected a bound variable at offset 1",
      );
    });

    it("rejects an unbalanced parenthesis", () => {
      expect(() => parseLambda("(a b")).to.throw(
        LambdaParseError,
        "expected ')' but found 'EOF' at offset 4",
      );
    });

    it("rejects trailing input", () => {
      expect(() => parseLambda("a b)")).to.throw(
        LambdaParseError,
        "unexpected ')' at offset 3",
      );
    });

    it("rejects an empty term", () => {
      expect(() => parseLambda("  ")).to.throw(
        LambdaParseError,
        "expected a term at offset 2",
      );
    });
  });
});
