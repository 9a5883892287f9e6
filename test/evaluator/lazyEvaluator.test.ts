import { describe, it } from "mocha";
import { assert, expect } from "chai";

import { LazyEvaluator } from "../../lib/evaluator/lazyEvaluator.js";
import { EvaluationError } from "../../lib/evaluator/evaluationError.js";
import { parseLambda } from "../../lib/parser/untyped.js";
import { churchNumeral, COMBINATORS } from "../../lib/consts/lambdas.js";
import type { UntypedLambda } from "../../lib/terms/lambda.js";

const term = (source: string): UntypedLambda =>
  parseLambda(source, COMBINATORS)[1];

const failure = (f: () => unknown): EvaluationError => {
  try {
    f();
  } catch (e) {
    assert(e instanceof EvaluationError, `unexpected error ${String(e)}`);
    return e;
  }
  return expect.fail("expected an EvaluationError");
};

const OMEGA = "(λx.x x) (λx.x x)";

describe("LazyEvaluator", () => {
  it("stops at weak head normal form", () => {
    const value = new LazyEvaluator().evaluate(term("λx.(λy.y y) (λy.y y)"));
    expect(value.kind).to.equal("closure");
  });

  it("never evaluates an unused argument", () => {
    const evaluator = new LazyEvaluator({ maxSteps: 1000 });
    const value = evaluator.evaluate(term(`(λx.zero) (${OMEGA})`));
    expect(evaluator.readNat(value)).to.equal(0);
  });

  it("evaluates a shared argument once", () => {
    const two = "(succ (succ zero))";
    const work = `(iszero (mult ${two} ${two}) zero zero)`;
    const shared = new LazyEvaluator();
    shared.readNat(shared.evaluate(term(`(λx.add x x) ${work}`)));
    const copied = new LazyEvaluator();
    copied.readNat(copied.evaluate(term(`add ${work} ${work}`)));
    expect(shared.steps).to.be.lessThan(copied.steps);
  });

  it("reads back pairs and lists", () => {
    const evaluator = new LazyEvaluator();
    const [a, b] = evaluator.readPair(
      evaluator.evaluate(term("pair true (succ zero)")),
    );
    expect(evaluator.readBool(a)).to.equal(true);
    expect(evaluator.readNat(b)).to.equal(1);
    const items = evaluator.readList(
      evaluator.evaluate(term("cons false (cons true nil)")),
    );
    expect(items.map((v) => evaluator.readBool(v))).to.deep.equal([
      false,
      true,
    ]);
  });

  it("reads back numerals longer than the call stack is deep", () => {
    const evaluator = new LazyEvaluator();
    const value = evaluator.evaluate(churchNumeral(200_000));
    expect(evaluator.readNat(value)).to.equal(200_000);
  });

  it("counts steps across calls", () => {
    const evaluator = new LazyEvaluator();
    evaluator.evaluate(term("(λx.x) zero"));
    const first = evaluator.steps;
    expect(first).to.be.greaterThan(0);
    evaluator.evaluate(term("(λx.x) zero"));
    expect(evaluator.steps).to.be.greaterThan(first);
  });

  describe("errors", () => {
    it("gives up after the step budget", () => {
      const error = failure(() =>
        new LazyEvaluator({ maxSteps: 1000 }).evaluate(term(OMEGA))
      );
      expect(error.kind).to.equal("step-limit");
      expect(error.message).to.equal(
        "evaluation did not finish within 1000 steps",
      );
    });

    it("bounds a diverging fixed point", () => {
      const error = failure(() =>
        new LazyEvaluator({ maxSteps: 500 }).evaluate(
          term("Z (λloop c.loop c) zero"),
        )
      );
      expect(error.kind).to.equal("step-limit");
    });

    it("reports an unbound variable", () => {
      const error = failure(() => new LazyEvaluator().evaluate(term("y")));
      expect(error.kind).to.equal("unbound-variable");
      expect(error.message).to.equal("unbound variable y");
    });

    it("refuses to apply a native datum", () => {
      const evaluator = new LazyEvaluator();
      const value = evaluator.evaluate(term("λf x.x f"));
      const error = failure(() => evaluator.readNat(value));
      expect(error.kind).to.equal("bad-application");
      expect(error.message).to.equal(
        "cannot apply a native nat to an argument",
      );
    });

    it("rejects a value of the wrong shape", () => {
      const evaluator = new LazyEvaluator();
      const value = evaluator.evaluate(term("true"));
      const error = failure(() => evaluator.readNat(value));
      expect(error.kind).to.equal("unexpected-shape");
      expect(error.message).to.equal(
        "expected a Church numeral, found the native inc",
      );
    });
  });
});
