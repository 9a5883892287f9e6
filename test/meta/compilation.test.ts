import { describe, it } from "mocha";
import { assert, expect } from "chai";

import {
  CompilationError,
  compile,
  compileOrThrow,
} from "../../lib/meta/compilation.js";
import {
  formatOutput,
  type RunResult,
  runTranslation,
} from "../../lib/evaluator/run.js";

const run = (source: string): RunResult =>
  runTranslation(compileOrThrow(source).translation);

const printed = (source: string): string => formatOutput(run(source).output);

describe("compile and run", () => {
  describe("scenarios", () => {
    it("adds integers", () => {
      const result = run("{int x; x := 1+2; print x}");
      expect(result.status).to.equal("ok");
      expect(formatOutput(result.output)).to.equal("[3]");
      expect(result.state).to.deep.equal({ x: { kind: "int", value: 3 } });
    });

    it("evaluates boolean operators", () => {
      expect(printed("{bool b; b := true and false; print b}")).to.equal(
        "[false]",
      );
    });

    it("rejects an undeclared identifier before translating", () => {
      const result = compile("{int y; y := z+1}");
      assert(!result.ok);
      expect(result.stage).to.equal("analyze");
      expect(result.diagnostics).to.deep.equal([{
        category: "semantic",
        kind: "undeclared-identifier",
        message: "Variable z not declared at line 1 and column 14",
        position: { line: 1, column: 14 },
      }]);
    });

    it("runs a loop to completion", () => {
      const result = run("{int n; n:=0; while n < 3 → n := n+1 end; print n}");
      expect(formatOutput(result.output)).to.equal("[3]");
      expect(result.state).to.deep.equal({ n: { kind: "int", value: 3 } });
    });
  });

  describe("integers and booleans", () => {
    it("handles negative results", () => {
      expect(printed("{int x; x := 2 - 5 * 3; print x; print -x}")).to.equal(
        "[-13, 13]",
      );
    });

    it("evaluates comparisons", () => {
      expect(
        printed("{int x; x := 3; print x >= 3 and !(x == 4); print x <> 3}"),
      ).to.equal("[true, false]");
    });

    it("starts every variable at its default", () => {
      const result = run("{int x; bool b; function[..1] a; skip}");
      expect(result.state).to.deep.equal({
        x: { kind: "int", value: 0 },
        b: { kind: "bool", value: false },
        a: { kind: "function", values: [0, 0] },
      });
      expect(result.output).to.deep.equal([]);
    });
  });

  describe("control flow", () => {
    it("takes the first true guard of an if", () => {
      expect(
        printed("{int x; if true --> x := 1 [] true --> x := 2 fi; print x}"),
      ).to.equal("[1]");
    });

    it("aborts when no guard holds", () => {
      const result = run(
        "{int x; x := 1; if x > 5 --> print 1 fi; print 2}",
      );
      expect(result.status).to.equal("aborted");
      expect(result.output).to.deep.equal([]);
      expect(result.state).to.deep.equal({ x: { kind: "int", value: 1 } });
    });

    it("keeps output printed before an abort", () => {
      const result = run("{print 1; if false --> skip fi; print 2}");
      expect(result.status).to.equal("aborted");
      expect(formatOutput(result.output)).to.equal("[1]");
    });

    it("loops over several guards in order", () => {
      expect(printed(`{
        int x, y;
        x := 5;
        while x > 0 and x > 3 --> x := x - 1
           [] x > 1 --> x := x - 2
        end;
        print x
      }`)).to.equal("[1]");
    });

    it("skips a loop whose guards are false", () => {
      expect(printed("{int x; while false --> x := 1 end; print x}")).to
        .equal("[0]");
    });
  });

  describe("blocks", () => {
    it("shadows outer variables", () => {
      expect(
        printed("{int x; x := 1; {int x; x := 5; print x}; print x}"),
      ).to.equal("[5, 1]");
    });

    it("resets local variables on every entry", () => {
      const result = run(`{
        int i;
        while i < 2 --> {int y; y := y + 1; print y}; i := i + 1 end
      }`);
      expect(formatOutput(result.output)).to.equal("[1, 1]");
      expect(result.state).to.deep.equal({ i: { kind: "int", value: 2 } });
    });

    it("updates outer variables from a nested block", () => {
      expect(printed("{int x; {int y; y := 4; x := y * 2}; print x}")).to
        .equal("[8]");
    });
  });

  describe("function ranges", () => {
    it("assigns, updates and reads", () => {
      const result = run(
        "{function[..2] a; a := 4, 5, 6; a := a(1:9); print a; print a.2}",
      );
      expect(formatOutput(result.output)).to.equal("[[4, 9, 6], 6]");
      expect(result.state).to.deep.equal({
        a: { kind: "function", values: [4, 9, 6] },
      });
    });

    it("fills a one-element range from an int", () => {
      expect(printed("{function[..0] a; a := 5; print a}")).to.equal("[[5]]");
    });

    it("reads with a computed index", () => {
      expect(
        printed("{int i; function[..1] a; a := 3, 8; i := 2 - 1; print a.i}"),
      ).to.equal("[8]");
    });

    it("rejects a range too large to enumerate", () => {
      const result = compile("{function[..9007199254740991] a; print a}");
      assert(!result.ok);
      expect(result.stage).to.equal("analyze");
      expect(result.diagnostics[0]?.kind).to.equal("arity-or-range-mismatch");
    });

    it("prints a comma list", () => {
      expect(printed("{print 1, -2}")).to.equal("[[1, -2]]");
    });
  });

  describe("strings", () => {
    it("prints a literal", () => {
      expect(printed('{print "hi"}')).to.equal('["hi"]');
    });

    it("concatenates printable values", () => {
      expect(printed('{int x; x := 7; print "x=" + x + " ok"}')).to.equal(
        '["x=7 ok"]',
      );
      expect(printed('{print "b:" + true}')).to.equal('["b:true"]');
      expect(printed('{print "" + -3}')).to.equal('["-3"]');
    });

    it("prints characters outside ASCII", () => {
      const result = compile('{print "😀"}');
      assert(result.ok);
      expect(formatOutput(runTranslation(result.translation).output)).to.equal(
        '["😀"]',
      );
    });
  });

  describe("large programs", () => {
    it("handles large literals", () => {
      const result = run("{int x; x := 50000; print x}");
      expect(formatOutput(result.output)).to.equal("[50000]");
      expect(result.state).to.deep.equal({ x: { kind: "int", value: 50000 } });
    });

    it("translates long instruction sequences", () => {
      const skips = Array.from({ length: 20_000 }, () => "skip").join(";");
      const result = compile(`{${skips}}`);
      assert(result.ok);
      expect(result.text.endsWith(")\n")).to.equal(true);
    });

    it("reports deep nesting as a syntax error", () => {
      const parens = "(".repeat(20_000) + "1" + ")".repeat(20_000);
      const nestedExpr = compile(`{int x; x := ${parens}}`);
      assert(!nestedExpr.ok);
      expect(nestedExpr.stage).to.equal("parse");
      expect(nestedExpr.diagnostics[0]?.kind).to.equal("nesting-too-deep");

      const blocks = compile("{".repeat(20_000) + "skip" + "}".repeat(20_000));
      assert(!blocks.ok);
      expect(blocks.diagnostics[0]?.message).to.equal(
        "Syntax error in line 1 and column 258: '{' nests too deeply",
      );
    });
  });

  describe("failures", () => {
    it("reports lexical errors", () => {
      const result = compile("{print 1 @ 2}");
      assert(!result.ok);
      expect(result.stage).to.equal("lex");
      expect(result.diagnostics[0]?.message).to.equal(
        "Unexpected character '@' at line 1 and column 10",
      );
    });

    it("reports syntax errors", () => {
      const result = compile("{print 1");
      assert(!result.ok);
      expect(result.stage).to.equal("parse");
      expect(result.diagnostics[0]?.kind).to.equal("unexpected-end-of-input");
    });

    it("reports translation errors", () => {
      const result = compile('{bool b; b := "a" == "b"}');
      assert(!result.ok);
      expect(result.stage).to.equal("translate");
      expect(result.diagnostics[0]?.category).to.equal("translation");
    });

    it("honours the maximum depth", () => {
      const result = compile("{int x; x := 1+2+3+4}", { maxDepth: 3 });
      assert(!result.ok);
      expect(result.diagnostics[0]?.kind).to.equal("depth-exceeded");
    });

    it("throws with the failing stage", () => {
      try {
        compileOrThrow("{int x; x := true; print y}");
        expect.fail("expected a CompilationError");
      } catch (e) {
        assert(e instanceof CompilationError);
        expect(e.stage).to.equal("analyze");
        expect(e.message).to.equal(
          "Type error. Variable x has different type than expression at line 1 and column 9\n" +
            "Variable y not declared at line 1 and column 26",
        );
      }
    });
  });

  it("renders the translation as text", () => {
    const named = compileOrThrow("{print 1}");
    expect(named.text).to.match(/^main := /m);
    const expanded = compileOrThrow("{print 1}", { expand: true });
    expect(expanded.text).to.not.include(":=");
  });
});
