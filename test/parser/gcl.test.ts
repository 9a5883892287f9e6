import { describe, it } from "mocha";
import { assert, expect } from "chai";

import { parseGcl, parseGclExpression } from "../../lib/parser/gcl.js";
import { ParseError } from "../../lib/parser/parseError.js";
import { LexicalError } from "../../lib/lexer/lexicalError.js";
import { lex } from "../../lib/lexer/lexer.js";
import { unparseExpression } from "../../lib/gcl/unparse.js";

const shape = (source: string): string =>
  unparseExpression(parseGclExpression(source));

describe("parseGcl", () => {
  it("parses declarations and instructions of a block", () => {
    const program = parseGcl("{int x, y; bool b; function[..2] a; skip}");
    expect(program.kind).to.equal("block");
    expect(program.declarations.map((d) => d.names)).to.deep.equal([
      ["x", "y"],
      ["b"],
      ["a"],
    ]);
    expect(program.declarations[2]?.type).to.deep.equal({
      kind: "function",
      upper: 2,
    });
    expect(program.declarations[0]?.namePositions).to.deep.equal([
      { line: 1, column: 6 },
      { line: 1, column: 9 },
    ]);
    expect(program.instructions.map((i) => i.kind)).to.deep.equal(["skip"]);
  });

  it("parses every instruction form", () => {
    const program = parseGcl(`{
      int n;
      n := 0;
      while n < 3 --> n := n + 1 end;
      if n == 3 --> print "done" [] n <> 3 --> skip fi;
      {bool b; b := true}
    }`);
    expect(program.instructions.map((i) => i.kind)).to.deep.equal([
      "assignment",
      "while",
      "if",
      "block",
    ]);
    const conditional = program.instructions[2];
    assert(conditional?.kind === "if");
    expect(conditional.guards).to.have.length(2);
    expect(conditional.position).to.deep.equal({ line: 5, column: 7 });
  });

  it("accepts a token stream", () => {
    const program = parseGcl(lex("{print 1}"));
    expect(program.instructions[0]?.kind).to.equal("print");
  });

  it("parses array reads and writes", () => {
    expect(shape("a.1")).to.equal("a.1");
    expect(shape("a(0:5).0")).to.equal("a(0:5).0");
    expect(shape("a.(b.1)")).to.equal("a.(b.1)");
    expect(shape("a(1 + 1:x)")).to.equal("a((1 + 1):x)");
  });

  it("reads a[i:v] as a range write", () => {
    expect(parseGclExpression("a[1:5]")).to.deep.equal(
      parseGclExpression("a(1:5)"),
    );
    expect(shape("a[0:1][1:x + 2].1")).to.equal("a(0:1)(1:(x + 2)).1");
  });

  describe("precedence", () => {
    it("binds * tighter than +", () => {
      expect(shape("1 + 2 * 3")).to.equal("(1 + (2 * 3))");
    });

    it("associates - to the left", () => {
      expect(shape("1 - 2 - 3")).to.equal("((1 - 2) - 3)");
    });

    it("binds and tighter than or", () => {
      expect(shape("a or b and c")).to.equal("(a or (b and c))");
    });

    it("binds prefix minus tighter than *", () => {
      expect(shape("-x * y")).to.equal("((-x) * y)");
    });

    it("binds postfix . tighter than prefix minus", () => {
      expect(shape("-a.1")).to.equal("(-a.1)");
    });

    it("gives the comma the lowest precedence", () => {
      expect(shape("1, 2, 3")).to.equal("((1, 2), 3)");
      expect(shape("x < 1, true")).to.equal("((x < 1), true)");
    });

    it("respects parentheses", () => {
      expect(shape("(1 + 2) * 3")).to.equal("((1 + 2) * 3)");
    });
  });

  describe("errors", () => {
    it("rejects chained relational operators", () => {
      expect(() => parseGclExpression("1 < 2 < 3")).to.throw(
        ParseError,
        "Syntax error in line 1 and column 7: unexpected token '<', expected 'and', 'or', ','",
      );
    });

    it("reports a missing separator", () => {
      expect(() => parseGcl("{int x; x := 1 x := 2}")).to.throw(
        ParseError,
        "Syntax error in line 1 and column 16: unexpected token 'x', expected ';', '}'",
      );
    });

    it("reports the end of input", () => {
      try {
        parseGcl("{print 1");
        expect.fail("expected a ParseError");
      } catch (e) {
        assert(e instanceof ParseError);
        expect(e.kind).to.equal("unexpected-end-of-input");
        expect(e.message).to.equal(
          "Syntax error: unexpected end of input, expected ';', '}'",
        );
      }
    });

    it("requires at least one instruction", () => {
      expect(() => parseGcl("{}")).to.throw(
        ParseError,
        "Syntax error in line 1 and column 2: unexpected token '}', expected identifier, 'print', 'skip', 'if', 'while', '{'",
      );
    });

    it("rejects trailing input after the program", () => {
      expect(() => parseGcl("{skip} skip")).to.throw(
        ParseError,
        "unexpected token 'skip', expected end of input",
      );
    });

    it("limits parenthesis nesting", () => {
      const deep = "(".repeat(20_000) + "1" + ")".repeat(20_000);
      try {
        parseGcl(`{int x; x := ${deep}}`);
        expect.fail("expected a ParseError");
      } catch (e) {
        assert(e instanceof ParseError);
        expect(e.kind).to.equal("nesting-too-deep");
        expect(e.message).to.equal(
          "Syntax error in line 1 and column 270: '(' nests too deeply",
        );
      }
    });

    it("limits block nesting", () => {
      const deep = "{".repeat(20_000) + "skip" + "}".repeat(20_000);
      expect(() => parseGcl(deep)).to.throw(
        ParseError,
        "Syntax error in line 1 and column 258: '{' nests too deeply",
      );
    });

    it("limits the height of operator chains", () => {
      const long = Array.from({ length: 2000 }, () => "1").join(" + ");
      expect(() => parseGclExpression(long)).to.throw(
        ParseError,
        "Syntax error in line 1 and column 1023: '+' nests too deeply",
      );
    });

    it("accepts nesting up to the limit", () => {
      const deep = "(".repeat(255) + "1" + ")".repeat(255);
      expect(shape(deep)).to.equal("1");
    });

    it("propagates lexical errors", () => {
      expect(() => parseGcl("{print 1 # 2}")).to.throw(LexicalError);
    });
  });
});
