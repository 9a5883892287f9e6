import { describe, it } from "mocha";
import { assert, expect } from "chai";

import { dumpProgram } from "../../lib/gcl/dump.js";
import { analyze } from "../../lib/context/analyzer.js";
import { parseGcl } from "../../lib/parser/gcl.js";

const dump = (source: string): string => {
  const result = analyze(parseGcl(source));
  assert(result.ok);
  return dumpProgram(result.program);
};

describe("dumpProgram", () => {
  it("prints the decorated tree", () => {
    expect(dump("{int x; x := 1+2; print x}")).to.equal(
      [
        "Block",
        "-Symbols Table",
        "--variable: x | type: int",
        "-Sequencing",
        "--Asig",
        "---Ident: x | type: int",
        "---Plus | type: int",
        "----Literal: 1 | type: int",
        "----Literal: 2 | type: int",
        "--Print",
        "---Ident: x | type: int",
        "",
      ].join("\n"),
    );
  });

  it("nests sequencing to the left", () => {
    expect(dump("{skip; skip; skip}")).to.equal(
      [
        "Block",
        "-Sequencing",
        "--Sequencing",
        "---skip",
        "---skip",
        "--skip",
        "",
      ].join("\n"),
    );
  });

  it("prints guards and range accesses", () => {
    expect(dump("{function[..1] a; if a.0 < 1 --> a := a(1:2) fi}")).to.equal(
      [
        "Block",
        "-Symbols Table",
        "--variable: a | type: function[..1]",
        "-If",
        "--Guard",
        "---Less | type: bool",
        "----ReadFunction | type: int",
        "-----Ident: a | type: function[..1]",
        "-----Literal: 0 | type: int",
        "----Literal: 1 | type: int",
        "---Asig",
        "----Ident: a | type: function[..1]",
        "----WriteFunction | type: function[..1]",
        "-----Ident: a | type: function[..1]",
        "-----TwoPoints",
        "------Literal: 1 | type: int",
        "------Literal: 2 | type: int",
        "",
      ].join("\n"),
    );
  });

  it("shows string literals without a type", () => {
    expect(dump('{print "hi"}')).to.equal(
      ["Block", "-Print", '--String: "hi"', ""].join("\n"),
    );
  });
});
