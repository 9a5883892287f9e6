import { describe, it } from "mocha";
import { expect } from "chai";

import {
  type CliIo,
  helpText,
  parseArgs,
  runCli,
} from "../../lib/cli/main.js";
import { compileOrThrow } from "../../lib/meta/compilation.js";
import { dumpProgram } from "../../lib/gcl/dump.js";
import { VERSION } from "../../lib/shared/version.js";

interface FakeIo extends CliIo {
  readonly stdout: string[];
  readonly files: Map<string, string>;
  readonly logs: { level: string; msg: string }[];
}

const fakeIo = (files: Record<string, string> = {}): FakeIo => {
  const stdout: string[] = [];
  const logs: { level: string; msg: string }[] = [];
  const store = new Map(Object.entries(files));
  const logAt = (level: string) => (msg: string) => {
    logs.push({ level, msg });
  };
  return {
    stdout,
    logs,
    files: store,
    readFile: (path) => {
      const content = store.get(path);
      return content === undefined
        ? Promise.reject(new Error(`ENOENT: no such file, open '${path}'`))
        : Promise.resolve(content);
    },
    writeFile: (path, content) => {
      store.set(path, content);
      return Promise.resolve();
    },
    write: (text) => {
      stdout.push(text);
    },
    log: {
      info: logAt("info"),
      success: logAt("success"),
      warn: logAt("warn"),
      error: logAt("error"),
    },
  };
};

const SCENARIO = "{int x; x := 1+2; print x}";

const errors = (io: FakeIo): string[] =>
  io.logs.filter((l) => l.level === "error").map((l) => l.msg);

describe("parseArgs", () => {
  it("reads flags, numbers and paths", () => {
    const parsed = parseArgs([
      "--run",
      "--max-steps",
      "100",
      "-o",
      "out.lambda",
      "prog.gcl",
    ]);
    expect(parsed.ok).to.equal(true);
    if (!parsed.ok) return;
    expect(parsed.options.run).to.equal(true);
    expect(parsed.options.maxSteps).to.equal(100);
    expect(parsed.outputPath).to.equal("out.lambda");
    expect(parsed.inputPath).to.equal("prog.gcl");
  });

  it("rejects bad values", () => {
    expect(parseArgs(["--max-depth", "0"])).to.deep.equal({
      ok: false,
      error: "Option --max-depth expects a positive integer",
    });
    expect(parseArgs(["-o"])).to.deep.equal({
      ok: false,
      error: "Option -o expects a file name",
    });
    expect(parseArgs(["a.gcl", "b.gcl"])).to.deep.equal({
      ok: false,
      error: "Too many arguments. Use --help for usage information.",
    });
  });
});

describe("runCli", () => {
  it("prints the version", async () => {
    const io = fakeIo();
    expect(await runCli(["--version"], io)).to.equal(0);
    expect(io.stdout).to.deep.equal([`gclc v${VERSION}\n`]);
  });

  it("prints the help text", async () => {
    const io = fakeIo();
    expect(await runCli(["-h"], io)).to.equal(0);
    expect(io.stdout).to.deep.equal([helpText()]);
  });

  it("writes the translation to stdout", async () => {
    const io = fakeIo({ "prog.gcl": SCENARIO });
    expect(await runCli(["prog.gcl"], io)).to.equal(0);
    expect(io.stdout).to.deep.equal([compileOrThrow(SCENARIO).text]);
  });

  it("writes the translation to a file", async () => {
    const io = fakeIo({ "prog.gcl": SCENARIO });
    expect(await runCli(["--expand", "-o", "out.lambda", "prog.gcl"], io)).to
      .equal(0);
    expect(io.stdout).to.deep.equal([]);
    expect(io.files.get("out.lambda")).to.equal(
      compileOrThrow(SCENARIO, { expand: true }).text,
    );
  });

  it("prints the decorated tree", async () => {
    const io = fakeIo({ "prog.gcl": SCENARIO });
    expect(await runCli(["--ast", "prog.gcl"], io)).to.equal(0);
    expect(io.stdout).to.deep.equal([
      dumpProgram(compileOrThrow(SCENARIO).analyzed),
    ]);
  });

  it("runs the program", async () => {
    const io = fakeIo({ "prog.gcl": SCENARIO });
    expect(await runCli(["--run", "prog.gcl"], io)).to.equal(0);
    expect(io.stdout).to.deep.equal(["[3]\n"]);
  });

  it("exits with 2 when the program aborts", async () => {
    const io = fakeIo({ "prog.gcl": "{print 1; if false --> skip fi}" });
    expect(await runCli(["--run", "prog.gcl"], io)).to.equal(2);
    expect(io.stdout).to.deep.equal(["[1]\n"]);
    expect(io.logs).to.deep.equal([{
      level: "warn",
      msg: "Program aborted: no guard of an if was true",
    }]);
  });

  it("logs progress when verbose", async () => {
    const io = fakeIo({ "prog.gcl": SCENARIO });
    expect(await runCli(["-V", "prog.gcl"], io)).to.equal(0);
    expect(io.logs[0]).to.deep.equal({
      level: "info",
      msg: "Reading prog.gcl...",
    });
  });

  describe("failures", () => {
    it("rejects an unknown option", async () => {
      const io = fakeIo();
      expect(await runCli(["--bogus"], io)).to.equal(1);
      expect(errors(io)).to.deep.equal([
        "Unknown option: --bogus",
        "Use --help for usage information.",
      ]);
    });

    it("requires an input file", async () => {
      const io = fakeIo();
      expect(await runCli([], io)).to.equal(1);
      expect(errors(io)[0]).to.equal("Error: No input file specified.");
    });

    it("reports an unreadable input file", async () => {
      const io = fakeIo();
      expect(await runCli(["missing.gcl"], io)).to.equal(1);
      expect(errors(io)).to.deep.equal([
        "Cannot read input file 'missing.gcl': ENOENT: no such file, open 'missing.gcl'",
      ]);
    });

    it("reports an unwritable output file", async () => {
      const io: FakeIo = {
        ...fakeIo({ "prog.gcl": SCENARIO }),
        writeFile: (path) =>
          Promise.reject(new Error(`EACCES: permission denied, open '${path}'`)),
      };
      expect(await runCli(["-o", "/locked/out.lambda", "prog.gcl"], io)).to
        .equal(1);
      expect(errors(io)).to.deep.equal([
        "Cannot write output file '/locked/out.lambda': EACCES: permission denied, open '/locked/out.lambda'",
      ]);
      expect(io.stdout).to.deep.equal([]);
    });

    it("translates programs with large literals", async () => {
      const io = fakeIo({ "prog.gcl": "{int x; x := 50000; print x}" });
      expect(await runCli(["--run", "prog.gcl"], io)).to.equal(0);
      expect(io.stdout).to.deep.equal(["[50000]\n"]);
    });

    it("reports compile errors", async () => {
      const io = fakeIo({ "prog.gcl": "{int y; y := z+1}" });
      expect(await runCli(["prog.gcl"], io)).to.equal(1);
      expect(errors(io)).to.deep.equal([
        "Variable z not declared at line 1 and column 14",
      ]);
      expect(io.stdout).to.deep.equal([]);
    });

    it("reports an exhausted step budget", async () => {
      const io = fakeIo({ "prog.gcl": SCENARIO });
      expect(await runCli(["--run", "--max-steps", "10", "prog.gcl"], io)).to
        .equal(1);
      expect(errors(io)).to.deep.equal([
        "Evaluation error: evaluation did not finish within 10 steps",
      ]);
    });
  });
});
