/**
 * The `gclc` command line: compiles a GCL source file to lambda calculus,
 * prints its decorated tree, or runs it.
 *
 * @module
 */
import { readFile, writeFile } from "node:fs/promises";
import tkexport from "terminal-kit";

import { dumpProgram } from "../gcl/dump.js";
import { formatOutput, runTranslation } from "../evaluator/run.js";
import { EvaluationError } from "../evaluator/evaluationError.js";
import { DEFAULT_MAX_STEPS } from "../evaluator/lazyEvaluator.js";
import { compile, DEFAULT_COMPILE_OPTIONS } from "../meta/compilation.js";
import { VERSION } from "../shared/version.js";

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface CliIo {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  /** Program output: translations, trees and run results. */
  write(text: string): void;
  log: Logger;
}

// the terminal is only set up on first use
export const terminalLogger: Logger = {
  info: (msg) => tkexport.terminal.cyan(msg + "\n"),
  success: (msg) => tkexport.terminal.green(msg + "\n"),
  warn: (msg) => tkexport.terminal.yellow(msg + "\n"),
  error: (msg) => tkexport.terminal.red(msg + "\n"),
};

export const nodeIo: CliIo = {
  readFile: (path) => readFile(path, "utf-8"),
  writeFile: (path, content) => writeFile(path, content, "utf-8"),
  write: (text) => {
    process.stdout.write(text);
  },
  log: terminalLogger,
};

interface CLIOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  ast: boolean;
  expand: boolean;
  run: boolean;
  maxDepth: number;
  maxSteps: number;
}

type ParsedArgs =
  | {
    ok: true;
    options: CLIOptions;
    inputPath?: string;
    outputPath?: string;
  }
  | { ok: false; error: string };

function parseCount(flag: string, value: string | undefined): number | string {
  const n = value === undefined ? NaN : Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) {
    return `Option ${flag} expects a positive integer`;
  }
  return n;
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CLIOptions = {
    help: false,
    version: false,
    verbose: false,
    ast: false,
    expand: false,
    run: false,
    maxDepth: DEFAULT_COMPILE_OPTIONS.maxDepth,
    maxSteps: DEFAULT_MAX_STEPS,
  };

  let inputPath: string | undefined;
  let outputPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--verbose":
      case "-V":
        options.verbose = true;
        break;
      case "--ast":
        options.ast = true;
        break;
      case "--expand":
        options.expand = true;
        break;
      case "--run":
        options.run = true;
        break;
      case "--output":
      case "-o": {
        const value = args[++i];
        if (value === undefined) {
          return { ok: false, error: `Option ${arg} expects a file name` };
        }
        outputPath = value;
        break;
      }
      case "--max-depth":
      case "--max-steps": {
        const n = parseCount(arg, args[++i]);
        if (typeof n === "string") return { ok: false, error: n };
        if (arg === "--max-depth") {
          options.maxDepth = n;
        } else {
          options.maxSteps = n;
        }
        break;
      }
      default:
        if (arg.startsWith("-")) {
          return { ok: false, error: `Unknown option: ${arg}` };
        }
        if (inputPath !== undefined) {
          return {
            ok: false,
            error: "Too many arguments. Use --help for usage information.",
          };
        }
        inputPath = arg;
        break;
    }
  }

  return { ok: true, options, inputPath, outputPath };
}

export function helpText(): string {
  return `
GCL to Lambda Calculus Translator (gclc) v${VERSION}

USAGE:
    gclc [OPTIONS] <input.gcl>

OPTIONS:
    -h, --help           Show this help message
    -v, --version        Show version information
    -V, --verbose        Enable verbose output
    -o, --output <file>  Write the translation to <file> instead of stdout
        --ast            Print the decorated syntax tree
        --expand         Inline every combinator into a single term
        --run            Evaluate the translation and print its output
        --max-depth <n>  Deepest nesting the translator accepts (default ${DEFAULT_COMPILE_OPTIONS.maxDepth})
        --max-steps <n>  Evaluation step budget for --run (default ${DEFAULT_MAX_STEPS})

EXAMPLES:
    gclc program.gcl                 # Print combinator definitions and main
    gclc --expand -o out.lambda program.gcl
    gclc --run program.gcl           # e.g. [3]
`;
}

/**
 * Runs the command line with `args` (without the executable name).
 *
 * @returns the process exit code
 */
export async function runCli(
  args: readonly string[],
  io: CliIo = nodeIo,
): Promise<number> {
  const parsed = parseArgs(args);
  if (!parsed.ok) {
    io.log.error(parsed.error);
    io.log.error("Use --help for usage information.");
    return 1;
  }
  const { options, inputPath, outputPath } = parsed;

  if (options.help) {
    io.write(helpText());
    return 0;
  }
  if (options.version) {
    io.write(`gclc v${VERSION}\n`);
    return 0;
  }
  if (inputPath === undefined) {
    io.log.error("Error: No input file specified.");
    io.log.error("Use --help for usage information.");
    return 1;
  }

  if (options.verbose) io.log.info(`Reading ${inputPath}...`);
  let source: string;
  try {
    source = await io.readFile(inputPath);
  } catch (error) {
    io.log.error(
      `Cannot read input file '${inputPath}': ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    return 1;
  }

  if (options.verbose) io.log.info("Compiling GCL program...");
  const result = compile(source, {
    maxDepth: options.maxDepth,
    expand: options.expand,
  });
  if (!result.ok) {
    for (const diagnostic of result.diagnostics) {
      io.log.error(diagnostic.message);
    }
    return 1;
  }
  if (options.verbose) {
    io.log.info(`   Slots: ${result.translation.layout.length}`);
    io.log.info(`   Combinators: ${result.translation.combinators.length}`);
  }

  const text = options.ast ? dumpProgram(result.analyzed) : result.text;
  if (outputPath !== undefined) {
    try {
      await io.writeFile(outputPath, text);
    } catch (error) {
      io.log.error(
        `Cannot write output file '${outputPath}': ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return 1;
    }
    if (options.verbose) io.log.success(`Wrote ${outputPath}`);
  } else if (!options.run) {
    io.write(text);
  }

  if (options.run) {
    if (options.verbose) io.log.info("Evaluating...");
    try {
      const run = runTranslation(result.translation, {
        maxSteps: options.maxSteps,
      });
      io.write(`${formatOutput(run.output)}\n`);
      if (options.verbose) io.log.info(`   Steps: ${run.steps}`);
      if (run.status === "aborted") {
        io.log.warn("Program aborted: no guard of an if was true");
        return 2;
      }
    } catch (error) {
      if (!(error instanceof EvaluationError)) throw error;
      io.log.error(`Evaluation error: ${error.message}`);
      return 1;
    }
  }
  return 0;
}
