/**
 * The GCL compilation pipeline: lexing, parsing, context analysis and
 * translation to lambda calculus.
 *
 * @example
 * ```ts
 * import { compile, runTranslation, formatOutput } from "guarded-lambda";
 *
 * const result = compile("{int x; x := 1+2; print x}");
 * if (result.ok) {
 *   console.log(result.text);
 *   console.log(formatOutput(runTranslation(result.translation).output)); // [3]
 * }
 * ```
 *
 * @module
 */
import type { Program } from "../gcl/ast.js";
import { type AnalyzedProgram, analyze } from "../context/analyzer.js";
import type { SemanticErrorKind } from "../context/semanticError.js";
import { tokenize } from "../lexer/lexer.js";
import { LexicalError, type LexicalErrorKind } from "../lexer/lexicalError.js";
import type { Token } from "../lexer/token.js";
import { parseGcl } from "../parser/gcl.js";
import { ParseError, type ParseErrorKind } from "../parser/parseError.js";
import type { SourcePosition } from "../shared/position.js";
import {
  DEFAULT_MAX_DEPTH,
  guardDepth,
  serializeTranslation,
  translate,
  type Translation,
} from "../translator/translator.js";
import {
  TranslationError,
  type TranslationErrorKind,
} from "../translator/translationError.js";

export type CompilationStage = "lex" | "parse" | "analyze" | "translate";

export type Diagnostic =
  | {
    readonly category: "lexical";
    readonly kind: LexicalErrorKind;
    readonly message: string;
    readonly position: SourcePosition;
  }
  | {
    readonly category: "syntax";
    readonly kind: ParseErrorKind;
    readonly message: string;
    readonly position: SourcePosition;
  }
  | {
    readonly category: "semantic";
    readonly kind: SemanticErrorKind;
    readonly message: string;
    readonly position: SourcePosition;
  }
  | {
    readonly category: "translation";
    readonly kind: TranslationErrorKind;
    readonly message: string;
    readonly position: SourcePosition;
  };

export interface CompileOptions {
  /** Deepest AST nesting the translator accepts. */
  maxDepth?: number;
  /** Serialize as one fully inlined term instead of named definitions. */
  expand?: boolean;
}

export const DEFAULT_COMPILE_OPTIONS: Required<CompileOptions> = {
  maxDepth: DEFAULT_MAX_DEPTH,
  expand: false,
};

export interface CompileSuccess {
  readonly ok: true;
  readonly program: Program;
  readonly analyzed: AnalyzedProgram;
  readonly translation: Translation;
  /** `translation` rendered as text. */
  readonly text: string;
}

export interface CompileFailure {
  readonly ok: false;
  readonly stage: CompilationStage;
  readonly diagnostics: readonly Diagnostic[];
}

export type CompileResult = CompileSuccess | CompileFailure;

export class CompilationError extends Error {
  constructor(
    message: string,
    public readonly stage: CompilationStage,
    public readonly diagnostics: readonly Diagnostic[],
  ) {
    super(message);
    this.name = "CompilationError";
  }
}

const failure = (
  stage: CompilationStage,
  diagnostic: Diagnostic,
): CompileFailure => ({ ok: false, stage, diagnostics: [diagnostic] });

/**
 * Runs every stage over `source`. Lexing, parsing and translation stop at
 * the first error; analysis reports every error it finds, and translation
 * never starts if there was one.
 */
export function compile(
  source: string,
  options: CompileOptions = {},
): CompileResult {
  const maxDepth = options.maxDepth ?? DEFAULT_COMPILE_OPTIONS.maxDepth;
  const expand = options.expand ?? DEFAULT_COMPILE_OPTIONS.expand;

  let tokens: Token[];
  try {
    tokens = tokenize(source);
  } catch (e) {
    if (!(e instanceof LexicalError)) throw e;
    return failure("lex", {
      category: "lexical",
      kind: e.kind,
      message: e.message,
      position: e.position,
    });
  }

  let program: Program;
  try {
    program = parseGcl(tokens);
  } catch (e) {
    if (!(e instanceof ParseError)) throw e;
    return failure("parse", {
      category: "syntax",
      kind: e.kind,
      message: e.message,
      position: e.position,
    });
  }

  const analysis = analyze(program);
  if (!analysis.ok) {
    return {
      ok: false,
      stage: "analyze",
      diagnostics: analysis.errors.map((error): Diagnostic => ({
        category: "semantic",
        kind: error.kind,
        message: error.message,
        position: error.position,
      })),
    };
  }

  let translation: Translation;
  let text: string;
  try {
    translation = translate(analysis.program, { maxDepth });
    const translated = translation;
    text = guardDepth(
      program.position,
      () => serializeTranslation(translated, { expand }),
    );
  } catch (e) {
    if (!(e instanceof TranslationError)) throw e;
    return failure("translate", {
      category: "translation",
      kind: e.kind,
      message: e.message,
      position: e.position,
    });
  }

  return {
    ok: true,
    program,
    analyzed: analysis.program,
    translation,
    text,
  };
}

/**
 * Like `compile`, but throws a `CompilationError` naming the failed stage.
 */
export function compileOrThrow(
  source: string,
  options: CompileOptions = {},
): CompileSuccess {
  const result = compile(source, options);
  if (!result.ok) {
    throw new CompilationError(
      result.diagnostics.map((d) => d.message).join("\n"),
      result.stage,
      result.diagnostics,
    );
  }
  return result;
}
