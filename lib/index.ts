/**
 * Guarded Lambda: a translator from Dijkstra's guarded command language to
 * the untyped lambda calculus.
 *
 * This module re-exports the public API:
 * - GCL lexing, parsing, context analysis and source printing
 * - Untyped lambda terms, their reader and the Church combinator library
 * - The translator and a call-by-need reference evaluator
 * - The full compile pipeline (lex → parse → analyze → translate)
 *
 * @example
 * ```ts
 * import { compile, formatOutput, runTranslation } from "guarded-lambda";
 * const result = compile("{int x; x := 1+2; print x}");
 * if (result.ok) {
 *   formatOutput(runTranslation(result.translation).output); // "[3]"
 * }
 * ```
 *
 * @module
 */
// Pipeline exports
export {
  compile,
  CompilationError,
  type CompilationStage,
  type CompileFailure,
  type CompileOptions,
  compileOrThrow,
  type CompileResult,
  type CompileSuccess,
  DEFAULT_COMPILE_OPTIONS,
  type Diagnostic,
} from "./meta/compilation.js";

// Lexer exports
/** Splits GCL source into tokens. */
export { lex, tokenize, TokenStream } from "./lexer/lexer.js";
export { type Token, type TokenKind } from "./lexer/token.js";
export { LexicalError, type LexicalErrorKind } from "./lexer/lexicalError.js";

// Parser exports
/** Parses GCL source into its AST. */
export {
  MAX_PARSE_DEPTH,
  parseGcl,
  parseGclExpression,
} from "./parser/gcl.js";
/** Parses a string representation of an untyped lambda expression into its AST. */
export { type CombinatorTable, parseLambda } from "./parser/untyped.js";
export {
  LambdaParseError,
  ParseError,
  type ParseErrorKind,
} from "./parser/parseError.js";

// GCL exports
export type {
  Block,
  Expression,
  Instruction,
  Program,
  TypeSpec,
} from "./gcl/ast.js";
export { type GclType, prettyPrintType } from "./gcl/types.js";
export { unparseExpression, unparseProgram } from "./gcl/unparse.js";
export { dumpProgram } from "./gcl/dump.js";
export { randProgram, type RandomSource } from "./gcl/generator.js";

// Context analysis exports
export {
  analyze,
  type AnalysisResult,
  type AnalyzedProgram,
  MAX_RANGE_UPPER,
} from "./context/analyzer.js";
export type {
  SemanticError,
  SemanticErrorKind,
} from "./context/semanticError.js";
export { Scope, type SymbolInfo } from "./context/symbolTable.js";

// Lambda terms exports
export {
  expandCombinators,
  freeVariables,
  type LambdaCombinator,
  lambdaEquals,
  /** Generates a human-readable string representation of an untyped lambda expression. */
  prettyPrintUntypedLambda,
  type UntypedLambda,
} from "./terms/lambda.js";
export { churchInt, churchNumeral, COMBINATORS } from "./consts/lambdas.js";

// Translator exports
export {
  DEFAULT_MAX_DEPTH,
  serializeTranslation,
  type SlotLayout,
  translate,
  type TranslateOptions,
  type Translation,
} from "./translator/translator.js";
export {
  TranslationError,
  type TranslationErrorKind,
} from "./translator/translationError.js";

// Evaluator exports
export {
  DEFAULT_MAX_STEPS,
  type EvaluateOptions,
  LazyEvaluator,
  type Value,
} from "./evaluator/lazyEvaluator.js";
export {
  EvaluationError,
  type EvaluationErrorKind,
} from "./evaluator/evaluationError.js";
export {
  formatOutput,
  type OutputValue,
  type RunResult,
  runTranslation,
  type StateValue,
} from "./evaluator/run.js";

export { VERSION } from "./shared/version.js";
