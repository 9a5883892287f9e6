/**
 * Semantic error records.
 *
 * Unlike the lexer and parser, the context analyzer does not throw: it
 * collects every semantic error it finds in one pass and returns them.
 *
 * @module
 */
import type { SourcePosition } from "../shared/position.js";

export type SemanticErrorKind =
  | "undeclared-identifier"
  | "redeclaration"
  | "type-mismatch"
  | "arity-or-range-mismatch";

export interface SemanticError {
  readonly kind: SemanticErrorKind;
  readonly message: string;
  readonly position: SourcePosition;
  /** The identifier involved, when there is one. */
  readonly name?: string;
}
