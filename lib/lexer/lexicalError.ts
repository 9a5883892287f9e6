/**
 * Lexical error definitions.
 *
 * @module
 */
import type { SourcePosition } from "../shared/position.js";
import { formatPosition } from "../shared/position.js";

export type LexicalErrorKind =
  | "invalid-character"
  | "unterminated-string"
  | "invalid-escape";

export class LexicalError extends Error {
  constructor(
    public readonly kind: LexicalErrorKind,
    public readonly detail: string,
    public readonly position: SourcePosition,
  ) {
    super(`${detail} at ${formatPosition(position)}`);
    this.name = "LexicalError";
  }
}
