import { formatPosition, type SourcePosition } from "../shared/position.js";

export type TranslationErrorKind = "unsupported-construct" | "depth-exceeded";

export class TranslationError extends Error {
  constructor(
    public readonly kind: TranslationErrorKind,
    public readonly detail: string,
    public readonly position: SourcePosition,
  ) {
    super(`${detail} at ${formatPosition(position)}`);
    this.name = "TranslationError";
  }
}
