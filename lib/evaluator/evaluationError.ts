export type EvaluationErrorKind =
  | "step-limit"
  | "stack-exhausted"
  | "unbound-variable"
  | "bad-application"
  | "unexpected-shape";

export class EvaluationError extends Error {
  constructor(
    public readonly kind: EvaluationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "EvaluationError";
  }
}
