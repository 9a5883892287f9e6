/**
 * Source positions shared by every pipeline stage.
 *
 * @module
 */

/**
 * A 1-based line and column into the GCL source text.
 */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

export const mkPosition = (line: number, column: number): SourcePosition => ({
  line,
  column,
});

export const formatPosition = (position: SourcePosition): string =>
  `line ${position.line} and column ${position.column}`;
