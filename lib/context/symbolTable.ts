/**
 * Scope-chained symbol tables.
 *
 * Each block gets one `Scope` whose parent is the scope of the enclosing
 * block. Lookup walks outward from the innermost scope, so an inner
 * declaration shadows outer ones for the instructions of its own block.
 *
 * @module
 */
import type { GclType } from "../gcl/types.js";
import type { SourcePosition } from "../shared/position.js";

export interface SymbolInfo {
  readonly name: string;
  readonly type: GclType;
  readonly scope: Scope;
  /** Block nesting depth of the declaring scope; 0 for the program block. */
  readonly depth: number;
  /** Unique state cell of this declaration across the whole program. */
  readonly slot: number;
  readonly position: SourcePosition;
}

export class Scope {
  private readonly symbols = new Map<string, SymbolInfo>();

  public constructor(
    public readonly id: number,
    public readonly parent: Scope | undefined,
  ) {}

  get depth(): number {
    return this.parent === undefined ? 0 : this.parent.depth + 1;
  }

  /**
   * Adds a symbol to this scope.
   *
   * @returns the earlier symbol of the same name in this scope, in which
   *   case nothing is added
   */
  declare(symbol: SymbolInfo): SymbolInfo | undefined {
    const existing = this.symbols.get(symbol.name);
    if (existing !== undefined) return existing;
    this.symbols.set(symbol.name, symbol);
    return undefined;
  }

  lookup(name: string): SymbolInfo | undefined {
    return this.symbols.get(name) ?? this.parent?.lookup(name);
  }

  /**
   * This scope's own symbols in declaration order.
   */
  entries(): SymbolInfo[] {
    return [...this.symbols.values()];
  }
}
