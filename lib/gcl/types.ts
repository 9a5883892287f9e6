/**
 * Static types of GCL expressions.
 *
 * `list` is the type of a comma-separated integer literal such as `1, 2, 3`,
 * which is only assignable to a function range of matching length. `error`
 * marks a subexpression that already produced a diagnostic.
 *
 * @module
 */
import type { TypeSpec } from "./ast.js";

export type GclType =
  | { readonly kind: "int" }
  | { readonly kind: "bool" }
  | { readonly kind: "string" }
  | { readonly kind: "function"; readonly upper: number }
  | { readonly kind: "list"; readonly length: number }
  | { readonly kind: "error" };

export const INT: GclType = { kind: "int" };
export const BOOL: GclType = { kind: "bool" };
export const STRING: GclType = { kind: "string" };
export const ERROR: GclType = { kind: "error" };

export const mkFunctionType = (upper: number): GclType => ({
  kind: "function",
  upper,
});

export const mkListType = (length: number): GclType => ({
  kind: "list",
  length,
});

export const fromTypeSpec = (spec: TypeSpec): GclType =>
  spec.kind === "function" ? mkFunctionType(spec.upper) : spec;

export const typesEqual = (a: GclType, b: GclType): boolean => {
  switch (a.kind) {
    case "function":
      return b.kind === "function" && a.upper === b.upper;
    case "list":
      return b.kind === "list" && a.length === b.length;
    default:
      return a.kind === b.kind;
  }
};

export const prettyPrintType = (ty: GclType): string => {
  switch (ty.kind) {
    case "int":
    case "bool":
      return ty.kind;
    case "string":
      return "String";
    case "function":
      return `function[..${ty.upper}]`;
    case "list":
      return `function with length=${ty.length}`;
    case "error":
      return "<error>";
  }
};
