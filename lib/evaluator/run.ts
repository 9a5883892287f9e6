/**
 * Running translated programs and decoding what they leave behind.
 *
 * @module
 */
import { churchNumeral } from "../consts/lambdas.js";
import { OutputTag, type Translation } from "../translator/translator.js";
import { EvaluationError } from "./evaluationError.js";
import {
  type EvaluateOptions,
  LazyEvaluator,
  type Value,
} from "./lazyEvaluator.js";

export type StateValue =
  | { readonly kind: "int"; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "function"; readonly values: readonly number[] };

export type OutputValue =
  | StateValue
  | { readonly kind: "string"; readonly value: string };

export interface RunResult {
  /** `aborted` once an `if` found no true guard. */
  readonly status: "ok" | "aborted";
  readonly output: readonly OutputValue[];
  /** Final values of the program block's variables. */
  readonly state: Readonly<Record<string, StateValue>>;
  readonly steps: number;
}

/**
 * Evaluates `translation.main` and reads back the final configuration.
 */
export function runTranslation(
  translation: Translation,
  options: EvaluateOptions = {},
): RunResult {
  const evaluator = new LazyEvaluator(options);
  const config = evaluator.evaluate(translation.main);
  const [ok, rest] = evaluator.readPair(config);
  const [stateTuple, out] = evaluator.readPair(rest);

  const output = evaluator.readList(out).map((entry) =>
    readOutput(evaluator, entry)
  );

  const state: Record<string, StateValue> = {};
  let cursor = stateTuple;
  for (const slot of translation.layout) {
    const [value, next] = evaluator.readPair(cursor);
    cursor = next;
    const { name, type, depth } = slot.symbol;
    if (depth > 0) continue;
    switch (type.kind) {
      case "int":
        state[name] = { kind: "int", value: evaluator.readInt(value) };
        break;
      case "bool":
        state[name] = { kind: "bool", value: evaluator.readBool(value) };
        break;
      case "function":
        state[name] = {
          kind: "function",
          values: readRange(evaluator, value, type.upper + 1),
        };
        break;
    }
  }

  return {
    status: evaluator.readBool(ok) ? "ok" : "aborted",
    output,
    state,
    steps: evaluator.steps,
  };
}

function readRange(
  evaluator: LazyEvaluator,
  range: Value,
  size: number,
): number[] {
  return Array.from({ length: size }, (_, i) => {
    const index = evaluator.evaluate(churchNumeral(i));
    return evaluator.readInt(evaluator.apply(range, index));
  });
}

function readOutput(evaluator: LazyEvaluator, entry: Value): OutputValue {
  const [tagValue, payload] = evaluator.readPair(entry);
  const tag = evaluator.readNat(tagValue);
  switch (tag) {
    case OutputTag.int:
      return { kind: "int", value: evaluator.readInt(payload) };
    case OutputTag.bool:
      return { kind: "bool", value: evaluator.readBool(payload) };
    case OutputTag.string:
      return { kind: "string", value: readString(evaluator, payload) };
    case OutputTag.function:
      return {
        kind: "function",
        values: evaluator.readList(payload).map((v) => evaluator.readInt(v)),
      };
    default:
      throw new EvaluationError(
        "unexpected-shape",
        `unknown output tag ${tag}`,
      );
  }
}

function readString(evaluator: LazyEvaluator, fragments: Value): string {
  return evaluator.readList(fragments).map((fragment) => {
    const [tagValue, payload] = evaluator.readPair(fragment);
    const tag = evaluator.readNat(tagValue);
    switch (tag) {
      case OutputTag.string:
        return String.fromCodePoint(
          ...evaluator.readList(payload).map((code) => evaluator.readNat(code)),
        );
      case OutputTag.int:
        return String(evaluator.readInt(payload));
      case OutputTag.bool:
        return String(evaluator.readBool(payload));
      default:
        throw new EvaluationError(
          "unexpected-shape",
          `unknown string fragment tag ${tag}`,
        );
    }
  }).join("");
}

const formatValue = (value: OutputValue): string => {
  switch (value.kind) {
    case "int":
    case "bool":
      return String(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "function":
      return `[${value.values.join(", ")}]`;
  }
};

/**
 * Renders printed values as a bracketed list, e.g. `[3, "hi", [1, 2]]`.
 */
export const formatOutput = (output: readonly OutputValue[]): string =>
  `[${output.map(formatValue).join(", ")}]`;
