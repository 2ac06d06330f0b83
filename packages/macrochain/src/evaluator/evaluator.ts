/**
 * Evaluates linked items and renders the program's output text
 */

import { ArithmeticUnit } from "#arith";
import type { EngineOptions } from "#config";
import type { MacroError } from "#errors";
import {
  renderOutput,
  run,
  runDirect,
  type ChainOutput,
  type TraceEntry,
} from "#chain";
import type { Item, Linked } from "#linker";
import { Result } from "#result";
import { render } from "#tokens";

export type EvaluatedItem =
  | { kind: "text"; text: string; spaced: boolean }
  | { kind: "direct"; name: string; text: string; spaced: boolean }
  | { kind: "chain"; output: ChainOutput; text: string; spaced: boolean };

export interface ChainTraceEntry extends TraceEntry {
  /** zero-based position of the chain among the program's chains */
  chain: number;
}

export interface Output {
  text: string;
  items: EvaluatedItem[];
  /** empty unless tracing was enabled */
  trace: ChainTraceEntry[];
}

/**
 * Joins item texts, keeping a single space wherever the source had
 * whitespace before an item
 */
export const joinItems = (items: readonly EvaluatedItem[]): string =>
  items
    .map(({ text, spaced }, i) => (i > 0 && spaced ? ` ${text}` : text))
    .join("");

const evaluateItem = (
  item: Item,
  arithmetic: ArithmeticUnit,
  trace: boolean,
): Result<EvaluatedItem, MacroError> => {
  switch (item.kind) {
    case "text":
      return Result.ok({ kind: "text", text: item.token, spaced: item.spaced });

    case "direct": {
      const { invocation, operation, spaced } = item;
      return Result.map(
        runDirect(operation, invocation, { arithmetic }),
        (value): EvaluatedItem => ({
          kind: "direct",
          name: invocation.name,
          text: render(value),
          spaced,
        }),
      );
    }

    case "chain":
      return Result.map(
        run(item.entry, { arithmetic, trace }),
        (output): EvaluatedItem => ({
          kind: "chain",
          output,
          text: renderOutput(output),
          spaced: item.spaced,
        }),
      );
  }
};

/**
 * Every item is evaluated even after a failure so that all errors are
 * reported together
 */
export function evaluateItems(
  { items }: Linked,
  { range, maxExponent, trace }: EngineOptions,
): Result<Output, MacroError> {
  const arithmetic = ArithmeticUnit.for({ range, maxExponent });
  const results = items.map((item) => evaluateItem(item, arithmetic, trace));
  const messages = Result.merge(...results.map((result) => result.messages));

  const evaluated: EvaluatedItem[] = [];
  for (const result of results) {
    if (!result.success) {
      return { success: false, messages };
    }
    evaluated.push(result.value);
  }

  const chainTrace: ChainTraceEntry[] = evaluated
    .flatMap((item) => (item.kind === "chain" ? [item.output] : []))
    .flatMap(({ trace = [] }, chain) =>
      trace.map((entry) => ({ ...entry, chain })),
    );

  return {
    success: true,
    value: { text: joinItems(evaluated), items: evaluated, trace: chainTrace },
    messages,
  };
}
