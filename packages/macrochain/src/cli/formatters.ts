import type { MacroError } from "#errors";
import type { ChainTraceEntry, EvaluatedItem, Output } from "#evaluator";
import { renderValue } from "#tokens";

export function formatText(output: Output): string {
  return output.text;
}

const describeItem = (item: EvaluatedItem) => {
  switch (item.kind) {
    case "text":
      return { kind: item.kind, text: item.text };
    case "direct":
      return { kind: item.kind, operation: item.name, text: item.text };
    case "chain":
      return item.output.kind === "consumed"
        ? {
            kind: item.kind,
            text: item.text,
            consumer: item.output.consumer,
            discarded: item.output.discarded,
          }
        : {
            kind: item.kind,
            text: item.text,
            values: item.output.values.map(renderValue),
          };
  }
};

const describeEntry = ({ chain, step, operation, stack }: ChainTraceEntry) => ({
  chain,
  step,
  operation,
  stack: stack.map(renderValue),
});

export function formatJson(
  output: Output,
  warnings: readonly MacroError[] = [],
): string {
  return JSON.stringify(
    {
      text: output.text,
      items: output.items.map(describeItem),
      ...(output.trace.length > 0
        ? { trace: output.trace.map(describeEntry) }
        : {}),
      warnings: warnings.map(({ code, message }) => ({ code, message })),
    },
    null,
    2,
  );
}

/**
 * One line per executed link: chain, step, operation, stack front first
 */
export function formatTrace(trace: readonly ChainTraceEntry[]): string {
  return trace
    .map(({ chain, step, operation, stack }) => {
      const values =
        stack.length > 0 ? stack.map(renderValue).join(" ") : "<empty>";
      return `[chain ${chain}] ${step}. ${operation} -> ${values}`;
    })
    .join("\n");
}
