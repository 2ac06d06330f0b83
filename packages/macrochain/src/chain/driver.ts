/**
 * Chain Driver and Done Handler.
 *
 * A chain is linked back to front into continuations ending in the
 * terminator, then run from the front on an empty stack. Each link hands
 * its successor a new state snapshot; nothing is shared between links or
 * between chains.
 */

import type { ArithmeticUnit } from "#arith";
import type { MacroError } from "#errors";
import type { ChainExpression, Invocation } from "#parser";
import { Result, type MessagesBySeverity } from "#result";
import { countPlaceholders, render, renderValue, type Value } from "#tokens";

import { Error as ChainError, ErrorCode } from "./errors";
import {
  acceptsArgs,
  formatArity,
  locate,
  terminator,
  type ChainOutput,
  type Link,
  type Next,
  type Operation,
  type OperationContext,
  type Outcome,
  type Transition,
} from "./operation";
import { popArity } from "./operations";
import type { OperationRegistry } from "./registry";
import { controls, initialState, type ChainState } from "./stack";

export interface LinkOptions {
  registry: OperationRegistry;
}

export interface RunOptions {
  arithmetic: ArithmeticUnit;
  /** record the stack after every link */
  trace?: boolean;
}

function checkLink(
  invocation: Invocation,
  registry: OperationRegistry,
  last: boolean,
): ChainError[] {
  const { name, args, loc } = invocation;
  const operation = registry.get(name);
  if (!operation) {
    return [new ChainError(ErrorCode.UNKNOWN_OPERATION, name, loc)];
  }

  const errors: ChainError[] = [];
  if (!operation.chained) {
    errors.push(new ChainError(ErrorCode.NOT_CHAINABLE, name, loc));
  }
  if (!acceptsArgs(operation, args.length)) {
    errors.push(
      new ChainError(
        ErrorCode.ARITY_MISMATCH,
        `${name} takes ${formatArity(operation.arity)}, got ${args.length}`,
        loc,
      ),
    );
  }
  if (operation.kind === "pop") {
    if (args.length <= 1 && popArity(args) === undefined) {
      errors.push(
        new ChainError(ErrorCode.INVALID_POP_ARITY, args[0].join(""), loc),
      );
    }
    if (last) {
      errors.push(new ChainError(ErrorCode.DANGLING_POP, undefined, loc));
    }
  }
  if (operation.kind === "terminal" && !last) {
    errors.push(new ChainError(ErrorCode.TERMINAL_NOT_LAST, name, loc));
  }
  return errors;
}

/**
 * Resolve every invocation and link them into continuations.
 * All static problems are reported at once, in source order.
 */
export function link(
  invocations: readonly Invocation[],
  { registry }: LinkOptions,
): Result<Next, ChainError> {
  const errors = invocations.flatMap((invocation, i) =>
    checkLink(invocation, registry, i === invocations.length - 1),
  );
  if (errors.length > 0) {
    return Result.err(errors);
  }

  let next: Next = terminator;
  for (const invocation of [...invocations].reverse()) {
    const operation = registry.get(invocation.name);
    if (!operation) {
      // checkLink rejected unknown names above
      continue;
    }
    next = { kind: "link", invocation, operation, next };
  }
  return Result.ok(next);
}

/**
 * Done Handler: the whole remaining stack, front first
 */
export function flush(state: ChainState): Outcome {
  const output: ChainOutput = {
    kind: "flushed",
    values: state.stack,
    ...(state.trace ? { trace: state.trace } : {}),
  };
  return Result.ok(output);
}

/**
 * Run one link's chained form
 */
function step(
  current: Link,
  state: ChainState,
  context: OperationContext,
): Result<Transition, MacroError> {
  const { invocation, operation } = current;
  if (!operation.chained) {
    return Result.err(
      new ChainError(ErrorCode.NOT_CHAINABLE, invocation.name, invocation.loc),
    );
  }

  if (operation.kind === "compute") {
    const unfilled = countPlaceholders(invocation.args);
    if (unfilled > 0) {
      return Result.err(
        new ChainError(
          ErrorCode.UNFILLED_PLACEHOLDER,
          `${invocation.name} has ${unfilled} placeholder(s) and no preceding Pop`,
          invocation.loc,
        ),
      );
    }
  }

  return operation.chained(invocation, state, current.next, context);
}

/**
 * Run a linked chain from an empty stack, one link at a time
 */
export function run(
  entry: Next,
  { arithmetic, trace = false }: RunOptions,
): Outcome {
  let messages: MessagesBySeverity<MacroError> = {};
  let state = initialState(trace);
  let current = entry;

  while (current.kind === "link") {
    const result = step(current, state, { arithmetic });
    messages = Result.merge(messages, result.messages);
    if (!result.success) {
      return { success: false, messages };
    }

    const transition = result.value;
    if (transition.kind === "stop") {
      return Result.okWith(transition.output, messages);
    }
    state = controls.record(transition.state, current.invocation.name);
    current = transition.next;
  }

  return Result.andThen(Result.okWith(state, messages), flush);
}

export interface ChainOptions extends LinkOptions, RunOptions {}

/**
 * Chain(ops...): link, seed an empty stack, run
 */
export function evaluateChain(
  chain: ChainExpression | readonly Invocation[],
  options: ChainOptions,
): Outcome {
  const invocations = "kind" in chain ? chain.links : chain;
  return Result.andThen<Next, ChainOutput, ChainError, MacroError>(
    link(invocations, options),
    (entry) => run(entry, options),
  );
}

export interface DirectOptions extends LinkOptions {
  arithmetic: ArithmeticUnit;
}

/**
 * Run a resolved operation's direct form
 */
export function runDirect(
  operation: Operation,
  invocation: Invocation,
  { arithmetic }: OperationContext,
): Result<Value, MacroError> {
  const { name, args, loc } = invocation;
  if (!acceptsArgs(operation, args.length)) {
    return Result.err(
      new ChainError(
        ErrorCode.ARITY_MISMATCH,
        `${name} takes ${formatArity(operation.arity)}, got ${args.length}`,
        loc,
      ),
    );
  }
  if (operation.kind === "compute" && countPlaceholders(args) > 0) {
    return Result.err(
      new ChainError(
        ErrorCode.UNFILLED_PLACEHOLDER,
        `${name} outside a chain has nothing to fill its placeholders`,
        loc,
      ),
    );
  }
  return locate(operation.direct(invocation, { arithmetic }), loc);
}

/**
 * Evaluate one invocation standalone through its direct form
 */
export function evaluateDirect(
  invocation: Invocation,
  { registry, arithmetic }: DirectOptions,
): Result<Value, MacroError> {
  const operation = registry.get(invocation.name);
  if (!operation) {
    return Result.err(
      new ChainError(ErrorCode.UNKNOWN_OPERATION, invocation.name, invocation.loc),
    );
  }
  return runDirect(operation, invocation, { arithmetic });
}

/**
 * Text of a chain's result. A single flushed value is rendered bare;
 * otherwise every flushed value keeps its delimiters, front first.
 */
export function renderOutput(output: ChainOutput): string {
  if (output.kind === "consumed") {
    return render(output.tokens);
  }
  if (output.values.length === 1) {
    return render(output.values[0]);
  }
  return output.values.map(renderValue).join("");
}
