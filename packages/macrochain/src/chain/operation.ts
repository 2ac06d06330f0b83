/**
 * Operation descriptors.
 *
 * Every operation has a direct form, evaluated standalone, and usually a
 * chained form that receives the threaded state and the rest of the chain
 * and says where the driver goes next. The driver always selects the
 * chained form inside a chain; nothing in an operation has to work out
 * which context it is running in.
 */

import type { ArithmeticUnit } from "#arith";
import type { MacroError } from "#errors";
import type { Invocation, SourceLocation } from "#parser";
import { Result } from "#result";
import type { Token, Value } from "#tokens";

import { controls, type ChainState, type Stack, type TraceEntry } from "./stack";

export type ChainOutput =
  | {
      /** the chain reached its terminator */
      kind: "flushed";
      values: Stack;
      trace?: readonly TraceEntry[];
    }
  | {
      /** a terminal consumer ended the chain */
      kind: "consumed";
      consumer: string;
      tokens: readonly Token[];
      /** stack values dropped without being substituted */
      discarded: number;
      trace?: readonly TraceEntry[];
    };

export type Outcome = Result<ChainOutput, MacroError>;

export interface Link {
  kind: "link";
  invocation: Invocation;
  operation: Operation;
  next: Next;
}

export interface Terminator {
  kind: "done";
}

export type Next = Link | Terminator;

export const terminator: Terminator = { kind: "done" };

export interface OperationContext {
  readonly arithmetic: ArithmeticUnit;
}

/**
 * What a chained form hands back to the driver
 */
export type Transition =
  | {
      /** run `next` (or the done handler) on `state` */
      kind: "proceed";
      next: Next;
      state: ChainState;
    }
  | {
      /** the chain ended here */
      kind: "stop";
      output: ChainOutput;
    };

export const proceed = (next: Next, state: ChainState): Transition => ({
  kind: "proceed",
  next,
  state,
});

export const stop = (output: ChainOutput): Transition => ({
  kind: "stop",
  output,
});

export type DirectForm = (
  invocation: Invocation,
  context: OperationContext,
) => Result<Value, MacroError>;

export type ChainedForm = (
  invocation: Invocation,
  state: ChainState,
  next: Next,
  context: OperationContext,
) => Result<Transition, MacroError>;

export interface Arity {
  min: number;
  max: number;
}

interface BaseOperation {
  name: string;
  arity: Arity;
  direct: DirectForm;
}

/**
 * Computes a value; inside a chain the value is pushed
 */
export interface ComputeOperation extends BaseOperation {
  kind: "compute";
  chained?: ChainedForm;
}

/**
 * Moves stack values into the next invocation's placeholders
 */
export interface PopOperation extends BaseOperation {
  kind: "pop";
  chained: ChainedForm;
}

/**
 * Ends a chain by consuming the whole remaining stack
 */
export interface TerminalOperation extends BaseOperation {
  kind: "terminal";
  chained: ChainedForm;
}

export type Operation = ComputeOperation | PopOperation | TerminalOperation;

export const exactly = (count: number): Arity => ({ min: count, max: count });

export const acceptsArgs = ({ arity }: Operation, count: number): boolean =>
  count >= arity.min && count <= arity.max;

export const formatArity = ({ min, max }: Arity): string => {
  if (min === max) return `${min}`;
  if (max === Infinity) return `at least ${min}`;
  return `${min} to ${max}`;
};

/**
 * Attach an invocation's location to every error of a result that has none
 */
export const locate = <T, E extends MacroError>(
  result: Result<T, E>,
  location: SourceLocation | undefined,
): Result<T, E> => {
  for (const message of Result.errors(result)) {
    message.locate(location);
  }
  for (const message of Result.warnings(result)) {
    message.locate(location);
  }
  return result;
};

/**
 * Chained form of a compute operation: compute exactly as the direct form,
 * push the result, continue with the next link.
 */
export const pushing =
  (direct: DirectForm): ChainedForm =>
  (invocation, state, next, context) =>
    Result.map(locate(direct(invocation, context), invocation.loc), (value) =>
      proceed(next, controls.push(state, value)),
    );

/**
 * Describe a compute operation. Unless `chainable` is false its chained
 * form pushes the direct result.
 */
export const defineOperation = ({
  name,
  arity,
  direct,
  chainable = true,
}: {
  name: string;
  arity: Arity | number;
  direct: DirectForm;
  chainable?: boolean;
}): ComputeOperation => ({
  kind: "compute",
  name,
  arity: typeof arity === "number" ? exactly(arity) : arity,
  direct,
  ...(chainable ? { chained: pushing(direct) } : {}),
});
