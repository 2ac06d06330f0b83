import { Result } from "#result";
import { countPlaceholders, fillEach } from "#tokens";

import { Error as ChainError, ErrorCode } from "../errors";
import {
  exactly,
  proceed,
  pushing,
  type ComputeOperation,
  type DirectForm,
  type PopOperation,
} from "../operation";
import { controls } from "../stack";

const itself: DirectForm = ({ args: [value] }) => Result.ok(value);

/**
 * Push(v): puts v on the front of the stack
 */
export const push: ComputeOperation = {
  kind: "compute",
  name: "Push",
  arity: exactly(1),
  direct: itself,
  chained: pushing(itself),
};

/**
 * Identity(v): v unchanged; after a Pop it re-pushes the popped value
 */
export const identity: ComputeOperation = {
  kind: "compute",
  name: "Identity",
  arity: exactly(1),
  direct: itself,
  chained: pushing(itself),
};

export const POP_ARITIES = [1, 2, 3] as const;

export type PopArity = (typeof POP_ARITIES)[number];

/**
 * Arity written as Pop's argument; `Pop()` means `Pop(1)`
 */
export const popArity = (args: readonly (readonly string[])[]): PopArity | undefined => {
  if (args.length === 0) {
    return 1;
  }
  const text = args[0].join("");
  return POP_ARITIES.find((arity) => String(arity) === text);
};

/**
 * Pop(k): removes the front k values and fills the next invocation's
 * placeholders with them, oldest first, so the first placeholder receives
 * the k-th most recent value and the last receives the most recent.
 */
export const pop: PopOperation = {
  kind: "pop",
  name: "Pop",
  arity: { min: 0, max: 1 },

  direct: ({ loc }) =>
    Result.err(new ChainError(ErrorCode.OUTSIDE_CHAIN, "Pop", loc)),

  chained: (invocation, state, next) => {
    const { args, loc } = invocation;
    const arity = popArity(args);
    if (arity === undefined) {
      return Result.err(
        new ChainError(ErrorCode.INVALID_POP_ARITY, args[0].join(""), loc),
      );
    }

    if (next.kind === "done") {
      return Result.err(new ChainError(ErrorCode.DANGLING_POP, undefined, loc));
    }

    const values = controls.topN(state, arity);
    if (values.length < arity) {
      return Result.err(
        new ChainError(
          ErrorCode.STACK_UNDERFLOW,
          `Pop(${arity}) with ${values.length} value(s) on the stack`,
          loc,
        ),
      );
    }

    const target = next.invocation;
    const placeholders = countPlaceholders(target.args);
    if (placeholders !== arity) {
      return Result.err(
        new ChainError(
          ErrorCode.PLACEHOLDER_MISMATCH,
          `Pop(${arity}) followed by ${target.name} with ${placeholders} placeholder(s)`,
          target.loc ?? loc,
        ),
      );
    }

    const filled = {
      ...next,
      invocation: { ...target, args: fillEach(target.args, [...values].reverse()) },
    };
    return Result.ok(proceed(filled, controls.popN(state, arity)));
  },
};
