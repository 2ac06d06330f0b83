import type { Value } from "#tokens";

/**
 * Ordered list of values; index 0 is the front (most recently pushed).
 * Stacks are never mutated: every operation returns a new snapshot.
 */
export type Stack = readonly Value[];

export const emptyStack: Stack = [];

/** Add a value to the front of the stack */
export const push = (stack: Stack, value: Value): Stack => [value, ...stack];

/** Remove the front N values, returning the remaining stack */
export const popN = (stack: Stack, num: number): Stack => stack.slice(num);

/** Read the front N values (fewer when the stack is shorter) */
export const topN = (stack: Stack, num: number): readonly Value[] =>
  stack.slice(0, num);

export interface TraceEntry {
  /** one-based position of the link in its chain */
  step: number;
  operation: string;
  /** stack after the link ran, before the next one starts */
  stack: Stack;
}

/**
 * Everything threaded from one link of a chain to the next
 */
export interface ChainState {
  stack: Stack;
  step: number;
  /** present only when tracing is enabled */
  trace?: readonly TraceEntry[];
}

export const initialState = (trace: boolean): ChainState => ({
  stack: emptyStack,
  step: 0,
  ...(trace ? { trace: [] } : {}),
});

export const controls = {
  push(state: ChainState, value: Value): ChainState {
    return { ...state, stack: push(state.stack, value) };
  },

  popN(state: ChainState, num: number): ChainState {
    return { ...state, stack: popN(state.stack, num) };
  },

  topN(state: ChainState, num: number): readonly Value[] {
    return topN(state.stack, num);
  },

  /**
   * Count a finished link and, when tracing, record the stack it left
   */
  record(state: ChainState, operation: string): ChainState {
    const step = state.step + 1;
    if (!state.trace) {
      return { ...state, step };
    }
    return {
      ...state,
      step,
      trace: [...state.trace, { step, operation, stack: state.stack }],
    };
  },
};
