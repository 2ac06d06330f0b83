import { describe, it, expect } from "vitest";

import { controls, emptyStack, initialState, popN, push, topN } from "./stack";

describe("stack", () => {
  it("pushes to the front", () => {
    const stack = push(push(emptyStack, ["1"]), ["2"]);
    expect(stack).toEqual([["2"], ["1"]]);
  });

  it("never mutates a snapshot", () => {
    const before = push(emptyStack, ["1"]);
    const after = push(before, ["2"]);
    expect(before).toEqual([["1"]]);
    expect(popN(after, 1)).toEqual([["1"]]);
    expect(after).toEqual([["2"], ["1"]]);
  });

  it("restores push order when removed values are reversed", () => {
    const pushed = [["a"], ["b"], ["c"]];
    const stack = pushed.reduce(push, emptyStack);
    expect([...topN(stack, 3)].reverse()).toEqual(pushed);
  });

  it("reads fewer values from a short stack", () => {
    expect(topN([["1"]], 2)).toEqual([["1"]]);
  });

  describe("controls", () => {
    it("threads the stack through state", () => {
      const state = controls.push(initialState(false), ["7"]);
      expect(controls.topN(state, 1)).toEqual([["7"]]);
      expect(controls.popN(state, 1).stack).toEqual([]);
    });

    it("records the stack only when tracing", () => {
      const quiet = controls.record(controls.push(initialState(false), ["1"]), "Push");
      expect(quiet).toEqual({ stack: [["1"]], step: 1 });

      const traced = controls.record(controls.push(initialState(true), ["1"]), "Push");
      expect(traced.trace).toEqual([
        { step: 1, operation: "Push", stack: [["1"]] },
      ]);
    });
  });
});
