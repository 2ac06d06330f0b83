import { describe, it, expect } from "vitest";

import { Result } from "#result";

import { defineOperation } from "./operation";
import { OperationRegistry } from "./registry";

describe("OperationRegistry", () => {
  it("holds the standard operations", () => {
    expect(OperationRegistry.standard().names()).toEqual([
      "Add",
      "Subtract",
      "Negate",
      "Log2",
      "Pow2",
      "Identity",
      "Push",
      "Pop",
      "Unwrap",
      "Print",
      "Tokenize",
    ]);
  });

  it("reserves the chain name", () => {
    const chain = defineOperation({
      name: "Chain",
      arity: 0,
      direct: () => Result.ok([]),
    });
    expect(() => new OperationRegistry([chain])).toThrow(RangeError);
  });

  it("replaces an operation registered twice", () => {
    const first = defineOperation({ name: "X", arity: 0, direct: () => Result.ok(["1"]) });
    const second = defineOperation({ name: "X", arity: 1, direct: () => Result.ok(["2"]) });
    const registry = new OperationRegistry([first, second]);
    expect(registry.get("X")).toBe(second);
    expect(registry.has("Y")).toBe(false);
  });
});
