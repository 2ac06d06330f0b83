import { describe, it, expect } from "vitest";

import { OperationRegistry, STANDARD_OPERATIONS, defineOperation } from "#chain";
import { Result } from "#result";

import { evaluate } from "./evaluate";
import { targetSequences } from "./sequences";

async function text(source: string): Promise<string> {
  const result = await evaluate({ source });
  if (!result.success) {
    const codes = Result.errors(result).map(({ code }) => code);
    throw new Error(`evaluation failed: ${codes.join(", ")}`);
  }
  return result.value.text;
}

async function errorCodes(
  options: Parameters<typeof evaluate>[0],
): Promise<string[]> {
  return Result.errors(await evaluate(options)).map(({ code }) => code);
}

describe("evaluate", () => {
  it("evaluates chains written as source", async () => {
    expect(
      await text("Chain(Add(5, 6), Add(40, 80), Pop(2), Subtract($, $))"),
    ).toBe("-109");
    expect(
      await text(`
        Chain(
          Add(5, -9)
          Pop() Subtract($, 2)
          Pop() Negate($)
          Pop() Identity($)
        )
      `),
    ).toBe("6");
  });

  it("evaluates standalone invocations through their direct form", async () => {
    expect(await text("Add(5, 6)")).toBe("11");
    expect(await text("Pow2(-4)")).toBe("1/16");
  });

  it("copies surrounding text, keeping word spacing", async () => {
    expect(await text("let total = Add(100, 28);")).toBe("let total = 128;");
    expect(await text("x=Add(1,2);")).toBe("x=3;");
  });

  it("joins several chains in order", async () => {
    expect(await text("Chain(Push(11), Push(18)) Chain(Push(100), Pop(), Identity($))")).toBe(
      "(18)(11) 100",
    );
  });

  it("collects the errors of every item", async () => {
    const result = await evaluate({ source: "Pop() Add(600, 1)" });
    expect(result.success).toBe(false);
    expect(Result.errors(result).map(({ code, location }) => [code, location?.column])).toEqual([
      ["CHAIN005", 1],
      ["ARITH002", 7],
    ]);
  });

  it("reports parse, link and option errors", async () => {
    expect(await errorCodes({ source: "Add(1," })).toEqual(["PARSE_ERROR"]);
    expect(await errorCodes({ source: "Frob(1) Chain(Pop())" })).toEqual([
      "CHAIN008",
      "CHAIN006",
    ]);
    expect(await errorCodes({ source: "x", maxExponent: -1 })).toEqual([
      "CONFIG001",
    ]);
  });

  it("locates errors raised inside a chain", async () => {
    const result = await evaluate({ source: "Chain(Push(1),\n  Add(500, 200))" });
    expect(Result.errors(result)[0]).toMatchObject({
      code: "ARITH001",
      location: { line: 2, column: 3 },
    });
  });

  it("honours the range tier", async () => {
    expect(await errorCodes({ source: "Add(600, 1)" })).toEqual(["ARITH002"]);
    const result = await evaluate({ source: "Add(600, 1)", range: 1024 });
    expect(result).toMatchObject({ success: true, value: { text: "601" } });
  });

  it("keeps warnings on success", async () => {
    const result = await evaluate({ source: "Chain(Push(1), Push(2), Unwrap($))" });
    expect(result).toMatchObject({ success: true, value: { text: "2" } });
    expect(Result.warnings(result).map(({ code }) => code)).toEqual(["CHAIN011"]);
  });

  it("traces every chain when asked", async () => {
    const result = await evaluate({
      source: "Chain(Push(1), Push(2)) Chain(Push(3))",
      trace: true,
    });
    if (!result.success) throw new Error("evaluation failed");
    expect(result.value.text).toBe("(2)(1) 3");
    expect(result.value.trace).toEqual([
      { chain: 0, step: 1, operation: "Push", stack: [["1"]] },
      { chain: 0, step: 2, operation: "Push", stack: [["2"], ["1"]] },
      { chain: 1, step: 1, operation: "Push", stack: [["3"]] },
    ]);
  });

  it("uses a custom registry", async () => {
    const registry = new OperationRegistry([
      ...STANDARD_OPERATIONS,
      defineOperation({
        name: "Twice",
        arity: 1,
        direct: ({ args: [value] }) => Result.ok([...value, ...value]),
      }),
    ]);
    const result = await evaluate({
      source: "Chain(Push(4), Pop(), Twice($ +))",
      registry,
    });
    expect(result).toMatchObject({ success: true, value: { text: "4+4+" } });
  });
});

describe("target sequences", () => {
  it("stops after linking", async () => {
    const result = await targetSequences.linked.run({ source: "a Add(1, 2)" });
    if (!result.success) throw new Error("linking failed");
    expect(result.value.linked.items.map(({ kind }) => kind)).toEqual([
      "text",
      "direct",
    ]);
    expect(result.value.options).toEqual({
      range: 256,
      maxExponent: 73,
      trace: false,
    });
  });

  it("stops after parsing", async () => {
    const result = await targetSequences.ast.run({ source: "Frob(1)" });
    expect(result.success).toBe(true);
  });
});
