import { describe, it, expect } from "vitest";

import { Result } from "#result";

import type { Program } from "./ast";
import { lex } from "./lexer";
import { parse, parseInvocationText } from "./parser";

function parsed(source: string): Program {
  const result = parse(source);
  if (!result.success) {
    throw new Error(Result.errors(result)[0]?.message ?? "parse failed");
  }
  return result.value;
}

describe("lexer", () => {
  it("splits identifiers, digit runs and punctuation", () => {
    const result = lex("Add(5,-19) CALL_$");
    if (!result.success) throw new Error("lex failed");
    expect(result.value.map(({ text }) => text)).toEqual([
      "Add",
      "(",
      "5",
      ",",
      "-",
      "19",
      ")",
      "CALL_",
      "$",
    ]);
  });

  it("drops comments and remembers preceding whitespace", () => {
    const result = lex("a /* c */b // d\nc");
    if (!result.success) throw new Error("lex failed");
    expect(result.value.map(({ text, spaced }) => [text, spaced])).toEqual([
      ["a", false],
      ["b", true],
      ["c", true],
    ]);
  });

  it("tracks lines and columns", () => {
    const result = lex("x\n  yz");
    if (!result.success) throw new Error("lex failed");
    expect(result.value[1]?.loc).toEqual({
      offset: 4,
      length: 2,
      line: 2,
      column: 3,
    });
  });

  it("rejects an unterminated block comment", () => {
    const result = lex("a /* b");
    expect(result.success).toBe(false);
    expect(Result.errors(result)[0]?.location).toMatchObject({
      line: 1,
      column: 3,
    });
  });
});

describe("parser", () => {
  it("keeps arguments as token sequences", () => {
    const [segment] = parsed("Add(Add(1,2),3)").segments;
    expect(segment?.node).toMatchObject({
      kind: "invocation",
      name: "Add",
      args: [["Add", "(", "1", ",", "2", ")"], ["3"]],
    });
  });

  it("distinguishes no arguments from empty ones", () => {
    const [empty, blanks] = parsed("Pop() Pop(,)").segments;
    expect(empty?.node).toMatchObject({ args: [] });
    expect(blanks?.node).toMatchObject({ args: [[], []] });
  });

  it("parses chains with or without commas", () => {
    const [segment] = parsed("Chain(Add(5,6) Pop(), Negate($))").segments;
    if (segment?.node.kind !== "chain") throw new Error("expected a chain");
    expect(segment.node.links.map(({ name }) => name)).toEqual([
      "Add",
      "Pop",
      "Negate",
    ]);
    expect(segment.node.links[2]?.args).toEqual([["$"]]);
  });

  it("passes other tokens through", () => {
    const { segments } = parsed("x = Add(1, 2);");
    expect(
      segments.map(({ node, spaced }) => [node.kind, spaced]),
    ).toEqual([
      ["text", false],
      ["text", true],
      ["invocation", true],
      ["text", false],
    ]);
  });

  it("records invocation spans", () => {
    const [segment] = parsed("  Negate(4)").segments;
    expect(segment?.node.loc).toEqual({
      offset: 2,
      length: 9,
      line: 1,
      column: 3,
    });
  });

  it("reports unterminated argument lists", () => {
    const result = parse("Add(1,");
    expect(Result.errors(result).map(({ code, message }) => [code, message])).toEqual([
      ["PARSE_ERROR", "Unterminated argument list for Add"],
    ]);
  });

  it("reports non-invocations inside a chain", () => {
    const result = parse("\n  Chain(5)");
    const [error] = Result.errors(result);
    expect(error?.message).toBe(
      "expected an operation invocation inside Chain but found 5",
    );
    expect(error?.location).toMatchObject({ line: 2, column: 9 });
  });

  it("parses exactly one invocation on request", () => {
    expect(parseInvocationText("Negate(4)")).toMatchObject({
      success: true,
      value: { name: "Negate", args: [["4"]] },
    });
    expect(parseInvocationText("Negate(4) x").success).toBe(false);
    expect(parseInvocationText("x").success).toBe(false);
  });
});
