/**
 * Typed construction of invocations and chains without going through
 * source text:
 *
 *     Chain(Add(5, 6), Add(40, 80), Pop(2), Subtract($, $))
 *
 *     chain().then(Push(100)).then(Pop()).then(Identity($)).done()
 */

import { lex, type ChainExpression, type Invocation } from "#parser";
import { PLACEHOLDER, type Template, type Token } from "#tokens";

import type { PopArity } from "./operations";

/** The placeholder token */
export const $ = PLACEHOLDER;

/**
 * A number, source text (lexed into tokens), or tokens as they are
 */
export type Operand = number | string | readonly Token[];

const tokensOf = (text: string): Template => {
  const lexed = lex(text);
  return lexed.success ? lexed.value.map(({ text }) => text) : [text];
};

export const toTemplate = (operand: Operand): Template => {
  if (typeof operand === "number") {
    return [String(operand)];
  }
  if (typeof operand === "string") {
    return tokensOf(operand);
  }
  return operand;
};

export const invoke = (name: string, ...operands: Operand[]): Invocation => ({
  kind: "invocation",
  name,
  args: operands.map(toTemplate),
});

export const Add = (a: Operand, b: Operand) => invoke("Add", a, b);
export const Subtract = (a: Operand, b: Operand) => invoke("Subtract", a, b);
export const Negate = (a: Operand) => invoke("Negate", a);
export const Log2 = (a: Operand) => invoke("Log2", a);
export const Pow2 = (n: Operand) => invoke("Pow2", n);
export const Identity = (v: Operand) => invoke("Identity", v);
export const Push = (v: Operand) => invoke("Push", v);
export const Pop = (arity?: PopArity) =>
  arity === undefined ? invoke("Pop") : invoke("Pop", arity);
export const Unwrap = (template: Operand) => invoke("Unwrap", template);
export const Print = (template: Operand) => invoke("Print", template);
export const Tokenize = (template: Operand) => invoke("Tokenize", template);

export const Chain = (...links: Invocation[]): ChainExpression => ({
  kind: "chain",
  links,
});

/**
 * Immutable chain builder; each `then` returns a new builder
 */
export class ChainBuilder {
  constructor(private readonly links: readonly Invocation[] = []) {}

  then(invocation: Invocation): ChainBuilder {
    return new ChainBuilder([...this.links, invocation]);
  }

  done(): ChainExpression {
    return { kind: "chain", links: [...this.links] };
  }
}

export const chain = () => new ChainBuilder();
