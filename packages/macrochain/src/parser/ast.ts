/**
 * Syntax tree produced by the parser
 */

import type { Template, Token } from "#tokens";

export interface SourceLocation {
  /** zero-based character offset */
  offset: number;
  length: number;
  /** one-based */
  line: number;
  /** one-based */
  column: number;
}

export interface Invocation {
  kind: "invocation";
  name: string;
  args: Template[];
  loc?: SourceLocation;
}

export interface ChainExpression {
  kind: "chain";
  links: Invocation[];
  loc?: SourceLocation;
}

/**
 * Token outside any invocation, copied to the output unchanged
 */
export interface Text {
  kind: "text";
  token: Token;
  loc?: SourceLocation;
}

export type Node = Invocation | ChainExpression | Text;

export interface Segment {
  node: Node;
  /** whether whitespace preceded the node in the source */
  spaced: boolean;
}

export interface Program {
  kind: "program";
  segments: Segment[];
}

export const isInvocation = (node: Node): node is Invocation =>
  node.kind === "invocation";

export const isChain = (node: Node): node is ChainExpression =>
  node.kind === "chain";
