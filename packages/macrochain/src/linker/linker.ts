/**
 * Resolves a parsed program into evaluable items. Chains are linked into
 * continuations up front so that every static error in the program is
 * reported before anything runs.
 */

import {
  ChainError,
  ErrorCode,
  link,
  type Next,
  type Operation,
  type OperationRegistry,
} from "#chain";
import type { ChainExpression, Invocation, Program, SourceLocation } from "#parser";
import { Result } from "#result";
import type { Token } from "#tokens";

export type Item =
  | {
      kind: "text";
      token: Token;
      spaced: boolean;
      loc?: SourceLocation;
    }
  | {
      kind: "direct";
      invocation: Invocation;
      operation: Operation;
      spaced: boolean;
    }
  | {
      kind: "chain";
      chain: ChainExpression;
      entry: Next;
      spaced: boolean;
    };

export interface Linked {
  items: Item[];
}

export interface LinkProgramOptions {
  registry: OperationRegistry;
}

export function linkProgram(
  program: Program,
  { registry }: LinkProgramOptions,
): Result<Linked, ChainError> {
  const items: Item[] = [];
  const errors: ChainError[] = [];

  for (const { node, spaced } of program.segments) {
    switch (node.kind) {
      case "text":
        items.push({ kind: "text", token: node.token, spaced, loc: node.loc });
        break;

      case "invocation": {
        const operation = registry.get(node.name);
        if (!operation) {
          errors.push(
            new ChainError(ErrorCode.UNKNOWN_OPERATION, node.name, node.loc),
          );
          break;
        }
        items.push({ kind: "direct", invocation: node, operation, spaced });
        break;
      }

      case "chain": {
        const linked = link(node.links, { registry });
        if (!linked.success) {
          errors.push(...Result.errors(linked));
          break;
        }
        items.push({ kind: "chain", chain: node, entry: linked.value, spaced });
        break;
      }
    }
  }

  return errors.length > 0 ? Result.err(errors) : Result.ok({ items });
}
