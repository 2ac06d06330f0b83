import { CHAIN } from "#parser";

import type { Operation } from "./operation";
import {
  add,
  identity,
  log2,
  negate,
  pop,
  pow2,
  print,
  push,
  subtract,
  tokenize,
  unwrap,
} from "./operations";

export const STANDARD_OPERATIONS: readonly Operation[] = [
  add,
  subtract,
  negate,
  log2,
  pow2,
  identity,
  push,
  pop,
  unwrap,
  print,
  tokenize,
];

/**
 * Name-to-descriptor table consulted by the chain driver and by direct
 * evaluation
 */
export class OperationRegistry {
  private readonly operations = new Map<string, Operation>();

  constructor(operations: Iterable<Operation> = []) {
    for (const operation of operations) {
      this.register(operation);
    }
  }

  static standard(): OperationRegistry {
    return new OperationRegistry(STANDARD_OPERATIONS);
  }

  /**
   * Add or replace an operation
   */
  register(operation: Operation): this {
    if (operation.name === CHAIN) {
      throw new RangeError(`"${CHAIN}" is reserved for the chain driver`);
    }
    this.operations.set(operation.name, operation);
    return this;
  }

  get(name: string): Operation | undefined {
    return this.operations.get(name);
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  names(): string[] {
    return [...this.operations.keys()];
  }
}
