import { Result } from "#result";
import { LookupTableStore, type Lookup, type TableOptions } from "#tables";
import type { Token } from "#tokens";

import { Error, ErrorCode } from "./errors";
import { exponentOf } from "./operands";

export type BinaryKind = "add" | "subtract";

export interface BinaryOperation {
  kind: BinaryKind;
  a: number;
  b: number;
}

const symbols: Record<BinaryKind, string> = {
  add: "+",
  subtract: "-",
};

const formatOperation = ({ kind, a, b }: BinaryOperation): string =>
  `${a} ${symbols[kind]} ${b < 0 ? `(${b})` : b}`;

/**
 * Sign canonicalization: a negative second operand flips the operation,
 * so `a + -b` becomes `a - b` and `a - -b` becomes `a + b`.
 * Only signs are inspected.
 */
export const canonicalize = (operation: BinaryOperation): BinaryOperation => {
  const { kind, a, b } = operation;
  if (b >= 0) {
    return operation;
  }
  return { kind: kind === "add" ? "subtract" : "add", a, b: -b };
};

/**
 * Bounded Arithmetic Unit.
 *
 * Every operation resolves to a single lookup into the tier's tables; no
 * operation iterates over its operands.
 */
export class ArithmeticUnit {
  constructor(readonly tables: LookupTableStore = LookupTableStore.for()) {}

  static for(options: Partial<TableOptions> = {}): ArithmeticUnit {
    return new ArithmeticUnit(LookupTableStore.for(options));
  }

  add(a: number, b: number): Result<number, Error> {
    return this.binary({ kind: "add", a, b });
  }

  subtract(a: number, b: number): Result<number, Error> {
    return this.binary({ kind: "subtract", a, b });
  }

  negate(a: number): Result<number, Error> {
    const entry = this.tables.minus(a);
    if (!entry.found) {
      return Result.err(new Error(ErrorCode.OPERAND_OUT_OF_RANGE, `-(${a})`));
    }
    return Result.ok(entry.value);
  }

  log2(power: Token): Result<number, Error> {
    const entry = this.tables.log2(power);
    if (entry.found) {
      return Result.ok(entry.value);
    }
    const exponent = exponentOf(power);
    return Result.err(
      exponent === undefined
        ? new Error(ErrorCode.NOT_A_POWER_OF_TWO, power)
        : new Error(
            ErrorCode.EXPONENT_OUT_OF_RANGE,
            `log2(${power}) = ${exponent} exceeds ±${this.tables.maxExponent}`,
          ),
    );
  }

  pow2(exponent: number): Result<Token, Error> {
    const entry = this.tables.pow2(exponent);
    if (!entry.found) {
      return Result.err(
        new Error(
          ErrorCode.EXPONENT_OUT_OF_RANGE,
          `2^${exponent} exceeds ±${this.tables.maxExponent}`,
        ),
      );
    }
    return Result.ok(entry.value);
  }

  private binary(operation: BinaryOperation): Result<number, Error> {
    const canonical = canonicalize(operation);
    const { kind, a, b } = canonical;

    // The tables cover 0..R for the second operand only. When the first
    // operand is the small one, swap them: a + b = b + a, a - b = -(b - a).
    if (!this.tables.inRange(b) && this.tables.inRange(Math.abs(a))) {
      const swapped = canonicalize({ kind, a: b, b: a });
      const entry = this.lookup(swapped);
      if (kind === "add" || !entry.found) {
        return this.settle(operation, entry);
      }
      return this.settle(operation, this.tables.minus(entry.value));
    }

    return this.settle(operation, this.lookup(canonical));
  }

  private lookup({ kind, a, b }: BinaryOperation): Lookup<number> {
    return kind === "add" ? this.tables.sum(a, b) : this.tables.difference(a, b);
  }

  private settle(
    operation: BinaryOperation,
    entry: Lookup<number>,
  ): Result<number, Error> {
    if (entry.found) {
      return Result.ok(entry.value);
    }
    return Result.err(
      new Error(
        entry.miss === "result"
          ? ErrorCode.RESULT_OUT_OF_RANGE
          : ErrorCode.OPERAND_OUT_OF_RANGE,
        `${formatOperation(operation)} (range ±${this.tables.range}, results ±${this.tables.span})`,
      ),
    );
  }
}
