import {
  type ArithmeticUnit,
  type Error as ArithmeticError,
  readInteger,
  readPower,
} from "#arith";
import { Result } from "#result";
import type { Value } from "#tokens";

import {
  exactly,
  pushing,
  type ComputeOperation,
  type DirectForm,
} from "../operation";

const integer = (n: number): Value => [String(n)];

const binary = (
  name: string,
  apply: (unit: ArithmeticUnit, a: number, b: number) => Result<number, ArithmeticError>,
): ComputeOperation => {
  const direct: DirectForm = ({ args: [first, second] }, { arithmetic }) =>
    Result.andThen(readInteger(first), (a) =>
      Result.andThen(readInteger(second), (b) =>
        Result.map(apply(arithmetic, a, b), integer),
      ),
    );
  return { kind: "compute", name, arity: exactly(2), direct, chained: pushing(direct) };
};

const unary = (name: string, direct: DirectForm): ComputeOperation => ({
  kind: "compute",
  name,
  arity: exactly(1),
  direct,
  chained: pushing(direct),
});

export const add = binary("Add", (unit, a, b) => unit.add(a, b));

export const subtract = binary("Subtract", (unit, a, b) => unit.subtract(a, b));

export const negate = unary("Negate", ({ args: [operand] }, { arithmetic }) =>
  Result.andThen(readInteger(operand), (a) =>
    Result.map(arithmetic.negate(a), integer),
  ),
);

export const log2 = unary("Log2", ({ args: [operand] }, { arithmetic }) =>
  Result.andThen(readPower(operand), (power) =>
    Result.map(arithmetic.log2(power), integer),
  ),
);

export const pow2 = unary("Pow2", ({ args: [operand] }, { arithmetic }) =>
  Result.andThen(readInteger(operand), (n) =>
    Result.map(arithmetic.pow2(n), (power): Value => [power]),
  ),
);
