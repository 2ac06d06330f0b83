/**
 * Bounded Arithmetic Unit
 */

export {
  type BinaryKind,
  type BinaryOperation,
  ArithmeticUnit,
  canonicalize,
} from "./unit";
export { readInteger, readPower, exponentOf } from "./operands";
export * from "./errors";
