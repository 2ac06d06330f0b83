/**
 * Stack threading protocol: operations, the chain driver and the
 * programmatic chain builder
 */

export { Error as ChainError, ErrorCode, ErrorMessages } from "./errors";
export {
  controls,
  emptyStack,
  initialState,
  type ChainState,
  type Stack,
  type TraceEntry,
} from "./stack";
export * from "./operation";
export * from "./operations";
export * from "./registry";
export * from "./driver";
export {
  $,
  Add,
  Chain,
  ChainBuilder,
  Identity,
  Log2,
  Negate,
  Pop,
  Pow2,
  Print,
  Push,
  Subtract,
  Tokenize,
  Unwrap,
  chain,
  invoke,
  toTemplate,
  type Operand,
} from "./builder";
