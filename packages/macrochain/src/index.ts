export const VERSION = "0.1.0";

export * as Tokens from "#tokens";
export * as Tables from "#tables";
export * as Arith from "#arith";

// Re-export the chain protocol and builder
export {
  $,
  Add,
  Chain,
  ChainBuilder,
  ChainError,
  Identity,
  Log2,
  Negate,
  OperationRegistry,
  Pop,
  Pow2,
  Print,
  Push,
  Subtract,
  Tokenize,
  Unwrap,
  chain,
  evaluateChain,
  evaluateDirect,
  renderOutput,
  type ChainOutput,
  type Operation,
  type TraceEntry,
} from "#chain";

// Re-export the arithmetic unit
export { ArithmeticUnit } from "#arith";

// Re-export parser functionality
export { parse, parseInvocationText, ParseError } from "#parser";

// Re-export configuration
export {
  DEFAULT_OPTIONS,
  parseConfig,
  resolveOptions,
  type EngineOptions,
} from "#config";

export type { ChainTraceEntry, EvaluatedItem, Output } from "#evaluator";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export pipeline interfaces
export { evaluate, type EvaluateOptions } from "#pipeline";

// CLI utilities are not exported; import them from ./cli in Node.js
