/**
 * Pass system for composing evaluation stages
 */

export * from "./pass";
export * from "./sequence";
export * from "./sequences";
export { evaluate, type EvaluateOptions } from "./evaluate";
