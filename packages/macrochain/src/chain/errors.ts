/**
 * Stack-protocol misuse, reported as malformed chains
 */

import { MacroError } from "#errors";
import type { SourceLocation } from "#parser";
import { Severity } from "#result";

export enum ErrorCode {
  STACK_UNDERFLOW = "CHAIN001",
  PLACEHOLDER_MISMATCH = "CHAIN002",
  NOT_CHAINABLE = "CHAIN003",
  TERMINAL_NOT_LAST = "CHAIN004",
  OUTSIDE_CHAIN = "CHAIN005",
  DANGLING_POP = "CHAIN006",
  UNFILLED_PLACEHOLDER = "CHAIN007",
  UNKNOWN_OPERATION = "CHAIN008",
  ARITY_MISMATCH = "CHAIN009",
  INVALID_POP_ARITY = "CHAIN010",
  VALUES_DISCARDED = "CHAIN011",
}

export const ErrorMessages = {
  [ErrorCode.STACK_UNDERFLOW]: "Stack underflow: not enough values on the stack",
  [ErrorCode.PLACEHOLDER_MISMATCH]:
    "Placeholder count does not match the pop arity",
  [ErrorCode.NOT_CHAINABLE]: "Operation has no chained form",
  [ErrorCode.TERMINAL_NOT_LAST]:
    "Terminal consumer must be the last operation of a chain",
  [ErrorCode.OUTSIDE_CHAIN]: "Operation is only meaningful inside a chain",
  [ErrorCode.DANGLING_POP]: "Pop has no following operation to fill",
  [ErrorCode.UNFILLED_PLACEHOLDER]: "Placeholder left unfilled",
  [ErrorCode.UNKNOWN_OPERATION]: "Unknown operation",
  [ErrorCode.ARITY_MISMATCH]: "Wrong number of arguments",
  [ErrorCode.INVALID_POP_ARITY]: "Pop arity must be 1, 2 or 3",
  [ErrorCode.VALUES_DISCARDED]: "Terminal consumer discarded stack values",
};

export class Error extends MacroError {
  constructor(
    code: ErrorCode,
    message?: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, severity);
  }
}
