/**
 * Arithmetic-specific errors and error codes
 */

import { MacroError } from "#errors";
import type { SourceLocation } from "#parser";
import { Severity } from "#result";

export enum ErrorCode {
  RESULT_OUT_OF_RANGE = "ARITH001",
  OPERAND_OUT_OF_RANGE = "ARITH002",
  NOT_A_POWER_OF_TWO = "ARITH003",
  EXPONENT_OUT_OF_RANGE = "ARITH004",
  INVALID_OPERAND = "ARITH005",
}

export const ErrorMessages = {
  [ErrorCode.RESULT_OUT_OF_RANGE]: "Result outside the configured range",
  [ErrorCode.OPERAND_OUT_OF_RANGE]: "Operand outside the configured range",
  [ErrorCode.NOT_A_POWER_OF_TWO]: "Operand is not a power of two",
  [ErrorCode.EXPONENT_OUT_OF_RANGE]: "Exponent outside the power-of-two table",
  [ErrorCode.INVALID_OPERAND]: "Operand is not a number",
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
