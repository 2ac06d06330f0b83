/**
 * Configuration errors and error codes
 */

import { MacroError } from "#errors";
import type { SourceLocation } from "#parser";
import { Severity } from "#result";

export enum ErrorCode {
  INVALID_VALUE = "CONFIG001",
  UNKNOWN_KEY = "CONFIG002",
  MALFORMED = "CONFIG003",
  UNREADABLE = "CONFIG004",
}

export const ErrorMessages = {
  [ErrorCode.INVALID_VALUE]: "Invalid configuration value",
  [ErrorCode.UNKNOWN_KEY]: "Unknown configuration key",
  [ErrorCode.MALFORMED]: "Malformed configuration file",
  [ErrorCode.UNREADABLE]: "Cannot read configuration file",
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
