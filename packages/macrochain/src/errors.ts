/**
 * Base error type for every diagnostic macrochain reports
 */

import type { SourceLocation } from "#parser";
import { Severity } from "#result";

export class MacroError extends Error {
  public readonly code: string;
  public location?: SourceLocation;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.location = location;
    this.severity = severity;
  }

  /**
   * Attaches a source location unless the error already has one
   */
  locate(location: SourceLocation | undefined): this {
    this.location ??= location;
    return this;
  }
}

/**
 * Raised for failures that indicate a bug rather than bad input
 */
export class InternalError extends MacroError {
  constructor(message: string, location?: SourceLocation) {
    super(message, "INTERNAL_ERROR", location);
  }
}
