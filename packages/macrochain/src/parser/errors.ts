/**
 * Parser-specific errors and error codes
 */

import { MacroError } from "#errors";

import type { SourceLocation } from "./ast";

/**
 * Parse errors
 */
export class Error extends MacroError {
  public readonly expected?: string[];

  constructor(message: string, location: SourceLocation, expected?: string[]) {
    super(message, "PARSE_ERROR", location);
    this.expected = expected;
  }
}
