/**
 * Everything the CLI prints goes through here: results to stdout,
 * diagnostics to stderr
 */

import { promises as fs } from "fs";

import type { MacroError } from "#errors";

import { formatError, formatWarning, type SourceContext } from "./error-formatter";

export function displayErrors(
  errors: readonly MacroError[],
  context: SourceContext = {},
): void {
  for (const error of errors) {
    console.error(formatError(error, context));
  }
}

export function displayWarnings(
  warnings: readonly MacroError[],
  context: SourceContext = {},
): void {
  for (const warning of warnings) {
    console.error(formatWarning(warning, context));
  }
}

/**
 * Write to a file when a path is given, stdout otherwise
 */
export async function writeOutput(
  content: string,
  outputPath?: string,
): Promise<void> {
  if (outputPath) {
    await fs.writeFile(outputPath, `${content}\n`, "utf-8");
    return;
  }
  console.log(content);
}

/**
 * Report a fatal CLI problem; returns the exit status to use
 */
export function exitWithError(message: string): number {
  console.error(`Error: ${message}`);
  return 1;
}
