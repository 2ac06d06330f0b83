/**
 * Diagnostic formatting with source excerpts
 */

import type { MacroError } from "#errors";
import { Severity } from "#result";

export interface SourceContext {
  source?: string;
  sourcePath?: string;
}

const excerpt = (error: MacroError, source: string): string[] => {
  const { location } = error;
  if (!location) {
    return [];
  }
  const line = source.split("\n")[location.line - 1];
  if (line === undefined) {
    return [];
  }
  const available = Math.max(1, line.length - location.column + 1);
  const width = Math.max(1, Math.min(location.length, available));
  const gutter = String(location.line);
  return [
    `${gutter} | ${line}`,
    `${" ".repeat(gutter.length)} | ${" ".repeat(location.column - 1)}${"^".repeat(width)}`,
  ];
};

const format = (
  error: MacroError,
  { source, sourcePath }: SourceContext,
): string => {
  const kind = error.severity === Severity.Warning ? "warning" : "error";
  const { location } = error;
  const where = location
    ? `${sourcePath ?? "<input>"}:${location.line}:${location.column}: `
    : sourcePath
      ? `${sourcePath}: `
      : "";
  const lines = [`${where}${kind}[${error.code}]: ${error.message}`];
  if (source !== undefined) {
    lines.push(...excerpt(error, source));
  }
  return lines.join("\n");
};

export function formatError(error: MacroError, context: SourceContext = {}): string {
  return format(error, context);
}

export function formatWarning(
  warning: MacroError,
  context: SourceContext = {},
): string {
  return format(warning, context);
}
