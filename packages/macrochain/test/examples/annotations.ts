/**
 * Test Block Parser
 *
 * Parses fenced YAML test blocks from .chain example files.
 * Format: block comment starting with @test, containing YAML:
 *
 *     /*@test
 *     output: "-109"
 *     *\/
 *
 * Recognised keys: `output` (exact text), `error` (first error code),
 * `warnings` (list of warning codes) and the engine options `range`,
 * `maxExponent` and `trace`.
 */

import YAML from "yaml";

import { readOptions, type EngineOptions } from "#config";

export interface Expectation {
  output?: string;
  error?: string;
  warnings?: string[];
}

export interface TestBlock {
  name?: string;
  raw: string;
  expect: Expectation;
  options: Partial<EngineOptions>;
}

export interface ParsedBlocks {
  blocks: TestBlock[];
  /** blocks that could not be read, with the reason */
  problems: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/**
 * Remove common leading indentation from a multi-line string.
 */
function dedent(text: string): string {
  const lines = text.split("\n");

  let minIndent = Infinity;
  for (const line of lines) {
    if (line.trim()) {
      const indent = line.match(/^(\s*)/)?.[1].length ?? 0;
      minIndent = Math.min(minIndent, indent);
    }
  }

  if (minIndent === Infinity || minIndent === 0) {
    return text;
  }

  return lines.map((line) => line.slice(minIndent)).join("\n");
}

function readExpectation(parsed: Record<string, unknown>): Expectation | string {
  const { output, error, warnings } = parsed;
  const expectation: Expectation = {};

  if (output !== undefined) {
    if (typeof output !== "string" && typeof output !== "number") {
      return "output must be a string";
    }
    expectation.output = String(output);
  }
  if (error !== undefined) {
    if (typeof error !== "string") {
      return "error must be an error code";
    }
    expectation.error = error;
  }
  if (warnings !== undefined) {
    if (!isStringList(warnings)) {
      return "warnings must be a list of error codes";
    }
    expectation.warnings = warnings;
  }
  if (expectation.output === undefined && expectation.error === undefined) {
    return "expected an output or an error";
  }
  return expectation;
}

/**
 * Parse all test blocks from a source file.
 */
export function parseTestBlocks(source: string): ParsedBlocks {
  const blocks: TestBlock[] = [];
  const problems: string[] = [];

  // Match /*@test <name>\n<yaml>\n*/
  const regex = /\/\*@test[ \t]*(\S*)?\n([\s\S]*?)\*\//g;

  let match;
  while ((match = regex.exec(source)) !== null) {
    const name = match[1] || undefined;
    const raw = dedent(match[2]).trim();

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (error) {
      problems.push(
        `${name ?? "test block"}: ${error instanceof Error ? error.message : String(error)}`,
      );
      continue;
    }
    if (!isRecord(parsed)) {
      problems.push(`${name ?? "test block"}: expected a mapping`);
      continue;
    }

    const expectation = readExpectation(parsed);
    if (typeof expectation === "string") {
      problems.push(`${name ?? "test block"}: ${expectation}`);
      continue;
    }

    const { range, maxExponent, trace } = parsed;
    const options = readOptions({ range, maxExponent, trace });
    if (!options.success) {
      problems.push(
        `${name ?? "test block"}: ${options.messages.error?.[0]?.message ?? "invalid options"}`,
      );
      continue;
    }

    blocks.push({ name, raw, expect: expectation, options: options.value });
  }

  return { blocks, problems };
}
