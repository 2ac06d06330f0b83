import type { ParseArgsConfig } from "util";

import {
  ConfigError,
  ErrorCode,
  checkMaxExponent,
  checkRange,
} from "#config";
import { Result } from "#result";
import type { RangeTier } from "#tables";

export const FORMATS = ["text", "json"] as const;

export type Format = (typeof FORMATS)[number];

export const commonOptions = {
  expression: { type: "string", short: "e" },
  range: { type: "string", short: "r" },
  "max-exponent": { type: "string" },
  config: { type: "string", short: "c" },
  format: { type: "string", short: "f", default: "text" },
  trace: { type: "boolean", short: "t" },
  output: { type: "string", short: "o" },
  help: { type: "boolean", short: "h" },
} as const satisfies ParseArgsConfig["options"];

export const usage = `Usage: macrochain [options] [file]

Evaluate macrochain source from a file or from --expression.

Options:
  -e, --expression <src>   Evaluate the given source text
  -r, --range <tier>       Operand range: 256, 512 or 1024 (default: 256)
      --max-exponent <n>   Power-of-two table bound (default: 73)
  -c, --config <path>      Configuration file (default: ./macrochain.yaml)
  -f, --format <format>    Output format: text or json (default: text)
  -t, --trace              Print the stack after every chain link to stderr
  -o, --output <file>      Write the result to a file
  -h, --help               Show this help message

Examples:
  macrochain -e "Chain(Add(5, 6), Add(40, 80), Pop(2), Subtract($, $))"
  macrochain --range 1024 --trace program.chain`;

const invalid = (message: string) =>
  Result.err(new ConfigError(ErrorCode.INVALID_VALUE, message));

export const parseRangeTier = (text: string): Result<RangeTier, ConfigError> =>
  /^\d+$/.test(text)
    ? checkRange(Number(text))
    : invalid(`range must be a number, got "${text}"`);

export const parseMaxExponent = (text: string): Result<number, ConfigError> =>
  /^\d+$/.test(text)
    ? checkMaxExponent(Number(text))
    : invalid(`max-exponent must be a non-negative integer, got "${text}"`);

const isFormat = (text: string): text is Format =>
  FORMATS.some((format) => format === text);

export const parseFormat = (text: string): Result<Format, ConfigError> =>
  isFormat(text)
    ? Result.ok(text)
    : invalid(`format must be one of ${FORMATS.join(", ")}, got "${text}"`);
