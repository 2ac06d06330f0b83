import { parseDocument } from "yaml";

import { Result, Severity } from "#result";
import {
  DEFAULT_MAX_EXPONENT,
  DEFAULT_RANGE,
  RANGE_TIERS,
  isRangeTier,
  type RangeTier,
} from "#tables";

import { Error as ConfigError, ErrorCode } from "./errors";

export interface EngineOptions {
  /** operand bound R; results are bounded by 2R */
  range: RangeTier;
  /** largest |n| in the power-of-two table */
  maxExponent: number;
  /** record the stack after every chain link */
  trace: boolean;
}

export const DEFAULT_OPTIONS: EngineOptions = {
  range: DEFAULT_RANGE,
  maxExponent: DEFAULT_MAX_EXPONENT,
  trace: false,
};

export const MAX_EXPONENT_LIMIT = 1024;

const KEYS: readonly string[] = ["range", "maxExponent", "trace"];

export const checkRange = (value: unknown): Result<RangeTier, ConfigError> =>
  typeof value === "number" && isRangeTier(value)
    ? Result.ok(value)
    : Result.err(
        new ConfigError(
          ErrorCode.INVALID_VALUE,
          `range must be one of ${RANGE_TIERS.join(", ")}, got ${String(value)}`,
        ),
      );

export const checkMaxExponent = (value: unknown): Result<number, ConfigError> =>
  typeof value === "number" &&
  Number.isInteger(value) &&
  value >= 0 &&
  value <= MAX_EXPONENT_LIMIT
    ? Result.ok(value)
    : Result.err(
        new ConfigError(
          ErrorCode.INVALID_VALUE,
          `maxExponent must be an integer from 0 to ${MAX_EXPONENT_LIMIT}, got ${String(value)}`,
        ),
      );

export const checkTrace = (value: unknown): Result<boolean, ConfigError> =>
  typeof value === "boolean"
    ? Result.ok(value)
    : Result.err(
        new ConfigError(
          ErrorCode.INVALID_VALUE,
          `trace must be true or false, got ${String(value)}`,
        ),
      );

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Validate an untyped options object (as read from a config file).
 * Unknown keys are reported as warnings.
 */
export function readOptions(
  raw: unknown,
): Result<Partial<EngineOptions>, ConfigError> {
  if (raw === null || raw === undefined) {
    return Result.ok({});
  }
  if (!isRecord(raw)) {
    return Result.err(
      new ConfigError(ErrorCode.MALFORMED, "expected a mapping of options"),
    );
  }

  const options: Partial<EngineOptions> = {};
  const errors: ConfigError[] = [];
  const warnings: ConfigError[] = [];

  const take = <T>(result: Result<T, ConfigError>, set: (value: T) => void) => {
    if (result.success) {
      set(result.value);
    } else {
      errors.push(...Result.errors(result));
    }
  };

  if (raw.range !== undefined) {
    take(checkRange(raw.range), (range) => (options.range = range));
  }
  if (raw.maxExponent !== undefined) {
    take(
      checkMaxExponent(raw.maxExponent),
      (maxExponent) => (options.maxExponent = maxExponent),
    );
  }
  if (raw.trace !== undefined) {
    take(checkTrace(raw.trace), (trace) => (options.trace = trace));
  }

  for (const key of Object.keys(raw)) {
    if (!KEYS.includes(key)) {
      warnings.push(
        new ConfigError(ErrorCode.UNKNOWN_KEY, key, undefined, Severity.Warning),
      );
    }
  }

  if (errors.length > 0) {
    return Result.err([...errors, ...warnings]);
  }
  return Result.okWith(options, warnings);
}

/**
 * Validate fully typed options, e.g. those passed to `evaluate`
 */
export function checkOptions(
  options: EngineOptions,
): Result<EngineOptions, ConfigError> {
  return Result.andThen(checkRange(options.range), (range) =>
    Result.andThen(checkMaxExponent(options.maxExponent), (maxExponent) =>
      Result.map(checkTrace(options.trace), (trace) => ({
        range,
        maxExponent,
        trace,
      })),
    ),
  );
}

/**
 * Parse YAML configuration text
 */
export function parseConfig(
  text: string,
): Result<Partial<EngineOptions>, ConfigError> {
  const document = parseDocument(text);
  if (document.errors.length > 0) {
    return Result.err(
      document.errors.map((error) => {
        const start = error.linePos?.[0];
        const [offset, end] = error.pos;
        return new ConfigError(
          ErrorCode.MALFORMED,
          error.message,
          start && {
            offset,
            length: end - offset,
            line: start.line,
            column: start.col,
          },
        );
      }),
    );
  }
  return readOptions(document.toJS());
}

/**
 * Later layers override earlier ones; undefined leaves a value alone
 */
export const resolveOptions = (
  ...layers: readonly Partial<EngineOptions>[]
): EngineOptions =>
  layers.reduce<EngineOptions>(
    (options, layer) => ({
      range: layer.range ?? options.range,
      maxExponent: layer.maxExponent ?? options.maxExponent,
      trace: layer.trace ?? options.trace,
    }),
    DEFAULT_OPTIONS,
  );
