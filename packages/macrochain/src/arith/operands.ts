import { Result } from "#result";
import { paste, render, type Token, type Value } from "#tokens";

import { Error, ErrorCode } from "./errors";

const INTEGER = /^-?\d+$/;
const POWER = /^\d+(?:\/\d+)?$/;
const CANONICAL_POWER = /^(1\/)?([1-9]\d*)$/;

const DIGITS = /^\d+$/;

/**
 * Text of an operand written as `parts` tokens, each matching its pattern.
 * A single token must match `whole` instead.
 */
const readShaped = (
  value: Value,
  whole: RegExp,
  parts: readonly RegExp[],
): string | undefined => {
  if (value.length === 1) {
    return whole.test(value[0]) ? value[0] : undefined;
  }
  if (value.length !== parts.length) {
    return undefined;
  }
  return value.every((token, i) => parts[i].test(token))
    ? paste(value)
    : undefined;
};

/**
 * Reads a signed decimal integer written as one token or as `-`, `9`
 */
export const readInteger = (value: Value): Result<number, Error> => {
  const text = readShaped(value, INTEGER, [/^-$/, DIGITS]);
  if (text === undefined) {
    return Result.err(
      new Error(ErrorCode.INVALID_OPERAND, `expected an integer, got "${render(value)}"`),
    );
  }
  const number = Number(text);
  // collapse -0
  return Result.ok(number === 0 ? 0 : number);
};

/**
 * Reads an integer or fractional (`1/8`) power-of-two operand as one token
 */
export const readPower = (value: Value): Result<Token, Error> => {
  const text = readShaped(value, POWER, [DIGITS, /^\/$/, DIGITS]);
  if (text === undefined) {
    return Result.err(
      new Error(ErrorCode.INVALID_OPERAND, `expected a power of two, got "${render(value)}"`),
    );
  }
  return Result.ok(text);
};

/**
 * Exponent of a canonically written power of two (`8`, `1/8`), computed
 * without the tables. Undefined for anything else, `1/1` included.
 */
export const exponentOf = (token: Token): number | undefined => {
  const match = CANONICAL_POWER.exec(token);
  if (!match) {
    return undefined;
  }
  const [, fraction, digits] = match;
  const magnitude = BigInt(digits);
  if ((magnitude & (magnitude - 1n)) !== 0n) {
    return undefined;
  }
  const exponent = magnitude.toString(2).length - 1;
  if (fraction) {
    return exponent === 0 ? undefined : -exponent;
  }
  return exponent;
};
