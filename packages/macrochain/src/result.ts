/**
 * Result type shared by every stage of evaluation.
 *
 * A result either succeeds with a value or fails; in both cases it carries
 * the messages produced along the way, grouped by severity.
 */

import type { MacroError } from "#errors";

export enum Severity {
  Error = "error",
  Warning = "warning",
}

export type MessagesBySeverity<E extends MacroError = MacroError> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends MacroError = MacroError> =
  | {
      success: true;
      value: T;
      messages: MessagesBySeverity<E>;
    }
  | {
      success: false;
      messages: MessagesBySeverity<E>;
    };

const group = <E extends MacroError>(
  messages: readonly E[],
): MessagesBySeverity<E> => {
  const grouped: MessagesBySeverity<E> = {};
  for (const message of messages) {
    const bucket = grouped[message.severity] ?? [];
    bucket.push(message);
    grouped[message.severity] = bucket;
  }
  return grouped;
};

const flatten = <E extends MacroError>(
  messages: MessagesBySeverity<E>,
): E[] => [...(messages.error ?? []), ...(messages.warning ?? [])];

const merge = <E extends MacroError>(
  ...all: readonly MessagesBySeverity<E>[]
): MessagesBySeverity<E> => group(all.flatMap((messages) => flatten(messages)));

const isList = <T, O>(value: readonly T[] | O): value is readonly T[] =>
  Array.isArray(value);

export const Result = {
  ok<T>(value: T): Result<T, never> {
    return { success: true, value, messages: {} };
  },

  /**
   * Succeed while still reporting (non-fatal) messages
   */
  okWith<T, E extends MacroError>(
    value: T,
    messages: readonly E[] | MessagesBySeverity<E>,
  ): Result<T, E> {
    return {
      success: true,
      value,
      messages: isList(messages) ? group(messages) : { ...messages },
    };
  },

  err<E extends MacroError>(error: E | readonly E[]): Result<never, E> {
    return { success: false, messages: group(isList(error) ? error : [error]) };
  },

  map<T, U, E extends MacroError>(
    result: Result<T, E>,
    func: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: func(result.value), messages: result.messages };
  },

  /**
   * Chain a fallible step, keeping the messages of both results
   */
  andThen<T, U, E extends MacroError, F extends MacroError>(
    result: Result<T, E>,
    func: (value: T) => Result<U, F>,
  ): Result<U, E | F> {
    if (!result.success) {
      return result;
    }
    const next = func(result.value);
    const messages = merge<E | F>(result.messages, next.messages);
    return next.success
      ? { success: true, value: next.value, messages }
      : { success: false, messages };
  },

  merge,

  errors<E extends MacroError>(result: Result<unknown, E>): E[] {
    return result.messages.error ?? [];
  },

  warnings<E extends MacroError>(result: Result<unknown, E>): E[] {
    return result.messages.warning ?? [];
  },

  hasErrors<E extends MacroError>(result: Result<unknown, E>): boolean {
    return (result.messages.error?.length ?? 0) > 0;
  },
};
