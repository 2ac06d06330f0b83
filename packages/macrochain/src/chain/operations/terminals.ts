import { Result, Severity } from "#result";
import {
  enclose,
  fillAll,
  isPlaceholder,
  paste,
  type Template,
  type Token,
} from "#tokens";

import { Error as ChainError, ErrorCode } from "../errors";
import {
  stop,
  type ChainOutput,
  type ChainedForm,
  type TerminalOperation,
} from "../operation";
import { controls, emptyStack } from "../stack";

type Substitution = "bare" | "enclosed";

/**
 * Template arguments split at top-level commas are rejoined with `,`
 */
export const joinTemplate = (args: readonly Template[]): Token[] =>
  args.flatMap((arg, i) => (i === 0 ? [...arg] : [",", ...arg]));

const consume =
  (name: string, substitution: Substitution, pasted: boolean): ChainedForm =>
  ({ args, loc }, state, next) => {
    if (next.kind !== "done") {
      return Result.err(
        new ChainError(
          ErrorCode.TERMINAL_NOT_LAST,
          `${name} followed by ${next.invocation.name}`,
          loc,
        ),
      );
    }

    const template = joinTemplate(args);
    const placeholders = template.filter(isPlaceholder).length;
    const [front] = state.stack;

    if (placeholders > 0 && front === undefined) {
      return Result.err(
        new ChainError(ErrorCode.STACK_UNDERFLOW, `${name} on an empty stack`, loc),
      );
    }

    const substituted =
      front === undefined
        ? template
        : fillAll(template, substitution === "enclosed" ? enclose(front) : front);
    const tokens =
      pasted && substituted.length > 0 ? [paste(substituted)] : substituted;
    const discarded = state.stack.length - (placeholders > 0 ? 1 : 0);

    const warnings =
      discarded > 0
        ? [
            new ChainError(
              ErrorCode.VALUES_DISCARDED,
              `${name} dropped ${discarded} value(s)`,
              loc,
              Severity.Warning,
            ),
          ]
        : [];

    // the consumer takes the whole stack
    const { trace } = controls.record({ ...state, stack: emptyStack }, name);
    const output: ChainOutput = {
      kind: "consumed",
      consumer: name,
      tokens,
      discarded,
      ...(trace ? { trace } : {}),
    };
    return Result.okWith(stop(output), warnings);
  };

const terminal = (
  name: string,
  substitution: Substitution,
  pasted = false,
): TerminalOperation => ({
  kind: "terminal",
  name,
  arity: { min: 0, max: Infinity },
  direct: ({ loc }) =>
    Result.err(new ChainError(ErrorCode.OUTSIDE_CHAIN, name, loc)),
  chained: consume(name, substitution, pasted),
});

/** Substitutes the bare front value */
export const unwrap = terminal("Unwrap", "bare");

/** Substitutes the front value with its delimiters */
export const print = terminal("Print", "enclosed");

/** As Unwrap, then pastes the result into a single token */
export const tokenize = terminal("Tokenize", "bare", true);
