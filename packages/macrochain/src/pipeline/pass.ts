import type { MacroError } from "#errors";
import type { Result } from "#result";

/**
 * What a stage of evaluation reads, what it contributes, and the coded
 * error it may report. `needs` of a later stage is satisfied by the
 * source options plus the `adds` of every stage before it.
 */
export type PassConfig = {
  needs: unknown;
  adds: unknown;
  error: MacroError;
};

export type Needs<C extends PassConfig> = C["needs"];
export type Adds<C extends PassConfig> = C["adds"];
export type PassError<C extends PassConfig> = C["error"];

/**
 * One stage of turning macrochain source into output: options, parsing,
 * linking or evaluation
 */
export interface Pass<C extends PassConfig = PassConfig> {
  run: Run<C>;
}

// Diagnostics go into the result; a run never prints
export type Run<C extends PassConfig> = (
  input: Needs<C>,
) => Promise<Result<Adds<C>, PassError<C>>>;
