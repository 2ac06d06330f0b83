import { InternalError, type MacroError } from "#errors";
import { Result } from "#result";

import type { Pass } from "./pass";

/**
 * Runs a pass, turning anything it throws into an internal error
 */
export async function runGuarded<I, O, E extends MacroError>(
  pass: Pass<{ needs: I; adds: O; error: E }>,
  input: I,
): Promise<Result<O, E | InternalError>> {
  try {
    return await pass.run(input);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Result.err(new InternalError(`Unexpected failure: ${message}`));
  }
}

/**
 * Compose two passes. The second sees the original input together with
 * everything the first added; the composite adds the outputs of both and
 * keeps the messages of both.
 */
export function compose<
  I extends object,
  M extends object,
  O extends object,
  E1 extends MacroError,
  E2 extends MacroError,
>(
  first: Pass<{ needs: I; adds: M; error: E1 }>,
  second: Pass<{ needs: I & M; adds: O; error: E2 }>,
): Pass<{ needs: I; adds: M & O; error: E1 | E2 | InternalError }> {
  return {
    async run(input) {
      const head = await runGuarded(first, input);
      if (!head.success) {
        return head;
      }
      const tail = await runGuarded(second, { ...input, ...head.value });
      const messages = Result.merge<E1 | E2 | InternalError>(
        head.messages,
        tail.messages,
      );
      if (!tail.success) {
        return { success: false, messages };
      }
      return {
        success: true,
        value: { ...head.value, ...tail.value },
        messages,
      };
    },
  };
}
