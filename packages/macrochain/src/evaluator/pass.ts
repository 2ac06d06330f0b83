import type { EngineOptions } from "#config";
import type { MacroError } from "#errors";
import type { Linked } from "#linker";
import type { Pass } from "#pipeline";
import { Result } from "#result";

import { evaluateItems, type Output } from "./evaluator";

/**
 * Evaluation pass - runs every linked item and renders the output
 */
export const pass: Pass<{
  needs: {
    linked: Linked;
    options: EngineOptions;
  };
  adds: {
    output: Output;
  };
  error: MacroError;
}> = {
  async run({ linked, options }) {
    return Result.map(evaluateItems(linked, options), (output) => ({ output }));
  },
};
